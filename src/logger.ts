import pino from "pino";

export const logger = pino(
  {
    name: "slapt-reconcile",
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  },
  // stdout belongs to the MCP stdio transport
  pino.destination({ dest: 2, sync: true }),
);
