#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { hostname } from "node:os";

import { logger } from "./logger.js";
import { commandTimeoutMs, loadConfig } from "./config/loader.js";
import { LocalExecutor } from "./execution/executor.js";
import type { PluginContext } from "./tools/context.js";
import type { ToolResponse } from "./types/response.js";
import { packageTools } from "./tools/packages/index.js";

async function main(): Promise<void> {
  logger.info("Starting slapt-reconcile-mcp server");

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, firstRun } = loadConfig(process.env.SLAPT_RECONCILE_CONFIG);
  logger.info({ configPath, firstRun, slaptGet: config.slapt_get.path }, "Configuration loaded");

  // ── Phase 2: Create executor and context ──────────────────────
  const executor = new LocalExecutor({ maxBufferBytes: config.output.max_buffer_mb * 1024 * 1024 });
  const ctx: PluginContext = {
    slapt: {
      executor,
      settings: {
        path: config.slapt_get.path,
        globalFlags: config.slapt_get.global_flags,
        environment: config.slapt_get.environment,
      },
      timeoutMs: commandTimeoutMs(config),
    },
    targetHost: hostname(),
  };

  // ── Phase 3: Build tool modules ───────────────────────────────
  const tools = packageTools(ctx);
  logger.info({ toolCount: tools.length }, "All tool modules built");

  // ── Phase 4: Create MCP server and expose tools ───────────────
  const server = new McpServer({
    name: "slapt-reconcile-mcp",
    version: "0.1.0",
  });

  for (const tool of tools) {
    const meta = tool.metadata;
    const name = meta.name;
    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: meta.inputShape,
        annotations: {
          readOnlyHint: meta.annotations?.readOnlyHint ?? false,
          destructiveHint: meta.annotations?.destructiveHint ?? false,
          idempotentHint: meta.annotations?.idempotentHint ?? false,
          openWorldHint: meta.annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>) => {
        try {
          const response: ToolResponse = await tool.execute(args);
          return {
            content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
            isError: response.status === "error",
          };
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.error({ tool: name, error: message }, "Tool execution error");
          return {
            content: [{
              type: "text" as const,
              text: JSON.stringify({
                status: "error",
                tool: name,
                target_host: ctx.targetHost,
                duration_ms: 0,
                commands_executed: [],
                error_code: "INTERNAL_ERROR",
                error_category: "state",
                message,
                transient: false,
                remediation: ["Check server logs for details"],
              }),
            }],
            isError: true,
          };
        }
      },
    );
  }

  // ── Phase 5: Connect transport ────────────────────────────────
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: tools.length, host: ctx.targetHost }, "slapt-reconcile-mcp server running on stdio");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
