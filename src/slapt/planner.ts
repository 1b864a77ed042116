import type { Command } from "../types/command.js";
import { emptyPlan, isRemoval, type ActionPlan, type ReconcileRequest } from "../types/slapt.js";
import { ReconcileErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";
import type { SlaptCommands } from "./commands.js";
import { parsePlan } from "./parser.js";
import { runOrThrow, type SlaptSession } from "./runner.js";

/**
 * Whether installs must leave an already-installed version alone.
 * `latest` allows upgrades for the whole request, whichever packages it names.
 */
export function keepsInstalledVersion(request: Pick<ReconcileRequest, "upgrade" | "state">): boolean {
  return request.upgrade === "none" && request.state !== "latest";
}

/**
 * The single dry run that answers a request, or null when the request only
 * touches the cache or keys. Named packages and a global upgrade never coexist.
 */
export function simulationFor(commands: SlaptCommands, request: ReconcileRequest): Command | null {
  if (request.packages.length > 0) {
    if (request.flags.installSet) return commands.installSet(request.packages, { simulate: true });
    if (isRemoval(request.state)) return commands.remove(request.packages, { simulate: true });
    return commands.install(request.packages, { noUpgrade: keepsInstalledVersion(request), simulate: true });
  }
  if (request.upgrade !== "none") return commands.upgrade(request.upgrade, { simulate: true });
  return null;
}

/** Ask slapt-get what it would do and parse the answer. */
export async function planActions(session: SlaptSession, request: ReconcileRequest): Promise<ActionPlan> {
  const command = simulationFor(session.commands, request);
  if (!command) return emptyPlan();

  const result = await runOrThrow(session, command, {
    code: ReconcileErrorCode.SIMULATION_FAILED,
    message: "Failed to simulate package changes",
  });
  const plan = parsePlan(result.stdout, { suggested: request.flags.suggested });
  logger.info(
    { install: plan.install.length, upgrade: plan.upgrade.length, remove: plan.remove.length },
    "Simulation planned",
  );
  return plan;
}
