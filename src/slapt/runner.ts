import type { Executor, ExecResult } from "../execution/executor.js";
import type { Command } from "../types/command.js";
import { ReconcileError, type ReconcileErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";
import { SlaptCommands, type GlobalFlags, type SlaptSettings } from "./commands.js";

/** Long-lived collaborators, created once at startup. */
export interface SlaptContext {
  readonly executor: Executor;
  readonly settings: SlaptSettings;
  /** 0 waits for slapt-get to exit however long it takes. */
  readonly timeoutMs: number;
}

/** One reconcile's view of slapt-get: commands bound to that request's flags. */
export interface SlaptSession {
  readonly executor: Executor;
  readonly commands: SlaptCommands;
  readonly timeoutMs: number;
}

export function openSession(ctx: SlaptContext, flags: GlobalFlags): SlaptSession {
  return {
    executor: ctx.executor,
    commands: new SlaptCommands(ctx.settings, flags),
    timeoutMs: ctx.timeoutMs,
  };
}

export async function run(session: SlaptSession, command: Command): Promise<ExecResult> {
  const result = await session.executor.execute(command, session.timeoutMs);
  logger.debug(
    { argv: command.argv, exitCode: result.exitCode, durationMs: result.durationMs },
    "slapt-get finished",
  );
  return result;
}

/** Run a command and turn a nonzero exit into a ReconcileError carrying the exit code and stderr. */
export async function runOrThrow(
  session: SlaptSession,
  command: Command,
  failure: { code: ReconcileErrorCode; message: string; package?: string },
): Promise<ExecResult> {
  const result = await run(session, command);
  if (result.exitCode !== 0) {
    logger.error({ argv: command.argv, exitCode: result.exitCode, stderr: result.stderr }, failure.message);
    throw new ReconcileError(failure.code, failure.message, {
      package: failure.package,
      exitCode: result.exitCode,
      stderr: result.stderr,
    });
  }
  return result;
}
