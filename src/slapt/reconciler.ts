// Reconciler. Drives one request through the fixed pipeline
//   cache update → cache clean → key import → simulate → apply
// Every stage is optional and every failure is fatal: nothing is retried and
// packages applied before a failure stay applied.
import type { ReconcileRequest, ReconcileResult } from "../types/slapt.js";
import { ReconcileErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";
import { keepsInstalledVersion, planActions } from "./planner.js";
import { planSize } from "./parser.js";
import { openSession, runOrThrow, type SlaptContext } from "./runner.js";

export async function reconcile(ctx: SlaptContext, request: ReconcileRequest): Promise<ReconcileResult> {
  const session = openSession(ctx, request.flags);
  const { commands } = session;
  const checkMode = request.flags.checkMode;

  if (request.updateCache) {
    await runOrThrow(session, commands.update(), {
      code: ReconcileErrorCode.CACHE_UPDATE_FAILED,
      message: "Failed to update cache",
    });
  }

  if (request.cleanCache !== "none") {
    await runOrThrow(session, commands.clean(request.cleanCache), {
      code: ReconcileErrorCode.CACHE_CLEAN_FAILED,
      message: "Failed to clean cache",
    });
  }

  if (request.addGpgKeys) {
    await runOrThrow(session, commands.addKeys(), {
      code: ReconcileErrorCode.KEY_ADD_FAILED,
      message: "Failed to add GPG keys",
    });
  }

  const plan = await planActions(session, request);

  if (!checkMode) {
    const noUpgrade = keepsInstalledVersion(request);
    for (const pkg of plan.install) {
      await runOrThrow(session, commands.install([pkg], { noUpgrade }), {
        code: ReconcileErrorCode.INSTALL_FAILED,
        message: `Failed to install package ${pkg}`,
        package: pkg,
      });
    }
    for (const pkg of plan.upgrade) {
      await runOrThrow(session, commands.install([pkg]), {
        code: ReconcileErrorCode.INSTALL_FAILED,
        message: `Failed to install package ${pkg}`,
        package: pkg,
      });
    }
    for (const pkg of plan.remove) {
      await runOrThrow(session, commands.remove([pkg], { noDep: true }), {
        code: ReconcileErrorCode.REMOVE_FAILED,
        message: `Failed to remove package ${pkg}`,
        package: pkg,
      });
    }
  }

  const changed = !checkMode && planSize(plan) > 0;
  logger.info({ changed, checkMode }, "Reconcile complete");
  return {
    changed,
    packages: { installed: plan.install, upgraded: plan.upgrade, removed: plan.remove },
  };
}
