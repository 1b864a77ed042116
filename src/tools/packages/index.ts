import { z } from "zod";
import type { PluginContext } from "../context.js";
import type { RegisteredTool } from "../../types/tool.js";
import { defineTool, success, error, failure } from "../helpers.js";
import { RecordingExecutor } from "../../execution/executor.js";
import { ReconcileError } from "../../shared/errors.js";
import { reconcile } from "../../slapt/reconciler.js";
import { packageName, parseReconcileRequest, reconcileInputShape } from "../../slapt/request.js";
import { openSession } from "../../slapt/runner.js";
import { queryPackage } from "../../slapt/query.js";

const queryInputShape = {
  package: packageName.describe("Package name, without version"),
  latest: z.boolean().default(false).describe("Only report installed when the newest available version is installed"),
};

const QUERY_FLAGS = { gpgCheck: true, ignoreDeps: false, ignoreChecksum: false, ignoreExcludes: false };

/** The package tools, bound to one server context, in listing order. */
export function packageTools(ctx: PluginContext): RegisteredTool[] {
  // ── slapt_reconcile ─────────────────────────────────────────────
  const reconcileTool = defineTool({
    name: "slapt_reconcile",
    description: "Bring packages to the desired state with slapt-get: install, remove, upgrade, update or clean the cache, import GPG keys. Simulates first and only applies what changed; check_mode reports without applying.",
    inputShape: reconcileInputShape,
    annotations: { readOnlyHint: false, destructiveHint: true, idempotentHint: true, openWorldHint: true },
  }, async (args) => {
    const start = performance.now();
    const executor = new RecordingExecutor(ctx.slapt.executor);
    const elapsed = () => Math.round(performance.now() - start);
    try {
      const request = parseReconcileRequest(args);
      const result = await reconcile({ ...ctx.slapt, executor }, request);
      return success("slapt_reconcile", ctx.targetHost, elapsed(), executor.executed,
        { changed: result.changed, packages: result.packages },
        { check_mode: request.flags.checkMode },
      );
    } catch (err) {
      if (err instanceof ReconcileError) return failure("slapt_reconcile", ctx.targetHost, elapsed(), executor.executed, err);
      throw err;
    }
  });

  // ── slapt_query ─────────────────────────────────────────────────
  const queryTool = defineTool({
    name: "slapt_query",
    description: "Report whether a package is installed, and which versions slapt-get knows about.",
    inputShape: queryInputShape,
    annotations: { readOnlyHint: true, idempotentHint: true },
  }, async (args) => {
    const start = performance.now();
    const executor = new RecordingExecutor(ctx.slapt.executor);
    const elapsed = () => Math.round(performance.now() - start);
    const parsed = z.object(queryInputShape).safeParse(args);
    if (!parsed.success) {
      return error("slapt_query", ctx.targetHost, elapsed(), [], {
        code: "INVALID_REQUEST", category: "validation",
        message: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
      });
    }
    try {
      const session = openSession({ ...ctx.slapt, executor }, QUERY_FLAGS);
      const result = await queryPackage(session, parsed.data.package, { latest: parsed.data.latest });
      return success("slapt_query", ctx.targetHost, elapsed(), executor.executed, {
        package: result.name,
        installed: result.installed,
        candidates: result.candidates.map((c) => ({ id: c.id, version: c.version, arch: c.arch, build: c.build, installed: c.installed })),
      });
    } catch (err) {
      if (err instanceof ReconcileError) return failure("slapt_query", ctx.targetHost, elapsed(), executor.executed, err);
      throw err;
    }
  });

  return [reconcileTool, queryTool];
}
