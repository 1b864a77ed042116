import { z } from "zod";
import type { CleanMode, ReconcileRequest, UpgradeMode } from "../types/slapt.js";
import { ReconcileError, ReconcileErrorCode } from "../shared/errors.js";

/** A single slapt-get target: never a switch, never several words. */
export const packageName = z.string().min(1).regex(/^[^-\s]\S*$/, "must not start with '-' or contain whitespace");

/** Raw input fields; also the MCP input shape of slapt_reconcile. */
export const reconcileInputShape = {
  package: z.array(packageName).optional().describe("Package names (or install-set names) to act on. Mutually exclusive with upgrade."),
  state: z.enum(["present", "installed", "latest", "absent", "removed"]).default("present")
    .describe("Desired package state. installed = present, removed = absent."),
  upgrade: z.enum(["yes", "no", "dist"]).default("no").describe("Upgrade all packages (yes) or run a dist-upgrade (dist)."),
  install_set: z.boolean().default(false).describe("Treat package names as install sets."),
  suggested: z.boolean().default(false).describe("Also install packages slapt-get lists as suggested."),
  add_gpg_keys: z.boolean().default(false).describe("Import GPG keys of configured sources before planning."),
  update_cache: z.boolean().default(false).describe("Refresh the package cache before planning."),
  clean_cache: z.enum(["all", "yes", "old", "no"]).default("no").describe("Clean the package cache: all/yes removes everything, old only stale archives."),
  gpg_check: z.boolean().default(true).describe("Set false to allow unauthenticated packages."),
  ignore_excludes: z.boolean().default(false).describe("Ignore the exclude list of slapt-getrc."),
  ignore_deps: z.boolean().default(false).describe("Skip dependency checks."),
  ignore_checksum: z.boolean().default(false).describe("Skip MD5 checksum verification."),
  check_mode: z.boolean().default(false).describe("Report what would change without changing anything."),
};

export const reconcileInputSchema = z.object(reconcileInputShape).superRefine((input, ctx) => {
  const hasPackages = (input.package?.length ?? 0) > 0;
  if (hasPackages && input.upgrade !== "no") {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["upgrade"],
      message: "parameters are mutually exclusive: package, upgrade",
    });
  }
  if (!hasPackages && input.upgrade === "no" && !input.update_cache) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: [],
      message: "one of the following is required: package, upgrade, update_cache",
    });
  }
});

export type ReconcileInput = z.infer<typeof reconcileInputSchema>;

const UPGRADE_MODES: Record<ReconcileInput["upgrade"], UpgradeMode> = { yes: "standard", no: "none", dist: "dist" };
const CLEAN_MODES: Record<ReconcileInput["clean_cache"], CleanMode> = { all: "all", yes: "all", old: "old", no: "none" };

export function toReconcileRequest(input: ReconcileInput): ReconcileRequest {
  return {
    packages: input.package ?? [],
    state: input.state,
    upgrade: UPGRADE_MODES[input.upgrade],
    updateCache: input.update_cache,
    cleanCache: CLEAN_MODES[input.clean_cache],
    addGpgKeys: input.add_gpg_keys,
    flags: {
      gpgCheck: input.gpg_check,
      ignoreDeps: input.ignore_deps,
      ignoreChecksum: input.ignore_checksum,
      ignoreExcludes: input.ignore_excludes,
      installSet: input.install_set,
      suggested: input.suggested,
      checkMode: input.check_mode,
    },
  };
}

/** Validate untyped input before anything is spawned. */
export function parseReconcileRequest(raw: unknown): ReconcileRequest {
  const result = reconcileInputSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
    throw new ReconcileError(ReconcileErrorCode.INVALID_REQUEST, issues.join("; "), { issues });
  }
  return toReconcileRequest(result.data);
}
