/** Requested package state. `installed` is a synonym of `present`, `removed` of `absent`. */
export type DesiredState = "present" | "installed" | "latest" | "absent" | "removed";

/** Global upgrade requested instead of named packages. */
export type UpgradeMode = "none" | "standard" | "dist";

/** Package cache cleanup: everything (`--clean`) or only stale archives (`--autoclean`). */
export type CleanMode = "none" | "all" | "old";

/** Toggles that shape every slapt-get invocation of a run. */
export interface ExecutionFlags {
  /** false adds `--allow-unauthenticated`. */
  readonly gpgCheck: boolean;
  readonly ignoreDeps: boolean;
  readonly ignoreChecksum: boolean;
  readonly ignoreExcludes: boolean;
  readonly installSet: boolean;
  /** Fold the "Suggested packages:" section of a simulation into the install set. */
  readonly suggested: boolean;
  readonly checkMode: boolean;
}

/**
 * A validated reconcile request. Built once at the boundary by
 * parseReconcileRequest(); `packages` and a non-`none` upgrade never coexist.
 */
export interface ReconcileRequest {
  readonly packages: readonly string[];
  readonly state: DesiredState;
  readonly upgrade: UpgradeMode;
  readonly updateCache: boolean;
  readonly cleanCache: CleanMode;
  readonly addGpgKeys: boolean;
  readonly flags: ExecutionFlags;
}

export type PlanSection = "install" | "upgrade" | "remove";

/** Package names a simulation says would be installed, upgraded or removed. */
export type ActionPlan = Record<PlanSection, string[]>;

export interface ReconcileResult {
  readonly changed: boolean;
  readonly packages: {
    readonly installed: string[];
    readonly upgraded: string[];
    readonly removed: string[];
  };
}

export function emptyPlan(): ActionPlan {
  return { install: [], upgrade: [], remove: [] };
}

export function isRemoval(state: DesiredState): boolean {
  return state === "absent" || state === "removed";
}
