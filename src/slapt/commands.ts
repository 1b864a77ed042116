import type { Command } from "../types/command.js";
import type { ExecutionFlags } from "../types/slapt.js";

/** Every invocation carries this; slapt-get would otherwise wait on a [y/N] prompt. */
export const NO_PROMPT = "--no-prompt";

/** Where slapt-get lives and how every invocation starts; comes from config. */
export interface SlaptSettings {
  readonly path: string;
  /** Extra global switches, passed after --no-prompt. */
  readonly globalFlags: readonly string[];
  readonly environment: Readonly<Record<string, string>>;
}

/** Per-run toggles that become global switches. */
export type GlobalFlags = Pick<ExecutionFlags, "gpgCheck" | "ignoreDeps" | "ignoreChecksum" | "ignoreExcludes">;

/**
 * slapt-get command lines, laid out as
 * `<path> <global flags> [--simulate] <action switches> [targets]`.
 * The per-run flags are bound at construction so every command of one
 * reconcile carries the same global switches.
 */
export class SlaptCommands {
  private readonly flags: readonly string[];

  constructor(
    private readonly settings: SlaptSettings,
    flags: GlobalFlags,
  ) {
    this.flags = [
      NO_PROMPT,
      ...settings.globalFlags.filter((flag) => flag !== NO_PROMPT),
      ...(flags.gpgCheck ? [] : ["--allow-unauthenticated"]),
      ...(flags.ignoreDeps ? ["--no-dep"] : []),
      ...(flags.ignoreChecksum ? ["--no-md5"] : []),
      ...(flags.ignoreExcludes ? ["--ignore-excludes"] : []),
    ];
  }

  update(): Command {
    return this.build(["--update"]);
  }

  clean(mode: "all" | "old"): Command {
    return this.build([mode === "old" ? "--autoclean" : "--clean"]);
  }

  addKeys(): Command {
    return this.build(["--add-keys"]);
  }

  install(packages: readonly string[], options?: { noUpgrade?: boolean; simulate?: boolean }): Command {
    const action = options?.noUpgrade ? ["--install", "--no-upgrade"] : ["--install"];
    return this.build(action, packages, options?.simulate);
  }

  installSet(sets: readonly string[], options?: { simulate?: boolean }): Command {
    return this.build(["--install-set"], sets, options?.simulate);
  }

  remove(packages: readonly string[], options?: { noDep?: boolean; simulate?: boolean }): Command {
    const action = options?.noDep ? ["--remove", "--no-dep"] : ["--remove"];
    return this.build(action, packages, options?.simulate);
  }

  upgrade(mode: "standard" | "dist", options?: { simulate?: boolean }): Command {
    return this.build([mode === "dist" ? "--dist-upgrade" : "--upgrade"], [], options?.simulate);
  }

  search(pattern: string): Command {
    return this.build(["--search"], [pattern]);
  }

  private build(action: readonly string[], targets: readonly string[] = [], simulate = false): Command {
    return {
      argv: [this.settings.path, ...this.flags, ...(simulate ? ["--simulate"] : []), ...action, ...targets],
      env: this.settings.environment,
    };
  }
}
