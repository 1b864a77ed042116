import type { SlaptContext } from "../slapt/runner.js";

/**
 * Shared server context, created once at startup and passed to every tool module.
 */
export interface PluginContext {
  readonly slapt: SlaptContext;
  readonly targetHost: string;
}
