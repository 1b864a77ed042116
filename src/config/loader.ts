// Config loader: reads ~/.config/slapt-reconcile/config.yaml and deep-merges it over defaults.
// On first run (no config file), writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// The merged object is validated against reconcilerConfigSchema; a file that fails
// validation is reported and ignored rather than half-applied.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { reconcilerConfigSchema, type ReconcilerConfig } from "../types/config.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "slapt-reconcile");
const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

/** slapt-get output is only parseable in the C locale. */
const C_LOCALE_ENV: Readonly<Record<string, string>> = {
  LANG: "C",
  LC_ALL: "C",
  LC_MESSAGES: "C",
  LC_CTYPE: "C",
};

export const DEFAULT_CONFIG: ReconcilerConfig = {
  slapt_get: {
    path: "/usr/sbin/slapt-get",
    global_flags: [],
    environment: { ...C_LOCALE_ENV },
  },
  errors: { command_timeout_ceiling: 0 },
  output: { max_buffer_mb: 10 },
};

/** Default config YAML written on first run. */
const DEFAULT_CONFIG_YAML = `# slapt-reconcile — Configuration
# Generated automatically on first run. All values shown are defaults.

slapt_get:
  path: /usr/sbin/slapt-get
  # Extra switches passed before the action switch; --no-prompt is always passed
  global_flags: []
  # Merged over the server's environment for every invocation
  environment:
    LANG: C
    LC_ALL: C
    LC_MESSAGES: C
    LC_CTYPE: C

errors:
  # Seconds before a slapt-get run is killed; 0 disables the limit
  command_timeout_ceiling: 0

output:
  max_buffer_mb: 10
`;

export interface ConfigResult {
  config: ReconcilerConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found — generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: true };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to parse config — using defaults");
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: false };
  }

  const merged = deepMerge(DEFAULT_CONFIG, isRecord(parsed) ? parsed : {});
  const result = reconcilerConfigSchema.safeParse(merged);
  if (!result.success) {
    logger.error(
      { configPath, issues: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) },
      "Invalid config — using defaults",
    );
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: false };
  }
  return { config: result.data, configPath, firstRun: false };
}

/** Milliseconds handed to the executor; 0 means no limit. */
export function commandTimeoutMs(config: ReconcilerConfig): number {
  return config.errors.command_timeout_ceiling * 1000;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
export function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
