import type { SuccessResponse, ErrorResponse, ErrorCategory, ToolResponse } from "../types/response.js";
import type { RegisteredTool, ToolMetadata } from "../types/tool.js";
import { ReconcileError, ReconcileErrorCode } from "../shared/errors.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(tool: string, targetHost: string, durationMs: number, commandsExecuted: string[], data: Record<string, unknown>, extra?: Partial<SuccessResponse>): SuccessResponse {
  return { status: "success", tool, target_host: targetHost, duration_ms: durationMs, commands_executed: commandsExecuted, data, ...extra };
}

export function error(tool: string, targetHost: string, durationMs: number, commandsExecuted: string[], opts: { code: string; category: ErrorCategory; message: string; transient?: boolean; remediation?: string[] }): ErrorResponse {
  return {
    status: "error", tool, target_host: targetHost, duration_ms: durationMs, commands_executed: commandsExecuted,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    transient: opts.transient ?? false,
    remediation: opts.remediation ?? [],
  };
}

/**
 * Convert a ReconcileError into an ErrorResponse. The error code names the failed
 * step; category and remediation come from slapt-get's stderr.
 */
export function failure(tool: string, targetHost: string, durationMs: number, commandsExecuted: string[], err: ReconcileError): ErrorResponse {
  if (err.code === ReconcileErrorCode.INVALID_REQUEST) {
    return error(tool, targetHost, durationMs, commandsExecuted, {
      code: err.code, category: "validation", message: err.message,
      remediation: err.context?.issues ?? [],
    });
  }
  const stderr = err.context?.stderr ?? "";
  const cat = categorizeError(stderr);
  const response = error(tool, targetHost, durationMs, commandsExecuted, {
    code: err.code, category: cat.category, message: err.message,
    transient: cat.transient, remediation: cat.remediation,
  });
  return {
    ...response,
    package: err.context?.package,
    exit_code: err.context?.exitCode,
    stderr: stderr.trim(),
  };
}

// ── Error Categorization ───────────────────────────────────────────

interface ErrorPattern {
  test: (stderr: string) => boolean;
  category: ErrorCategory;
  transient: boolean;
  remediation: string[];
}

// Patterns receive lowercased stderr
const ERROR_PATTERNS: ErrorPattern[] = [
  { test: (s) => s.includes("enoent"),
    category: "not_found", transient: false,
    remediation: ["Install slapt-get or set slapt_get.path in config.yaml"] },
  { test: (s) => s.includes("permission denied") || s.includes("operation not permitted") || s.includes("must be root"),
    category: "privilege", transient: false,
    remediation: ["Run the server as root", "Check ownership of /var/slapt-get and /etc/slapt-get"] },
  { test: (s) => s.includes("unable to lock") || s.includes("already running"),
    category: "lock", transient: false,
    remediation: ["Another slapt-get process may be running", "Wait for it to complete, then retry"] },
  { test: (s) => s.includes("no space left on device"),
    category: "resource", transient: false,
    remediation: ["Free disk space", "Set clean_cache: all to drop cached packages"] },
  { test: (s) => s.includes("no such package"),
    category: "not_found", transient: false,
    remediation: ["Check the package name spelling", "Run slapt_query to list available versions", "Set update_cache: true to refresh the package list"] },
  { test: (s) => s.includes("signature") || s.includes("gpg"),
    category: "verification", transient: false,
    remediation: ["Set add_gpg_keys: true to import the source keys", "Set gpg_check: false only for sources you trust"] },
  { test: (s) => s.includes("md5") || s.includes("checksum"),
    category: "verification", transient: false,
    remediation: ["Set update_cache: true and retry", "Set clean_cache: all to drop corrupt downloads"] },
  { test: (s) => s.includes("dependenc"),
    category: "dependency", transient: false,
    remediation: ["Review the dependency details in stderr", "Retry with check_mode: true to preview the plan"] },
  { test: (s) => s.includes("failed to download") || s.includes("resolve host") || s.includes("connection timed out") || s.includes("network is unreachable"),
    category: "network", transient: true,
    remediation: ["Check network connectivity to the package sources", "Verify SOURCE lines in slapt-getrc"] },
];

export function categorizeError(stderr: string): { category: ErrorCategory; transient: boolean; remediation: string[] } {
  const lowered = stderr.toLowerCase();
  for (const p of ERROR_PATTERNS) {
    if (p.test(lowered)) {
      return { category: p.category, transient: p.transient, remediation: p.remediation };
    }
  }
  return { category: "state", transient: false, remediation: [
    "Review the stderr output for the specific error",
    "Retry with check_mode: true to preview the operation without executing",
  ] };
}

// ── Tool Definition Helper ─────────────────────────────────────────

export function defineTool(
  metadata: ToolMetadata,
  handler: (args: Record<string, unknown>) => Promise<ToolResponse>,
): RegisteredTool {
  return { metadata, execute: handler };
}
