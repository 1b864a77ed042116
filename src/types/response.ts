/** Error categories reported to the MCP client. */
export type ErrorCategory =
  | "privilege"
  | "not_found"
  | "dependency"
  | "resource"
  | "lock"
  | "network"
  | "verification"
  | "validation"
  | "state";

/** Base fields present in every response. */
export interface ResponseBase {
  status: "success" | "error";
  tool: string;
  target_host: string;
  duration_ms: number;
  commands_executed: string[];
}

/** Successful response with tool-specific data. */
export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
  changed?: boolean;
  check_mode?: boolean;
}

export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  transient: boolean;
  remediation: string[];
  // Populated when a slapt-get invocation failed
  package?: string;
  exit_code?: number;
  stderr?: string;
}

export type ToolResponse = SuccessResponse | ErrorResponse;
