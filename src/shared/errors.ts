export enum ReconcileErrorCode {
  INVALID_REQUEST = 'INVALID_REQUEST',
  CACHE_UPDATE_FAILED = 'CACHE_UPDATE_FAILED',
  CACHE_CLEAN_FAILED = 'CACHE_CLEAN_FAILED',
  KEY_ADD_FAILED = 'KEY_ADD_FAILED',
  SIMULATION_FAILED = 'SIMULATION_FAILED',
  INSTALL_FAILED = 'INSTALL_FAILED',
  REMOVE_FAILED = 'REMOVE_FAILED',
  QUERY_FAILED = 'QUERY_FAILED',
}

export interface ReconcileErrorContext {
  readonly package?: string;
  readonly exitCode?: number;
  readonly stderr?: string;
  readonly issues?: string[];
}

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode;
  readonly context?: ReconcileErrorContext;

  constructor(code: ReconcileErrorCode, message: string, context?: ReconcileErrorContext) {
    super(message);
    this.name = 'ReconcileError';
    this.code = code;
    this.context = context;
  }
}
