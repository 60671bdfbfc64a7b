// packages/core/src/errors.ts
// Error taxonomy shared by the engine, the collaborators and the outer surfaces.

export enum ErrorCode {
  COLLABORATOR_UNAVAILABLE = 'COLLABORATOR_UNAVAILABLE',
  PROPOSAL_INVALID = 'PROPOSAL_INVALID',
  EXECUTION_ERROR = 'EXECUTION_ERROR',
  TIMEOUT = 'TIMEOUT',
  CANCELLED = 'CANCELLED',
  UNSAFE_SQL = 'UNSAFE_SQL',
  CONFIG_INVALID = 'CONFIG_INVALID',
  UNSUPPORTED_DIALECT = 'UNSUPPORTED_DIALECT',
  INTERNAL = 'INTERNAL'
}

export type Collaborator = 'database' | 'llm';

export class ShadowError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly recoverable: boolean,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ShadowError';
  }

  toJSON() {
    return { code: this.code, message: this.message, ...(this.details ? { details: this.details } : {}) };
  }
}

/** DB or LLM unreachable, or the LLM client exhausted its own retries. Always fatal. */
export class CollaboratorUnavailableError extends ShadowError {
  constructor(public readonly collaborator: Collaborator, message: string, details?: Record<string, unknown>) {
    super(ErrorCode.COLLABORATOR_UNAVAILABLE, message, false, { collaborator, ...details });
    this.name = 'CollaboratorUnavailableError';
  }
}

export class ProposalInvalidError extends ShadowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.PROPOSAL_INVALID, message, true, details);
    this.name = 'ProposalInvalidError';
  }
}

export class ExecutionError extends ShadowError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.EXECUTION_ERROR, message, true, details);
    this.name = 'ExecutionError';
  }
}

export class TimeoutError extends ShadowError {
  constructor(public readonly operation: string, public readonly timeoutMs: number) {
    super(ErrorCode.TIMEOUT, `${operation} timed out after ${timeoutMs} ms`, true, { operation, timeoutMs });
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends ShadowError {
  constructor(message = 'request cancelled by caller') {
    super(ErrorCode.CANCELLED, message, false);
    this.name = 'CancelledError';
  }
}

export class UnsafeSqlError extends ShadowError {
  constructor(message: string) {
    super(ErrorCode.UNSAFE_SQL, message, false);
    this.name = 'UnsafeSqlError';
  }
}

export class ConfigError extends ShadowError {
  constructor(message: string, issues?: Array<{ path: string; msg: string }>) {
    super(ErrorCode.CONFIG_INVALID, message, false, issues ? { issues } : undefined);
    this.name = 'ConfigError';
  }
}

export class UnsupportedDialectError extends ShadowError {
  constructor(public readonly dialect: string) {
    super(ErrorCode.UNSUPPORTED_DIALECT, `unsupported database dialect: ${dialect}`, false, { dialect });
    this.name = 'UnsupportedDialectError';
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

/** Normalizes anything thrown into the `{ code, message }` pair reported on outcomes. */
export function toOutcomeError(e: unknown): { code: string; message: string } {
  if (e instanceof ShadowError) return { code: e.code, message: e.message };
  return { code: ErrorCode.INTERNAL, message: errorMessage(e) };
}
