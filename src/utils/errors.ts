export enum ErrorCode {
  // Data Source Errors (1xxx)
  SOURCE_UNAVAILABLE = 1001,
  SOURCE_TIMEOUT = 1002,
  SOURCE_PAYLOAD_INVALID = 1003,

  // Configuration Errors (2xxx)
  CONFIG_INVALID = 2001,
  CONFIG_THRESHOLD_ORDER = 2002,

  // Analysis Errors (3xxx)
  INVALID_HISTORY_CAPACITY = 3001,
  CYCLE_CANCELLED = 3002,
  CYCLE_FAILED = 3003,

  // General Errors (9xxx)
  UNKNOWN_ERROR = 9000,
  INVALID_PARAMETER = 9002,
}

export interface ErrorDetails {
  code: ErrorCode;
  message: string;
  cause?: Error | undefined;
  context?: Record<string, unknown> | undefined;
  timestamp: Date;
  recoverable: boolean;
}

export class EngineError extends Error {
  readonly code: ErrorCode;
  override readonly cause?: Error | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly timestamp: Date;
  readonly recoverable: boolean;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      cause?: Error | undefined;
      context?: Record<string, unknown> | undefined;
      recoverable?: boolean | undefined;
    }
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.cause = options?.cause;
    this.context = options?.context;
    this.timestamp = new Date();
    this.recoverable = options?.recoverable ?? false;

    Error.captureStackTrace?.(this, EngineError);
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      cause: this.cause,
      context: this.context,
      timestamp: this.timestamp,
      recoverable: this.recoverable,
    };
  }

  static fromError(err: unknown, code: ErrorCode = ErrorCode.UNKNOWN_ERROR): EngineError {
    if (err instanceof EngineError) return err;
    if (err instanceof Error) {
      return new EngineError(code, err.message, { cause: err });
    }
    return new EngineError(code, String(err));
  }
}

/**
 * A collaborator returned nothing usable. The cycle carries on with empty
 * defaults for that source.
 */
export class DataUnavailableError extends EngineError {
  readonly source: string;

  constructor(
    source: string,
    message: string,
    options?: { code?: ErrorCode; cause?: Error | undefined; context?: Record<string, unknown> }
  ) {
    super(options?.code ?? ErrorCode.SOURCE_UNAVAILABLE, message, {
      cause: options?.cause,
      context: { source, ...options?.context },
      recoverable: true,
    });
    this.name = 'DataUnavailableError';
    this.source = source;
  }
}

export class ConfigurationError extends EngineError {
  constructor(
    message: string,
    options?: { code?: ErrorCode; cause?: Error; context?: Record<string, unknown> }
  ) {
    super(options?.code ?? ErrorCode.CONFIG_INVALID, message, {
      cause: options?.cause,
      context: options?.context,
      recoverable: false,
    });
    this.name = 'ConfigurationError';
  }
}

/** Raised at construction time when a caller breaks an API contract. */
export class ContractViolationError extends EngineError {
  constructor(
    code: ErrorCode,
    message: string,
    options?: { context?: Record<string, unknown> }
  ) {
    super(code, message, { context: options?.context, recoverable: false });
    this.name = 'ContractViolationError';
  }
}

export class CycleCancelledError extends EngineError {
  constructor(step: string, options?: { cause?: Error | undefined }) {
    super(ErrorCode.CYCLE_CANCELLED, `Analysis cycle cancelled before '${step}'`, {
      cause: options?.cause,
      context: { step },
      recoverable: true,
    });
    this.name = 'CycleCancelledError';
  }
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof EngineError) {
    return error.recoverable;
  }
  if (error instanceof Error) {
    const msg = error.message.toLowerCase();
    return (
      msg.includes('timeout') ||
      msg.includes('timed out') ||
      msg.includes('econnreset') ||
      msg.includes('econnrefused') ||
      msg.includes('etimedout')
    );
  }
  return false;
}

export function getErrorCode(error: unknown): ErrorCode {
  if (error instanceof EngineError) {
    return error.code;
  }
  return ErrorCode.UNKNOWN_ERROR;
}
