/**
 * Base error class with error codes
 * @module @tidewater/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,
  TIMEOUT = 1003,
  CANCELLED = 1004,
  NOT_FOUND = 1005,
  RATE_LIMITED = 1006,

  // Validation errors (2xxx)
  VALIDATION_FAILED = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED_FIELD = 2002,
  INVALID_FORMAT = 2003,
  OUT_OF_RANGE = 2004,

  // Authentication errors (3xxx)
  AUTHENTICATION_REQUIRED = 3000,
  INVALID_CREDENTIALS = 3001,

  // Authorization errors (4xxx)
  FORBIDDEN = 4000,
  RESOURCE_ACCESS_DENIED = 4003,

  // Tunnel errors (6xxx)
  HANDSHAKE_REJECTED = 6000,
  TUNNEL_LOST = 6001,
  SUB_CONNECTION_FAILED = 6002,
  TUNNEL_DIAL_TIMEOUT = 6003,

  // Proxy errors (7xxx)
  ENVIRONMENT_UNREACHABLE = 7000,
  CONFIG_INVALID = 7001,
  UPSTREAM_PROTOCOL_ERROR = 7002,
  UPGRADE_FAILED = 7003,
  ENVIRONMENT_NOT_FOUND = 7004,
  API_FAMILY_MISMATCH = 7005,
}

/**
 * HTTP status for codes that do not follow their category default
 */
const STATUS_OVERRIDES: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.TIMEOUT]: 504,
  [ErrorCode.CANCELLED]: 499,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.RATE_LIMITED]: 429,
  [ErrorCode.HANDSHAKE_REJECTED]: 401,
  [ErrorCode.TUNNEL_LOST]: 503,
  [ErrorCode.SUB_CONNECTION_FAILED]: 502,
  [ErrorCode.TUNNEL_DIAL_TIMEOUT]: 504,
  [ErrorCode.ENVIRONMENT_UNREACHABLE]: 503,
  [ErrorCode.CONFIG_INVALID]: 500,
  [ErrorCode.UPSTREAM_PROTOCOL_ERROR]: 502,
  [ErrorCode.UPGRADE_FAILED]: 502,
  [ErrorCode.ENVIRONMENT_NOT_FOUND]: 404,
  [ErrorCode.API_FAMILY_MISMATCH]: 404,
};

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Resource type involved */
  resourceType?: string;
  /** Resource ID involved */
  resourceId?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Base error class for all control plane errors
 */
export class TidewaterError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** HTTP status code equivalent */
  public readonly statusCode: number;
  public readonly meta: ErrorMeta;
  public readonly timestamp: Date;
  /** Correlation ID for tracing */
  public correlationId?: string;
  /** Original error if this wraps another */
  public readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message);
    this.name = 'TidewaterError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();
    this.cause = cause;
    this.statusCode = TidewaterError.statusFor(code);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Map error code to HTTP status code
   */
  static statusFor(code: ErrorCode): number {
    const override = STATUS_OVERRIDES[code];
    if (override !== undefined) {
      return override;
    }

    switch (Math.floor(code / 1000)) {
      case 2: // Validation
        return 400;
      case 3: // Authentication
        return 401;
      case 4: // Authorization
        return 403;
      default:
        return 500;
    }
  }

  withCorrelationId(correlationId: string): this {
    this.correlationId = correlationId;
    return this;
  }

  /**
   * Convert to JSON for API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: {
        name: this.name,
        code: this.code,
        message: this.message,
        meta: this.meta,
        timestamp: this.timestamp.toISOString(),
        correlationId: this.correlationId,
      },
    };
  }

  /**
   * Convert to log-friendly format
   */
  toLog(): Record<string, unknown> {
    return {
      error: this.name,
      code: this.code,
      message: this.message,
      meta: this.meta,
      timestamp: this.timestamp.toISOString(),
      correlationId: this.correlationId,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  isClientError(): boolean {
    return this.statusCode >= 400 && this.statusCode < 500;
  }

  isServerError(): boolean {
    return this.statusCode >= 500;
  }

  /**
   * Check if this error is retryable
   */
  isRetryable(): boolean {
    return [
      ErrorCode.TIMEOUT,
      ErrorCode.TUNNEL_DIAL_TIMEOUT,
      ErrorCode.SUB_CONNECTION_FAILED,
      ErrorCode.ENVIRONMENT_UNREACHABLE,
    ].includes(this.code);
  }
}

/**
 * Check if an error is a TidewaterError
 */
export function isTidewaterError(error: unknown): error is TidewaterError {
  return error instanceof TidewaterError;
}

/**
 * Wrap an unknown error as a TidewaterError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.UNKNOWN): TidewaterError {
  if (isTidewaterError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new TidewaterError(error.message, code, {}, error);
  }

  return new TidewaterError(String(error), code);
}

/**
 * Normalise an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
