/**
 * Proxy error class
 * @module @tidewater/shared/errors/proxy-error
 */

import { TidewaterError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * Errors surfaced to the calling layer by the endpoint proxy
 */
export class ProxyError extends TidewaterError {
  public readonly environmentId?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UPSTREAM_PROTOCOL_ERROR,
    meta: ErrorMeta = {},
    environmentId?: string,
    cause?: Error,
  ) {
    super(
      message,
      code,
      { ...meta, resourceType: 'environment', resourceId: environmentId },
      cause,
    );
    this.name = 'ProxyError';
    this.environmentId = environmentId;
  }

  static environmentUnreachable(environmentId: string, reason: string, cause?: Error): ProxyError {
    return new ProxyError(
      `Environment ${environmentId} is unreachable: ${reason}`,
      ErrorCode.ENVIRONMENT_UNREACHABLE,
      { reason },
      environmentId,
      cause,
    );
  }

  static environmentNotFound(environmentId: string): ProxyError {
    return new ProxyError(
      `Environment ${environmentId} not found`,
      ErrorCode.ENVIRONMENT_NOT_FOUND,
      {},
      environmentId,
    );
  }

  /**
   * Malformed environment connection descriptor
   */
  static configInvalid(environmentId: string, reason: string, field?: string): ProxyError {
    return new ProxyError(
      `Invalid configuration for environment ${environmentId}: ${reason}`,
      ErrorCode.CONFIG_INVALID,
      { reason, field },
      environmentId,
    );
  }

  static upstreamProtocolError(environmentId: string, reason: string, cause?: Error): ProxyError {
    return new ProxyError(
      `Upstream error from environment ${environmentId}: ${reason}`,
      ErrorCode.UPSTREAM_PROTOCOL_ERROR,
      { reason },
      environmentId,
      cause,
    );
  }

  static upgradeFailed(environmentId: string, reason: string, statusCode?: number): ProxyError {
    return new ProxyError(
      `Protocol upgrade to environment ${environmentId} failed: ${reason}`,
      ErrorCode.UPGRADE_FAILED,
      { reason, upstreamStatus: statusCode },
      environmentId,
    );
  }

  static apiFamilyMismatch(environmentId: string, requested: string, actual: string): ProxyError {
    return new ProxyError(
      `Environment ${environmentId} serves the ${actual} API, not ${requested}`,
      ErrorCode.API_FAMILY_MISMATCH,
      { requested, actual },
      environmentId,
    );
  }
}

export function isProxyError(error: unknown): error is ProxyError {
  return error instanceof ProxyError;
}

