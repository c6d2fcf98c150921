/**
 * Authentication/Authorization error classes
 * @module @tidewater/shared/errors/auth-error
 */

import { TidewaterError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * Authentication error for missing or invalid API credentials
 */
export class AuthenticationError extends TidewaterError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.AUTHENTICATION_REQUIRED,
    meta: ErrorMeta = {},
  ) {
    super(message, code, meta);
    this.name = 'AuthenticationError';
  }

  static required(): AuthenticationError {
    return new AuthenticationError('Authentication required', ErrorCode.AUTHENTICATION_REQUIRED);
  }

  static invalidCredentials(reason?: string): AuthenticationError {
    return new AuthenticationError(
      reason ? `Invalid credentials: ${reason}` : 'Invalid credentials',
      ErrorCode.INVALID_CREDENTIALS,
    );
  }
}

/**
 * Authorization error for access denials on an environment
 */
export class AuthorizationError extends TidewaterError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.FORBIDDEN,
    meta: ErrorMeta = {},
  ) {
    super(message, code, meta);
    this.name = 'AuthorizationError';
  }

  static environmentAccessDenied(environmentId: string, userId?: string): AuthorizationError {
    return new AuthorizationError(
      `Access to environment ${environmentId} denied`,
      ErrorCode.RESOURCE_ACCESS_DENIED,
      { resourceType: 'environment', resourceId: environmentId, userId },
    );
  }
}

export function isAuthenticationError(error: unknown): error is AuthenticationError {
  return error instanceof AuthenticationError;
}

export function isAuthorizationError(error: unknown): error is AuthorizationError {
  return error instanceof AuthorizationError;
}
