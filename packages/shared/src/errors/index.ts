/**
 * Error classes for the control plane
 * @module @tidewater/shared/errors
 */

export {
  TidewaterError,
  ErrorCode,
  isTidewaterError,
  wrapError,
  toError,
} from './base-error.js';

export type { ErrorMeta } from './base-error.js';

export {
  ValidationError,
  isValidationError,
  validResult,
  invalidResult,
} from './validation-error.js';

export type {
  ValidationErrorDetail,
  ValidationResult,
} from './validation-error.js';

export {
  AuthenticationError,
  AuthorizationError,
  isAuthenticationError,
  isAuthorizationError,
} from './auth-error.js';

export { TunnelError, isTunnelError } from './tunnel-error.js';

export { ProxyError, isProxyError } from './proxy-error.js';
