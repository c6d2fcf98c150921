/**
 * Middleware Module
 *
 * Re-exports all middleware for the server
 * @module @tidewater/server/middleware
 */

export {
  createAuthMiddleware,
  authenticateRequest,
  extractBearerToken,
  StaticTokenIdentityProvider,
  type ApiIdentity,
  type ApiRole,
  type IdentityProvider,
  type AuthMiddlewareOptions,
} from './auth-middleware.js';

export {
  defineAbilityFor,
  authorizeEnvironment,
  requireEnvironmentAccess,
  RoleAccessPolicy,
  type AccessPolicy,
  type AppAbility,
  type EnvironmentAction,
  type EnvironmentSubject,
  type EnvironmentAccessOptions,
} from './rbac-middleware.js';

export {
  createRateLimitMiddleware,
  skipHealthChecks,
  type RateLimitConfig,
} from './rate-limit-middleware.js';

export {
  createErrorMiddleware,
  createNotFoundHandler,
  toApiError,
  writeSocketError,
} from './error-middleware.js';

export {
  createCorrelationMiddleware,
  correlationIdFor,
  getIdentity,
  setIdentity,
  CORRELATION_HEADER,
} from './request-context.js';
