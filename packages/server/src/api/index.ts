/**
 * HTTP API
 * @module @tidewater/server/api
 */

export {
  createApiRouter,
  createHealthCheck,
  createRequestLoggingMiddleware,
  isProxiedPath,
  type ApiRouterOptions,
  type HealthCheckResponse,
} from './router.js';
export {
  createEndpointsRouter,
  filterAccessible,
  toEnvironmentView,
  type EnvironmentView,
  type EnvironmentStatusView,
} from './endpoints.js';
export { createTunnelsRouter } from './tunnels.js';
export {
  createUpgradeHandler,
  parseUpgradeTarget,
  type UpgradeHandler,
  type UpgradeTarget,
} from './upgrade.js';
