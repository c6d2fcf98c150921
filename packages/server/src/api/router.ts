/**
 * Central API Router
 *
 * Combines the health check, management routes and proxied environment routes
 * into a single router.
 * @module @tidewater/server/api/router
 */

import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import type { EnvironmentStatus } from '@tidewater/shared';
import type { AppContext } from '../context.js';
import {
  createAuthMiddleware,
  createCorrelationMiddleware,
  createErrorMiddleware,
  createNotFoundHandler,
  createRateLimitMiddleware,
  correlationIdFor,
  skipHealthChecks,
} from '../middleware/index.js';
import { createEndpointsRouter } from './endpoints.js';
import { createTunnelsRouter } from './tunnels.js';

/**
 * API router configuration options
 */
export interface ApiRouterOptions {
  /** Enable request logging (default: true) */
  enableLogging?: boolean;
  /** Enable rate limiting on management routes (default: true) */
  enableRateLimiting?: boolean;
  /** Requests per minute per client on management routes */
  rateLimitMax?: number;
}

/**
 * Health check response
 */
export interface HealthCheckResponse {
  status: 'healthy';
  timestamp: string;
  uptime: number;
  environments: Record<EnvironmentStatus, number>;
  tunnels: number;
}

const PROXIED_PATH = /^\/api\/endpoints\/[^/]+\/(docker|kubernetes)(\/|\?|$)/;

export function isProxiedPath(url: string): boolean {
  return PROXIED_PATH.test(url);
}

/**
 * GET /health - Liveness and a coarse view of environment status
 */
export function createHealthCheck(ctx: AppContext): RequestHandler {
  const startTime = Date.now();
  return (_req: Request, res: Response): void => {
    const response: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - startTime) / 1000),
      environments: { ...ctx.registry.statusCounts.value },
      tunnels: ctx.tunnels.count.value,
    };
    res.status(200).json(response);
  };
}

/**
 * Request logging middleware
 */
export function createRequestLoggingMiddleware(ctx: AppContext): RequestHandler {
  const logger = ctx.logger.child({ component: 'api-router' });
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();
    const requestLogger = logger.withCorrelationId(correlationIdFor(req));

    requestLogger.debug('Incoming request', {
      method: req.method,
      path: req.path,
      userAgent: req.headers['user-agent'],
      ip: req.ip ?? req.socket.remoteAddress,
    });

    res.on('finish', () => {
      const meta = {
        method: req.method,
        path: req.originalUrl,
        statusCode: res.statusCode,
        duration: Date.now() - startTime,
      };
      if (res.statusCode >= 400) {
        requestLogger.warn('Request completed', meta);
      } else {
        requestLogger.info('Request completed', meta);
      }
    });

    next();
  };
}

/**
 * Create the central API router
 */
export function createApiRouter(ctx: AppContext, options: ApiRouterOptions = {}): Router {
  const { enableLogging = true, enableRateLimiting = true, rateLimitMax } = options;
  const logger = ctx.logger.child({ component: 'api-router' });
  const router = Router();

  router.use(createCorrelationMiddleware());
  if (enableLogging) {
    router.use(createRequestLoggingMiddleware(ctx));
  }

  // Health check (no auth, no rate limiting)
  router.get('/health', createHealthCheck(ctx));

  const apiRouter = Router();

  // Proxied calls stream for as long as the backend keeps them open
  if (enableRateLimiting) {
    apiRouter.use(
      createRateLimitMiddleware({
        max: rateLimitMax,
        skip: (req) => skipHealthChecks(req) || isProxiedPath(req.originalUrl),
        logger,
      }),
    );
  }

  const auth: RequestHandler[] = ctx.identityProvider
    ? [createAuthMiddleware({ identityProvider: ctx.identityProvider, logger })]
    : [];

  apiRouter.use('/endpoints', createEndpointsRouter(ctx, auth));
  apiRouter.use('/tunnels', createTunnelsRouter(ctx, auth));

  router.use('/api', apiRouter);

  router.use(createNotFoundHandler());
  router.use(createErrorMiddleware(ctx.logger.child({ component: 'api-error' })));

  logger.debug('API router initialized', {
    rateLimiting: enableRateLimiting,
    requireAuth: auth.length > 0,
    routes: ['/health', '/api/endpoints', '/api/endpoints/:id/status', '/api/endpoints/:id/{docker,kubernetes}/*', '/api/tunnels'],
  });

  return router;
}
