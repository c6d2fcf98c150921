/**
 * Rate Limiting Middleware
 *
 * Limits request rates per client on the management routes. Proxied calls
 * are not limited here; they carry long-lived streams and are throttled by
 * the backends themselves.
 *
 * @module @tidewater/server/middleware/rate-limit-middleware
 */

import type { Request } from 'express';
import rateLimit, { type RateLimitRequestHandler } from 'express-rate-limit';
import { ErrorCode, TidewaterError, createServiceLogger, type Logger } from '@tidewater/shared';
import { correlationIdFor } from './request-context.js';

export interface RateLimitConfig {
  /** Window duration in milliseconds (default: 1 minute) */
  windowMs?: number;
  /** Maximum requests per window (default: 300) */
  max?: number;
  /** Skip rate limiting for certain requests */
  skip?: (req: Request) => boolean;
  logger?: Logger;
}

/**
 * Health checks are never limited
 */
export function skipHealthChecks(req: Request): boolean {
  return req.path === '/health';
}

/**
 * Create a rate limiting middleware. Rejections go to the error middleware
 * as RATE_LIMITED (429).
 */
export function createRateLimitMiddleware(config: RateLimitConfig = {}): RateLimitRequestHandler {
  const logger = config.logger ?? createServiceLogger({ component: 'rate-limit' });
  const windowMs = config.windowMs ?? 60_000;
  const limit = config.max ?? 300;

  return rateLimit({
    windowMs,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    skip: config.skip ?? skipHealthChecks,
    handler: (req, _res, next) => {
      logger.warn('Rate limit exceeded', {
        correlationId: correlationIdFor(req),
        ip: req.ip,
        method: req.method,
        path: req.path,
      });
      next(
        new TidewaterError('Too many requests, please try again later', ErrorCode.RATE_LIMITED, {
          limit,
          windowMs,
        }),
      );
    },
  });
}
