/**
 * Per-request values shared between middleware and handlers
 * @module @tidewater/server/middleware/request-context
 */

import type { IncomingMessage } from 'node:http';
import type { RequestHandler } from 'express';
import { generateCorrelationId } from '@tidewater/shared';
import type { ApiIdentity } from './auth-middleware.js';

const correlationIds = new WeakMap<IncomingMessage, string>();
const identities = new WeakMap<IncomingMessage, ApiIdentity>();

export const CORRELATION_HEADER = 'x-correlation-id';

/**
 * Correlation id from the caller's header, or a fresh one. Remembered for the
 * lifetime of the request.
 */
export function correlationIdFor(req: IncomingMessage): string {
  const known = correlationIds.get(req);
  if (known) return known;

  const header = req.headers[CORRELATION_HEADER];
  const presented = Array.isArray(header) ? header[0] : header;
  const correlationId = presented && presented.length <= 128 ? presented : generateCorrelationId();
  correlationIds.set(req, correlationId);
  return correlationId;
}

export function setIdentity(req: IncomingMessage, identity: ApiIdentity): void {
  identities.set(req, identity);
}

/** Undefined when authentication is disabled */
export function getIdentity(req: IncomingMessage): ApiIdentity | undefined {
  return identities.get(req);
}

/**
 * Assign the correlation id and echo it back as `X-Correlation-ID`
 */
export function createCorrelationMiddleware(): RequestHandler {
  return (req, res, next) => {
    res.setHeader('X-Correlation-ID', correlationIdFor(req));
    next();
  };
}
