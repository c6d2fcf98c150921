/**
 * Error Middleware
 *
 * Maps thrown errors onto the error taxonomy and its HTTP status codes.
 *
 * @module @tidewater/server/middleware/error-middleware
 */

import { STATUS_CODES } from 'node:http';
import type { Duplex } from 'node:stream';
import type { ErrorRequestHandler, RequestHandler } from 'express';
import {
  ErrorCode,
  TidewaterError,
  createServiceLogger,
  isTidewaterError,
  wrapError,
  type Logger,
} from '@tidewater/shared';
import { correlationIdFor } from './request-context.js';

/**
 * Normalise anything thrown into a TidewaterError
 */
export function toApiError(error: unknown): TidewaterError {
  if (isTidewaterError(error)) {
    return error;
  }
  // body-parser and friends tag client errors with a status
  if (error instanceof Error && 'status' in error && error.status === 400) {
    return new TidewaterError(error.message, ErrorCode.INVALID_INPUT, {}, error);
  }
  return wrapError(error, ErrorCode.INTERNAL);
}

/**
 * Write an error as a complete HTTP response onto a raw socket and close it.
 * Used where no ServerResponse exists, such as refused upgrades.
 */
export function writeSocketError(socket: Duplex, error: TidewaterError): void {
  if (!socket.writable) {
    socket.destroy();
    return;
  }
  const body = JSON.stringify(error.toJSON());
  const head = [
    `HTTP/1.1 ${error.statusCode} ${STATUS_CODES[error.statusCode] ?? 'Error'}`,
    'Content-Type: application/json; charset=utf-8',
    `Content-Length: ${Buffer.byteLength(body)}`,
    'Connection: close',
  ];
  socket.end(`${head.join('\r\n')}\r\n\r\n${body}`);
}

export function createNotFoundHandler(): RequestHandler {
  return (req, _res, next) => {
    next(new TidewaterError(`Route ${req.method} ${req.path} not found`, ErrorCode.NOT_FOUND));
  };
}

export function createErrorMiddleware(logger: Logger = createServiceLogger({ component: 'api-error' })): ErrorRequestHandler {
  return (error: unknown, req, res, _next) => {
    const apiError = toApiError(error).withCorrelationId(correlationIdFor(req));

    if (apiError.isServerError()) {
      logger.error('Request failed', apiError, { method: req.method, path: req.originalUrl, ...apiError.toLog() });
    } else {
      logger.debug('Request rejected', { method: req.method, path: req.originalUrl, code: apiError.code });
    }

    if (res.headersSent) {
      res.destroy(apiError);
      return;
    }
    res.status(apiError.statusCode).json(apiError.toJSON());
  };
}
