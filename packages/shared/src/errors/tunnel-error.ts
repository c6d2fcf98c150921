/**
 * Tunnel error class
 * @module @tidewater/shared/errors/tunnel-error
 */

import { TidewaterError, ErrorCode, type ErrorMeta } from './base-error.js';
import type { HandshakeRejectCode } from '../types/tunnel.js';

/**
 * Errors raised by the reverse tunnel and its sub-connections
 */
export class TunnelError extends TidewaterError {
  /** Environment the tunnel serves */
  public readonly environmentId?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.SUB_CONNECTION_FAILED,
    meta: ErrorMeta = {},
    environmentId?: string,
    cause?: Error,
  ) {
    super(
      message,
      code,
      { ...meta, resourceType: 'tunnel', resourceId: environmentId },
      cause,
    );
    this.name = 'TunnelError';
    this.environmentId = environmentId;
  }

  /**
   * Agent handshake refused
   */
  static handshakeRejected(
    reason: HandshakeRejectCode,
    detail: string,
    environmentId?: string,
  ): TunnelError {
    return new TunnelError(
      `Tunnel handshake rejected: ${detail}`,
      ErrorCode.HANDSHAKE_REJECTED,
      { reason },
      environmentId,
    );
  }

  /**
   * Tunnel went away underneath an in-flight sub-connection
   */
  static lost(environmentId: string | undefined, reason: string): TunnelError {
    return new TunnelError(
      `Tunnel lost: ${reason}`,
      ErrorCode.TUNNEL_LOST,
      { reason },
      environmentId,
    );
  }

  /**
   * A single sub-connection failed; siblings are unaffected
   */
  static subConnectionFailed(
    streamId: number,
    reason: string,
    environmentId?: string,
    cause?: Error,
  ): TunnelError {
    return new TunnelError(
      `Sub-connection ${streamId} failed: ${reason}`,
      ErrorCode.SUB_CONNECTION_FAILED,
      { streamId, reason },
      environmentId,
      cause,
    );
  }

  static dialTimeout(streamId: number, timeoutMs: number, environmentId?: string): TunnelError {
    return new TunnelError(
      `Sub-connection ${streamId} not acknowledged within ${timeoutMs}ms`,
      ErrorCode.TUNNEL_DIAL_TIMEOUT,
      { streamId, timeoutMs },
      environmentId,
    );
  }
}

export function isTunnelError(error: unknown): error is TunnelError {
  return error instanceof TunnelError;
}
