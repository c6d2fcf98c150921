/**
 * JSON control messages carried in tunnel WebSocket text frames
 * @module @tidewater/shared/tunnel/control
 */

import type {
  HandshakeRejectCode,
  TunnelAcceptPayload,
  TunnelHeartbeatPayload,
  TunnelHelloPayload,
  TunnelMessageType,
  TunnelRejectPayload,
  WsMessage,
} from '../types/tunnel.js';

const REJECT_CODES: readonly HandshakeRejectCode[] = [
  'INVALID_FRAME',
  'UNKNOWN_ENVIRONMENT',
  'NOT_EDGE_ENVIRONMENT',
  'INVALID_CREDENTIALS',
  'HANDSHAKE_TIMEOUT',
  'VERIFIER_ERROR',
];

export function encodeControl<T>(type: TunnelMessageType, payload: T, correlationId?: string): string {
  const message: WsMessage<T> = { type, payload };
  if (correlationId) {
    message.correlationId = correlationId;
  }
  return JSON.stringify(message);
}

/**
 * Parse a text frame into a control message envelope. Returns null for
 * anything that is not `{ type: string, payload }` JSON.
 */
export function parseControl(text: string): WsMessage<unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null || !('type' in parsed) || typeof parsed.type !== 'string') {
    return null;
  }

  const message: WsMessage<unknown> = {
    type: parsed.type,
    payload: 'payload' in parsed ? parsed.payload : undefined,
  };
  if ('correlationId' in parsed && typeof parsed.correlationId === 'string') {
    message.correlationId = parsed.correlationId;
  }
  return message;
}

export function isHelloPayload(payload: unknown): payload is TunnelHelloPayload {
  return (
    typeof payload === 'object' &&
    payload !== null &&
    'environmentId' in payload &&
    typeof payload.environmentId === 'string' &&
    payload.environmentId.length > 0 &&
    'token' in payload &&
    typeof payload.token === 'string' &&
    (!('agentVersion' in payload) || payload.agentVersion === undefined || typeof payload.agentVersion === 'string')
  );
}

export function isAcceptPayload(payload: unknown): payload is TunnelAcceptPayload {
  return (
    typeof payload === 'object' &&
    payload !== null &&
    'tunnelId' in payload &&
    typeof payload.tunnelId === 'string' &&
    'heartbeatIntervalMs' in payload &&
    typeof payload.heartbeatIntervalMs === 'number' &&
    payload.heartbeatIntervalMs > 0
  );
}

export function isRejectPayload(payload: unknown): payload is TunnelRejectPayload {
  if (typeof payload !== 'object' || payload === null || !('code' in payload) || !('reason' in payload)) {
    return false;
  }
  const { code, reason } = payload;
  return typeof reason === 'string' && REJECT_CODES.some((candidate) => candidate === code);
}

export function isHeartbeatPayload(payload: unknown): payload is TunnelHeartbeatPayload {
  return (
    typeof payload === 'object' &&
    payload !== null &&
    'timestamp' in payload &&
    typeof payload.timestamp === 'number'
  );
}
