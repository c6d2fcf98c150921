/**
 * Reverse tunnel types and wire messages
 * @module @tidewater/shared/types/tunnel
 */

/**
 * Tunnel lifecycle state
 */
export type TunnelState = 'active' | 'closing';

/**
 * Reason codes carried by `tunnel:reject`
 */
export type HandshakeRejectCode =
  | 'INVALID_FRAME'
  | 'UNKNOWN_ENVIRONMENT'
  | 'NOT_EDGE_ENVIRONMENT'
  | 'INVALID_CREDENTIALS'
  | 'HANDSHAKE_TIMEOUT'
  | 'VERIFIER_ERROR';

/**
 * Generic control message carried in text frames
 */
export interface WsMessage<T = unknown> {
  type: string;
  payload: T;
  correlationId?: string;
}

/**
 * Control message types
 */
export type TunnelMessageType =
  | 'tunnel:hello'
  | 'tunnel:accept'
  | 'tunnel:reject'
  | 'tunnel:heartbeat'
  | 'tunnel:heartbeat:ack'
  | 'tunnel:error';

/**
 * First frame an agent sends
 */
export interface TunnelHelloPayload {
  environmentId: string;
  token: string;
  agentVersion?: string;
}

export interface TunnelAcceptPayload {
  tunnelId: string;
  heartbeatIntervalMs: number;
}

export interface TunnelRejectPayload {
  code: HandshakeRejectCode;
  reason: string;
}

export interface TunnelHeartbeatPayload {
  timestamp: number;
}

/**
 * Read-only view of a tunnel for status APIs
 */
export interface TunnelSummary {
  tunnelId: string;
  environmentId: string;
  state: TunnelState;
  establishedAt: string;
  lastActivityAt: string;
  lastHeartbeatAt: string;
  remoteAddress?: string;
  agentVersion?: string;
  openStreams: number;
}

/**
 * Result of the external credential-verification capability
 */
export interface CredentialCheck {
  valid: boolean;
  reason?: string;
}

/**
 * External credential-verification capability used during the handshake
 */
export interface CredentialVerifier {
  verify(environmentId: string, token: string): Promise<CredentialCheck>;
}
