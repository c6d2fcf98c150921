/**
 * Shared type definitions
 * @module @tidewater/shared/types
 */

export type {
  ApiFamily,
  TransportKind,
  EnvironmentKind,
  EnvironmentStatus,
  TlsSettings,
  EnvironmentCredentials,
  ConnectionDescriptor,
  Environment,
} from './environment.js';

export {
  ENVIRONMENT_KINDS,
  API_FAMILIES,
  describeKind,
  isEnvironmentKind,
  isApiFamily,
  isEdgeEnvironment,
  defaultTunnelTarget,
} from './environment.js';

export type {
  TunnelState,
  HandshakeRejectCode,
  WsMessage,
  TunnelMessageType,
  TunnelHelloPayload,
  TunnelAcceptPayload,
  TunnelRejectPayload,
  TunnelHeartbeatPayload,
  TunnelSummary,
  CredentialCheck,
  CredentialVerifier,
} from './tunnel.js';
