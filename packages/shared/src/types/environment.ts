/**
 * Environment types
 * @module @tidewater/shared/types/environment
 */

/**
 * Backend API families the proxy forwards to
 */
export type ApiFamily = 'docker' | 'kubernetes';

/**
 * How the control plane reaches an environment
 */
export type TransportKind = 'socket' | 'http' | 'tunnel';

/**
 * Environment kind: transport specialised per API family
 */
export type EnvironmentKind =
  | 'docker-socket'
  | 'docker-http'
  | 'docker-tunnel'
  | 'kubernetes-socket'
  | 'kubernetes-http'
  | 'kubernetes-tunnel';

export const ENVIRONMENT_KINDS: readonly EnvironmentKind[] = [
  'docker-socket',
  'docker-http',
  'docker-tunnel',
  'kubernetes-socket',
  'kubernetes-http',
  'kubernetes-tunnel',
];

export const API_FAMILIES: readonly ApiFamily[] = ['docker', 'kubernetes'];

/**
 * Liveness status. Written only by the status service.
 */
export type EnvironmentStatus = 'up' | 'down' | 'unknown';

/**
 * TLS parameters for direct HTTP transports (PEM contents, not paths)
 */
export interface TlsSettings {
  enabled: boolean;
  /** Skip server certificate verification */
  skipVerify?: boolean;
  ca?: string;
  cert?: string;
  key?: string;
}

/**
 * Environment-scoped credentials injected into forwarded calls
 */
export interface EnvironmentCredentials {
  /** Sent as `Authorization: Bearer <token>` */
  bearerToken?: string;
  /** Extra headers added to every forwarded call */
  headers?: Record<string, string>;
}

/**
 * Where and how to connect
 */
export interface ConnectionDescriptor {
  /**
   * `unix:///path`, `npipe:///path`, `tcp://host:port`, `http://…` or `https://…`.
   * Unused for tunnel transports.
   */
  url: string;
  tls?: TlsSettings;
  credentials?: EnvironmentCredentials;
  /** Address inside the agent's network that tunnel sub-connections open to */
  tunnelTarget?: string;
}

/**
 * A managed container or cluster target
 */
export interface Environment {
  id: string;
  name: string;
  kind: EnvironmentKind;
  connection: ConnectionDescriptor;
  status: EnvironmentStatus;
  lastProbeAt?: Date;
  lastStatusChangeAt?: Date;
  /** SHA-256 hex digest of the edge agent credential */
  edgeKeyHash?: string;
}

/**
 * Parse an environment kind into transport and API family
 */
export function describeKind(kind: EnvironmentKind): { api: ApiFamily; transport: TransportKind } {
  switch (kind) {
    case 'docker-socket':
      return { api: 'docker', transport: 'socket' };
    case 'docker-http':
      return { api: 'docker', transport: 'http' };
    case 'docker-tunnel':
      return { api: 'docker', transport: 'tunnel' };
    case 'kubernetes-socket':
      return { api: 'kubernetes', transport: 'socket' };
    case 'kubernetes-http':
      return { api: 'kubernetes', transport: 'http' };
    case 'kubernetes-tunnel':
      return { api: 'kubernetes', transport: 'tunnel' };
  }
}

export function isEnvironmentKind(value: unknown): value is EnvironmentKind {
  return typeof value === 'string' && ENVIRONMENT_KINDS.some((kind) => kind === value);
}

export function isApiFamily(value: unknown): value is ApiFamily {
  return typeof value === 'string' && API_FAMILIES.some((family) => family === value);
}

export function isEdgeEnvironment(environment: Pick<Environment, 'kind'>): boolean {
  return describeKind(environment.kind).transport === 'tunnel';
}

/**
 * Default sub-connection target for tunnel-routed environments
 */
export function defaultTunnelTarget(api: ApiFamily): string {
  return api === 'docker' ? 'unix:///var/run/docker.sock' : 'tcp://127.0.0.1:8001';
}
