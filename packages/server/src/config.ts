/**
 * Control plane configuration
 * @module @tidewater/server/config
 *
 * Values come from environment variables, are merged with explicit overrides
 * and validated once at startup.
 */

import fs from 'node:fs';
import {
  ErrorCode,
  ValidationError,
  isLogLevel,
  parseDuration,
  validateEndpointUrl,
  validateSnapshotInterval,
  type LogLevel,
  type ValidationErrorDetail,
} from '@tidewater/shared';

export interface ControlPlaneConfig {
  /** HTTP API bind address */
  host: string;
  port: number;
  /** Tunnel listener bind address */
  tunnelHost: string;
  tunnelPort: number;
  /** Accept edge agents at all */
  edgeCompute: boolean;
  heartbeatIntervalMs: number;
  heartbeatLossThreshold: number;
  snapshotIntervalMs: number;
  probeTimeoutMs: number;
  snapshotConcurrency: number;
  failureThreshold: number;
  cacheIdleEvictionMs: number;
  tunnelDialTimeoutMs: number;
  requestTimeoutMs: number;
  handshakeTimeoutMs: number;
  requireAuth: boolean;
  /** Bearer token accepted by the built-in identity provider */
  apiToken?: string;
  /** Seeds the `local` environment */
  endpointUrl?: string;
  corsOrigins: string[];
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: ControlPlaneConfig = {
  host: '0.0.0.0',
  port: 9000,
  tunnelHost: '0.0.0.0',
  tunnelPort: 8000,
  edgeCompute: true,
  heartbeatIntervalMs: 10_000,
  heartbeatLossThreshold: 2,
  snapshotIntervalMs: 5 * 60_000,
  probeTimeoutMs: 10_000,
  snapshotConcurrency: 5,
  failureThreshold: 2,
  cacheIdleEvictionMs: 10 * 60_000,
  tunnelDialTimeoutMs: 10_000,
  requestTimeoutMs: 60_000,
  handshakeTimeoutMs: 10_000,
  requireAuth: false,
  corsOrigins: ['http://localhost:*', 'http://127.0.0.1:*'],
  logLevel: 'info',
};

type Env = Record<string, string | undefined>;

class EnvReader {
  readonly errors: ValidationErrorDetail[] = [];

  constructor(private readonly env: Env) {}

  string(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }

  integer(name: string, field: string, min = 1): number | undefined {
    const raw = this.string(name);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min) {
      this.errors.push({ field, message: `${name} must be an integer >= ${min}`, rule: 'integer', received: raw });
      return undefined;
    }
    return value;
  }

  duration(name: string, field: string): number | undefined {
    const raw = this.string(name);
    if (raw === undefined) return undefined;
    const value = parseDuration(raw);
    if (value === null || value <= 0) {
      this.errors.push({ field, message: `${name} must be a duration such as 30s or 5m`, rule: 'duration', received: raw });
      return undefined;
    }
    return value;
  }

  boolean(name: string, field: string): boolean | undefined {
    const raw = this.string(name)?.toLowerCase();
    if (raw === undefined) return undefined;
    if (raw === 'true' || raw === '1' || raw === 'yes') return true;
    if (raw === 'false' || raw === '0' || raw === 'no') return false;
    this.errors.push({ field, message: `${name} must be true or false`, rule: 'boolean', received: raw });
    return undefined;
  }
}

/**
 * Read configuration overrides from environment variables. Invalid values
 * throw a ValidationError listing every problem.
 */
export function readEnvConfig(env: Env = process.env): Partial<ControlPlaneConfig> {
  const reader = new EnvReader(env);

  const snapshotRaw = reader.string('SNAPSHOT_INTERVAL');
  let snapshotIntervalMs: number | undefined;
  if (snapshotRaw !== undefined) {
    const result = validateSnapshotInterval(snapshotRaw);
    if (!result.valid) {
      throw result.error;
    }
    snapshotIntervalMs = result.value;
  }

  const logLevel = reader.string('LOG_LEVEL');
  if (logLevel !== undefined && !isLogLevel(logLevel)) {
    reader.errors.push({ field: 'logLevel', message: 'LOG_LEVEL must be debug, info, warn, error or fatal', rule: 'enum', received: logLevel });
  }

  const overrides: Partial<ControlPlaneConfig> = {};
  const assign = <K extends keyof ControlPlaneConfig>(key: K, value: ControlPlaneConfig[K] | undefined): void => {
    if (value !== undefined) {
      overrides[key] = value;
    }
  };

  assign('host', reader.string('HOST'));
  assign('port', reader.integer('PORT', 'port'));
  assign('tunnelHost', reader.string('TUNNEL_HOST'));
  assign('tunnelPort', reader.integer('TUNNEL_PORT', 'tunnelPort'));
  assign('edgeCompute', reader.boolean('EDGE_COMPUTE', 'edgeCompute'));
  assign('heartbeatIntervalMs', reader.duration('HEARTBEAT_INTERVAL', 'heartbeatIntervalMs'));
  assign('heartbeatLossThreshold', reader.integer('HEARTBEAT_LOSS_THRESHOLD', 'heartbeatLossThreshold'));
  assign('snapshotIntervalMs', snapshotIntervalMs);
  assign('probeTimeoutMs', reader.duration('SNAPSHOT_PROBE_TIMEOUT', 'probeTimeoutMs'));
  assign('snapshotConcurrency', reader.integer('SNAPSHOT_CONCURRENCY', 'snapshotConcurrency'));
  assign('failureThreshold', reader.integer('SNAPSHOT_FAILURE_THRESHOLD', 'failureThreshold'));
  assign('cacheIdleEvictionMs', reader.duration('CACHE_IDLE_EVICTION', 'cacheIdleEvictionMs'));
  assign('tunnelDialTimeoutMs', reader.duration('TUNNEL_DIAL_TIMEOUT', 'tunnelDialTimeoutMs'));
  assign('requestTimeoutMs', reader.duration('REQUEST_TIMEOUT', 'requestTimeoutMs'));
  assign('handshakeTimeoutMs', reader.duration('HANDSHAKE_TIMEOUT', 'handshakeTimeoutMs'));
  assign('requireAuth', reader.boolean('REQUIRE_AUTH', 'requireAuth'));
  assign('apiToken', reader.string('API_TOKEN'));
  assign('endpointUrl', reader.string('ENDPOINT_URL'));
  assign('corsOrigins', reader.string('CORS_ORIGINS')?.split(',').map((origin) => origin.trim()).filter(Boolean));
  assign('logLevel', isLogLevel(logLevel) ? logLevel : undefined);

  if (reader.errors.length > 0) {
    throw ValidationError.multiple(reader.errors);
  }
  return overrides;
}

/**
 * Check cross-field rules and the local endpoint. Throws a ValidationError.
 */
export function validateConfig(config: ControlPlaneConfig): ControlPlaneConfig {
  if (config.endpointUrl !== undefined) {
    const result = validateEndpointUrl(config.endpointUrl);
    if (!result.valid) {
      throw result.error;
    }
    const address = result.value;
    if ((address.protocol === 'unix' || address.protocol === 'npipe') && !fs.existsSync(address.socketPath)) {
      throw new ValidationError(
        'Unable to locate Unix socket or named pipe',
        [{ field: 'endpointUrl', message: `Nothing found at ${address.socketPath}`, rule: 'exists', received: config.endpointUrl }],
        { field: 'endpointUrl' },
        ErrorCode.INVALID_INPUT,
      );
    }
  }

  if (config.probeTimeoutMs >= config.snapshotIntervalMs) {
    throw ValidationError.field('probeTimeoutMs', 'Probe timeout must be shorter than the snapshot interval', 'range');
  }
  return config;
}

/**
 * Defaults, then environment variables, then explicit overrides
 */
export function loadConfig(overrides: Partial<ControlPlaneConfig> = {}, env: Env = process.env): ControlPlaneConfig {
  return validateConfig({ ...DEFAULT_CONFIG, ...readEnvConfig(env), ...overrides });
}
