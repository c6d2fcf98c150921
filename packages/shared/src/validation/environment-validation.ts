/**
 * Environment record and connection descriptor validation
 * @module @tidewater/shared/validation/environment-validation
 */

import {
  describeKind,
  isEnvironmentKind,
  type ConnectionDescriptor,
  type Environment,
  type EnvironmentCredentials,
  type EnvironmentKind,
  type EnvironmentStatus,
  type TlsSettings,
} from '../types/environment.js';
import {
  ValidationError,
  invalidResult,
  validResult,
  type ValidationErrorDetail,
  type ValidationResult,
} from '../errors/validation-error.js';
import { ErrorCode } from '../errors/base-error.js';
import { parseDuration } from '../utils/duration.js';
import { parseEndpointUrl, parseTunnelTarget, type EndpointAddress } from './endpoint-url.js';

/**
 * Environment id pattern: used as a path segment and store key suffix
 */
const ENVIRONMENT_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]{0,127}$/;

const ENVIRONMENT_STATUSES: readonly EnvironmentStatus[] = ['up', 'down', 'unknown'];

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringMap(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'string');
}

function isEnvironmentStatus(value: unknown): value is EnvironmentStatus {
  return typeof value === 'string' && ENVIRONMENT_STATUSES.some((status) => status === value);
}

/**
 * Validate an environment identifier
 */
export function validateEnvironmentId(id: unknown): ValidationErrorDetail | null {
  if (typeof id !== 'string' || id.length === 0) {
    return { field: 'id', message: 'Environment id is required', rule: 'required' };
  }

  if (!ENVIRONMENT_ID_PATTERN.test(id)) {
    return {
      field: 'id',
      message:
        'Environment id must start with an alphanumeric character and contain only alphanumerics, dots, hyphens and underscores',
      rule: 'format',
      received: id,
    };
  }

  return null;
}

function validateTls(tls: unknown, errors: ValidationErrorDetail[]): TlsSettings | undefined {
  if (tls === undefined) return undefined;
  if (!isRecord(tls) || typeof tls.enabled !== 'boolean') {
    errors.push({ field: 'connection.tls.enabled', message: 'TLS enabled flag must be a boolean', rule: 'type' });
    return undefined;
  }

  const settings: TlsSettings = { enabled: tls.enabled };
  if (tls.skipVerify !== undefined) {
    if (typeof tls.skipVerify !== 'boolean') {
      errors.push({ field: 'connection.tls.skipVerify', message: 'skipVerify must be a boolean', rule: 'type' });
    } else {
      settings.skipVerify = tls.skipVerify;
    }
  }

  for (const key of ['ca', 'cert', 'key'] as const) {
    const value = tls[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || !value.includes('-----BEGIN')) {
      errors.push({ field: `connection.tls.${key}`, message: 'Expected PEM encoded contents', rule: 'format' });
      continue;
    }
    settings[key] = value;
  }

  if ((settings.cert === undefined) !== (settings.key === undefined)) {
    errors.push({
      field: 'connection.tls',
      message: 'A client certificate and key must be provided together',
      rule: 'pair',
    });
  }

  return settings;
}

function validateCredentials(
  credentials: unknown,
  errors: ValidationErrorDetail[],
): EnvironmentCredentials | undefined {
  if (credentials === undefined) return undefined;
  if (!isRecord(credentials)) {
    errors.push({ field: 'connection.credentials', message: 'Credentials must be an object', rule: 'type' });
    return undefined;
  }

  const result: EnvironmentCredentials = {};
  if (credentials.bearerToken !== undefined) {
    if (typeof credentials.bearerToken !== 'string' || credentials.bearerToken.length === 0) {
      errors.push({
        field: 'connection.credentials.bearerToken',
        message: 'Bearer token must be a non-empty string',
        rule: 'type',
      });
    } else {
      result.bearerToken = credentials.bearerToken;
    }
  }

  if (credentials.headers !== undefined) {
    if (!isStringMap(credentials.headers)) {
      errors.push({
        field: 'connection.credentials.headers',
        message: 'Headers must map names to string values',
        rule: 'type',
      });
    } else {
      result.headers = { ...credentials.headers };
    }
  }

  return result;
}

/**
 * Validate a connection descriptor against the transport its kind selects.
 * Returns the list of problems; empty when valid.
 */
export function validateConnectionDescriptor(
  kind: EnvironmentKind,
  connection: unknown,
): ValidationErrorDetail[] {
  const errors: ValidationErrorDetail[] = [];
  if (!isRecord(connection)) {
    return [{ field: 'connection', message: 'Connection descriptor is required', rule: 'required' }];
  }

  const { transport } = describeKind(kind);
  const url = connection.url;

  if (typeof url !== 'string') {
    errors.push({ field: 'connection.url', message: 'Connection URL must be a string', rule: 'type' });
  } else if (transport !== 'tunnel') {
    const address = parseEndpointUrl(url);
    if (!address) {
      errors.push({ field: 'connection.url', message: `Unparsable connection URL: ${url}`, rule: 'format', received: url });
    } else if (transport === 'socket' && address.protocol !== 'unix' && address.protocol !== 'npipe') {
      errors.push({
        field: 'connection.url',
        message: 'Socket environments require a unix:// or npipe:// URL',
        rule: 'protocol',
        received: url,
      });
    } else if (transport === 'http' && (address.protocol === 'unix' || address.protocol === 'npipe')) {
      errors.push({
        field: 'connection.url',
        message: 'HTTP environments require a tcp://, http:// or https:// URL',
        rule: 'protocol',
        received: url,
      });
    }
  }

  validateTls(connection.tls, errors);
  validateCredentials(connection.credentials, errors);

  if (connection.tunnelTarget !== undefined) {
    if (typeof connection.tunnelTarget !== 'string' || !parseTunnelTarget(connection.tunnelTarget)) {
      errors.push({
        field: 'connection.tunnelTarget',
        message: 'Tunnel target must be tcp://host:port, host:port, unix:///path or npipe:///path',
        rule: 'format',
        received: connection.tunnelTarget,
      });
    }
  }

  return errors;
}

function parseDate(value: unknown, field: string, errors: ValidationErrorDetail[]): Date | undefined {
  if (value === undefined || value === null) return undefined;
  if (value instanceof Date) return value;
  if (typeof value === 'string') {
    const date = new Date(value);
    if (!Number.isNaN(date.getTime())) return date;
  }
  errors.push({ field, message: 'Expected an ISO 8601 timestamp', rule: 'format', received: value });
  return undefined;
}

/**
 * Validate and decode an environment record (for example one read back from the store)
 */
export function validateEnvironment(input: unknown): ValidationResult<Environment> {
  if (!isRecord(input)) {
    return invalidResult(ValidationError.field('environment', 'Environment record must be an object', 'type'));
  }

  const errors: ValidationErrorDetail[] = [];

  const idError = validateEnvironmentId(input.id);
  if (idError) errors.push(idError);

  if (typeof input.name !== 'string' || input.name.trim().length === 0) {
    errors.push({ field: 'name', message: 'Environment name is required', rule: 'required' });
  }

  const kind = input.kind;
  if (!isEnvironmentKind(kind)) {
    errors.push({ field: 'kind', message: 'Unknown environment kind', rule: 'enum', received: kind });
  } else {
    errors.push(...validateConnectionDescriptor(kind, input.connection));
  }

  const status = input.status ?? 'unknown';
  if (!isEnvironmentStatus(status)) {
    errors.push({ field: 'status', message: 'Status must be up, down or unknown', rule: 'enum', received: status });
  }

  if (input.edgeKeyHash !== undefined && (typeof input.edgeKeyHash !== 'string' || !/^[a-f0-9]{64}$/.test(input.edgeKeyHash))) {
    errors.push({ field: 'edgeKeyHash', message: 'Edge key hash must be a SHA-256 hex digest', rule: 'format' });
  }

  const lastProbeAt = parseDate(input.lastProbeAt, 'lastProbeAt', errors);
  const lastStatusChangeAt = parseDate(input.lastStatusChangeAt, 'lastStatusChangeAt', errors);

  if (
    errors.length > 0 ||
    typeof input.id !== 'string' ||
    typeof input.name !== 'string' ||
    !isEnvironmentKind(kind) ||
    !isEnvironmentStatus(status) ||
    !isRecord(input.connection) ||
    typeof input.connection.url !== 'string'
  ) {
    return invalidResult(ValidationError.multiple(errors));
  }

  const tlsErrors: ValidationErrorDetail[] = [];
  const connection: ConnectionDescriptor = { url: input.connection.url };
  const tls = validateTls(input.connection.tls, tlsErrors);
  const credentials = validateCredentials(input.connection.credentials, tlsErrors);
  if (tls) connection.tls = tls;
  if (credentials) connection.credentials = credentials;
  if (typeof input.connection.tunnelTarget === 'string') connection.tunnelTarget = input.connection.tunnelTarget;

  const environment: Environment = {
    id: input.id,
    name: input.name,
    kind,
    connection,
    status,
  };
  if (lastProbeAt) environment.lastProbeAt = lastProbeAt;
  if (lastStatusChangeAt) environment.lastStatusChangeAt = lastStatusChangeAt;
  if (typeof input.edgeKeyHash === 'string') environment.edgeKeyHash = input.edgeKeyHash;

  return validResult(environment);
}

/**
 * Validate the startup endpoint URL. Only local socket, named pipe or raw TCP
 * endpoints are accepted here; socket existence is checked by the caller.
 */
export function validateEndpointUrl(url: string): ValidationResult<EndpointAddress> {
  const address = parseEndpointUrl(url);
  if (!address || (address.protocol !== 'unix' && address.protocol !== 'npipe' && address.protocol !== 'tcp')) {
    return invalidResult(
      new ValidationError(
        'Invalid endpoint protocol: only unix://, npipe:// or tcp:// are supported',
        [{ field: 'endpointUrl', message: 'Unsupported protocol', rule: 'protocol', expected: 'unix://, npipe:// or tcp://', received: url }],
        { field: 'endpointUrl' },
        ErrorCode.INVALID_FORMAT,
      ),
    );
  }

  return validResult(address);
}

/**
 * Validate a snapshot interval given as a duration string or milliseconds
 */
export function validateSnapshotInterval(value: string | number): ValidationResult<number> {
  const ms = parseDuration(value);
  if (ms === null || ms <= 0) {
    return invalidResult(
      new ValidationError(
        'Invalid snapshot interval',
        [{ field: 'snapshotInterval', message: 'Expected a positive duration such as 30s or 5m', rule: 'duration', received: value }],
        { field: 'snapshotInterval' },
        ErrorCode.INVALID_FORMAT,
      ),
    );
  }

  return validResult(ms);
}
