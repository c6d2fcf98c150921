/**
 * Unit tests for validation module
 */

import { describe, it, expect } from 'vitest';

import {
  parseEndpointUrl,
  parseTunnelTarget,
  formatTunnelTarget,
  validateEnvironment,
  validateEnvironmentId,
  validateConnectionDescriptor,
  validateEndpointUrl,
  validateSnapshotInterval,
} from '../../src/validation/index.js';

const PEM_CERT = '-----BEGIN CERTIFICATE-----\nMIIB\n-----END CERTIFICATE-----';

describe('parseEndpointUrl', () => {
  it('parses unix sockets', () => {
    expect(parseEndpointUrl('unix:///var/run/docker.sock')).toEqual({
      protocol: 'unix',
      socketPath: '/var/run/docker.sock',
    });
  });

  it('maps named pipe URLs to Windows pipe paths', () => {
    expect(parseEndpointUrl('npipe:////./pipe/docker_engine')).toEqual({
      protocol: 'npipe',
      socketPath: '\\\\.\\pipe\\docker_engine',
    });
  });

  it('parses tcp with explicit port', () => {
    expect(parseEndpointUrl('tcp://10.0.0.5:2376')).toEqual({ protocol: 'tcp', host: '10.0.0.5', port: 2376 });
  });

  it('applies default ports', () => {
    expect(parseEndpointUrl('https://k8s.internal')).toEqual({ protocol: 'https', host: 'k8s.internal', port: 443 });
    expect(parseEndpointUrl('tcp://docker.internal')).toEqual({ protocol: 'tcp', host: 'docker.internal', port: 2375 });
  });

  it('rejects unsupported or malformed URLs', () => {
    expect(parseEndpointUrl('ftp://host')).toBeNull();
    expect(parseEndpointUrl('tcp://host:99999')).toBeNull();
    expect(parseEndpointUrl('unix://')).toBeNull();
  });
});

describe('parseTunnelTarget', () => {
  it('accepts bare and tcp:// host:port targets', () => {
    expect(parseTunnelTarget('127.0.0.1:8001')).toEqual({ kind: 'tcp', host: '127.0.0.1', port: 8001 });
    expect(parseTunnelTarget('tcp://[::1]:2375')).toEqual({ kind: 'tcp', host: '::1', port: 2375 });
  });

  it('accepts socket targets', () => {
    expect(parseTunnelTarget('unix:///var/run/docker.sock')).toEqual({ kind: 'socket', path: '/var/run/docker.sock' });
  });

  it('rejects targets without a port', () => {
    expect(parseTunnelTarget('localhost')).toBeNull();
  });

  it('formats IPv6 hosts in brackets', () => {
    expect(formatTunnelTarget({ kind: 'tcp', host: '::1', port: 80 })).toBe('tcp://[::1]:80');
    expect(formatTunnelTarget({ kind: 'socket', path: '/run/k.sock' })).toBe('unix:///run/k.sock');
  });
});

describe('validateEnvironmentId', () => {
  it('accepts simple ids', () => {
    expect(validateEnvironmentId('edge-01')).toBeNull();
  });

  it('rejects ids that would break paths', () => {
    expect(validateEnvironmentId('a/b')?.rule).toBe('format');
    expect(validateEnvironmentId('')?.rule).toBe('required');
  });
});

describe('validateConnectionDescriptor', () => {
  it('requires a socket URL for socket kinds', () => {
    const errors = validateConnectionDescriptor('docker-socket', { url: 'tcp://host:2375' });
    expect(errors).toHaveLength(1);
    expect(errors[0]?.field).toBe('connection.url');
    expect(errors[0]?.rule).toBe('protocol');
  });

  it('requires a network URL for http kinds', () => {
    const errors = validateConnectionDescriptor('kubernetes-http', { url: 'unix:///run/k.sock' });
    expect(errors[0]?.rule).toBe('protocol');
  });

  it('ignores the URL for tunnel kinds', () => {
    expect(validateConnectionDescriptor('docker-tunnel', { url: '' })).toEqual([]);
  });

  it('requires client certificate and key together', () => {
    const errors = validateConnectionDescriptor('docker-http', {
      url: 'https://host:2376',
      tls: { enabled: true, cert: PEM_CERT },
    });
    expect(errors.map((e) => e.field)).toEqual(['connection.tls']);
  });

  it('rejects non-PEM TLS material', () => {
    const errors = validateConnectionDescriptor('docker-http', {
      url: 'https://host:2376',
      tls: { enabled: true, ca: '/etc/ca.pem' },
    });
    expect(errors.map((e) => e.field)).toEqual(['connection.tls.ca']);
  });

  it('rejects malformed tunnel targets', () => {
    const errors = validateConnectionDescriptor('docker-tunnel', { url: '', tunnelTarget: 'nowhere' });
    expect(errors.map((e) => e.field)).toEqual(['connection.tunnelTarget']);
  });
});

describe('validateEnvironment', () => {
  it('decodes a stored record', () => {
    const result = validateEnvironment({
      id: 'edge-1',
      name: 'Edge one',
      kind: 'docker-tunnel',
      connection: { url: '', credentials: { bearerToken: 'test-token' } },
      status: 'down',
      lastProbeAt: '2026-01-02T03:04:05.000Z',
    });

    expect(result.valid).toBe(true);
    if (!result.valid) return;
    expect(result.value.status).toBe('down');
    expect(result.value.lastProbeAt?.toISOString()).toBe('2026-01-02T03:04:05.000Z');
    expect(result.value.connection.credentials).toEqual({ bearerToken: 'test-token' });
  });

  it('defaults missing status to unknown', () => {
    const result = validateEnvironment({
      id: 'local',
      name: 'local',
      kind: 'docker-socket',
      connection: { url: 'unix:///var/run/docker.sock' },
    });
    expect(result.valid && result.value.status).toBe('unknown');
  });

  it('collects every field error', () => {
    const result = validateEnvironment({ id: 'x', name: '', kind: 'podman', connection: {} });
    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.error.hasFieldError('name')).toBe(true);
    expect(result.error.hasFieldError('kind')).toBe(true);
    expect(result.error.statusCode).toBe(400);
  });
});

describe('validateEndpointUrl', () => {
  it('accepts tcp endpoints', () => {
    expect(validateEndpointUrl('tcp://127.0.0.1:2375')).toEqual({
      valid: true,
      value: { protocol: 'tcp', host: '127.0.0.1', port: 2375 },
    });
  });

  it('rejects http endpoints with the protocol message', () => {
    const result = validateEndpointUrl('http://localhost:2375');
    expect(result.valid).toBe(false);
    if (result.valid) return;
    expect(result.error.message).toBe('Invalid endpoint protocol: only unix://, npipe:// or tcp:// are supported');
  });
});

describe('validateSnapshotInterval', () => {
  it('parses duration strings', () => {
    expect(validateSnapshotInterval('5m')).toEqual({ valid: true, value: 300_000 });
  });

  it('rejects garbage and zero', () => {
    for (const input of ['soon', '0s']) {
      const result = validateSnapshotInterval(input);
      expect(result.valid).toBe(false);
      if (!result.valid) {
        expect(result.error.message).toBe('Invalid snapshot interval');
      }
    }
  });
});
