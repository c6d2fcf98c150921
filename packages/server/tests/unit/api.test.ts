/**
 * Unit tests for the HTTP API: health, environment views, proxied routes,
 * upgrades, authentication and CORS
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { ErrorCode, ValidationError } from '@tidewater/shared';

import {
  LOCAL_ENVIRONMENT_ID,
  createCorsConfig,
  createServer,
  localEnvironmentKind,
  type ServerInstance,
} from '../../src/index.js';
import { parseUpgradeTarget } from '../../src/api/upgrade.js';
import { StaticTokenIdentityProvider, type ApiIdentity } from '../../src/middleware/auth-middleware.js';
import { rawRequest, startFakeDocker, type FakeDocker } from '../helpers/fake-docker.js';

const TOKEN = 'test-secret';

interface ErrorBody {
  error: { code: number; message: string; correlationId?: string };
}

function isErrorBody(value: unknown): value is ErrorBody {
  return typeof value === 'object' && value !== null && 'error' in value;
}

async function errorCodeOf(res: Response): Promise<number | undefined> {
  const body: unknown = await res.json();
  return isErrorBody(body) ? body.error.code : undefined;
}

function upgradeRequest(path: string, headers: string[] = []): string {
  return [
    `GET ${path} HTTP/1.1`,
    'Host: localhost',
    'Connection: Upgrade',
    'Upgrade: tcp',
    ...headers,
    '',
    '',
  ].join('\r\n');
}

describe('HTTP API', () => {
  let fake: FakeDocker;
  let server: ServerInstance;
  let base: string;

  beforeAll(async () => {
    fake = await startFakeDocker();
    server = createServer(
      {
        host: '127.0.0.1',
        port: 0,
        edgeCompute: false,
        endpointUrl: fake.url,
        requireAuth: true,
        apiToken: TOKEN,
        snapshotIntervalMs: 3_600_000,
      },
      { api: { enableLogging: false } },
    );
    await server.start();
    base = `http://127.0.0.1:${server.ports.http}`;
  });

  afterAll(async () => {
    await server.stop();
    await fake.close();
  });

  const authorized = { authorization: `Bearer ${TOKEN}` };

  it('answers health checks without authentication', async () => {
    const res = await fetch(`${base}/health`);
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ status: 'healthy', tunnels: 0 });
  });

  it('requires a known bearer token', async () => {
    const missing = await fetch(`${base}/api/endpoints`);
    const wrong = await fetch(`${base}/api/endpoints`, { headers: { authorization: 'Bearer nope' } });

    expect(missing.status).toBe(401);
    expect(await errorCodeOf(missing)).toBe(ErrorCode.AUTHENTICATION_REQUIRED);
    expect(wrong.status).toBe(401);
    expect(await errorCodeOf(wrong)).toBe(ErrorCode.INVALID_CREDENTIALS);
  });

  it('lists the seeded local environment without secrets', async () => {
    const res = await fetch(`${base}/api/endpoints`, { headers: authorized });
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      environments: [{ id: LOCAL_ENVIRONMENT_ID, name: 'local', kind: 'docker-http', api: 'docker', edge: false }],
    });
    expect(JSON.stringify(body)).not.toContain('connection');
  });

  it('reports status with probe state', async () => {
    const res = await fetch(`${base}/api/endpoints/local/status`, { headers: authorized });
    const body: unknown = await res.json();

    expect(res.status).toBe(200);
    expect(body).toMatchObject({ id: 'local', tunnel: null, probe: { consecutiveFailures: 0 } });
  });

  it('returns 404 for unknown environments and routes', async () => {
    const environment = await fetch(`${base}/api/endpoints/nope/status`, { headers: authorized });
    const route = await fetch(`${base}/api/nothing-here`, { headers: authorized });

    expect(environment.status).toBe(404);
    expect(await errorCodeOf(environment)).toBe(ErrorCode.ENVIRONMENT_NOT_FOUND);
    expect(route.status).toBe(404);
    expect(await errorCodeOf(route)).toBe(ErrorCode.NOT_FOUND);
  });

  it('echoes the caller correlation id', async () => {
    const res = await fetch(`${base}/api/endpoints/nope/status`, {
      headers: { ...authorized, 'x-correlation-id': 'corr-1' },
    });
    const body: unknown = await res.json();

    expect(res.headers.get('x-correlation-id')).toBe('corr-1');
    expect(isErrorBody(body) && body.error.correlationId).toBe('corr-1');
  });

  it('proxies Docker calls without forwarding the caller token', async () => {
    const res = await fetch(`${base}/api/endpoints/local/docker/containers/json?all=1`, { headers: authorized });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual([]);
    const forwarded = fake.requests.find((request) => request.url === '/containers/json?all=1');
    expect(forwarded?.headers.authorization).toBeUndefined();
  });

  it('refuses the wrong API family', async () => {
    const res = await fetch(`${base}/api/endpoints/local/kubernetes/version`, { headers: authorized });

    expect(res.status).toBe(404);
    expect(await errorCodeOf(res)).toBe(ErrorCode.API_FAMILY_MISMATCH);
  });

  it('lists no tunnels when edge compute is off', async () => {
    const res = await fetch(`${base}/api/tunnels`, { headers: authorized });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ tunnels: [] });
    expect(server.ports.tunnel).toBeNull();
  });

  it('relays authenticated upgrades', async () => {
    const { text, socket } = await rawRequest(
      server.ports.http ?? 0,
      upgradeRequest('/api/endpoints/local/docker/containers/abc/attach?stream=1', [`Authorization: Bearer ${TOKEN}`]),
      /\r\n\r\n/,
    );
    expect(text).toBe('HTTP/1.1 101 UPGRADED\r\nConnection: Upgrade\r\nUpgrade: tcp\r\n\r\n');

    const echoed = new Promise<string>((resolve) => socket.once('data', (chunk: Buffer) => resolve(chunk.toString())));
    socket.write('ping');
    expect(await echoed).toBe('ping');
    socket.destroy();
  });

  it('rejects unauthenticated upgrades on the raw socket', async () => {
    const { text } = await rawRequest(
      server.ports.http ?? 0,
      upgradeRequest('/api/endpoints/local/docker/containers/abc/attach'),
    );

    expect(text.startsWith('HTTP/1.1 401 Unauthorized\r\n')).toBe(true);
    expect(text).toContain('"code":3000');
  });
});

describe('HTTP API with scoped identities', () => {
  let fake: FakeDocker;
  let server: ServerInstance;
  let base: string;

  beforeAll(async () => {
    fake = await startFakeDocker();
    const identityProvider = new StaticTokenIdentityProvider(
      new Map<string, ApiIdentity>([
        ['viewer-token', { userId: 'viewer', roles: ['viewer'] }],
        ['scoped-token', { userId: 'scoped', roles: ['operator'], environmentIds: ['other'] }],
      ]),
    );
    server = createServer(
      {
        host: '127.0.0.1',
        port: 0,
        edgeCompute: false,
        endpointUrl: fake.url,
        requireAuth: true,
        snapshotIntervalMs: 3_600_000,
      },
      { identityProvider, api: { enableLogging: false } },
    );
    await server.start();
    base = `http://127.0.0.1:${server.ports.http}`;
  });

  afterAll(async () => {
    await server.stop();
    await fake.close();
  });

  it('lets viewers read but not proxy', async () => {
    const headers = { authorization: 'Bearer viewer-token' };
    const list = await fetch(`${base}/api/endpoints`, { headers });
    const proxied = await fetch(`${base}/api/endpoints/local/docker/_ping`, { headers });

    expect(list.status).toBe(200);
    expect(await list.json()).toMatchObject({ environments: [{ id: 'local' }] });
    expect(proxied.status).toBe(403);
    expect(await errorCodeOf(proxied)).toBe(ErrorCode.RESOURCE_ACCESS_DENIED);
  });

  it('hides environments outside an identity scope', async () => {
    const headers = { authorization: 'Bearer scoped-token' };
    const list = await fetch(`${base}/api/endpoints`, { headers });
    const status = await fetch(`${base}/api/endpoints/local/status`, { headers });

    expect(await list.json()).toEqual({ environments: [] });
    expect(status.status).toBe(403);
  });
});

describe('createServer', () => {
  it('requires a token provider when authentication is on', () => {
    expect(() => createServer({ requireAuth: true, apiToken: undefined })).toThrow(ValidationError);
  });
});

describe('createCorsConfig', () => {
  function allows(origins: string[], origin: string | undefined): boolean {
    const { origin: check } = createCorsConfig(origins);
    if (typeof check !== 'function') {
      throw new Error('expected an origin callback');
    }
    let allowed: unknown;
    check(origin, (_error, result) => {
      allowed = result;
    });
    return allowed === true;
  }

  it('matches exact origins and wildcard patterns', () => {
    const origins = ['http://localhost:*', 'https://app.test'];

    expect(allows(origins, 'http://localhost:3000')).toBe(true);
    expect(allows(origins, 'https://app.test')).toBe(true);
    expect(allows(origins, 'https://app.test.example')).toBe(false);
    expect(allows(origins, 'http://localhostile.test')).toBe(false);
  });

  it('allows requests without an origin', () => {
    expect(allows([], undefined)).toBe(true);
  });
});

describe('parseUpgradeTarget', () => {
  it('splits environment, API family and backend path', () => {
    expect(parseUpgradeTarget('/api/endpoints/local/docker/containers/abc/attach?stream=1')).toEqual({
      environmentId: 'local',
      api: 'docker',
      path: '/containers/abc/attach?stream=1',
    });
    expect(parseUpgradeTarget('/api/endpoints/edge%201/kubernetes')).toEqual({
      environmentId: 'edge 1',
      api: 'kubernetes',
      path: '/',
    });
  });

  it('ignores other paths', () => {
    expect(parseUpgradeTarget('/api/endpoints/local/podman/x')).toBeNull();
    expect(parseUpgradeTarget('/health')).toBeNull();
    expect(parseUpgradeTarget('/api/endpoints/%E0%A4%A/docker/x')).toBeNull();
    expect(parseUpgradeTarget(undefined)).toBeNull();
  });
});

describe('localEnvironmentKind', () => {
  it('picks the transport from the endpoint URL', () => {
    expect(localEnvironmentKind('unix:///var/run/docker.sock')).toBe('docker-socket');
    expect(localEnvironmentKind('tcp://10.0.0.2:2375')).toBe('docker-http');
  });
});
