/**
 * Integration tests: an edge agent dials the control plane, proxied calls ride
 * its tunnel, and heartbeat loss takes the environment down
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { ErrorCode, type EnvironmentStatus } from '@tidewater/shared';
import type { StatusChange } from '@tidewater/core';
import { EdgeAgent } from '@tidewater/agent';

import { createServer, hashEdgeKey, type ServerInstance } from '../../src/index.js';
import { startFakeDocker, type FakeDocker } from '../helpers/fake-docker.js';

const EDGE_KEY = 'test-secret';

async function waitFor(check: () => boolean, timeoutMs = 3000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time');
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

describe('edge tunnel', () => {
  let fake: FakeDocker;
  let server: ServerInstance;
  let base: string;
  const agents: EdgeAgent[] = [];
  const changes: StatusChange[] = [];

  const statusOf = (): EnvironmentStatus | undefined => server.context.registry.get('edge-1')?.status;

  const startAgent = async (): Promise<EdgeAgent> => {
    const agent = new EdgeAgent({
      serverUrl: `ws://127.0.0.1:${server.ports.tunnel}`,
      environmentId: 'edge-1',
      edgeKey: EDGE_KEY,
      agentVersion: '0.1.0-test',
      reconnect: { maxAttempts: 0 },
    });
    agents.push(agent);
    await agent.start();
    return agent;
  };

  beforeAll(async () => {
    fake = await startFakeDocker();
    server = createServer(
      {
        host: '127.0.0.1',
        port: 0,
        tunnelHost: '127.0.0.1',
        tunnelPort: 0,
        edgeCompute: true,
        requireAuth: false,
        heartbeatIntervalMs: 100,
        heartbeatLossThreshold: 2,
        snapshotIntervalMs: 3_600_000,
      },
      { api: { enableLogging: false } },
    );
    await server.start();
    base = `http://127.0.0.1:${server.ports.http}/api/endpoints/edge-1/docker`;

    await server.context.registry.save({
      id: 'edge-1',
      name: 'edge-1',
      kind: 'docker-tunnel',
      connection: { url: '', tunnelTarget: fake.url },
      edgeKeyHash: hashEdgeKey(EDGE_KEY),
    });
    server.context.status.onStatusChange((change) => changes.push(change));
  });

  afterAll(async () => {
    for (const agent of agents) {
      await agent.stop();
    }
    await server.stop();
    await fake.close();
  });

  it('proxies calls over the agent tunnel', async () => {
    const agent = await startAgent();
    await waitFor(() => statusOf() === 'up');

    const res = await fetch(`${base}/containers/json`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual([]);

    const tunnels = await fetch(`http://127.0.0.1:${server.ports.http}/api/tunnels`);
    expect(await tunnels.json()).toMatchObject({
      tunnels: [{ environmentId: 'edge-1', tunnelId: agent.getTunnelId(), agentVersion: '0.1.0-test' }],
    });
  });

  it('marks the environment down once heartbeats stop', async () => {
    const [agent] = agents;
    agent?.pauseHeartbeats();

    await waitFor(() => statusOf() === 'down');
    expect(changes[changes.length - 1]).toMatchObject({ previous: 'up', current: 'down', reason: 'tunnel-lost' });
    expect(server.context.tunnels.has('edge-1')).toBe(false);

    const res = await fetch(`${base}/containers/json`);
    const body: unknown = await res.json();
    expect(res.status).toBe(503);
    expect(body).toMatchObject({ error: { code: ErrorCode.ENVIRONMENT_UNREACHABLE } });
  });

  it('comes back up when an agent reconnects', async () => {
    await startAgent();
    await waitFor(() => statusOf() === 'up');

    const res = await fetch(`${base}/_ping`);
    expect(res.status).toBe(200);
    expect(await res.text()).toBe('OK');
  });
});
