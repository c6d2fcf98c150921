/**
 * Unit tests for the reverse tunnel server, driven by raw WebSocket clients
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WebSocket, type RawData } from 'ws';
import {
  FrameType,
  decodeFrame,
  decodeStreamError,
  encodeControl,
  encodeOpen,
  isAcceptPayload,
  isRejectPayload,
  parseControl,
  type WsMessage,
} from '@tidewater/shared';
import {
  EnvironmentRegistry,
  EnvironmentRepository,
  EnvironmentStatusService,
  InMemoryKeyValueStore,
  TunnelStore,
} from '@tidewater/core';

import { TunnelServer } from '../../src/ws/tunnel-server.js';
import { EdgeKeyVerifier, hashEdgeKey } from '../../src/services/edge-key-verifier.js';

const EDGE_KEY = 'test-secret';

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

interface AgentClient {
  ws: WebSocket;
  nextControl(): Promise<WsMessage<unknown>>;
  nextFrame(): Promise<Buffer>;
  /** Resolves with the close code */
  closed: Promise<number>;
  hello(environmentId: string, token?: string): void;
}

async function openClient(port: number): Promise<AgentClient> {
  const ws = new WebSocket(`ws://127.0.0.1:${port}`);
  const controls: Array<WsMessage<unknown>> = [];
  const controlWaiters: Array<(message: WsMessage<unknown>) => void> = [];
  const frames: Buffer[] = [];
  const frameWaiters: Array<(frame: Buffer) => void> = [];

  ws.on('message', (data, isBinary) => {
    const buffer = toBuffer(data);
    if (isBinary) {
      const waiter = frameWaiters.shift();
      if (waiter) waiter(buffer);
      else frames.push(buffer);
      return;
    }
    const message = parseControl(buffer.toString('utf8'));
    if (!message) return;
    const waiter = controlWaiters.shift();
    if (waiter) waiter(message);
    else controls.push(message);
  });

  const closed = new Promise<number>((resolve) => ws.once('close', (code) => resolve(code)));
  await new Promise<void>((resolve, reject) => {
    ws.once('open', () => resolve());
    ws.once('error', reject);
  });

  return {
    ws,
    closed,
    nextControl: () => {
      const queued = controls.shift();
      return queued ? Promise.resolve(queued) : new Promise((resolve) => controlWaiters.push(resolve));
    },
    nextFrame: () => {
      const queued = frames.shift();
      return queued ? Promise.resolve(queued) : new Promise((resolve) => frameWaiters.push(resolve));
    },
    hello: (environmentId, token = EDGE_KEY) => {
      ws.send(encodeControl('tunnel:hello', { environmentId, token, agentVersion: '1.0.0' }));
    },
  };
}

async function waitFor(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

describe('TunnelServer', () => {
  let registry: EnvironmentRegistry;
  let tunnels: TunnelStore;
  let status: EnvironmentStatusService;
  let server: TunnelServer;
  let port: number;
  const clients: AgentClient[] = [];

  const connect = async (): Promise<AgentClient> => {
    const client = await openClient(port);
    clients.push(client);
    return client;
  };

  beforeEach(async () => {
    const repository = new EnvironmentRepository(new InMemoryKeyValueStore());
    registry = new EnvironmentRegistry({ repository });
    tunnels = new TunnelStore();
    status = new EnvironmentStatusService({ registry, repository, tunnels });
    server = new TunnelServer({
      registry,
      tunnels,
      status,
      verifier: new EdgeKeyVerifier(registry),
      heartbeatIntervalMs: 200,
      heartbeatLossThreshold: 2,
      handshakeTimeoutMs: 200,
    });
    port = await server.listen({ host: '127.0.0.1', port: 0 });

    await registry.save({
      id: 'edge-1',
      name: 'edge-1',
      kind: 'docker-tunnel',
      connection: { url: '' },
      edgeKeyHash: hashEdgeKey(EDGE_KEY),
    });
    await registry.save({ id: 'direct', name: 'direct', kind: 'docker-http', connection: { url: 'tcp://10.0.0.2:2375' } });
  });

  afterEach(async () => {
    for (const client of clients.splice(0)) {
      client.ws.terminate();
    }
    await server.close();
  });

  it('accepts a valid hello and marks the environment up', async () => {
    const client = await connect();
    client.hello('edge-1');

    const reply = await client.nextControl();
    expect(reply.type).toBe('tunnel:accept');
    expect(isAcceptPayload(reply.payload) && reply.payload.heartbeatIntervalMs).toBe(200);

    await waitFor(() => registry.get('edge-1')?.status === 'up');
    expect(server.getTunnel('edge-1')).toMatchObject({
      environmentId: 'edge-1',
      state: 'active',
      agentVersion: '1.0.0',
      openStreams: 0,
    });
    expect(server.listTunnels()).toHaveLength(1);
  });

  it.each([
    ['nowhere', EDGE_KEY, 'UNKNOWN_ENVIRONMENT'],
    ['direct', EDGE_KEY, 'NOT_EDGE_ENVIRONMENT'],
    ['edge-1', 'wrong-key', 'INVALID_CREDENTIALS'],
  ])('rejects a hello for %s with key %s as %s', async (environmentId, token, code) => {
    const client = await connect();
    client.hello(environmentId, token);

    const reply = await client.nextControl();
    expect(reply.type).toBe('tunnel:reject');
    expect(isRejectPayload(reply.payload) && reply.payload.code).toBe(code);
    expect(await client.closed).toBe(1008);
    expect(tunnels.has(environmentId)).toBe(false);
    expect(registry.get('edge-1')?.status).toBe('unknown');
  });

  it('rejects a first frame that is not a hello', async () => {
    const client = await connect();
    client.ws.send('hello there');

    const reply = await client.nextControl();
    expect(isRejectPayload(reply.payload) && reply.payload.code).toBe('INVALID_FRAME');
    expect(await client.closed).toBe(1008);
  });

  it('rejects agents that stay silent past the handshake timeout', async () => {
    const client = await connect();

    const reply = await client.nextControl();
    expect(isRejectPayload(reply.payload) && reply.payload.code).toBe('HANDSHAKE_TIMEOUT');
    expect(await client.closed).toBe(1008);
  });

  it('keeps exactly one tunnel under concurrent handshakes', async () => {
    const contenders = await Promise.all(Array.from({ length: 5 }, () => connect()));
    for (const client of contenders) client.hello('edge-1');

    const replies = await Promise.all(contenders.map((client) => client.nextControl()));
    expect(replies.every((reply) => reply.type === 'tunnel:accept')).toBe(true);

    const tunnelIds = replies.map((reply) => (isAcceptPayload(reply.payload) ? reply.payload.tunnelId : null));
    const installed = tunnels.get('edge-1')?.tunnelId;
    expect(tunnels.list()).toHaveLength(1);
    expect(tunnelIds.filter((tunnelId) => tunnelId === installed)).toHaveLength(1);

    const replaced = contenders.filter((_client, index) => tunnelIds[index] !== installed);
    expect(await Promise.all(replaced.map((client) => client.closed))).toEqual([1000, 1000, 1000, 1000]);
  });

  it('acknowledges heartbeats and tears the tunnel down once they stop', async () => {
    const client = await connect();
    client.hello('edge-1');
    await client.nextControl();

    client.ws.send(encodeControl('tunnel:heartbeat', { timestamp: Date.now() }, 'hb-1'));
    const ack = await client.nextControl();
    expect(ack).toMatchObject({ type: 'tunnel:heartbeat:ack', correlationId: 'hb-1' });

    const lostAt = Date.now();
    expect(await client.closed).toBe(1006);
    expect(Date.now() - lostAt).toBeLessThan(1000);
    expect(tunnels.has('edge-1')).toBe(false);
    await waitFor(() => registry.get('edge-1')?.status === 'down');
    expect(status.getProbeState('edge-1').tunnelLostAt).toBeInstanceOf(Date);
  });

  it('closes the tunnel when its environment is deleted', async () => {
    const client = await connect();
    client.hello('edge-1');
    await client.nextControl();

    await registry.remove('edge-1');

    expect(await client.closed).toBe(1000);
    expect(tunnels.has('edge-1')).toBe(false);
  });

  it('refuses agent-opened sub-connections without a handler', async () => {
    const client = await connect();
    client.hello('edge-1');
    await client.nextControl();

    client.ws.send(encodeOpen(2, 'tcp://127.0.0.1:9'));
    const frame = decodeFrame(await client.nextFrame());

    expect(frame?.type).toBe(FrameType.ERROR);
    expect(frame?.streamId).toBe(2);
    expect(frame && decodeStreamError(frame.payload).code).toBe('POLICY_DENIED');
  });
});
