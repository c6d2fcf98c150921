/**
 * Unit tests for the snapshot scheduler
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  EnvironmentRegistry,
  EnvironmentRepository,
  EnvironmentStatusService,
  InMemoryKeyValueStore,
  TunnelStore,
  type StatusChange,
} from '@tidewater/core';

import { SnapshotScheduler } from '../../src/services/snapshot-scheduler.js';
import { ProxyFactory } from '../../src/proxy/proxy-factory.js';
import { TransportBuilder } from '../../src/proxy/transport-builder.js';
import { startFakeDocker, type FakeDocker } from '../helpers/fake-docker.js';

describe('SnapshotScheduler', () => {
  let fake: FakeDocker;
  let registry: EnvironmentRegistry;
  let status: EnvironmentStatusService;
  let factory: ProxyFactory;
  let scheduler: SnapshotScheduler;
  let changes: StatusChange[];

  beforeEach(async () => {
    fake = await startFakeDocker();
    const repository = new EnvironmentRepository(new InMemoryKeyValueStore());
    const tunnels = new TunnelStore();
    registry = new EnvironmentRegistry({ repository });
    status = new EnvironmentStatusService({ registry, repository, tunnels });
    factory = new ProxyFactory({ registry, builder: new TransportBuilder({ tunnels, tunnelDialTimeoutMs: 500 }) });
    scheduler = new SnapshotScheduler({ registry, factory, status, probeTimeoutMs: 1000, failureThreshold: 2 });

    changes = [];
    status.onStatusChange((change) => changes.push(change));
    await registry.save({ id: 'local', name: 'local', kind: 'docker-http', connection: { url: fake.url } });
  });

  afterEach(async () => {
    scheduler.stop();
    factory.close();
    await fake.close();
  });

  it('marks a reachable environment up', async () => {
    const result = await scheduler.runOnce();

    expect(result).toEqual({ probed: 1, succeeded: 1, failed: 0, skipped: false });
    expect(registry.get('local')?.status).toBe('up');
    expect(registry.get('local')?.lastProbeAt).toBeInstanceOf(Date);
    expect(fake.requests.map((request) => request.url)).toEqual(['/_ping']);
  });

  it('waits for consecutive failures before marking down', async () => {
    await scheduler.runOnce();
    fake.healthy = false;

    const first = await scheduler.runOnce();
    expect(first).toEqual({ probed: 1, succeeded: 0, failed: 1, skipped: false });
    expect(registry.get('local')?.status).toBe('up');
    expect(status.getProbeState('local').consecutiveFailures).toBe(1);

    await scheduler.runOnce();
    expect(registry.get('local')?.status).toBe('down');

    fake.healthy = true;
    await scheduler.runOnce();
    expect(registry.get('local')?.status).toBe('up');
    expect(status.getProbeState('local').consecutiveFailures).toBe(0);

    expect(changes.map((change) => [change.previous, change.current, change.reason])).toEqual([
      ['unknown', 'up', 'probe-succeeded'],
      ['up', 'down', 'probe-failures'],
      ['down', 'up', 'probe-succeeded'],
    ]);
  });

  it('skips a cycle while another is running', async () => {
    const running = scheduler.runOnce();
    const skipped = await scheduler.runOnce();

    expect(skipped).toEqual({ probed: 0, succeeded: 0, failed: 0, skipped: true });
    expect((await running).skipped).toBe(false);
  });

  it('marks a tunnel environment down at once after a recorded loss', async () => {
    await registry.save({ id: 'edge', name: 'edge', kind: 'docker-tunnel', connection: { url: '' } });
    await status.recordTunnelEstablished('edge');
    await status.recordTunnelLost('edge', 'heartbeat timeout');

    const result = await scheduler.runOnce();

    expect(result).toEqual({ probed: 2, succeeded: 1, failed: 1, skipped: false });
    expect(registry.get('edge')?.status).toBe('down');
    expect(status.getProbeState('edge').lastError).toBe('Environment edge is unreachable: no active tunnel');
  });

  it('checks the current record rather than the listed copy', async () => {
    const listed = registry.get('local');
    if (!listed) throw new Error('missing environment');
    vi.spyOn(registry, 'list').mockReturnValue([{ ...listed, connection: { url: 'tcp://127.0.0.1:1' } }]);

    const result = await scheduler.runOnce();

    expect(result).toEqual({ probed: 1, succeeded: 1, failed: 0, skipped: false });
    expect(registry.get('local')?.status).toBe('up');
    expect(fake.requests.map((request) => request.url)).toEqual(['/_ping']);
  });

  it('skips environments removed during a cycle', async () => {
    const listed = registry.get('local');
    if (!listed) throw new Error('missing environment');
    await registry.remove('local');
    vi.spyOn(registry, 'list').mockReturnValue([listed]);

    const result = await scheduler.runOnce();

    expect(result).toEqual({ probed: 0, succeeded: 0, failed: 0, skipped: false });
    expect(fake.requests).toEqual([]);
    expect(status.getProbeState('local')).toEqual({ consecutiveFailures: 0 });
  });
});
