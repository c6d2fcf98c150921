/**
 * Unit tests for the environment status service
 * @module @tidewater/core/tests/unit/status-service
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MuxChannel } from '@tidewater/shared';

import { InMemoryKeyValueStore } from '../../src/storage/kv-store.js';
import { EnvironmentRepository } from '../../src/storage/environment-repository.js';
import { EnvironmentRegistry } from '../../src/stores/environment-registry.js';
import { TunnelStore, type Tunnel } from '../../src/stores/tunnel-store.js';
import { EnvironmentStatusService, type StatusChange } from '../../src/services/status-service.js';

describe('EnvironmentStatusService', () => {
  let repository: EnvironmentRepository;
  let registry: EnvironmentRegistry;
  let tunnels: TunnelStore;
  let service: EnvironmentStatusService;
  let changes: StatusChange[];

  beforeEach(async () => {
    repository = new EnvironmentRepository(new InMemoryKeyValueStore());
    registry = new EnvironmentRegistry({ repository });
    tunnels = new TunnelStore();
    service = new EnvironmentStatusService({ registry, repository, tunnels });
    changes = [];
    service.onStatusChange((change) => changes.push(change));
    await registry.save({ id: 'e1', name: 'e1', kind: 'docker-http', connection: { url: 'tcp://10.0.0.2:2375' } });
  });

  it('marks up on probe success and records latency', async () => {
    const change = await service.recordProbeSuccess('e1', 12);

    expect(change?.current).toBe('up');
    expect(change?.previous).toBe('unknown');
    expect(registry.get('e1')?.status).toBe('up');
    expect(registry.get('e1')?.lastProbeAt).toBeInstanceOf(Date);
    expect(service.getProbeState('e1')).toMatchObject({ consecutiveFailures: 0, lastProbeLatencyMs: 12 });
  });

  it('keeps the previous status after a single failure', async () => {
    await service.recordProbeSuccess('e1', 5);

    const first = await service.recordProbeFailure('e1', 'connect ECONNREFUSED', 2);
    expect(first).toBeNull();
    expect(registry.get('e1')?.status).toBe('up');

    const second = await service.recordProbeFailure('e1', 'connect ECONNREFUSED', 2);
    expect(second?.current).toBe('down');
    expect(second?.reason).toBe('probe-failures');
    expect(service.getProbeState('e1')).toMatchObject({ consecutiveFailures: 2, lastError: 'connect ECONNREFUSED' });
  });

  it('resets the failure count on success', async () => {
    await service.recordProbeFailure('e1', 'timeout', 2);
    await service.recordProbeSuccess('e1', 3);
    await service.recordProbeFailure('e1', 'timeout', 2);

    expect(registry.get('e1')?.status).toBe('up');
    expect(service.getProbeState('e1').consecutiveFailures).toBe(1);
  });

  it('goes down at once on tunnel loss and stays down while no tunnel returns', async () => {
    await service.recordTunnelEstablished('e1');
    const lost = await service.recordTunnelLost('e1', 'heartbeat timeout');
    expect(lost?.current).toBe('down');

    await service.recordProbeFailure('e1', 'no tunnel', 5);
    expect(registry.get('e1')?.status).toBe('down');
    expect(service.getProbeState('e1').tunnelLostAt).toBeInstanceOf(Date);

    await service.recordTunnelEstablished('e1');
    expect(registry.get('e1')?.status).toBe('up');
    expect(service.getProbeState('e1').tunnelLostAt).toBeUndefined();
    expect(changes.map((c) => c.reason)).toEqual(['tunnel-established', 'tunnel-lost', 'tunnel-established']);
  });

  it('applies hysteresis again once a tunnel is re-established', async () => {
    await service.recordTunnelLost('e1', 'transport closed');
    await service.recordTunnelEstablished('e1');
    tunnels.install({
      tunnelId: 't1',
      environmentId: 'e1',
      channel: new MuxChannel({ role: 'server', send: () => undefined }),
      establishedAt: new Date(),
      lastHeartbeatAt: new Date(),
      state: 'active',
      close: () => undefined,
    } satisfies Tunnel);

    await service.recordProbeFailure('e1', 'slow', 2);

    expect(registry.get('e1')?.status).toBe('up');
  });

  it('linearises concurrent transitions for one environment', async () => {
    await service.recordProbeSuccess('e1', 1);
    changes = [];

    await Promise.all(Array.from({ length: 20 }, () => service.recordProbeFailure('e1', 'down', 3)));

    expect(service.getProbeState('e1').consecutiveFailures).toBe(20);
    expect(changes).toHaveLength(1);
    expect(changes[0]?.current).toBe('down');
    expect((await repository.get('e1'))?.status).toBe('down');
  });

  it('ignores unknown environments', async () => {
    expect(await service.recordTunnelLost('ghost', 'x')).toBeNull();
  });

  it('forgets probe state when an environment is removed', async () => {
    await service.recordProbeFailure('e1', 'x', 5);
    await registry.remove('e1');
    expect(service.getProbeState('e1').consecutiveFailures).toBe(0);
  });
});
