/**
 * Environment liveness: the only writer of `Environment.status`
 * @module @tidewater/core/services/status-service
 */

import { EventEmitter } from 'node:events';
import {
  createServiceLogger,
  type Environment,
  type EnvironmentStatus,
  type Logger,
} from '@tidewater/shared';
import type { EnvironmentRegistry } from '../stores/environment-registry.js';
import type { TunnelStore } from '../stores/tunnel-store.js';
import type { EnvironmentRepository } from '../storage/environment-repository.js';
import { environmentKey } from '../storage/environment-repository.js';

/**
 * Per-environment probe bookkeeping
 */
export interface ProbeState {
  consecutiveFailures: number;
  lastProbeAt?: Date;
  lastProbeLatencyMs?: number;
  lastError?: string;
  /** Set when a tunnel was lost; cleared when one is established or a probe succeeds */
  tunnelLostAt?: Date;
}

export type StatusChangeReason =
  | 'probe-succeeded'
  | 'probe-failures'
  | 'probe-failed-tunnel-lost'
  | 'tunnel-established'
  | 'tunnel-lost';

export interface StatusChange {
  environmentId: string;
  previous: EnvironmentStatus;
  current: EnvironmentStatus;
  reason: StatusChangeReason;
  at: Date;
}

export type StatusChangeListener = (change: StatusChange) => void;

export interface EnvironmentStatusServiceOptions {
  registry: EnvironmentRegistry;
  repository: EnvironmentRepository;
  /** Consulted on probe failures: a lost tunnel with no replacement means down now */
  tunnels?: TunnelStore;
  logger?: Logger;
}

interface Transition {
  status: EnvironmentStatus;
  reason: StatusChangeReason;
  probedAt?: Date;
}

export class EnvironmentStatusService {
  private readonly registry: EnvironmentRegistry;
  private readonly repository: EnvironmentRepository;
  private readonly tunnels?: TunnelStore;
  private readonly logger: Logger;
  private readonly probeStates = new Map<string, ProbeState>();
  private readonly events = new EventEmitter();

  constructor(options: EnvironmentStatusServiceOptions) {
    this.registry = options.registry;
    this.repository = options.repository;
    this.tunnels = options.tunnels;
    this.logger = options.logger ?? createServiceLogger({ component: 'status-service' });

    this.registry.onRemoved((environmentId) => {
      this.probeStates.delete(environmentId);
    });
  }

  getProbeState(environmentId: string): ProbeState {
    return { ...this.state(environmentId) };
  }

  async recordProbeSuccess(environmentId: string, latencyMs: number): Promise<StatusChange | null> {
    const now = new Date();
    return this.transition(environmentId, () => {
      const state = this.state(environmentId);
      state.consecutiveFailures = 0;
      state.lastProbeAt = now;
      state.lastProbeLatencyMs = latencyMs;
      delete state.lastError;
      delete state.tunnelLostAt;
      return { status: 'up', reason: 'probe-succeeded', probedAt: now };
    });
  }

  /**
   * Count a failed probe. The status only turns `down` after `threshold`
   * consecutive failures, or at once when a tunnel loss is on record and no
   * tunnel has come back.
   */
  async recordProbeFailure(environmentId: string, error: string, threshold: number): Promise<StatusChange | null> {
    const now = new Date();
    return this.transition(environmentId, (current) => {
      const state = this.state(environmentId);
      state.consecutiveFailures += 1;
      state.lastProbeAt = now;
      state.lastError = error;
      delete state.lastProbeLatencyMs;

      if (state.tunnelLostAt && !this.tunnels?.has(environmentId)) {
        return { status: 'down', reason: 'probe-failed-tunnel-lost', probedAt: now };
      }
      if (state.consecutiveFailures >= Math.max(1, threshold)) {
        return { status: 'down', reason: 'probe-failures', probedAt: now };
      }
      return { status: current.status, reason: 'probe-failures', probedAt: now };
    });
  }

  async recordTunnelEstablished(environmentId: string): Promise<StatusChange | null> {
    return this.transition(environmentId, () => {
      const state = this.state(environmentId);
      state.consecutiveFailures = 0;
      delete state.tunnelLostAt;
      return { status: 'up', reason: 'tunnel-established' };
    });
  }

  async recordTunnelLost(environmentId: string, reason: string): Promise<StatusChange | null> {
    const now = new Date();
    return this.transition(environmentId, () => {
      const state = this.state(environmentId);
      state.tunnelLostAt = now;
      state.lastError = reason;
      return { status: 'down', reason: 'tunnel-lost' };
    });
  }

  onStatusChange(listener: StatusChangeListener): () => void {
    this.events.on('change', listener);
    return () => this.events.off('change', listener);
  }

  private state(environmentId: string): ProbeState {
    let state = this.probeStates.get(environmentId);
    if (!state) {
      state = { consecutiveFailures: 0 };
      this.probeStates.set(environmentId, state);
    }
    return state;
  }

  /**
   * Read-modify-write of one record under the environment's lock
   */
  private async transition(
    environmentId: string,
    decide: (current: Environment) => Transition,
  ): Promise<StatusChange | null> {
    return this.registry.locks.runExclusive(environmentKey(environmentId), async () => {
      const current = this.registry.get(environmentId) ?? (await this.repository.get(environmentId));
      if (!current) {
        this.logger.debug('Status update for unknown environment ignored', { environmentId });
        return null;
      }

      const next = decide(current);
      const changed = next.status !== current.status;
      if (!changed && next.probedAt === undefined) {
        return null;
      }

      const now = new Date();
      const updated: Environment = { ...current, status: next.status };
      if (next.probedAt) {
        updated.lastProbeAt = next.probedAt;
      }
      if (changed) {
        updated.lastStatusChangeAt = now;
      }

      await this.repository.put(updated);
      this.registry.ingest(updated);

      if (!changed) {
        return null;
      }

      const change: StatusChange = {
        environmentId,
        previous: current.status,
        current: next.status,
        reason: next.reason,
        at: now,
      };
      const log = next.status === 'down' ? this.logger.warn.bind(this.logger) : this.logger.info.bind(this.logger);
      log('Environment status changed', {
        environmentId,
        from: current.status,
        to: next.status,
        reason: next.reason,
      });
      this.events.emit('change', change);
      return change;
    });
  }
}
