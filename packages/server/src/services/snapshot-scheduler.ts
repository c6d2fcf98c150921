/**
 * Snapshot Scheduler
 * @module @tidewater/server/services/snapshot-scheduler
 *
 * Background loop that refreshes the environment registry and probes every
 * environment over its proxy transport. Results go to the status service,
 * which applies hysteresis before flipping anything to `down`.
 */

import { createServiceLogger, toError, type Environment, type Logger } from '@tidewater/shared';
import {
  runWithConcurrency,
  type EnvironmentRegistry,
  type EnvironmentStatusService,
} from '@tidewater/core';
import type { ProxyFactory } from '../proxy/index.js';

export interface SnapshotSchedulerConfig {
  /** Time between cycles (default: 5 minutes) */
  snapshotIntervalMs?: number;
  /** Per-probe deadline, independent of request timeouts (default: 10 seconds) */
  probeTimeoutMs?: number;
  /** Probes in flight at once (default: 5) */
  concurrency?: number;
  /** Consecutive failures before an environment is marked down (default: 2) */
  failureThreshold?: number;
}

export interface SnapshotSchedulerOptions extends SnapshotSchedulerConfig {
  registry: EnvironmentRegistry;
  factory: ProxyFactory;
  status: EnvironmentStatusService;
  logger?: Logger;
}

export interface SnapshotCycleResult {
  /** Environments probed; ones deleted mid-cycle are not counted */
  probed: number;
  succeeded: number;
  failed: number;
  /** True when the cycle was skipped because another was still running */
  skipped: boolean;
}

type ProbeOutcome = 'up' | 'down' | 'removed';

const DEFAULT_CONFIG: Required<SnapshotSchedulerConfig> = {
  snapshotIntervalMs: 5 * 60_000,
  probeTimeoutMs: 10_000,
  concurrency: 5,
  failureThreshold: 2,
};

export class SnapshotScheduler {
  private readonly config: Required<SnapshotSchedulerConfig>;
  private readonly registry: EnvironmentRegistry;
  private readonly factory: ProxyFactory;
  private readonly status: EnvironmentStatusService;
  private readonly logger: Logger;
  private intervalTimer: NodeJS.Timeout | null = null;
  private isRunning = false;
  private current: Promise<SnapshotCycleResult> | null = null;

  constructor(options: SnapshotSchedulerOptions) {
    this.config = {
      snapshotIntervalMs: options.snapshotIntervalMs ?? DEFAULT_CONFIG.snapshotIntervalMs,
      probeTimeoutMs: options.probeTimeoutMs ?? DEFAULT_CONFIG.probeTimeoutMs,
      concurrency: options.concurrency ?? DEFAULT_CONFIG.concurrency,
      failureThreshold: options.failureThreshold ?? DEFAULT_CONFIG.failureThreshold,
    };
    this.registry = options.registry;
    this.factory = options.factory;
    this.status = options.status;
    this.logger = options.logger ?? createServiceLogger({ component: 'snapshot-scheduler' });
  }

  /**
   * Start the snapshot loop
   */
  start(): void {
    if (this.isRunning) {
      this.logger.warn('Snapshot scheduler is already running');
      return;
    }

    this.isRunning = true;
    this.logger.info('Starting snapshot scheduler', {
      snapshotIntervalMs: this.config.snapshotIntervalMs,
      probeTimeoutMs: this.config.probeTimeoutMs,
      concurrency: this.config.concurrency,
      failureThreshold: this.config.failureThreshold,
    });

    // Run immediately, then on interval
    this.tick();
    this.intervalTimer = setInterval(() => this.tick(), this.config.snapshotIntervalMs);
    this.intervalTimer.unref();
  }

  stop(): void {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
    this.logger.info('Snapshot scheduler stopped');
  }

  isActive(): boolean {
    return this.isRunning;
  }

  /**
   * Run one cycle now. Returns a skipped result while another cycle is in
   * progress.
   */
  async runOnce(): Promise<SnapshotCycleResult> {
    if (this.current) {
      this.logger.debug('Skipping snapshot cycle - previous cycle still running');
      return { probed: 0, succeeded: 0, failed: 0, skipped: true };
    }

    this.current = this.cycle();
    try {
      return await this.current;
    } finally {
      this.current = null;
    }
  }

  private tick(): void {
    this.runOnce().catch((error: unknown) => {
      this.logger.error('Snapshot cycle failed', toError(error));
    });
  }

  private async cycle(): Promise<SnapshotCycleResult> {
    const started = Date.now();
    await this.registry.refresh();

    const environments = this.registry.list();
    const results = await runWithConcurrency(environments, this.config.concurrency, (environment) =>
      this.probe(environment),
    );

    let probed = 0;
    let succeeded = 0;
    for (const result of results) {
      if (result.status === 'rejected') {
        probed++;
        this.logger.error('Recording probe result failed', toError(result.reason));
      } else if (result.value !== 'removed') {
        probed++;
        if (result.value === 'up') succeeded++;
      }
    }

    const summary: SnapshotCycleResult = {
      probed,
      succeeded,
      failed: probed - succeeded,
      skipped: false,
    };
    this.logger.info('Snapshot cycle complete', { ...summary, durationMs: Date.now() - started });
    return summary;
  }

  /**
   * Probe the current record of one environment. Bypasses the router so a
   * down environment can be seen recovering.
   */
  private async probe(listed: Environment): Promise<ProbeOutcome> {
    const environment = this.registry.get(listed.id);
    if (!environment) {
      this.logger.debug('Skipping probe of removed environment', { environmentId: listed.id });
      return 'removed';
    }

    let latencyMs: number;
    try {
      const lease = await this.factory.acquire(environment);
      try {
        latencyMs = await lease.handler.probe(AbortSignal.timeout(this.config.probeTimeoutMs));
      } finally {
        lease.release();
      }
    } catch (error) {
      const message = toError(error).message;
      this.logger.debug('Probe failed', { environmentId: environment.id, error: message });
      await this.status.recordProbeFailure(environment.id, message, this.config.failureThreshold);
      return 'down';
    }

    await this.status.recordProbeSuccess(environment.id, latencyMs);
    return 'up';
  }
}
