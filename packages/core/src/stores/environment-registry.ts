/**
 * Cached, reactive view of environment records
 * @module @tidewater/core/stores/environment-registry
 */

import { EventEmitter } from 'node:events';
import { computed, shallowReactive, type ComputedRef } from '@vue/reactivity';
import {
  createServiceLogger,
  stableStringify,
  validateEnvironment,
  type Environment,
  type EnvironmentStatus,
  type Logger,
} from '@tidewater/shared';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import { EnvironmentRepository, environmentKey } from '../storage/environment-repository.js';

export type EnvironmentUpdatedListener = (environment: Environment, previous: Environment | undefined) => void;
export type EnvironmentRemovedListener = (environmentId: string, previous: Environment) => void;

export interface EnvironmentRegistryOptions {
  repository: EnvironmentRepository;
  /** Shared with the status service so record writes for one id never interleave */
  locks?: KeyedMutex;
  logger?: Logger;
}

/**
 * Fields only the status service may change
 */
type StatusFields = Pick<Environment, 'status' | 'lastProbeAt' | 'lastStatusChangeAt'>;

export class EnvironmentRegistry {
  readonly locks: KeyedMutex;

  private readonly repository: EnvironmentRepository;
  private readonly logger: Logger;
  private readonly environments = shallowReactive(new Map<string, Environment>());
  /** Bumped on every cache write; lets refresh() skip records written while it was reading */
  private readonly generations = new Map<string, number>();
  private readonly events = new EventEmitter();

  readonly count: ComputedRef<number> = computed(() => this.environments.size);

  readonly statusCounts: ComputedRef<Record<EnvironmentStatus, number>> = computed(() => {
    const counts: Record<EnvironmentStatus, number> = { up: 0, down: 0, unknown: 0 };
    for (const environment of this.environments.values()) {
      counts[environment.status] += 1;
    }
    return counts;
  });

  constructor(options: EnvironmentRegistryOptions) {
    this.repository = options.repository;
    this.locks = options.locks ?? new KeyedMutex();
    this.logger = options.logger ?? createServiceLogger({ component: 'environment-registry' });
  }

  get(environmentId: string): Environment | undefined {
    return this.environments.get(environmentId);
  }

  list(): Environment[] {
    return [...this.environments.values()];
  }

  /**
   * Create or update an environment. Liveness fields are kept from the
   * stored record; new environments start `unknown`.
   */
  async save(input: Omit<Environment, keyof StatusFields> & Partial<StatusFields>): Promise<Environment> {
    const result = validateEnvironment({ ...input, status: input.status ?? 'unknown' });
    if (!result.valid) {
      throw result.error;
    }

    return this.locks.runExclusive(environmentKey(input.id), async () => {
      const stored = await this.repository.get(input.id);
      const environment: Environment = { ...result.value };
      if (stored) {
        environment.status = stored.status;
        environment.lastProbeAt = stored.lastProbeAt;
        environment.lastStatusChangeAt = stored.lastStatusChangeAt;
      } else {
        environment.status = 'unknown';
        delete environment.lastProbeAt;
        delete environment.lastStatusChangeAt;
      }

      await this.repository.put(environment);
      this.ingest(environment);
      this.logger.info(stored ? 'Environment updated' : 'Environment created', {
        environmentId: environment.id,
        kind: environment.kind,
      });
      return environment;
    });
  }

  /**
   * Delete an environment. Listeners close its tunnel and evict its handler.
   */
  async remove(environmentId: string): Promise<boolean> {
    return this.locks.runExclusive(environmentKey(environmentId), async () => {
      const deleted = await this.repository.delete(environmentId);
      const previous = this.environments.get(environmentId);
      this.forget(environmentId);
      if (previous) {
        this.logger.info('Environment removed', { environmentId });
        this.events.emit('removed', environmentId, previous);
      }
      return deleted || previous !== undefined;
    });
  }

  /**
   * Reload the cached view from the record store
   */
  async refresh(): Promise<void> {
    const before = new Map(this.generations);
    const records = await this.repository.list();
    const seen = new Set<string>();

    for (const record of records) {
      seen.add(record.id);
      if (this.generations.get(record.id) !== before.get(record.id)) {
        continue;
      }
      const cached = this.environments.get(record.id);
      if (!cached || stableStringify(cached) !== stableStringify(record)) {
        this.ingest(record);
      }
    }

    for (const [environmentId, previous] of [...this.environments.entries()]) {
      if (seen.has(environmentId) || this.generations.get(environmentId) !== before.get(environmentId)) {
        continue;
      }
      this.forget(environmentId);
      this.logger.info('Environment disappeared from store', { environmentId });
      this.events.emit('removed', environmentId, previous);
    }
  }

  /**
   * Place a record in the cache and notify listeners. Callers must already
   * have persisted it.
   */
  ingest(environment: Environment): void {
    const previous = this.environments.get(environment.id);
    this.environments.set(environment.id, environment);
    this.generations.set(environment.id, (this.generations.get(environment.id) ?? 0) + 1);
    this.events.emit('updated', environment, previous);
  }

  onUpdated(listener: EnvironmentUpdatedListener): () => void {
    this.events.on('updated', listener);
    return () => this.events.off('updated', listener);
  }

  onRemoved(listener: EnvironmentRemovedListener): () => void {
    this.events.on('removed', listener);
    return () => this.events.off('removed', listener);
  }

  private forget(environmentId: string): void {
    this.environments.delete(environmentId);
    this.generations.set(environmentId, (this.generations.get(environmentId) ?? 0) + 1);
  }
}
