/**
 * Cache of per-environment proxy handlers
 * @module @tidewater/server/proxy/proxy-factory
 *
 * Handlers are keyed by environment id and a fingerprint of the connection
 * configuration. Concurrent misses for the same key share one build. Callers
 * hold a lease while a call is in flight; a handler replaced by a newer
 * configuration is disposed once its last lease is released.
 *
 * Only the registry's current record is ever cached. A caller holding an
 * older copy of a registered environment is served the current one; an
 * environment the registry does not know gets a one-off handler.
 */

import { createHash } from 'node:crypto';
import {
  ProxyError,
  createServiceLogger,
  stableStringify,
  type Environment,
  type Logger,
} from '@tidewater/shared';
import { SingleFlight, type EnvironmentRegistry } from '@tidewater/core';
import { EnvironmentProxyHandler } from './proxy-handler.js';
import type { TransportBuilder } from './transport-builder.js';

export interface ProxyLease {
  readonly handler: EnvironmentProxyHandler;
  /** Idempotent */
  release(): void;
}

export interface ProxyFactoryOptions {
  registry: EnvironmentRegistry;
  builder: TransportBuilder;
  requestTimeoutMs?: number;
  /** Unused handlers older than this are dropped (default: 10 minutes) */
  cacheIdleEvictionMs?: number;
  logger?: Logger;
}

interface CacheEntry {
  environmentId: string;
  fingerprint: string;
  handler: EnvironmentProxyHandler;
  refCount: number;
  lastUsedAt: number;
  superseded: boolean;
}

/**
 * Digest of everything that decides how an environment is reached
 */
export function connectionFingerprint(environment: Pick<Environment, 'kind' | 'connection'>): string {
  return createHash('sha256')
    .update(stableStringify({ kind: environment.kind, connection: environment.connection }))
    .digest('hex');
}

export class ProxyFactory {
  private readonly registry: EnvironmentRegistry;
  private readonly builder: TransportBuilder;
  private readonly requestTimeoutMs?: number;
  private readonly cacheIdleEvictionMs: number;
  private readonly logger: Logger;
  private readonly entries = new Map<string, CacheEntry>();
  private readonly retiring = new Set<CacheEntry>();
  private readonly builds = new SingleFlight<CacheEntry>();
  private readonly unsubscribers: Array<() => void> = [];
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: ProxyFactoryOptions) {
    this.registry = options.registry;
    this.builder = options.builder;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.cacheIdleEvictionMs = options.cacheIdleEvictionMs ?? 10 * 60_000;
    this.logger = options.logger ?? createServiceLogger({ component: 'proxy-factory' });

    this.unsubscribers.push(
      this.registry.onRemoved((environmentId) => this.evict(environmentId)),
      this.registry.onUpdated((environment) => {
        const entry = this.entries.get(environment.id);
        if (entry && entry.fingerprint !== connectionFingerprint(environment)) {
          this.supersede(entry);
        }
      }),
    );
  }

  /** Number of current (not superseded) handlers */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Lease the handler for an environment id known to the registry
   */
  async getHandler(environmentId: string): Promise<ProxyLease> {
    const environment = this.registry.get(environmentId);
    if (!environment) {
      throw ProxyError.environmentNotFound(environmentId);
    }
    return this.acquire(environment);
  }

  /**
   * Lease a handler for an environment, building it if needed
   */
  async acquire(environment: Environment): Promise<ProxyLease> {
    const current = this.registry.get(environment.id);
    if (!current) {
      return this.lease(this.createEntry(environment, connectionFingerprint(environment), false));
    }

    const fingerprint = connectionFingerprint(current);
    const cached = this.entries.get(current.id);
    if (cached && cached.fingerprint === fingerprint) {
      return this.lease(cached);
    }

    const entry = await this.builds.do(`${current.id}:${fingerprint}`, async () => this.install(current, fingerprint));
    if (entry.handler.isDisposed) {
      // Replaced before this caller resumed; follow the latest record
      const latest = this.registry.get(environment.id);
      if (!latest) {
        throw ProxyError.environmentNotFound(environment.id);
      }
      return this.acquire(latest);
    }
    return this.lease(entry);
  }

  /**
   * Drop the handler of a deleted or reconfigured environment. In-flight
   * calls keep their lease until they finish.
   */
  evict(environmentId: string): void {
    const entry = this.entries.get(environmentId);
    if (entry) {
      this.supersede(entry);
    }
  }

  /**
   * Dispose handlers nobody used for `cacheIdleEvictionMs`
   */
  sweepIdle(now: number = Date.now()): number {
    let evicted = 0;
    for (const entry of [...this.entries.values()]) {
      if (entry.refCount === 0 && now - entry.lastUsedAt >= this.cacheIdleEvictionMs) {
        this.entries.delete(entry.environmentId);
        entry.handler.dispose();
        evicted++;
      }
    }
    if (evicted > 0) {
      this.logger.debug('Evicted idle proxy handlers', { evicted });
    }
    return evicted;
  }

  startSweeper(): void {
    if (this.sweepTimer) return;
    const interval = Math.min(this.cacheIdleEvictionMs, 60_000);
    this.sweepTimer = setInterval(() => this.sweepIdle(), interval);
    this.sweepTimer.unref();
  }

  close(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
    for (const entry of [...this.entries.values(), ...this.retiring]) {
      entry.handler.dispose();
    }
    this.entries.clear();
    this.retiring.clear();
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private install(environment: Environment, fingerprint: string): CacheEntry {
    const current = this.entries.get(environment.id);
    if (current && current.fingerprint === fingerprint) {
      return current;
    }

    // The registry moved on while this build was queued
    const latest = this.registry.get(environment.id);
    if (!latest || connectionFingerprint(latest) !== fingerprint) {
      return this.createEntry(environment, fingerprint, false);
    }

    const entry = this.createEntry(environment, fingerprint, true);
    if (current) {
      this.supersede(current);
    }
    this.entries.set(environment.id, entry);
    return entry;
  }

  /**
   * Build a handler. Uncached entries are born superseded so their last
   * release disposes them.
   */
  private createEntry(environment: Environment, fingerprint: string, cached: boolean): CacheEntry {
    const transport = this.builder.build(environment);
    const entry: CacheEntry = {
      environmentId: environment.id,
      fingerprint,
      handler: new EnvironmentProxyHandler({
        environment,
        transport,
        requestTimeoutMs: this.requestTimeoutMs,
        logger: this.logger,
      }),
      refCount: 0,
      lastUsedAt: Date.now(),
      superseded: !cached,
    };
    if (!cached) {
      this.retiring.add(entry);
    }

    this.logger.info('Proxy handler built', {
      environmentId: environment.id,
      transport: transport.variant,
      fingerprint: fingerprint.slice(0, 12),
      cached,
    });
    return entry;
  }

  private supersede(entry: CacheEntry): void {
    if (this.entries.get(entry.environmentId) === entry) {
      this.entries.delete(entry.environmentId);
    }
    entry.superseded = true;
    if (entry.refCount === 0) {
      entry.handler.dispose();
    } else {
      this.retiring.add(entry);
    }
  }

  private lease(entry: CacheEntry): ProxyLease {
    entry.refCount++;
    entry.lastUsedAt = Date.now();
    let released = false;

    return {
      handler: entry.handler,
      release: () => {
        if (released) return;
        released = true;
        entry.refCount--;
        entry.lastUsedAt = Date.now();
        if (entry.superseded && entry.refCount === 0) {
          this.retiring.delete(entry);
          entry.handler.dispose();
        }
      },
    };
  }
}
