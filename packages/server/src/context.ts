/**
 * Application context
 * @module @tidewater/server/context
 *
 * Wires every store, cache and service of one control plane instance. Nothing
 * here is process-global; tests create as many contexts as they need.
 */

import {
  ValidationError,
  createServiceLogger,
  type CredentialVerifier,
  type Logger,
} from '@tidewater/shared';
import {
  EnvironmentRegistry,
  EnvironmentRepository,
  EnvironmentStatusService,
  InMemoryKeyValueStore,
  KeyedMutex,
  TunnelStore,
  type KeyValueStore,
} from '@tidewater/core';
import type { ControlPlaneConfig } from './config.js';
import { EndpointProxyRouter, ProxyFactory, TransportBuilder } from './proxy/index.js';
import { EdgeKeyVerifier } from './services/edge-key-verifier.js';
import { SnapshotScheduler } from './services/snapshot-scheduler.js';
import { TunnelServer, type AgentStreamHandler } from './ws/tunnel-server.js';
import {
  RoleAccessPolicy,
  StaticTokenIdentityProvider,
  type AccessPolicy,
  type IdentityProvider,
} from './middleware/index.js';

/**
 * External capabilities injected by the embedding product
 */
export interface AppCapabilities {
  /** Durable record store (default: in-memory) */
  store?: KeyValueStore;
  /** Edge agent credential check (default: `edgeKeyHash` comparison) */
  verifier?: CredentialVerifier;
  /** API caller identity (default: the configured `apiToken`) */
  identityProvider?: IdentityProvider;
  /** API authorization (default: role abilities) */
  accessPolicy?: AccessPolicy;
  onAgentStream?: AgentStreamHandler;
  logger?: Logger;
}

export interface AppContext {
  config: ControlPlaneConfig;
  logger: Logger;
  store: KeyValueStore;
  repository: EnvironmentRepository;
  registry: EnvironmentRegistry;
  tunnels: TunnelStore;
  status: EnvironmentStatusService;
  tunnelServer: TunnelServer;
  transportBuilder: TransportBuilder;
  proxyFactory: ProxyFactory;
  proxyRouter: EndpointProxyRouter;
  scheduler: SnapshotScheduler;
  /** Absent when authentication is disabled */
  identityProvider?: IdentityProvider;
  accessPolicy: AccessPolicy;
}

export function createAppContext(config: ControlPlaneConfig, capabilities: AppCapabilities = {}): AppContext {
  const logger = capabilities.logger ?? createServiceLogger({ level: config.logLevel });
  const child = (component: string): Logger => logger.child({ component });

  let identityProvider: IdentityProvider | undefined;
  if (config.requireAuth) {
    identityProvider =
      capabilities.identityProvider ??
      (config.apiToken ? StaticTokenIdentityProvider.admin(config.apiToken) : undefined);
    if (!identityProvider) {
      throw ValidationError.field('apiToken', 'API_TOKEN is required when REQUIRE_AUTH is enabled', 'required');
    }
  }

  const store = capabilities.store ?? new InMemoryKeyValueStore();
  const repository = new EnvironmentRepository(store, child('environment-repository'));
  const locks = new KeyedMutex();
  const registry = new EnvironmentRegistry({ repository, locks, logger: child('environment-registry') });
  const tunnels = new TunnelStore(child('tunnel-store'));
  const status = new EnvironmentStatusService({ registry, repository, tunnels, logger: child('status-service') });

  const tunnelServer = new TunnelServer({
    registry,
    tunnels,
    status,
    verifier: capabilities.verifier ?? new EdgeKeyVerifier(registry, child('edge-key-verifier')),
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    heartbeatLossThreshold: config.heartbeatLossThreshold,
    handshakeTimeoutMs: config.handshakeTimeoutMs,
    dialTimeoutMs: config.tunnelDialTimeoutMs,
    onAgentStream: capabilities.onAgentStream,
    logger: child('tunnel-server'),
  });

  const transportBuilder = new TransportBuilder({ tunnels, tunnelDialTimeoutMs: config.tunnelDialTimeoutMs });
  const proxyFactory = new ProxyFactory({
    registry,
    builder: transportBuilder,
    requestTimeoutMs: config.requestTimeoutMs,
    cacheIdleEvictionMs: config.cacheIdleEvictionMs,
    logger: child('proxy-factory'),
  });
  const proxyRouter = new EndpointProxyRouter({ registry, factory: proxyFactory, logger: child('proxy-router') });

  const scheduler = new SnapshotScheduler({
    registry,
    factory: proxyFactory,
    status,
    snapshotIntervalMs: config.snapshotIntervalMs,
    probeTimeoutMs: config.probeTimeoutMs,
    concurrency: config.snapshotConcurrency,
    failureThreshold: config.failureThreshold,
    logger: child('snapshot-scheduler'),
  });

  return {
    config,
    logger,
    store,
    repository,
    registry,
    tunnels,
    status,
    tunnelServer,
    transportBuilder,
    proxyFactory,
    proxyRouter,
    scheduler,
    identityProvider,
    accessPolicy: capabilities.accessPolicy ?? new RoleAccessPolicy(),
  };
}
