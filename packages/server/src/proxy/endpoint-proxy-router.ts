/**
 * Entry point for proxied environment calls
 * @module @tidewater/server/proxy/endpoint-proxy-router
 */

import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import {
  ProxyError,
  createServiceLogger,
  describeKind,
  type ApiFamily,
  type Logger,
} from '@tidewater/shared';
import type { EnvironmentRegistry } from '@tidewater/core';
import type { ProxyFactory } from './proxy-factory.js';

export interface HttpProxyCall {
  kind: 'http';
  api: ApiFamily;
  /** Backend path including the query string */
  path: string;
  req: IncomingMessage;
  res: ServerResponse;
}

export interface UpgradeProxyCall {
  kind: 'upgrade';
  api: ApiFamily;
  path: string;
  req: IncomingMessage;
  socket: Duplex;
  head: Buffer;
}

export type ProxyCall = HttpProxyCall | UpgradeProxyCall;

export interface EndpointProxyRouterOptions {
  registry: EnvironmentRegistry;
  factory: ProxyFactory;
  logger?: Logger;
}

/**
 * Resolves an environment and hands the call to its leased handler. Status is
 * only read here; environments marked down fail fast without touching a
 * transport.
 */
export class EndpointProxyRouter {
  private readonly registry: EnvironmentRegistry;
  private readonly factory: ProxyFactory;
  private readonly logger: Logger;

  constructor(options: EndpointProxyRouterOptions) {
    this.registry = options.registry;
    this.factory = options.factory;
    this.logger = options.logger ?? createServiceLogger({ component: 'proxy-router' });
  }

  async route(environmentId: string, call: ProxyCall, signal?: AbortSignal): Promise<void> {
    const environment = this.registry.get(environmentId);
    if (!environment) {
      throw ProxyError.environmentNotFound(environmentId);
    }
    if (environment.status === 'down') {
      throw ProxyError.environmentUnreachable(environmentId, 'environment is down');
    }

    const { api } = describeKind(environment.kind);
    if (api !== call.api) {
      throw ProxyError.apiFamilyMismatch(environmentId, call.api, api);
    }

    const lease = await this.factory.acquire(environment);
    this.logger.debug('Routing call', {
      environmentId,
      kind: call.kind,
      method: call.req.method,
      path: call.path,
      transport: lease.handler.variant,
    });

    try {
      if (call.kind === 'http') {
        await lease.handler.forward(call.req, call.res, call.path, signal);
      } else {
        await lease.handler.upgrade(call.req, call.socket, call.head, call.path, signal);
      }
    } finally {
      lease.release();
    }
  }
}
