/**
 * Transport selection for proxied environments
 * @module @tidewater/server/proxy/transport-builder
 *
 * Every environment kind resolves to exactly one of three transports. The
 * choice is made once per build; handlers never branch on kind afterwards.
 */

import http from 'node:http';
import https from 'node:https';
import { PassThrough, type Duplex } from 'node:stream';
import {
  ProxyError,
  defaultTunnelTarget,
  describeKind,
  formatTunnelTarget,
  parseEndpointUrl,
  parseTunnelTarget,
  validateConnectionDescriptor,
  type ApiFamily,
  type Environment,
} from '@tidewater/shared';
import type { TunnelStore } from '@tidewater/core';

/**
 * Where forwarded requests are addressed. `socketPath` wins over host/port.
 */
export interface RequestTarget {
  protocol: 'http:' | 'https:';
  host: string;
  port: number;
  socketPath?: string;
}

interface TransportBase {
  environmentId: string;
  api: ApiFamily;
  target: RequestTarget;
  agent: http.Agent;
  /** Throws when the transport cannot carry a call right now */
  preflight(): void;
  dispose(): void;
}

export interface DirectHttpTransport extends TransportBase {
  variant: 'direct-http';
  secure: boolean;
}

export interface DirectSocketTransport extends TransportBase {
  variant: 'direct-socket';
}

export interface TunnelDialTransport extends TransportBase {
  variant: 'tunnel-dial';
  tunnelTarget: string;
}

export type Transport = DirectHttpTransport | DirectSocketTransport | TunnelDialTransport;

export type TransportVariant = Transport['variant'];

/**
 * Opens sub-connections through whichever tunnel is installed for the
 * environment at connect time. A reconnected agent is picked up without
 * rebuilding the handler.
 */
export class TunnelDialAgent extends http.Agent {
  constructor(
    private readonly environmentId: string,
    private readonly tunnelTarget: string,
    private readonly tunnels: TunnelStore,
    private readonly dialTimeoutMs: number,
  ) {
    // Sub-connections are cheap to open and must not outlive a request
    super({ keepAlive: false });
  }

  createConnection(): Duplex {
    const tunnel = this.tunnels.get(this.environmentId);
    if (!tunnel) {
      const failed = new PassThrough();
      process.nextTick(() =>
        failed.destroy(ProxyError.environmentUnreachable(this.environmentId, 'no active tunnel')),
      );
      return failed;
    }
    return tunnel.channel.open(this.tunnelTarget, { timeoutMs: this.dialTimeoutMs });
  }
}

export interface TransportBuilderOptions {
  tunnels: TunnelStore;
  /** OPEN_ACK wait for tunnel sub-connections (default: 10000) */
  tunnelDialTimeoutMs?: number;
}

export class TransportBuilder {
  private readonly tunnels: TunnelStore;
  private readonly tunnelDialTimeoutMs: number;

  constructor(options: TransportBuilderOptions) {
    this.tunnels = options.tunnels;
    this.tunnelDialTimeoutMs = options.tunnelDialTimeoutMs ?? 10_000;
  }

  build(environment: Environment): Transport {
    const { id, kind, connection } = environment;
    const [problem] = validateConnectionDescriptor(kind, connection);
    if (problem) {
      throw ProxyError.configInvalid(id, problem.message, problem.field);
    }

    const { api, transport } = describeKind(kind);
    switch (transport) {
      case 'socket':
        return this.buildDirectSocket(environment, api);
      case 'http':
        return this.buildDirectHttp(environment, api);
      case 'tunnel':
        return this.buildTunnelDial(environment, api);
    }
  }

  private buildDirectSocket(environment: Environment, api: ApiFamily): DirectSocketTransport {
    const address = parseEndpointUrl(environment.connection.url);
    if (!address || (address.protocol !== 'unix' && address.protocol !== 'npipe')) {
      throw ProxyError.configInvalid(environment.id, 'socket transports need a unix:// or npipe:// URL', 'connection.url');
    }
    const agent = new http.Agent({ keepAlive: true });
    return {
      variant: 'direct-socket',
      environmentId: environment.id,
      api,
      agent,
      target: { protocol: 'http:', host: 'localhost', port: 80, socketPath: address.socketPath },
      preflight: () => undefined,
      dispose: () => agent.destroy(),
    };
  }

  private buildDirectHttp(environment: Environment, api: ApiFamily): DirectHttpTransport {
    const address = parseEndpointUrl(environment.connection.url);
    if (!address || address.protocol === 'unix' || address.protocol === 'npipe') {
      throw ProxyError.configInvalid(environment.id, 'http transports need a tcp://, http:// or https:// URL', 'connection.url');
    }

    const tls = environment.connection.tls;
    const secure = address.protocol === 'https' || tls?.enabled === true;
    const agent = secure
      ? new https.Agent({
          keepAlive: true,
          ca: tls?.ca,
          cert: tls?.cert,
          key: tls?.key,
          rejectUnauthorized: tls?.skipVerify !== true,
        })
      : new http.Agent({ keepAlive: true });

    return {
      variant: 'direct-http',
      environmentId: environment.id,
      api,
      agent,
      secure,
      target: { protocol: secure ? 'https:' : 'http:', host: address.host, port: address.port },
      preflight: () => undefined,
      dispose: () => agent.destroy(),
    };
  }

  private buildTunnelDial(environment: Environment, api: ApiFamily): TunnelDialTransport {
    const raw = environment.connection.tunnelTarget ?? defaultTunnelTarget(api);
    const parsed = parseTunnelTarget(raw);
    if (!parsed) {
      throw ProxyError.configInvalid(environment.id, `unsupported tunnel target ${raw}`, 'connection.tunnelTarget');
    }

    const tunnelTarget = formatTunnelTarget(parsed);
    const agent = new TunnelDialAgent(environment.id, tunnelTarget, this.tunnels, this.tunnelDialTimeoutMs);
    const target: RequestTarget =
      parsed.kind === 'tcp'
        ? { protocol: 'http:', host: parsed.host, port: parsed.port }
        : { protocol: 'http:', host: 'localhost', port: 80 };

    return {
      variant: 'tunnel-dial',
      environmentId: environment.id,
      api,
      agent,
      tunnelTarget,
      target,
      preflight: () => {
        if (!this.tunnels.has(environment.id)) {
          throw ProxyError.environmentUnreachable(environment.id, 'no active tunnel');
        }
      },
      dispose: () => agent.destroy(),
    };
  }
}
