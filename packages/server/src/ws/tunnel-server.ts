/**
 * Reverse tunnel server
 * @module @tidewater/server/ws/tunnel-server
 *
 * Accepts inbound agent WebSocket connections, authenticates the first
 * `tunnel:hello` frame, installs one multiplexed channel per environment and
 * watches agent heartbeats. Liveness changes go through the status service.
 */

import { randomUUID } from 'node:crypto';
import type { IncomingMessage } from 'node:http';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import {
  MuxChannel,
  TunnelError,
  createServiceLogger,
  encodeControl,
  isEdgeEnvironment,
  isHeartbeatPayload,
  isHelloPayload,
  parseControl,
  toError,
  type CredentialVerifier,
  type HandshakeRejectCode,
  type IncomingStream,
  type Logger,
  type TunnelAcceptPayload,
  type TunnelHelloPayload,
  type TunnelRejectPayload,
  type TunnelSummary,
} from '@tidewater/shared';
import {
  KeyedMutex,
  type EnvironmentRegistry,
  type EnvironmentStatusService,
  type Tunnel,
  type TunnelStore,
} from '@tidewater/core';

/**
 * Receives sub-connections the agent opens towards the control plane
 */
export type AgentStreamHandler = (environmentId: string, incoming: IncomingStream) => void;

export interface TunnelServerOptions {
  registry: EnvironmentRegistry;
  tunnels: TunnelStore;
  status: EnvironmentStatusService;
  verifier: CredentialVerifier;
  /** Interval agents are told to heartbeat at (default: 10000) */
  heartbeatIntervalMs?: number;
  /** Missed intervals before the tunnel is declared lost (default: 2) */
  heartbeatLossThreshold?: number;
  /** Time allowed for the hello frame and its verification (default: 10000) */
  handshakeTimeoutMs?: number;
  /** OPEN_ACK wait for server-opened sub-connections (default: 10000) */
  dialTimeoutMs?: number;
  /** Largest WebSocket message accepted (default: 16MB) */
  maxPayload?: number;
  onAgentStream?: AgentStreamHandler;
  logger?: Logger;
}

export interface ListenAddress {
  host: string;
  port: number;
}

/** Normal closure */
const CLOSE_NORMAL = 1000;
/** Going away */
const CLOSE_GOING_AWAY = 1001;
/** Policy violation, used for rejected handshakes */
const CLOSE_POLICY = 1008;

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export class TunnelServer {
  private readonly options: Required<
    Pick<
      TunnelServerOptions,
      'heartbeatIntervalMs' | 'heartbeatLossThreshold' | 'handshakeTimeoutMs' | 'dialTimeoutMs' | 'maxPayload'
    >
  >;
  private readonly registry: EnvironmentRegistry;
  private readonly tunnels: TunnelStore;
  private readonly status: EnvironmentStatusService;
  private readonly verifier: CredentialVerifier;
  private readonly onAgentStream?: AgentStreamHandler;
  private readonly logger: Logger;
  private readonly handshakes = new KeyedMutex();
  private readonly sockets = new Set<WebSocket>();
  /** Tunnels created by this server, so close() only tears down its own */
  private readonly owned = new Set<Tunnel>();
  private readonly unsubscribe: () => void;
  private wss: WebSocketServer | null = null;
  private ownsServer = false;
  private shuttingDown = false;

  constructor(options: TunnelServerOptions) {
    this.registry = options.registry;
    this.tunnels = options.tunnels;
    this.status = options.status;
    this.verifier = options.verifier;
    this.onAgentStream = options.onAgentStream;
    this.logger = options.logger ?? createServiceLogger({ component: 'tunnel-server' });
    this.options = {
      heartbeatIntervalMs: options.heartbeatIntervalMs ?? 10_000,
      heartbeatLossThreshold: Math.max(1, options.heartbeatLossThreshold ?? 2),
      handshakeTimeoutMs: options.handshakeTimeoutMs ?? 10_000,
      dialTimeoutMs: options.dialTimeoutMs ?? 10_000,
      maxPayload: options.maxPayload ?? 16 * 1024 * 1024,
    };

    this.unsubscribe = this.registry.onRemoved((environmentId) => {
      this.tunnels.get(environmentId)?.close('environment deleted');
    });
  }

  /**
   * Bind a WebSocket listener. Rejects when the address cannot be bound.
   * Resolves with the bound port.
   */
  listen(address: ListenAddress): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      const wss = new WebSocketServer({
        host: address.host,
        port: address.port,
        maxPayload: this.options.maxPayload,
      });

      const onError = (error: Error): void => {
        wss.off('listening', onListening);
        reject(error);
      };
      const onListening = (): void => {
        wss.off('error', onError);
        wss.on('error', (error) => this.logger.error('Tunnel listener error', error));
        this.ownsServer = true;
        this.attach(wss);
        const bound = wss.address();
        const port = typeof bound === 'string' ? address.port : bound.port;
        this.logger.info('Tunnel server listening', { host: address.host, port });
        resolve(port);
      };

      wss.once('error', onError);
      wss.once('listening', onListening);
    });
  }

  /**
   * Accept agent connections from an existing WebSocket server
   */
  attach(wss: WebSocketServer): void {
    this.wss = wss;
    wss.on('connection', (ws, request) => this.handleConnection(ws, request));
  }

  getTunnel(environmentId: string): TunnelSummary | undefined {
    const tunnel = this.tunnels.get(environmentId);
    return tunnel ? this.tunnels.summarize(tunnel) : undefined;
  }

  listTunnels(): TunnelSummary[] {
    return this.tunnels.summaries();
  }

  /**
   * Terminate every tunnel and pending handshake, then the listener
   */
  async close(): Promise<void> {
    this.unsubscribe();
    this.shuttingDown = true;

    for (const tunnel of [...this.owned]) {
      tunnel.close('server shutting down');
    }
    for (const ws of this.sockets) {
      ws.close(CLOSE_GOING_AWAY, 'server shutting down');
    }
    this.sockets.clear();

    const wss = this.wss;
    this.wss = null;
    if (wss && this.ownsServer) {
      for (const client of wss.clients) {
        client.terminate();
      }
      await new Promise<void>((resolve, reject) => {
        wss.close((error) => (error ? reject(error) : resolve()));
      });
    }

    this.logger.info('Tunnel server closed');
  }

  // ==========================================================================
  // Handshake
  // ==========================================================================

  private handleConnection(ws: WebSocket, request: IncomingMessage): void {
    const remoteAddress = this.extractIpAddress(request);
    this.sockets.add(ws);
    let settled = false;

    this.logger.debug('Agent connection opened', { remoteAddress });

    const timer = setTimeout(() => {
      if (!settled) {
        settled = true;
        this.reject(ws, 'HANDSHAKE_TIMEOUT', 'no valid hello within the handshake timeout');
      }
    }, this.options.handshakeTimeoutMs);

    const finish = (): boolean => {
      clearTimeout(timer);
      if (settled) return false;
      settled = true;
      return true;
    };

    ws.on('error', (error) => {
      this.logger.warn('Agent connection error', { remoteAddress, error: error.message });
    });
    ws.once('close', () => {
      clearTimeout(timer);
      settled = true;
      this.sockets.delete(ws);
    });

    ws.once('message', (data, isBinary) => {
      const message = isBinary ? null : parseControl(toBuffer(data).toString('utf8'));
      if (!message || message.type !== 'tunnel:hello' || !isHelloPayload(message.payload)) {
        if (finish()) {
          this.reject(ws, 'INVALID_FRAME', 'first frame must be a tunnel:hello control message');
        }
        return;
      }

      const hello = message.payload;
      this.handshakes
        .runExclusive(hello.environmentId, () => this.authenticate(ws, hello, remoteAddress, finish))
        .catch((error: unknown) => {
          this.logger.error('Tunnel handshake failed', toError(error), { environmentId: hello.environmentId });
          if (finish()) {
            this.reject(ws, 'VERIFIER_ERROR', 'handshake failed');
          }
        });
    });
  }

  private async authenticate(
    ws: WebSocket,
    hello: TunnelHelloPayload,
    remoteAddress: string | undefined,
    finish: () => boolean,
  ): Promise<void> {
    const { environmentId } = hello;
    const environment = this.registry.get(environmentId);
    if (!environment) {
      if (finish()) this.reject(ws, 'UNKNOWN_ENVIRONMENT', `unknown environment ${environmentId}`, environmentId);
      return;
    }
    if (!isEdgeEnvironment(environment)) {
      if (finish()) this.reject(ws, 'NOT_EDGE_ENVIRONMENT', `environment ${environmentId} is not tunnel-routed`, environmentId);
      return;
    }

    let valid: boolean;
    let reason: string | undefined;
    try {
      ({ valid, reason } = await this.verifier.verify(environmentId, hello.token));
    } catch (error) {
      this.logger.error('Credential verifier failed', toError(error), { environmentId });
      if (finish()) this.reject(ws, 'VERIFIER_ERROR', 'credential verification unavailable', environmentId);
      return;
    }

    if (!valid) {
      if (finish()) this.reject(ws, 'INVALID_CREDENTIALS', reason ?? 'invalid agent credentials', environmentId);
      return;
    }

    if (!finish() || ws.readyState !== WebSocket.OPEN) {
      this.logger.debug('Agent left before the handshake completed', { environmentId });
      return;
    }

    const tunnel = this.createTunnel(ws, hello, remoteAddress);
    this.tunnels.install(tunnel);
    this.sockets.delete(ws);

    const accept: TunnelAcceptPayload = {
      tunnelId: tunnel.tunnelId,
      heartbeatIntervalMs: this.options.heartbeatIntervalMs,
    };
    ws.send(encodeControl('tunnel:accept', accept));

    this.logger.info('Tunnel established', {
      environmentId,
      tunnelId: tunnel.tunnelId,
      remoteAddress,
      agentVersion: hello.agentVersion,
    });

    await this.status.recordTunnelEstablished(environmentId);
  }

  private reject(ws: WebSocket, code: HandshakeRejectCode, reason: string, environmentId?: string): void {
    const error = TunnelError.handshakeRejected(code, reason, environmentId);
    this.logger.warn('Tunnel handshake rejected', error.toLog());

    const payload: TunnelRejectPayload = { code, reason };
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(encodeControl('tunnel:reject', payload));
      ws.close(CLOSE_POLICY, code);
    }
  }

  // ==========================================================================
  // Established tunnels
  // ==========================================================================

  private createTunnel(ws: WebSocket, hello: TunnelHelloPayload, remoteAddress: string | undefined): Tunnel {
    const { environmentId } = hello;
    const logger = this.logger.child({ environmentId });
    const onAgentStream = this.onAgentStream;

    const channel = new MuxChannel({
      role: 'server',
      environmentId,
      openTimeoutMs: this.options.dialTimeoutMs,
      logger,
      onIncoming: onAgentStream ? (incoming) => onAgentStream(environmentId, incoming) : undefined,
      send: (frame) => {
        if (ws.readyState !== WebSocket.OPEN) return;
        ws.send(frame, { binary: true }, (error) => {
          if (error) logger.debug('Frame write failed', { error: error.message });
        });
      },
    });

    let watchdog: NodeJS.Timeout | null = null;
    let tornDown = false;
    const lossWindowMs = this.options.heartbeatIntervalMs * this.options.heartbeatLossThreshold;

    const teardown = (reason: string, lost: boolean): void => {
      if (tornDown) return;
      tornDown = true;
      if (watchdog) clearTimeout(watchdog);
      this.owned.delete(tunnel);

      channel.close(reason);
      if (lost) {
        ws.terminate();
      } else if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close(reason === 'server shutting down' ? CLOSE_GOING_AWAY : CLOSE_NORMAL, reason);
      }

      const wasInstalled = this.tunnels.retire(environmentId, tunnel);
      logger.info('Tunnel closed', { tunnelId: tunnel.tunnelId, reason, wasInstalled });
      if (wasInstalled && !this.shuttingDown) {
        this.status.recordTunnelLost(environmentId, reason).catch((error: unknown) => {
          logger.error('Failed to record tunnel loss', toError(error));
        });
      }
    };

    const armWatchdog = (): void => {
      if (watchdog) clearTimeout(watchdog);
      watchdog = setTimeout(() => {
        logger.warn('Tunnel heartbeat lost', { tunnelId: tunnel.tunnelId, lossWindowMs });
        teardown('heartbeat timeout', true);
      }, lossWindowMs);
    };

    const tunnel: Tunnel = {
      tunnelId: randomUUID(),
      environmentId,
      channel,
      establishedAt: new Date(),
      lastHeartbeatAt: new Date(),
      state: 'active',
      remoteAddress,
      agentVersion: hello.agentVersion,
      close: (reason) => teardown(reason, false),
    };
    this.owned.add(tunnel);

    ws.on('message', (data, isBinary) => {
      if (tornDown) return;
      if (isBinary) {
        channel.receive(toBuffer(data));
        return;
      }

      const message = parseControl(toBuffer(data).toString('utf8'));
      if (message?.type === 'tunnel:heartbeat' && isHeartbeatPayload(message.payload)) {
        tunnel.lastHeartbeatAt = new Date();
        armWatchdog();
        ws.send(encodeControl('tunnel:heartbeat:ack', { timestamp: Date.now() }, message.correlationId));
        return;
      }

      logger.debug('Ignoring unexpected control message', { type: message?.type });
    });
    ws.once('close', (code, reason) => {
      teardown(`transport closed (${code}${reason.length > 0 ? `: ${reason.toString()}` : ''})`, false);
    });

    armWatchdog();
    return tunnel;
  }

  private extractIpAddress(request: IncomingMessage): string | undefined {
    const forwarded = request.headers['x-forwarded-for'];
    if (forwarded) {
      const ips = typeof forwarded === 'string' ? forwarded : forwarded[0];
      return ips?.split(',')[0]?.trim();
    }
    return request.socket.remoteAddress;
  }
}
