/**
 * Edge Agent
 * @module @tidewater/agent/edge-agent
 *
 * Runs next to a Docker daemon or Kubernetes API that the control plane
 * cannot reach. Dials out to the tunnel server, authenticates with its edge
 * key, keeps the tunnel alive with heartbeats and services sub-connections
 * by dialing targets in its own network.
 */

import WebSocket, { type RawData } from 'ws';
import {
  TunnelError,
  createServiceLogger,
  encodeControl,
  formatTunnelTarget,
  isAcceptPayload,
  isRejectPayload,
  parseControl,
  parseTunnelTarget,
  toError,
  MuxChannel,
  type HandshakeRejectCode,
  type IncomingStream,
  type Logger,
  type TunnelAcceptPayload,
  type TunnelHeartbeatPayload,
  type TunnelHelloPayload,
} from '@tidewater/shared';
import { TargetPolicy, dialTarget, splice, type Dialer } from './dialer.js';

// ============================================================================
// Configuration
// ============================================================================

/**
 * Reconnect backoff: the delay doubles from `initialDelayMs` up to
 * `maxDelayMs`, less up to `jitter` (a fraction) at random.
 */
export interface ReconnectPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
  jitter: number;
  /** -1 for unlimited */
  maxAttempts: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  jitter: 0.2,
  maxAttempts: -1,
};

export interface EdgeAgentConfig {
  /** Tunnel server URL (e.g. ws://control-plane:8000) */
  serverUrl: string;
  environmentId: string;
  /** Edge key; the server stores only its SHA-256 digest */
  edgeKey: string;
  agentVersion?: string;
  /** Targets sub-connections may open; any when empty */
  allowedTargets?: string[];
  /** Local connect timeout for sub-connections (default: 10000) */
  dialTimeoutMs?: number;
  /** Time to wait for accept or reject after hello (default: 10000) */
  handshakeTimeoutMs?: number;
  reconnect?: Partial<ReconnectPolicy>;
  /** Replaces the TCP/Unix socket dialer */
  dialer?: Dialer;
  /** Source of randomness for backoff jitter */
  random?: () => number;
  logger?: Logger;
}

export type EdgeAgentEvent =
  | 'connecting'
  | 'connected'
  | 'heartbeat'
  | 'rejected'
  | 'disconnected'
  | 'reconnecting'
  | 'error'
  | 'stopped';

export type EdgeAgentEventHandler = (event: EdgeAgentEvent, data?: unknown) => void;

export type AgentState = 'disconnected' | 'connecting' | 'handshaking' | 'connected';

/**
 * Rejections that will not succeed on retry
 */
const FATAL_REJECTIONS: readonly HandshakeRejectCode[] = ['INVALID_CREDENTIALS', 'NOT_EDGE_ENVIRONMENT', 'INVALID_FRAME'];

export function isFatalRejection(code: HandshakeRejectCode): boolean {
  return FATAL_REJECTIONS.includes(code);
}

/**
 * Delay before reconnect attempt `attempt` (1-based)
 */
export function computeBackoff(attempt: number, policy: ReconnectPolicy, random: () => number = Math.random): number {
  const exponent = Math.max(0, attempt - 1);
  const base = Math.min(policy.maxDelayMs, policy.initialDelayMs * 2 ** exponent);
  return Math.round(base * (1 - policy.jitter * random()));
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ============================================================================
// Agent
// ============================================================================

export class EdgeAgent {
  private readonly config: Required<Omit<EdgeAgentConfig, 'agentVersion' | 'reconnect' | 'allowedTargets'>> & {
    agentVersion?: string;
    reconnect: ReconnectPolicy;
  };
  private readonly policy: TargetPolicy;
  private readonly logger: Logger;
  private ws: WebSocket | null = null;
  private channel: MuxChannel | null = null;
  private tunnelId: string | null = null;
  private state: AgentState = 'disconnected';
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempts = 0;
  private isShuttingDown = false;
  private heartbeatsPaused = false;
  private fatalRejection: TunnelError | null = null;
  private lastHeartbeatAckAt: Date | null = null;
  private eventHandlers = new Set<EdgeAgentEventHandler>();

  constructor(config: EdgeAgentConfig) {
    this.logger = (config.logger ?? createServiceLogger({ component: 'edge-agent' })).child({
      environmentId: config.environmentId,
    });
    this.config = {
      serverUrl: config.serverUrl,
      environmentId: config.environmentId,
      edgeKey: config.edgeKey,
      agentVersion: config.agentVersion,
      dialTimeoutMs: config.dialTimeoutMs ?? 10_000,
      handshakeTimeoutMs: config.handshakeTimeoutMs ?? 10_000,
      reconnect: { ...DEFAULT_RECONNECT_POLICY, ...config.reconnect },
      dialer: config.dialer ?? dialTarget,
      random: config.random ?? Math.random,
      logger: this.logger,
    };
    this.policy = new TargetPolicy(config.allowedTargets);
  }

  getState(): AgentState {
    return this.state;
  }

  getTunnelId(): string | null {
    return this.tunnelId;
  }

  /**
   * Set when the server refused the handshake for good; no reconnects follow
   */
  getFatalRejection(): TunnelError | null {
    return this.fatalRejection;
  }

  getLastHeartbeatAck(): Date | null {
    return this.lastHeartbeatAckAt;
  }

  /**
   * Register an event handler. Returns an unsubscribe function.
   */
  on(handler: EdgeAgentEventHandler): () => void {
    this.eventHandlers.add(handler);
    return () => {
      this.eventHandlers.delete(handler);
    };
  }

  private emit(event: EdgeAgentEvent, data?: unknown): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event, data);
      } catch (error) {
        this.logger.error('Event handler error', toError(error), { event });
      }
    }
  }

  /**
   * Connect and wait for the first tunnel. When that attempt fails the agent
   * keeps reconnecting in the background (unless the rejection is fatal)
   * until stop() is called.
   */
  async start(): Promise<void> {
    if (this.state !== 'disconnected') {
      throw new Error(`Cannot start agent in state: ${this.state}`);
    }
    this.isShuttingDown = false;
    this.fatalRejection = null;
    this.reconnectAttempts = 0;
    await this.connect();
  }

  /**
   * Close the tunnel and stop reconnecting
   */
  async stop(): Promise<void> {
    this.isShuttingDown = true;
    this.stopHeartbeat();
    this.cancelReconnect();

    const ws = this.ws;
    this.ws = null;
    this.teardownChannel('agent stopped');
    if (ws && (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING)) {
      await new Promise<void>((resolve) => {
        ws.once('close', () => resolve());
        ws.close(1000, 'agent stopped');
      });
    }

    this.state = 'disconnected';
    this.tunnelId = null;
    this.emit('stopped');
    this.logger.info('Edge agent stopped');
  }

  /**
   * Stop sending heartbeats while keeping the transport open. The server
   * declares the tunnel lost once the loss window passes.
   */
  pauseHeartbeats(): void {
    this.heartbeatsPaused = true;
  }

  resumeHeartbeats(): void {
    this.heartbeatsPaused = false;
  }

  // ==========================================================================
  // Connection
  // ==========================================================================

  private connect(): Promise<void> {
    if (this.isShuttingDown) return Promise.resolve();

    this.state = 'connecting';
    this.emit('connecting');
    this.logger.info('Connecting to tunnel server', { url: this.config.serverUrl });

    return new Promise<void>((resolve, reject) => {
      const ws = new WebSocket(this.config.serverUrl);
      this.ws = ws;
      let settled = false;

      const settle = (error?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(handshakeTimer);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const handshakeTimer = setTimeout(() => {
        settle(TunnelError.handshakeRejected('HANDSHAKE_TIMEOUT', 'no reply to hello', this.config.environmentId));
        ws.terminate();
      }, this.config.handshakeTimeoutMs);

      ws.on('open', () => {
        this.state = 'handshaking';
        const hello: TunnelHelloPayload = {
          environmentId: this.config.environmentId,
          token: this.config.edgeKey,
          agentVersion: this.config.agentVersion,
        };
        ws.send(encodeControl('tunnel:hello', hello));
      });

      ws.on('message', (data, isBinary) => {
        if (isBinary) {
          this.channel?.receive(toBuffer(data));
          return;
        }

        const message = parseControl(toBuffer(data).toString('utf8'));
        switch (message?.type) {
          case 'tunnel:accept':
            if (isAcceptPayload(message.payload) && this.ws === ws) {
              this.handleAccepted(ws, message.payload);
              settle();
            }
            break;

          case 'tunnel:reject':
            if (isRejectPayload(message.payload)) {
              const { code, reason } = message.payload;
              const error = TunnelError.handshakeRejected(code, reason, this.config.environmentId);
              this.logger.warn('Tunnel handshake rejected', { code, reason });
              if (isFatalRejection(code)) {
                this.fatalRejection = error;
              }
              this.emit('rejected', { code, reason });
              settle(error);
            }
            break;

          case 'tunnel:heartbeat:ack':
            this.lastHeartbeatAckAt = new Date();
            this.emit('heartbeat');
            break;

          default:
            this.logger.debug('Ignoring control message', { type: message?.type });
        }
      });

      ws.on('close', (code, reason) => {
        const text = reason.toString();
        settle(TunnelError.lost(this.config.environmentId, `transport closed (${code}${text ? `: ${text}` : ''})`));
        this.handleClose(ws, code, text);
      });

      ws.on('error', (error) => {
        this.logger.warn('Tunnel transport error', { error: error.message });
        this.emit('error', error);
        settle(error);
      });
    });
  }

  private handleAccepted(ws: WebSocket, accept: TunnelAcceptPayload): void {
    this.tunnelId = accept.tunnelId;
    this.channel = new MuxChannel({
      role: 'agent',
      environmentId: this.config.environmentId,
      logger: this.logger,
      onIncoming: (incoming) => this.handleIncoming(incoming),
      send: (frame) => {
        if (ws.readyState !== WebSocket.OPEN) return;
        ws.send(frame, { binary: true }, (error) => {
          if (error) this.logger.debug('Frame write failed', { error: error.message });
        });
      },
    });

    this.state = 'connected';
    this.reconnectAttempts = 0;
    this.startHeartbeat(accept.heartbeatIntervalMs);
    this.emit('connected', { tunnelId: accept.tunnelId });
    this.logger.info('Tunnel established', {
      tunnelId: accept.tunnelId,
      heartbeatIntervalMs: accept.heartbeatIntervalMs,
    });
  }

  private handleClose(ws: WebSocket, code: number, reason: string): void {
    if (this.ws !== ws && this.ws !== null) return;
    this.ws = null;
    this.stopHeartbeat();
    this.teardownChannel(`transport closed (${code})`);

    const wasConnected = this.state === 'connected';
    this.state = 'disconnected';
    this.tunnelId = null;
    this.logger.info('Tunnel closed', { code, reason, wasConnected });
    this.emit('disconnected', { code, reason, wasConnected });

    if (this.isShuttingDown) return;
    if (this.fatalRejection) {
      this.logger.error('Not reconnecting after fatal rejection', this.fatalRejection);
      return;
    }
    this.scheduleReconnect();
  }

  private teardownChannel(reason: string): void {
    const channel = this.channel;
    this.channel = null;
    channel?.close(reason);
  }

  private scheduleReconnect(): void {
    if (this.isShuttingDown || this.reconnectTimer) return;

    const { maxAttempts } = this.config.reconnect;
    if (maxAttempts !== -1 && this.reconnectAttempts >= maxAttempts) {
      this.logger.error('Max reconnect attempts reached, giving up', { attempts: this.reconnectAttempts });
      this.emit('error', new Error('Max reconnect attempts reached'));
      return;
    }

    this.reconnectAttempts++;
    const delay = computeBackoff(this.reconnectAttempts, this.config.reconnect, this.config.random);
    this.logger.info('Scheduling reconnect', { attempt: this.reconnectAttempts, delay });
    this.emit('reconnecting', { attempt: this.reconnectAttempts, delay });

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.connect().catch((error: unknown) => {
        // The close handler schedules the next attempt
        this.logger.debug('Reconnect attempt failed', { error: toError(error).message });
      });
    }, delay);
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  // ==========================================================================
  // Heartbeat
  // ==========================================================================

  private startHeartbeat(intervalMs: number): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => this.sendHeartbeat(), intervalMs);
    this.sendHeartbeat();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }

  private sendHeartbeat(): void {
    const ws = this.ws;
    if (this.heartbeatsPaused || !ws || ws.readyState !== WebSocket.OPEN) return;
    const payload: TunnelHeartbeatPayload = { timestamp: Date.now() };
    ws.send(encodeControl('tunnel:heartbeat', payload));
  }

  // ==========================================================================
  // Sub-connections
  // ==========================================================================

  private handleIncoming(incoming: IncomingStream): void {
    const target = parseTunnelTarget(incoming.target);
    if (!target) {
      incoming.reject('PROTOCOL_ERROR', `unparsable target: ${incoming.target}`);
      return;
    }
    if (!this.policy.permits(target)) {
      this.logger.warn('Sub-connection refused by policy', { target: incoming.target });
      incoming.reject('POLICY_DENIED', `target ${formatTunnelTarget(target)} is not allowed`);
      return;
    }

    const log = { streamId: incoming.streamId, target: formatTunnelTarget(target) };
    this.config
      .dialer(target, this.config.dialTimeoutMs)
      .then(async (local) => {
        const stream = incoming.accept();
        if (!stream) {
          local.destroy();
          return;
        }
        this.logger.debug('Sub-connection opened', log);
        const failure = await splice(local, stream);
        this.logger.debug('Sub-connection closed', { ...log, error: failure?.message });
      })
      .catch((error: unknown) => {
        const message = toError(error).message;
        this.logger.warn('Sub-connection dial failed', { ...log, error: message });
        incoming.reject('DIAL_FAILED', message);
      });
  }
}
