/**
 * Multiplexed stream channel over one tunnel transport.
 *
 * Transport agnostic: the owner feeds inbound binary messages to `receive()`
 * and supplies `send` for outbound frames. Server-opened streams use odd ids,
 * agent-opened streams even ids.
 * @module @tidewater/shared/tunnel/mux-channel
 */

import { EventEmitter } from 'node:events';
import { TunnelError } from '../errors/tunnel-error.js';
import { toError } from '../errors/base-error.js';
import { createServiceLogger, type Logger } from '../logging/logger.js';
import {
  CloseFlag,
  FrameType,
  MAX_STREAM_ID,
  decodeClose,
  decodeFrame,
  decodeOpen,
  decodeStreamError,
  decodeWindow,
  encodeClose,
  encodeFrame,
  encodeOpen,
  encodeStreamError,
  type StreamErrorCode,
} from './frames.js';
import { TunnelStream, type StreamSink } from './tunnel-stream.js';

export type MuxRole = 'server' | 'agent';

/**
 * A stream the peer asked to open. The handler dials the target and then
 * accepts or rejects it.
 */
export interface IncomingStream {
  readonly streamId: number;
  readonly target: string;
  /** Returns null when the peer already cancelled the open */
  accept(): TunnelStream | null;
  reject(code: StreamErrorCode, message: string): void;
}

export type IncomingStreamHandler = (incoming: IncomingStream) => void;

export interface MuxChannelOptions {
  role: MuxRole;
  /** Writes one binary frame to the transport */
  send: (frame: Buffer) => void;
  environmentId?: string;
  /** How long an opened stream waits for OPEN_ACK (ms) */
  openTimeoutMs?: number;
  /** Peer-initiated opens; without one they are refused with POLICY_DENIED */
  onIncoming?: IncomingStreamHandler;
  logger?: Logger;
}

export interface OpenStreamOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

const DEFAULT_OPEN_TIMEOUT_MS = 10_000;

export class MuxChannel extends EventEmitter {
  readonly role: MuxRole;
  readonly environmentId?: string;

  private readonly sendFrameFn: (frame: Buffer) => void;
  private readonly openTimeoutMs: number;
  private readonly onIncoming?: IncomingStreamHandler;
  private readonly logger: Logger;
  private readonly streams = new Map<number, TunnelStream>();
  /** Peer-opened ids awaiting accept/reject; dropped when the peer cancels */
  private readonly pendingIncoming = new Set<number>();
  private readonly sink: StreamSink;
  private nextStreamId: number;
  private closed = false;
  private lastActivity = new Date();

  constructor(options: MuxChannelOptions) {
    super();
    this.role = options.role;
    this.environmentId = options.environmentId;
    this.sendFrameFn = options.send;
    this.openTimeoutMs = options.openTimeoutMs ?? DEFAULT_OPEN_TIMEOUT_MS;
    this.onIncoming = options.onIncoming;
    this.logger = (options.logger ?? createServiceLogger({ component: 'mux-channel' })).child({
      environmentId: options.environmentId,
    });
    this.nextStreamId = options.role === 'server' ? 1 : 2;
    this.sink = {
      sendFrame: (frame) => this.sendFrame(frame),
      release: (streamId) => {
        this.streams.delete(streamId);
      },
      environmentId: options.environmentId,
    };
  }

  get openStreams(): number {
    return this.streams.size;
  }

  /** Peer opens still waiting for the local handler */
  get pendingOpens(): number {
    return this.pendingIncoming.size;
  }

  get lastActivityAt(): Date {
    return this.lastActivity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Open a sub-connection to a target in the agent's network. The stream is
   * returned immediately; writes are held until the peer acknowledges.
   * Failures (timeout, refusal, abort) surface as stream errors.
   */
  open(target: string, options: OpenStreamOptions = {}): TunnelStream {
    const streamId = this.allocateStreamId();
    const stream = new TunnelStream(this.sink, streamId, target, false);

    if (this.closed) {
      process.nextTick(() => stream.failFromPeer(TunnelError.lost(this.environmentId, 'channel closed')));
      return stream;
    }

    this.streams.set(streamId, stream);
    this.sendFrame(encodeOpen(streamId, target));

    const timeoutMs = options.timeoutMs ?? this.openTimeoutMs;
    const timer = setTimeout(() => {
      if (!stream.isAcknowledged && !stream.destroyed) {
        stream.destroy(TunnelError.dialTimeout(streamId, timeoutMs, this.environmentId));
      }
    }, timeoutMs);
    timer.unref();

    const signal = options.signal;
    const onAbort = (): void => {
      stream.destroy(toError(signal?.reason ?? new Error('aborted')));
    };
    if (signal) {
      if (signal.aborted) {
        process.nextTick(onAbort);
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    stream.once('ready', () => clearTimeout(timer));
    stream.once('close', () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    });

    this.logger.debug('Sub-connection opening', { streamId, target });
    return stream;
  }

  /**
   * Open a sub-connection and wait for the peer's acknowledgement
   */
  connect(target: string, options: OpenStreamOptions = {}): Promise<TunnelStream> {
    const stream = this.open(target, options);
    return new Promise<TunnelStream>((resolve, reject) => {
      const onReady = (): void => {
        stream.off('error', onError);
        stream.off('close', onClose);
        resolve(stream);
      };
      const onError = (error: Error): void => {
        stream.off('ready', onReady);
        stream.off('close', onClose);
        reject(error);
      };
      const onClose = (): void => {
        stream.off('ready', onReady);
        stream.off('error', onError);
        reject(TunnelError.subConnectionFailed(stream.streamId, 'closed before acknowledgement', this.environmentId));
      };
      stream.once('ready', onReady);
      stream.once('error', onError);
      stream.once('close', onClose);
    });
  }

  /**
   * Feed one inbound binary message
   */
  receive(data: Buffer): void {
    if (this.closed) return;
    this.lastActivity = new Date();

    const frame = decodeFrame(data);
    if (!frame) {
      this.logger.warn('Dropping malformed frame', { bytes: data.length });
      return;
    }

    const { streamId, payload } = frame;
    switch (frame.type) {
      case FrameType.OPEN:
        this.handleOpen(streamId, payload);
        return;
      case FrameType.OPEN_ACK: {
        const stream = this.streams.get(streamId);
        if (stream) {
          stream.handleAck();
        } else {
          this.sendFrame(encodeClose(streamId, CloseFlag.RST));
        }
        return;
      }
      case FrameType.DATA: {
        const stream = this.streams.get(streamId);
        if (stream) {
          stream.handleData(payload);
        } else {
          this.sendFrame(encodeStreamError(streamId, 'UNKNOWN_STREAM', `no stream ${streamId}`));
        }
        return;
      }
      case FrameType.WINDOW: {
        const increment = decodeWindow(payload);
        if (increment !== null) {
          this.streams.get(streamId)?.handleWindow(increment);
        }
        return;
      }
      case FrameType.CLOSE: {
        if (this.pendingIncoming.delete(streamId)) {
          return;
        }
        const stream = this.streams.get(streamId);
        const flag = decodeClose(payload);
        if (!stream) return;
        if (flag === CloseFlag.FIN) {
          stream.handleFin();
        } else {
          stream.handleReset();
        }
        return;
      }
      case FrameType.ERROR: {
        if (this.pendingIncoming.delete(streamId)) {
          return;
        }
        this.streams.get(streamId)?.handleRemoteError(decodeStreamError(payload));
        return;
      }
    }
  }

  /**
   * Fail every sub-connection and stop accepting frames. Idempotent.
   */
  close(reason: string): void {
    if (this.closed) return;
    this.closed = true;

    const error = TunnelError.lost(this.environmentId, reason);
    const streams = [...this.streams.values()];
    this.streams.clear();
    this.pendingIncoming.clear();
    for (const stream of streams) {
      stream.failFromPeer(error);
    }

    this.logger.debug('Channel closed', { reason, failedStreams: streams.length });
    this.emit('close', reason);
  }

  private handleOpen(streamId: number, payload: Buffer): void {
    const expectedParity = this.role === 'server' ? 0 : 1;
    if (streamId % 2 !== expectedParity || this.streams.has(streamId) || this.pendingIncoming.has(streamId)) {
      this.sendFrame(encodeStreamError(streamId, 'PROTOCOL_ERROR', `stream id ${streamId} not valid for open`));
      return;
    }

    const open = decodeOpen(payload);
    if (!open) {
      this.sendFrame(encodeStreamError(streamId, 'PROTOCOL_ERROR', 'malformed open payload'));
      return;
    }

    const handler = this.onIncoming;
    if (!handler) {
      this.sendFrame(encodeStreamError(streamId, 'POLICY_DENIED', 'peer-initiated streams are not accepted'));
      return;
    }

    this.pendingIncoming.add(streamId);
    let settled = false;
    const incoming: IncomingStream = {
      streamId,
      target: open.target,
      accept: () => {
        if (settled) return null;
        settled = true;
        // Missing means the peer cancelled the open
        const live = this.pendingIncoming.delete(streamId);
        if (!live || this.closed) return null;

        const stream = new TunnelStream(this.sink, streamId, open.target, true);
        this.streams.set(streamId, stream);
        this.sendFrame(encodeFrame(FrameType.OPEN_ACK, streamId));
        return stream;
      },
      reject: (code, message) => {
        if (settled) return;
        settled = true;
        const live = this.pendingIncoming.delete(streamId);
        if (live && !this.closed) {
          this.sendFrame(encodeStreamError(streamId, code, message));
        }
      },
    };

    try {
      handler(incoming);
    } catch (error) {
      this.logger.error('Incoming stream handler failed', toError(error), { streamId });
      incoming.reject('DIAL_FAILED', toError(error).message);
    }
  }

  private allocateStreamId(): number {
    for (let attempts = 0; attempts < 1024; attempts++) {
      const candidate = this.nextStreamId;
      this.nextStreamId += 2;
      if (this.nextStreamId > MAX_STREAM_ID) {
        this.nextStreamId = this.role === 'server' ? 1 : 2;
      }
      if (!this.streams.has(candidate)) {
        return candidate;
      }
    }
    throw new RangeError('stream id space exhausted');
  }

  private sendFrame(frame: Buffer): void {
    if (this.closed) return;
    try {
      this.sendFrameFn(frame);
    } catch (error) {
      this.logger.warn('Frame send failed', { error: toError(error).message });
    }
  }
}
