/**
 * One multiplexed sub-connection inside a tunnel, exposed as a Duplex so it
 * can back an http.Agent connection or be piped to a local socket.
 *
 * Each direction is credit based: a side sends at most STREAM_WINDOW_BYTES
 * the peer has not yet handed back with a WINDOW frame. Credit is returned
 * as the local reader consumes data, so a stalled reader stalls the writer.
 * @module @tidewater/shared/tunnel/tunnel-stream
 */

import { Duplex } from 'node:stream';
import { TunnelError } from '../errors/tunnel-error.js';
import {
  CloseFlag,
  FrameType,
  STREAM_WINDOW_BYTES,
  encodeClose,
  encodeFrame,
  encodeWindow,
  type StreamErrorPayload,
} from './frames.js';

/**
 * What a stream needs from the channel that owns it
 */
export interface StreamSink {
  sendFrame(frame: Buffer): void;
  release(streamId: number): void;
  readonly environmentId?: string;
}

interface PendingWrite {
  chunk: Buffer;
  callback: (error?: Error | null) => void;
}

export class TunnelStream extends Duplex {
  readonly streamId: number;
  readonly target: string;
  /** Mirrors net.Socket for http client compatibility */
  connecting: boolean;

  private readonly sink: StreamSink;
  private acknowledged: boolean;
  private pendingWrites: PendingWrite[] = [];
  private pendingFinal: ((error?: Error | null) => void) | null = null;
  private finSent = false;
  private finReceived = false;
  private closedByPeer = false;
  private sendCredit = STREAM_WINDOW_BYTES;
  /** Bytes received and not yet credited back to the peer */
  private owedCredit = 0;
  private throttled = false;
  private idleTimeoutMs = 0;
  private idleTimer: NodeJS.Timeout | null = null;

  constructor(sink: StreamSink, streamId: number, target: string, acknowledged: boolean) {
    super({ allowHalfOpen: true });
    this.sink = sink;
    this.streamId = streamId;
    this.target = target;
    this.acknowledged = acknowledged;
    this.connecting = !acknowledged;
  }

  get isAcknowledged(): boolean {
    return this.acknowledged;
  }

  /** Send credit left before the peer grants more */
  get availableCredit(): number {
    return this.sendCredit;
  }

  override _read(): void {
    // Data is pushed as frames arrive; reading is what frees peer credit.
    if (this.throttled) {
      this.throttled = false;
      this.grantCredit(true);
    }
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.touch();
    this.pendingWrites.push({ chunk, callback });
    this.flushWrites();
  }

  override _final(callback: (error?: Error | null) => void): void {
    this.pendingFinal = callback;
    this.flushWrites();
  }

  override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
    this.clearIdleTimer();
    const cleanlyFinished = this.finSent && this.finReceived;
    if (!this.closedByPeer && !cleanlyFinished) {
      this.sink.sendFrame(encodeClose(this.streamId, CloseFlag.RST));
    }
    for (const pending of this.pendingWrites) {
      pending.callback(error ?? TunnelError.subConnectionFailed(this.streamId, 'stream destroyed', this.sink.environmentId));
    }
    this.pendingWrites = [];
    this.pendingFinal = null;
    this.sink.release(this.streamId);
    callback(error);
  }

  /** Peer acknowledged the open; flush held writes */
  handleAck(): void {
    if (this.acknowledged || this.destroyed) return;
    this.acknowledged = true;
    this.connecting = false;
    this.touch();
    this.flushWrites();

    this.emit('connect');
    this.emit('ready');
  }

  handleData(payload: Buffer): void {
    if (this.destroyed) return;
    this.touch();
    if (this.finReceived) {
      this.failFromPeer(TunnelError.subConnectionFailed(this.streamId, 'data after half-close', this.sink.environmentId));
      return;
    }
    this.owedCredit += payload.length;
    if (this.owedCredit > STREAM_WINDOW_BYTES) {
      // Peer ignored its window; abort with RST
      this.destroy(TunnelError.subConnectionFailed(this.streamId, 'flow control window exceeded', this.sink.environmentId));
      return;
    }
    if (this.push(Buffer.from(payload))) {
      this.grantCredit(false);
    } else {
      this.throttled = true;
    }
  }

  /** Peer granted more send credit */
  handleWindow(increment: number): void {
    if (this.destroyed) return;
    this.sendCredit += increment;
    this.flushWrites();
  }

  handleFin(): void {
    if (this.destroyed || this.finReceived) return;
    this.finReceived = true;
    this.push(null);
  }

  handleReset(): void {
    this.failFromPeer(TunnelError.subConnectionFailed(this.streamId, 'reset by peer', this.sink.environmentId));
  }

  handleRemoteError(payload: StreamErrorPayload): void {
    this.failFromPeer(
      TunnelError.subConnectionFailed(this.streamId, `${payload.code}: ${payload.message}`, this.sink.environmentId),
    );
  }

  /** Tear down without sending RST: the peer or the tunnel is already gone */
  failFromPeer(error: Error): void {
    if (this.destroyed) return;
    this.closedByPeer = true;
    this.destroy(error);
  }

  setTimeout(timeoutMs: number, callback?: () => void): this {
    this.idleTimeoutMs = timeoutMs;
    if (callback) {
      if (timeoutMs === 0) {
        this.removeListener('timeout', callback);
      } else {
        this.once('timeout', callback);
      }
    }
    this.touch();
    return this;
  }

  setNoDelay(): this {
    return this;
  }

  setKeepAlive(): this {
    return this;
  }

  ref(): this {
    return this;
  }

  unref(): this {
    return this;
  }

  /**
   * Send held writes as far as credit allows, then a held FIN once nothing
   * is left. Write callbacks complete only when their bytes are sent, which
   * is what pushes back on the producer.
   */
  private flushWrites(): void {
    if (!this.acknowledged || this.destroyed) return;

    while (this.pendingWrites.length > 0 && this.sendCredit > 0) {
      const head = this.pendingWrites[0];
      if (!head) break;
      const size = Math.min(this.sendCredit, head.chunk.length);
      this.sink.sendFrame(encodeFrame(FrameType.DATA, this.streamId, head.chunk.subarray(0, size)));
      this.sendCredit -= size;
      if (size === head.chunk.length) {
        this.pendingWrites.shift();
        head.callback();
      } else {
        head.chunk = head.chunk.subarray(size);
      }
    }

    const final = this.pendingFinal;
    if (final && this.pendingWrites.length === 0) {
      this.pendingFinal = null;
      this.sendFin();
      final();
    }
  }

  /** Hand consumed bytes back to the peer, batched to half a window */
  private grantCredit(force: boolean): void {
    if (this.owedCredit === 0 || this.finReceived) return;
    if (!force && this.owedCredit < STREAM_WINDOW_BYTES / 2) return;
    this.sink.sendFrame(encodeWindow(this.streamId, this.owedCredit));
    this.owedCredit = 0;
  }

  private sendFin(): void {
    if (this.finSent) return;
    this.finSent = true;
    this.sink.sendFrame(encodeClose(this.streamId, CloseFlag.FIN));
  }

  private touch(): void {
    this.clearIdleTimer();
    if (this.idleTimeoutMs > 0 && !this.destroyed) {
      this.idleTimer = setTimeout(() => this.emit('timeout'), this.idleTimeoutMs);
      this.idleTimer.unref();
    }
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }
}
