/**
 * Binary stream frames carried inside tunnel WebSocket binary messages.
 *
 * Layout: byte 0 frame type, bytes 1-4 stream id (uint32 big-endian), then payload.
 * @module @tidewater/shared/tunnel/frames
 */

export const FRAME_HEADER_BYTES = 5;
export const MAX_STREAM_ID = 0xffffffff;
/** Bytes either side may send on a stream before the peer grants more */
export const STREAM_WINDOW_BYTES = 256 * 1024;

export const FrameType = {
  OPEN: 1,
  OPEN_ACK: 2,
  DATA: 3,
  CLOSE: 4,
  ERROR: 5,
  /** Grants the peer more send credit on one stream */
  WINDOW: 6,
} as const;
export type FrameType = (typeof FrameType)[keyof typeof FrameType];

export const CloseFlag = {
  /** Half-close: no more data from the sender */
  FIN: 1,
  /** Abort the stream in both directions */
  RST: 2,
} as const;
export type CloseFlag = (typeof CloseFlag)[keyof typeof CloseFlag];

export type StreamErrorCode = 'DIAL_FAILED' | 'POLICY_DENIED' | 'UNKNOWN_STREAM' | 'PROTOCOL_ERROR';

const STREAM_ERROR_CODES: readonly StreamErrorCode[] = [
  'DIAL_FAILED',
  'POLICY_DENIED',
  'UNKNOWN_STREAM',
  'PROTOCOL_ERROR',
];

export interface Frame {
  type: FrameType;
  streamId: number;
  payload: Buffer;
}

export interface OpenPayload {
  target: string;
}

export interface StreamErrorPayload {
  code: StreamErrorCode;
  message: string;
}

function isFrameType(value: number): value is FrameType {
  return value >= FrameType.OPEN && value <= FrameType.WINDOW;
}

function isCloseFlag(value: number): value is CloseFlag {
  return value === CloseFlag.FIN || value === CloseFlag.RST;
}

export function encodeFrame(type: FrameType, streamId: number, payload?: Buffer): Buffer {
  if (!Number.isInteger(streamId) || streamId < 1 || streamId > MAX_STREAM_ID) {
    throw new RangeError(`invalid stream id: ${streamId}`);
  }

  const body = payload ?? Buffer.alloc(0);
  const frame = Buffer.allocUnsafe(FRAME_HEADER_BYTES + body.length);
  frame.writeUInt8(type, 0);
  frame.writeUInt32BE(streamId, 1);
  body.copy(frame, FRAME_HEADER_BYTES);
  return frame;
}

/**
 * Decode one frame. Returns null when the header is truncated or names an
 * unknown type or stream id 0.
 */
export function decodeFrame(data: Buffer): Frame | null {
  if (data.length < FRAME_HEADER_BYTES) {
    return null;
  }

  const type = data.readUInt8(0);
  const streamId = data.readUInt32BE(1);
  if (!isFrameType(type) || streamId === 0) {
    return null;
  }

  return { type, streamId, payload: data.subarray(FRAME_HEADER_BYTES) };
}

export function encodeOpen(streamId: number, target: string): Buffer {
  const payload: OpenPayload = { target };
  return encodeFrame(FrameType.OPEN, streamId, Buffer.from(JSON.stringify(payload), 'utf8'));
}

export function decodeOpen(payload: Buffer): OpenPayload | null {
  const parsed = parseJson(payload);
  if (typeof parsed !== 'object' || parsed === null || !('target' in parsed)) {
    return null;
  }
  const target = parsed.target;
  return typeof target === 'string' && target.length > 0 ? { target } : null;
}

export function encodeClose(streamId: number, flag: CloseFlag): Buffer {
  return encodeFrame(FrameType.CLOSE, streamId, Buffer.from([flag]));
}

export function decodeClose(payload: Buffer): CloseFlag | null {
  if (payload.length !== 1) {
    return null;
  }
  const flag = payload.readUInt8(0);
  return isCloseFlag(flag) ? flag : null;
}

export function encodeWindow(streamId: number, increment: number): Buffer {
  const payload = Buffer.allocUnsafe(4);
  payload.writeUInt32BE(increment, 0);
  return encodeFrame(FrameType.WINDOW, streamId, payload);
}

/**
 * Credit increment of a WINDOW frame; null unless a positive uint32
 */
export function decodeWindow(payload: Buffer): number | null {
  if (payload.length !== 4) {
    return null;
  }
  const increment = payload.readUInt32BE(0);
  return increment > 0 ? increment : null;
}

export function encodeStreamError(streamId: number, code: StreamErrorCode, message: string): Buffer {
  const payload: StreamErrorPayload = { code, message };
  return encodeFrame(FrameType.ERROR, streamId, Buffer.from(JSON.stringify(payload), 'utf8'));
}

export function decodeStreamError(payload: Buffer): StreamErrorPayload {
  const parsed = parseJson(payload);
  if (typeof parsed === 'object' && parsed !== null && 'code' in parsed && 'message' in parsed) {
    const { code, message } = parsed;
    const known = STREAM_ERROR_CODES.find((candidate) => candidate === code);
    if (known && typeof message === 'string') {
      return { code: known, message };
    }
  }
  return { code: 'PROTOCOL_ERROR', message: 'malformed error frame' };
}

function parseJson(payload: Buffer): unknown {
  try {
    return JSON.parse(payload.toString('utf8'));
  } catch {
    return null;
  }
}
