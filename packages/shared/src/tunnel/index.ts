/**
 * Tunnel wire protocol
 * @module @tidewater/shared/tunnel
 */

export {
  FRAME_HEADER_BYTES,
  MAX_STREAM_ID,
  STREAM_WINDOW_BYTES,
  FrameType,
  CloseFlag,
  encodeFrame,
  decodeFrame,
  encodeOpen,
  decodeOpen,
  encodeClose,
  decodeClose,
  encodeWindow,
  decodeWindow,
  encodeStreamError,
  decodeStreamError,
  type Frame,
  type OpenPayload,
  type StreamErrorCode,
  type StreamErrorPayload,
} from './frames.js';

export {
  encodeControl,
  parseControl,
  isHelloPayload,
  isAcceptPayload,
  isRejectPayload,
  isHeartbeatPayload,
} from './control.js';

export { TunnelStream, type StreamSink } from './tunnel-stream.js';

export {
  MuxChannel,
  type MuxRole,
  type MuxChannelOptions,
  type OpenStreamOptions,
  type IncomingStream,
  type IncomingStreamHandler,
} from './mux-channel.js';
