/**
 * WebSocket module exports
 * @module @tidewater/server/ws
 */

export {
  TunnelServer,
  type TunnelServerOptions,
  type ListenAddress,
  type AgentStreamHandler,
} from './tunnel-server.js';
