/**
 * Environment proxy
 * @module @tidewater/server/proxy
 */

export {
  TransportBuilder,
  TunnelDialAgent,
  type Transport,
  type TransportVariant,
  type TransportBuilderOptions,
  type RequestTarget,
  type DirectHttpTransport,
  type DirectSocketTransport,
  type TunnelDialTransport,
} from './transport-builder.js';
export {
  EnvironmentProxyHandler,
  formatResponseHead,
  toProxyError,
  type EnvironmentProxyHandlerOptions,
} from './proxy-handler.js';
export { relayBidirectional } from './relay.js';
export {
  ProxyFactory,
  connectionFingerprint,
  type ProxyFactoryOptions,
  type ProxyLease,
} from './proxy-factory.js';
export {
  EndpointProxyRouter,
  type EndpointProxyRouterOptions,
  type ProxyCall,
  type HttpProxyCall,
  type UpgradeProxyCall,
} from './endpoint-proxy-router.js';
