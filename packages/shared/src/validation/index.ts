/**
 * Validation module
 * @module @tidewater/shared/validation
 */

export {
  parseEndpointUrl,
  parseTunnelTarget,
  formatTunnelTarget,
  type EndpointAddress,
  type TunnelTarget,
} from './endpoint-url.js';

export {
  isRecord,
  validateEnvironmentId,
  validateConnectionDescriptor,
  validateEnvironment,
  validateEndpointUrl,
  validateSnapshotInterval,
} from './environment-validation.js';
