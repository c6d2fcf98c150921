/**
 * Reactive stores
 * @module @tidewater/core/stores
 */

export {
  EnvironmentRegistry,
  type EnvironmentRegistryOptions,
  type EnvironmentUpdatedListener,
  type EnvironmentRemovedListener,
} from './environment-registry.js';

export { TunnelStore, type Tunnel } from './tunnel-store.js';
