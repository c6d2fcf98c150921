/**
 * Core services
 * @module @tidewater/core/services
 */

export {
  EnvironmentStatusService,
  type EnvironmentStatusServiceOptions,
  type ProbeState,
  type StatusChange,
  type StatusChangeListener,
  type StatusChangeReason,
} from './status-service.js';
