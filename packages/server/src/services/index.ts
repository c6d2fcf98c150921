/**
 * Services module exports
 * @module @tidewater/server/services
 */

export {
  SnapshotScheduler,
  type SnapshotSchedulerOptions,
  type SnapshotCycleResult,
} from './snapshot-scheduler.js';

export { EdgeKeyVerifier, hashEdgeKey } from './edge-key-verifier.js';
