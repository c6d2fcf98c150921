/**
 * Utilities
 * @module @tidewater/shared/utils
 */

export { parseDuration, formatDuration } from './duration.js';
export { stableStringify } from './stable-json.js';
