/**
 * Tidewater Core Package
 * Environment records, tunnel membership and liveness state
 * @module @tidewater/core
 */

export * from './storage/index.js';
export * from './stores/index.js';
export * from './services/index.js';
export * from './concurrency/index.js';

// Vue reactivity utilities for consumers of the stores
export { computed, isRef, type ComputedRef } from '@vue/reactivity';
