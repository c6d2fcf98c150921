/**
 * Tidewater - Shared Package
 * Types, errors, logging, validation and the tunnel wire protocol
 * @module @tidewater/shared
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation
export * from './validation/index.js';

// Tunnel protocol
export * from './tunnel/index.js';

// Logging
export {
  Logger,
  createLogger,
  createServiceLogger,
  isLogLevel,
  isTestEnvironment,
  logger,
  generateCorrelationId,
  type LogLevel,
  type LogMeta,
  type LogEntry,
  type LoggerConfig,
} from './logging/logger.js';

// Utilities
export * from './utils/index.js';
