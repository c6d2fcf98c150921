/**
 * Structured JSON logger with correlation IDs
 * @module @tidewater/shared/logging/logger
 */

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Log level numeric values for comparison
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
};

/**
 * Log entry metadata
 */
export interface LogMeta {
  /** Correlation ID for request tracing */
  correlationId?: string;
  /** Environment the entry concerns */
  environmentId?: string;
  /** Tunnel the entry concerns */
  tunnelId?: string;
  /** Service name */
  service?: string;
  /** Component name */
  component?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: LogMeta;
  error?: {
    name: string;
    message: string;
    stack?: string;
    code?: string | number;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level */
  level: LogLevel;
  /** Service name */
  service?: string;
  /** Component name */
  component?: string;
  /** Pretty print output (development) */
  pretty?: boolean;
  /** Custom output function */
  output?: (entry: LogEntry) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
};

/**
 * Check a string against the known log levels
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_VALUES, value);
}

/**
 * Structured JSON logger
 */
export class Logger {
  private config: LoggerConfig;
  private meta: LogMeta;

  constructor(config: Partial<LoggerConfig> = {}, meta: LogMeta = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.meta = {
      ...meta,
      service: config.service || meta.service,
      component: config.component || meta.component,
    };
  }

  private isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private log(level: LogLevel, message: string, meta?: LogMeta, error?: Error): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const mergedMeta: LogMeta = { ...this.meta, ...meta };
    for (const key of Object.keys(mergedMeta)) {
      if (mergedMeta[key] === undefined) {
        delete mergedMeta[key];
      }
    }
    if (Object.keys(mergedMeta).length > 0) {
      entry.meta = mergedMeta;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
      if ('code' in error && (typeof error.code === 'string' || typeof error.code === 'number')) {
        entry.error.code = error.code;
      }
    }

    if (this.config.output) {
      this.config.output(entry);
    } else {
      this.defaultOutput(entry);
    }
  }

  private defaultOutput(entry: LogEntry): void {
    const output = this.config.pretty ? this.formatPretty(entry) : JSON.stringify(entry);

    switch (entry.level) {
      case 'debug':
        console.debug(output);
        break;
      case 'info':
        console.info(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'error':
      case 'fatal':
        console.error(output);
        break;
    }
  }

  private formatPretty(entry: LogEntry): string {
    const levelColors: Record<LogLevel, string> = {
      debug: '\x1b[90m', // Gray
      info: '\x1b[36m',  // Cyan
      warn: '\x1b[33m',  // Yellow
      error: '\x1b[31m', // Red
      fatal: '\x1b[35m', // Magenta
    };
    const reset = '\x1b[0m';
    const color = levelColors[entry.level];
    const levelStr = entry.level.toUpperCase().padEnd(5);

    let output = `${entry.timestamp} ${color}${levelStr}${reset} ${entry.message}`;

    if (entry.meta?.correlationId) {
      output += ` ${color}[${entry.meta.correlationId}]${reset}`;
    }

    if (entry.meta?.environmentId) {
      output += ` env=${entry.meta.environmentId}`;
    }

    if (entry.meta?.component) {
      output += ` ${color}(${entry.meta.component})${reset}`;
    }

    if (entry.error) {
      output += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
      if (entry.error.stack) {
        output += `\n${entry.error.stack}`;
      }
    }

    return output;
  }

  /**
   * Create a child logger with additional metadata
   */
  child(meta: LogMeta): Logger {
    return new Logger(this.config, { ...this.meta, ...meta });
  }

  withCorrelationId(correlationId: string): Logger {
    return this.child({ correlationId });
  }

  withEnvironment(environmentId: string): Logger {
    return this.child({ environmentId });
  }

  debug(message: string, meta?: LogMeta): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log('warn', message, meta);
  }

  error(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.log('error', message, meta, error);
    } else {
      this.log('error', message, error);
    }
  }

  fatal(message: string, error?: Error | LogMeta, meta?: LogMeta): void {
    if (error instanceof Error) {
      this.log('fatal', message, meta, error);
    } else {
      this.log('fatal', message, error);
    }
  }
}

/**
 * Check if running in test environment
 */
export function isTestEnvironment(): boolean {
  return (
    process.env.NODE_ENV === 'test' ||
    process.env.VITEST === 'true' ||
    process.env.JEST_WORKER_ID !== undefined
  );
}

function getDefaultLogLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  // In test environment, suppress logs unless explicitly set
  return isTestEnvironment() ? 'fatal' : 'info';
}

// eslint-disable-next-line @typescript-eslint/no-unused-vars
function silentOutput(_entry: LogEntry): void {
  // Intentionally empty - suppresses all output
}

/**
 * Create a new logger instance (basic, does not apply test environment detection)
 */
export function createLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  return new Logger(config, meta);
}

/**
 * Create a logger instance with test environment detection.
 * Output is suppressed during tests unless LOG_LEVEL is explicitly set.
 */
export function createServiceLogger(config?: Partial<LoggerConfig>, meta?: LogMeta): Logger {
  const testConfig: Partial<LoggerConfig> = {};

  if (isTestEnvironment() && !process.env.LOG_LEVEL) {
    testConfig.level = 'fatal';
    testConfig.output = silentOutput;
  }

  return new Logger(
    {
      level: getDefaultLogLevel(),
      pretty: process.env.NODE_ENV !== 'production',
      service: 'tidewater',
      ...config,
      ...testConfig,
    },
    meta,
  );
}

/**
 * Default logger instance
 */
export const logger = createServiceLogger();

/**
 * Generate a correlation ID
 */
export function generateCorrelationId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 10);
  return `${timestamp}-${random}`;
}
