/**
 * Serve Command
 *
 * Boots the control plane in-process. Flags override environment variables.
 * @module @tidewater/cli/commands/serve
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ValidationError, isLogLevel, parseDuration, toError, type LogLevel } from '@tidewater/shared';
import type { ControlPlaneConfig } from '@tidewater/server';
import { error, info, success } from '../output.js';

export interface ServeOptions {
  port?: string;
  host?: string;
  tunnelPort?: string;
  tunnelHost?: string;
  endpoint?: string;
  edgeCompute?: boolean;
  requireAuth?: boolean;
  apiToken?: string;
  snapshotInterval?: string;
  logLevel?: string;
}

function parsePort(value: string, field: string): number {
  const port = /^\d+$/.test(value) ? Number.parseInt(value, 10) : NaN;
  if (!(port >= 0 && port <= 65535)) {
    throw ValidationError.outOfRange(field, 0, 65535);
  }
  return port;
}

/**
 * Map command flags onto configuration overrides. Unset flags are left out so
 * environment variables still apply.
 */
export function toServeOverrides(options: ServeOptions): Partial<ControlPlaneConfig> {
  const overrides: Partial<ControlPlaneConfig> = {};

  if (options.port !== undefined) overrides.port = parsePort(options.port, 'port');
  if (options.host !== undefined) overrides.host = options.host;
  if (options.tunnelPort !== undefined) overrides.tunnelPort = parsePort(options.tunnelPort, 'tunnelPort');
  if (options.tunnelHost !== undefined) overrides.tunnelHost = options.tunnelHost;
  if (options.endpoint !== undefined) overrides.endpointUrl = options.endpoint;
  // --no-edge-compute only ever turns it off
  if (options.edgeCompute === false) overrides.edgeCompute = false;
  if (options.requireAuth) overrides.requireAuth = true;
  if (options.apiToken !== undefined) overrides.apiToken = options.apiToken;

  if (options.snapshotInterval !== undefined) {
    const interval = parseDuration(options.snapshotInterval);
    if (interval === null || interval <= 0) {
      throw ValidationError.field('snapshotInterval', `Invalid snapshot interval: ${options.snapshotInterval}`, 'format');
    }
    overrides.snapshotIntervalMs = interval;
  }

  if (options.logLevel !== undefined) {
    const level: unknown = options.logLevel;
    if (!isLogLevel(level)) {
      throw ValidationError.invalidFormat('logLevel', 'debug, info, warn, error or fatal', options.logLevel);
    }
    const logLevel: LogLevel = level;
    overrides.logLevel = logLevel;
  }

  return overrides;
}

async function serveHandler(options: ServeOptions): Promise<void> {
  let overrides: Partial<ControlPlaneConfig>;
  try {
    overrides = toServeOverrides(options);
  } catch (err) {
    error(toError(err).message);
    process.exit(1);
  }

  info('Starting control plane…');

  try {
    // Loaded lazily so `tidewater agent` does not pull in the server
    const { createServer } = await import('@tidewater/server');
    const server = createServer(overrides);

    const shutdown = async (signal: string): Promise<void> => {
      console.log(chalk.yellow(`\nReceived ${signal}, shutting down gracefully…`));
      try {
        await server.stop();
        process.exit(0);
      } catch (err) {
        error(`Error during shutdown: ${toError(err).message}`);
        process.exit(1);
      }
    };

    process.on('SIGTERM', () => void shutdown('SIGTERM'));
    process.on('SIGINT', () => void shutdown('SIGINT'));

    await server.start();

    const { http, tunnel } = server.ports;
    success(`API listening on ${chalk.cyan(`http://${server.config.host}:${http ?? server.config.port}`)}`);
    if (tunnel !== null) {
      success(`Tunnel server listening on ${chalk.cyan(`ws://${server.config.tunnelHost}:${tunnel}`)}`);
    }
  } catch (err) {
    error(`Failed to start control plane: ${toError(err).message}`);
    process.exit(1);
  }
}

export function createServeCommand(): Command {
  return new Command('serve')
    .description('Run the control plane: HTTP API, environment proxy and tunnel server')
    .option('-p, --port <port>', 'HTTP API port (default: 9000)')
    .option('--host <host>', 'HTTP API bind address (default: 0.0.0.0)')
    .option('--tunnel-port <port>', 'Tunnel server port (default: 8000)')
    .option('--tunnel-host <host>', 'Tunnel server bind address (default: 0.0.0.0)')
    .option('-H, --endpoint <url>', 'Seed a "local" environment (unix://, npipe:// or tcp://)')
    .option('--no-edge-compute', 'Disable the tunnel server')
    .option('--require-auth', 'Require a bearer token on the API')
    .option('--api-token <token>', 'Admin token accepted when auth is required')
    .option('--snapshot-interval <duration>', 'Probe interval (e.g. 30s, 5m)')
    .option('--log-level <level>', 'debug, info, warn, error or fatal')
    .action(serveHandler);
}
