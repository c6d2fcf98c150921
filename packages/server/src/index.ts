/**
 * Tidewater Control Plane Server
 *
 * Entry point for the HTTP API, the environment proxy and the tunnel listener.
 * @module @tidewater/server
 */

import http from 'node:http';
import type { AddressInfo } from 'node:net';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import express, { type Express } from 'express';
import cors, { type CorsOptions } from 'cors';
import { createServiceLogger, parseEndpointUrl, toError, type EnvironmentKind } from '@tidewater/shared';
import { loadConfig, type ControlPlaneConfig } from './config.js';
import { createAppContext, type AppCapabilities, type AppContext } from './context.js';
import { createApiRouter, type ApiRouterOptions } from './api/router.js';
import { createUpgradeHandler } from './api/upgrade.js';
import { CORRELATION_HEADER } from './middleware/index.js';

// ============================================================================
// CORS Configuration
// ============================================================================

/**
 * Create CORS configuration for browser clients. Patterns may contain `*`.
 */
export function createCorsConfig(origins: string[]): CorsOptions {
  const patterns = origins.map((pattern) =>
    pattern.includes('*')
      ? new RegExp('^' + pattern.split('*').map(escapeRegExp).join('.*') + '$')
      : pattern,
  );

  return {
    origin: (origin, callback) => {
      // Allow requests with no origin (like curl or the docker CLI)
      if (!origin) {
        callback(null, true);
        return;
      }
      const isAllowed = patterns.some((pattern) =>
        typeof pattern === 'string' ? pattern === origin : pattern.test(origin),
      );
      callback(null, isAllowed);
    },
    credentials: true,
    methods: ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', CORRELATION_HEADER],
    exposedHeaders: [CORRELATION_HEADER],
    maxAge: 86400, // 24 hours
  };
}

function escapeRegExp(value: string): string {
  return value.replace(/[.+?^${}()|[\]\\]/g, '\\$&');
}

// ============================================================================
// Server Instance
// ============================================================================

export interface ServerPorts {
  /** Bound HTTP API port, null until started */
  http: number | null;
  /** Bound tunnel port, null until started or when edge compute is off */
  tunnel: number | null;
}

export interface ServerInstance {
  app: Express;
  httpServer: http.Server;
  context: AppContext;
  config: ControlPlaneConfig;
  readonly ports: ServerPorts;
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

export interface CreateServerOptions extends AppCapabilities {
  api?: ApiRouterOptions;
}

/**
 * Kind of the environment seeded from ENDPOINT_URL
 */
export function localEnvironmentKind(endpointUrl: string): EnvironmentKind | null {
  const address = parseEndpointUrl(endpointUrl);
  if (!address) return null;
  return address.protocol === 'unix' || address.protocol === 'npipe' ? 'docker-socket' : 'docker-http';
}

export const LOCAL_ENVIRONMENT_ID = 'local';

/**
 * Create and configure the server. `overrides` win over environment variables.
 */
export function createServer(
  overrides: Partial<ControlPlaneConfig> = {},
  options: CreateServerOptions = {},
): ServerInstance {
  const config = loadConfig(overrides);
  const { api, ...capabilities } = options;
  const context = createAppContext(config, capabilities);
  const logger = context.logger.child({ component: 'server' });

  logger.info('Creating server', {
    host: config.host,
    port: config.port,
    tunnelPort: config.edgeCompute ? config.tunnelPort : undefined,
    requireAuth: config.requireAuth,
  });

  const app = express();
  app.disable('x-powered-by');
  app.use(cors(createCorsConfig(config.corsOrigins)));
  app.use(createApiRouter(context, api));

  const httpServer = http.createServer(app);
  const upgrades = createUpgradeHandler(context);
  httpServer.on('upgrade', upgrades);

  const ports: ServerPorts = { http: null, tunnel: null };
  let started = false;

  const seedLocalEnvironment = async (): Promise<void> => {
    if (!config.endpointUrl) return;
    const kind = localEnvironmentKind(config.endpointUrl);
    if (!kind) return;
    await context.registry.save({
      id: LOCAL_ENVIRONMENT_ID,
      name: LOCAL_ENVIRONMENT_ID,
      kind,
      connection: { url: config.endpointUrl },
    });
  };

  const listen = (): Promise<number> =>
    new Promise<number>((resolveListen, reject) => {
      const onError = (error: Error): void => reject(error);
      httpServer.once('error', onError);
      httpServer.listen(config.port, config.host, () => {
        httpServer.off('error', onError);
        httpServer.on('error', (error) => logger.error('HTTP server error', error));
        const address: AddressInfo | string | null = httpServer.address();
        resolveListen(address && typeof address !== 'string' ? address.port : config.port);
      });
    });

  const instance: ServerInstance = {
    app,
    httpServer,
    context,
    config,
    get ports() {
      return { ...ports };
    },

    start: async () => {
      await context.registry.refresh();
      await seedLocalEnvironment();

      ports.http = await listen();
      logger.info('HTTP server started', { url: `http://${config.host}:${ports.http}` });

      if (config.edgeCompute) {
        try {
          ports.tunnel = await context.tunnelServer.listen({ host: config.tunnelHost, port: config.tunnelPort });
        } catch (error) {
          await new Promise<void>((done) => httpServer.close(() => done()));
          ports.http = null;
          throw error;
        }
      }

      context.proxyFactory.startSweeper();
      context.scheduler.start();
      started = true;
      logger.info('Server started', { ...ports, environments: context.registry.count.value });
    },

    stop: async () => {
      logger.info('Stopping server...');

      context.scheduler.stop();
      upgrades.closeAll();
      context.proxyFactory.close();
      if (config.edgeCompute) {
        await context.tunnelServer.close();
      }

      if (started || httpServer.listening) {
        httpServer.closeAllConnections();
        await new Promise<void>((done, reject) => {
          httpServer.close((error) => (error ? reject(error) : done()));
        });
      }

      started = false;
      ports.http = null;
      ports.tunnel = null;
      logger.info('Server stopped');
    },
  };

  return instance;
}

// ============================================================================
// Main Entry Point
// ============================================================================

/**
 * Start the server from environment variables
 */
export async function main(): Promise<void> {
  const logger = createServiceLogger({ component: 'server' });

  let server: ServerInstance;
  try {
    server = createServer();
  } catch (error) {
    logger.fatal('Invalid configuration', toError(error));
    process.exit(1);
  }

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down gracefully...`);
    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      logger.error('Error during shutdown', toError(error));
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    shutdown('uncaughtException').catch(() => process.exit(1));
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', toError(reason));
  });

  try {
    await server.start();
  } catch (error) {
    logger.fatal('Failed to start server', toError(error));
    process.exit(1);
  }
}

const currentFile = fileURLToPath(import.meta.url);
const entryFile = resolve(process.argv[1] ?? '');
if (currentFile === entryFile) {
  void main();
}

// ============================================================================
// Exports
// ============================================================================

export * from './config.js';
export * from './context.js';
export * from './api/index.js';
export * from './proxy/index.js';
export * from './services/index.js';
export * from './ws/index.js';
export * from './middleware/index.js';
