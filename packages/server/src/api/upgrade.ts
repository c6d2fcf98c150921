/**
 * Upgrade handling for proxied calls
 *
 * `docker attach`, `exec` and Kubernetes exec/port-forward switch protocols on
 * the proxied paths. Upgrades bypass express, so authentication and access
 * checks are repeated here.
 * @module @tidewater/server/api/upgrade
 */

import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import { ProxyError, TidewaterError, ErrorCode, isApiFamily, type ApiFamily } from '@tidewater/shared';
import type { AppContext } from '../context.js';
import {
  authenticateRequest,
  authorizeEnvironment,
  correlationIdFor,
  toApiError,
  writeSocketError,
} from '../middleware/index.js';

const UPGRADE_PATH = /^\/api\/endpoints\/([^/?]+)\/(docker|kubernetes)(\/[^?]*)?(\?.*)?$/;

export interface UpgradeTarget {
  environmentId: string;
  api: ApiFamily;
  /** Backend path including the query string */
  path: string;
}

/**
 * Match a request URL against the proxied paths
 */
export function parseUpgradeTarget(url: string | undefined): UpgradeTarget | null {
  const match = UPGRADE_PATH.exec(url ?? '');
  if (!match) {
    return null;
  }
  const [, rawId, api, path, search] = match;
  if (!rawId || !isApiFamily(api)) {
    return null;
  }
  let environmentId: string;
  try {
    environmentId = decodeURIComponent(rawId);
  } catch {
    return null;
  }
  return { environmentId, api, path: `${path ?? '/'}${search ?? ''}` };
}

export interface UpgradeHandler {
  (req: IncomingMessage, socket: Duplex, head: Buffer): void;
  /** Destroy every upgraded session still open */
  closeAll(): void;
}

export function createUpgradeHandler(ctx: AppContext): UpgradeHandler {
  const logger = ctx.logger.child({ component: 'api-upgrade' });
  const sockets = new Set<Duplex>();

  const handle = async (req: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> => {
    const target = parseUpgradeTarget(req.url);
    if (!target) {
      throw new TidewaterError(`Route ${req.method ?? 'GET'} ${req.url ?? ''} not found`, ErrorCode.NOT_FOUND);
    }

    if (ctx.identityProvider) {
      const identity = await authenticateRequest(req, ctx.identityProvider);
      await authorizeEnvironment(ctx.accessPolicy, identity, target.environmentId, 'proxy');
    }

    const controller = new AbortController();
    socket.once('close', () => controller.abort());

    await ctx.proxyRouter.route(
      target.environmentId,
      { kind: 'upgrade', api: target.api, path: target.path, req, socket, head },
      controller.signal,
    );
  };

  const handler = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    sockets.add(socket);
    socket.on('error', (error) => {
      logger.debug('Upgrade socket error', { url: req.url, error: error.message });
    });

    handle(req, socket, head)
      .catch((error: unknown) => {
        const apiError = toApiError(error).withCorrelationId(correlationIdFor(req));
        if (apiError.isServerError() && !(error instanceof ProxyError)) {
          logger.error('Upgrade failed', apiError, { url: req.url });
        } else {
          logger.debug('Upgrade rejected', { url: req.url, code: apiError.code, message: apiError.message });
        }
        // Refusals relayed from the backend have already been written
        if (socket.writable && !socket.writableEnded) {
          writeSocketError(socket, apiError);
        } else {
          socket.destroy();
        }
      })
      .finally(() => {
        sockets.delete(socket);
      });
  };

  return Object.assign(handler, {
    closeAll(): void {
      for (const socket of sockets) {
        socket.destroy();
      }
      sockets.clear();
    },
  });
}
