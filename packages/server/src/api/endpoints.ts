/**
 * Environment REST API Endpoints
 *
 * Read-only views of registered environments, and the proxied Docker and
 * Kubernetes API families beneath each of them.
 * @module @tidewater/server/api/endpoints
 */

import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import {
  ProxyError,
  createServiceLogger,
  describeKind,
  isApiFamily,
  type ApiFamily,
  type Environment,
  type EnvironmentKind,
  type EnvironmentStatus,
  type Logger,
  type TunnelSummary,
} from '@tidewater/shared';
import type { ProbeState } from '@tidewater/core';
import type { AppContext } from '../context.js';
import {
  correlationIdFor,
  getIdentity,
  requireEnvironmentAccess,
  type EnvironmentAction,
} from '../middleware/index.js';

// ============================================================================
// Views
// ============================================================================

/**
 * Public view of an environment. Credentials, TLS material and the edge key
 * digest never leave the server.
 */
export interface EnvironmentView {
  id: string;
  name: string;
  kind: EnvironmentKind;
  api: ApiFamily;
  edge: boolean;
  status: EnvironmentStatus;
  lastProbeAt: string | null;
  lastStatusChangeAt: string | null;
}

export interface EnvironmentStatusView extends EnvironmentView {
  probe: {
    consecutiveFailures: number;
    lastProbeAt: string | null;
    lastProbeLatencyMs: number | null;
    lastError: string | null;
  };
  tunnel: TunnelSummary | null;
}

export function toEnvironmentView(environment: Environment): EnvironmentView {
  const { api, transport } = describeKind(environment.kind);
  return {
    id: environment.id,
    name: environment.name,
    kind: environment.kind,
    api,
    edge: transport === 'tunnel',
    status: environment.status,
    lastProbeAt: environment.lastProbeAt?.toISOString() ?? null,
    lastStatusChangeAt: environment.lastStatusChangeAt?.toISOString() ?? null,
  };
}

function toProbeView(state: ProbeState): EnvironmentStatusView['probe'] {
  return {
    consecutiveFailures: state.consecutiveFailures,
    lastProbeAt: state.lastProbeAt?.toISOString() ?? null,
    lastProbeLatencyMs: state.lastProbeLatencyMs ?? null,
    lastError: state.lastError ?? null,
  };
}

/**
 * Keep only the environments the caller may perform `action` on. Without an
 * identity (authentication disabled) everything is visible.
 */
export async function filterAccessible<T extends { id: string }>(
  ctx: Pick<AppContext, 'accessPolicy'>,
  req: Request,
  items: T[],
  action: EnvironmentAction,
): Promise<T[]> {
  const identity = getIdentity(req);
  if (!identity) {
    return items;
  }
  const allowed = await Promise.all(items.map((item) => ctx.accessPolicy.canAccess(identity, item.id, action)));
  return items.filter((_item, index) => allowed[index]);
}

// ============================================================================
// Handlers
// ============================================================================

function createProxyHandler(ctx: AppContext, logger: Logger): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const { environmentId, api } = req.params;
    if (!environmentId || !isApiFamily(api)) {
      next();
      return;
    }

    // Client went away before the response completed
    const controller = new AbortController();
    const onClose = (): void => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };
    res.on('close', onClose);

    try {
      // req.url is relative to the mount point: the backend path and query
      await ctx.proxyRouter.route(
        environmentId,
        { kind: 'http', api, path: req.url, req, res },
        controller.signal,
      );
    } catch (error) {
      if (controller.signal.aborted) {
        logger.debug('Proxied call cancelled by client', {
          correlationId: correlationIdFor(req),
          environmentId,
          path: req.url,
        });
        return;
      }
      next(error);
    } finally {
      res.off('close', onClose);
    }
  };
}

export function createEndpointsRouter(ctx: AppContext, auth: RequestHandler[]): Router {
  const router = Router();
  const logger = ctx.logger.child({ component: 'api-endpoints' });

  router.use(
    '/:environmentId/:api(docker|kubernetes)',
    ...auth,
    requireEnvironmentAccess({ policy: ctx.accessPolicy, action: 'proxy', logger }),
    createProxyHandler(ctx, logger),
  );

  /**
   * GET /api/endpoints - List environments visible to the caller
   */
  router.get('/', ...auth, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const environments = await filterAccessible(ctx, req, ctx.registry.list(), 'read');
      res.status(200).json({ environments: environments.map(toEnvironmentView) });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/endpoints/:environmentId/status - Status, probe state and tunnel
   */
  router.get(
    '/:environmentId/status',
    ...auth,
    requireEnvironmentAccess({ policy: ctx.accessPolicy, action: 'read', logger }),
    (req: Request, res: Response, next: NextFunction): void => {
      const environmentId = req.params.environmentId ?? '';
      const environment = ctx.registry.get(environmentId);
      if (!environment) {
        next(ProxyError.environmentNotFound(environmentId));
        return;
      }

      const tunnel = ctx.tunnels.get(environmentId);
      const view: EnvironmentStatusView = {
        ...toEnvironmentView(environment),
        probe: toProbeView(ctx.status.getProbeState(environmentId)),
        tunnel: tunnel ? ctx.tunnels.summarize(tunnel) : null,
      };
      res.status(200).json(view);
    },
  );

  return router;
}
