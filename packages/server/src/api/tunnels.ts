/**
 * Tunnel REST API Endpoints
 * @module @tidewater/server/api/tunnels
 */

import { Router, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import type { TunnelSummary } from '@tidewater/shared';
import type { AppContext } from '../context.js';
import { filterAccessible } from './endpoints.js';

export function createTunnelsRouter(ctx: AppContext, auth: RequestHandler[]): Router {
  const router = Router();

  /**
   * GET /api/tunnels - Active tunnels of environments visible to the caller
   */
  router.get('/', ...auth, async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const summaries = ctx.tunnels.summaries();
      const byEnvironment = summaries.map((summary) => ({ id: summary.environmentId, summary }));
      const visible = await filterAccessible(ctx, req, byEnvironment, 'read');
      const tunnels: TunnelSummary[] = visible.map((entry) => entry.summary);
      res.status(200).json({ tunnels });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
