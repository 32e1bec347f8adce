/**
 * Prism - Health API Routes
 */

import { Router, type Request, type Response } from 'express';

import type { SqlDialect } from '../../dsl/registry.js';

export interface HealthRouterDeps {
  dialect: SqlDialect;
  startTime?: Date;
}

export function createHealthRouter(deps: HealthRouterDeps): Router {
  const router = Router();
  const startTime = deps.startTime ?? new Date();

  /**
   * GET /api/health
   */
  router.get('/', (_req: Request, res: Response) => {
    const now = new Date();
    res.status(200).json({
      status: 'healthy',
      dialect: deps.dialect,
      uptimeSeconds: Math.floor((now.getTime() - startTime.getTime()) / 1000),
      timestamp: now.toISOString(),
    });
  });

  return router;
}
