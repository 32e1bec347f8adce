/**
 * Prism - Query API Routes
 *
 * Natural-language analytics questions and CSV export of their results.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';

import type { AnalyticsAgent } from '../../agent/pipeline.js';
import { exportFileName, responseToCsv } from '../../agent/export.js';
import type { QueryExecutor } from '../../storage/types.js';
import { ValidationError } from '../../utils/types.js';
import { asyncHandler } from '../middleware/errorHandler.js';

// =============================================================================
// Types
// =============================================================================

export interface QueryRouterDeps {
  agent: AnalyticsAgent;
  executor: QueryExecutor;
}

const QueryBodySchema = z.object({
  question: z.string().trim().min(1),
  role: z.string().trim().min(1).optional(),
});

type QueryBody = z.infer<typeof QueryBodySchema>;

function parseBody(body: unknown): QueryBody {
  const result = QueryBodySchema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError(
      'Question is required',
      result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }
  return result.data;
}

// =============================================================================
// Router
// =============================================================================

export function createQueryRouter(deps: QueryRouterDeps): Router {
  const router = Router();

  /**
   * POST /api/query
   *
   * Run a question through the agent. Denied and failed runs are still 200:
   * the status field of the payload carries the outcome.
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const { question, role } = parseBody(req.body);
      const response = await deps.agent.run(question, deps.executor, role);

      res.json({
        success: response.status === 'success',
        data: response,
      });
    })
  );

  /**
   * POST /api/query/export
   *
   * Run a question and download the result set as CSV.
   */
  router.post(
    '/export',
    asyncHandler(async (req: Request, res: Response) => {
      const { question, role } = parseBody(req.body);
      const response = await deps.agent.run(question, deps.executor, role);

      if (response.status === 'denied') {
        res.status(403).json({
          success: false,
          error: response.explanation,
          data: response,
        });
        return;
      }

      if (response.status === 'error') {
        res.status(422).json({
          success: false,
          error: response.error,
          data: response,
        });
        return;
      }

      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${exportFileName(response)}"`);
      res.setHeader('X-Evidence-Pack-Id', response.evidencePack.evidencePackId);
      res.status(200).send(responseToCsv(response));
    })
  );

  return router;
}
