/**
 * Prism - Catalog API Routes
 */

import { Router, type Request, type Response } from 'express';

import { datasetNames, type Catalog } from '../../catalog/catalog.js';
import { ValidationError } from '../../utils/types.js';

export interface CatalogRouterDeps {
  catalog: Catalog;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function createCatalogRouter(deps: CatalogRouterDeps): Router {
  const router = Router();
  const { catalog } = deps;

  /**
   * GET /api/catalog/search?q=
   */
  router.get('/search', (req: Request, res: Response) => {
    const query = queryString(req.query['q'])?.trim();
    if (!query) {
      throw new ValidationError('Query parameter q is required');
    }

    const results = catalog.search(query);
    res.json({
      success: true,
      data: {
        query,
        results,
        datasets: datasetNames(results),
      },
    });
  });

  /**
   * GET /api/catalog/quality?datasets=a,b
   *
   * Without a datasets parameter every data product is reported.
   */
  router.get('/quality', (req: Request, res: Response) => {
    const raw = queryString(req.query['datasets']);
    const names =
      raw === undefined
        ? catalog.getDataProducts().map((dp) => dp.name)
        : raw
            .split(',')
            .map((name) => name.trim())
            .filter((name) => name.length > 0);

    res.json({
      success: true,
      data: catalog.quality(names),
    });
  });

  return router;
}
