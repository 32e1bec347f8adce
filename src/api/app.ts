/**
 * Prism - HTTP Application
 * Express app wiring middleware and API routes around an analytics agent
 */

import compression from 'compression';
import cors from 'cors';
import express, { type Application } from 'express';
import helmet from 'helmet';

import type { AnalyticsAgent } from '../agent/pipeline.js';
import type { Catalog } from '../catalog/catalog.js';
import type { QueryExecutor } from '../storage/types.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestIdMiddleware } from './middleware/requestId.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createCatalogRouter } from './routes/catalog.js';
import { createHealthRouter } from './routes/health.js';
import { createQueryRouter } from './routes/query.js';

export interface AppDeps {
  agent: AnalyticsAgent;
  executor: QueryExecutor;
  catalog: Catalog;
}

export const ROUTE_PREFIXES = {
  query: '/api/query',
  catalog: '/api/catalog',
  health: '/api/health',
} as const;

export function createApp(deps: AppDeps): Application {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(compression());

  app.use(requestIdMiddleware());
  app.use(requestLogger({ skipPaths: [ROUTE_PREFIXES.health] }));

  app.use(express.json({ limit: '1mb' }));

  app.use(ROUTE_PREFIXES.query, createQueryRouter({ agent: deps.agent, executor: deps.executor }));
  app.use(ROUTE_PREFIXES.catalog, createCatalogRouter({ catalog: deps.catalog }));
  app.use(ROUTE_PREFIXES.health, createHealthRouter({ dialect: deps.agent.getDialect() }));

  // 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
