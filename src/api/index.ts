/**
 * Prism - API Module
 */

export { createApp, ROUTE_PREFIXES, type AppDeps } from './app.js';
export { PrismServer } from './server.js';
export { createQueryRouter, type QueryRouterDeps } from './routes/query.js';
export { createCatalogRouter, type CatalogRouterDeps } from './routes/catalog.js';
export { createHealthRouter, type HealthRouterDeps } from './routes/health.js';
export { errorHandler, notFoundHandler, asyncHandler } from './middleware/errorHandler.js';
export { requestIdMiddleware, getRequestId } from './middleware/requestId.js';
export { requestLogger, type RequestLoggerOptions } from './middleware/requestLogger.js';
