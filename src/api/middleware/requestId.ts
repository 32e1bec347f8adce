/**
 * Prism - Request ID Middleware
 * Assigns a unique identifier to each incoming request for tracing
 */

import type { Request, Response, NextFunction } from 'express';

import { generateId } from '../../utils/helpers.js';

// =============================================================================
// Constants
// =============================================================================

export const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_RESPONSE_HEADER = 'X-Request-ID';

// =============================================================================
// Request ID Middleware
// =============================================================================

/**
 * Reuses an incoming X-Request-ID header when present, otherwise generates a
 * UUID. The id is set on req.requestId and echoed in the response headers.
 */
export function requestIdMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const existingId = req.headers[REQUEST_ID_HEADER];
    const requestId =
      typeof existingId === 'string' && existingId.length > 0
        ? existingId
        : Array.isArray(existingId) && existingId[0]
          ? existingId[0]
          : generateId();

    req.requestId = requestId;
    req.startTime = Date.now();
    res.setHeader(REQUEST_ID_RESPONSE_HEADER, requestId);

    next();
  };
}

/**
 * Get the request ID from a request object
 */
export function getRequestId(req: Request): string {
  return req.requestId ?? 'unknown';
}

export default requestIdMiddleware;
