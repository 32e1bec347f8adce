/**
 * Prism - Request Logging Middleware
 * Logs incoming requests and their responses
 */

import type { Request, Response, NextFunction } from 'express';

import { logRequest, type RequestLogData } from '../../utils/logger.js';
import { getClientIp } from '../../utils/helpers.js';
import { getRequestId } from './requestId.js';

// =============================================================================
// Types
// =============================================================================

export interface RequestLoggerOptions {
  /** Skip logging for certain paths (e.g., health checks) */
  skipPaths?: string[];
  /** Skip logging for certain methods */
  skipMethods?: string[];
}

// =============================================================================
// Request Logger Middleware
// =============================================================================

/**
 * Creates a request logging middleware
 */
export function requestLogger(
  options: RequestLoggerOptions = {}
): (req: Request, res: Response, next: NextFunction) => void {
  const { skipPaths = ['/api/health'], skipMethods = [] } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (skipPaths.some((path) => req.path.startsWith(path)) || skipMethods.includes(req.method)) {
      next();
      return;
    }

    const startTime = req.startTime ?? Date.now();

    res.on('finish', () => {
      const logData: RequestLogData = {
        requestId: getRequestId(req),
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        responseTimeMs: Date.now() - startTime,
        ipAddress: getClientIp(req.headers),
        userAgent: req.headers['user-agent'],
      };

      logRequest(logData);
    });

    next();
  };
}

export default requestLogger;
