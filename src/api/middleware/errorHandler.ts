/**
 * Prism - Error Handler Middleware
 * Centralized error handling for the HTTP API
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';

import logger from '../../utils/logger.js';
import { PrismError, ValidationError } from '../../utils/types.js';

// =============================================================================
// Types
// =============================================================================

interface ErrorResponse {
  success: false;
  error: string;
  code: string;
  statusCode: number;
  requestId?: string;
  details?: string[];
}

// =============================================================================
// Error Handler Middleware
// =============================================================================

/**
 * Central error handling middleware
 * Catches all errors and returns appropriate JSON responses
 */
export const errorHandler: ErrorRequestHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const errorResponse = buildErrorResponse(err, req.requestId);

  logError(err, req, errorResponse);

  res.status(errorResponse.statusCode).json(errorResponse);
};

/**
 * Build a standardized error response object
 */
function buildErrorResponse(err: Error, requestId?: string): ErrorResponse {
  if (err instanceof PrismError) {
    const response: ErrorResponse = {
      success: false,
      error: err.message,
      code: err.code,
      statusCode: err.statusCode,
      requestId,
    };

    if (err instanceof ValidationError && err.validationErrors.length > 0) {
      response.details = err.validationErrors;
    }

    return response;
  }

  // Errors raised by Express or body-parser carry their own status
  if ('statusCode' in err && typeof err.statusCode === 'number') {
    return {
      success: false,
      error: err.message || 'An error occurred',
      code: 'HTTP_ERROR',
      statusCode: err.statusCode,
      requestId,
    };
  }

  const isProduction = process.env['NODE_ENV'] === 'production';

  return {
    success: false,
    error: isProduction ? 'Internal server error' : err.message,
    code: 'INTERNAL_ERROR',
    statusCode: 500,
    requestId,
  };
}

/**
 * Log error with appropriate level and context
 */
function logError(err: Error, req: Request, errorResponse: ErrorResponse): void {
  const logContext = {
    requestId: errorResponse.requestId,
    method: req.method,
    path: req.path,
    statusCode: errorResponse.statusCode,
    errorCode: errorResponse.code,
  };

  if (errorResponse.statusCode >= 500) {
    logger.error(err.message, {
      ...logContext,
      stack: err.stack,
    });
  } else {
    logger.warn(err.message, logContext);
  }
}

// =============================================================================
// Not Found Handler
// =============================================================================

/**
 * Handle 404 Not Found errors
 */
export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  const errorResponse: ErrorResponse = {
    success: false,
    error: `Route not found: ${req.method} ${req.path}`,
    code: 'NOT_FOUND',
    statusCode: 404,
    requestId: req.requestId,
  };

  logger.warn('Route not found', {
    requestId: req.requestId,
    method: req.method,
    path: req.path,
  });

  res.status(404).json(errorResponse);
};

// =============================================================================
// Async Handler Wrapper
// =============================================================================

/**
 * Wrap async route handlers to properly catch and forward errors
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export default errorHandler;
