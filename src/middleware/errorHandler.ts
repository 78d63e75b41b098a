/**
 * Global Error Handler Middleware
 *
 * Centralized error handling for all Express routes. Maps `AppError`,
 * Zod validation errors and body-parser failures to their status codes and
 * answers everything else with a generic 500.
 */

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, bodyParserStatus, statusCodeForError } from '../errors';
import { createLogger } from '../utils/logger';
import { getRequestId, REQUEST_ID_HEADER } from './requestId';
import { formatZodErrors } from './validateRequest';

const logger = createLogger('errorHandler');

// ─────────────────────────────────────────────────────────────────────────────
// Error Response Format
// ─────────────────────────────────────────────────────────────────────────────

interface ErrorResponse {
  error: string;
  code?: string;
  requestId: string;
  details?: unknown;
}

function buildErrorResponse(
  err: Error,
  requestId: string,
  includeDetails: boolean,
): { statusCode: number; body: ErrorResponse } {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      body: {
        error: err.message,
        code: err.code,
        requestId,
        ...(err.details !== undefined ? { details: err.details } : {}),
      },
    };
  }

  if (err instanceof ZodError) {
    return {
      statusCode: 400,
      body: {
        error: 'Validation failed',
        code: 'VALIDATION_ERROR',
        requestId,
        details: formatZodErrors(err),
      },
    };
  }

  const parserStatus = bodyParserStatus(err);
  if (parserStatus !== undefined) {
    return {
      statusCode: parserStatus,
      body: {
        error: 'Malformed request body',
        code: 'BAD_REQUEST',
        requestId,
        ...(includeDetails ? { details: err.message } : {}),
      },
    };
  }

  return {
    statusCode: 500,
    body: {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
      requestId,
    },
  };
}

// ─────────────────────────────────────────────────────────────────────────────
// Error Handler Middleware
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Must be registered after all routes.
 *
 * @example
 * mountRoutes(app, routes);
 * app.use(notFoundHandler);
 * app.use(errorHandler); // Must be last
 */
export function errorHandler(err: Error, req: Request, res: Response, next: NextFunction): void {
  // Response already streaming: let Express abort the connection.
  if (res.headersSent) {
    next(err);
    return;
  }

  const requestId = getRequestId(res);
  const isProduction = process.env.NODE_ENV === 'production';
  const statusCode = statusCodeForError(err);

  const logPayload = {
    requestId,
    method: req.method,
    path: req.path,
    statusCode,
    error: err.message,
    ...(err instanceof AppError ? { code: err.code } : {}),
    ...(!isProduction && statusCode >= 500 ? { stack: err.stack } : {}),
  };

  if (statusCode >= 500) {
    logger.error(logPayload, 'Request failed with server error');
  } else {
    logger.warn(logPayload, 'Request failed with client error');
  }

  const { statusCode: responseStatus, body } = buildErrorResponse(err, requestId, !isProduction);

  res.setHeader(REQUEST_ID_HEADER, requestId);
  res.status(responseStatus).json(body);
}

// ─────────────────────────────────────────────────────────────────────────────
// 404 Handler
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Handler for requests that match no route.
 * Registered after all routes but before errorHandler.
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(AppError.notFound(`Cannot ${req.method} ${req.path}`));
}
