/**
 * Request ID Middleware
 *
 * Takes the caller's `X-Request-ID` (or generates one), echoes it on the
 * response and runs the rest of the chain inside the request context so the
 * logger tags every line with it.
 */

import type { Request, Response, NextFunction } from 'express';
import { runWithRequestId } from '../utils/requestContext';

export const REQUEST_ID_HEADER = 'X-Request-ID';

function generateRequestId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const existingId = req.headers['x-request-id'];
  const requestId =
    typeof existingId === 'string' && existingId.trim() ? existingId.trim().slice(0, 128) : generateRequestId();

  res.locals.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);
  runWithRequestId(requestId, () => next());
}

export function getRequestId(res: Response): string {
  const requestId: unknown = res.locals.requestId;
  return typeof requestId === 'string' ? requestId : 'unknown';
}
