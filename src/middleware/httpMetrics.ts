/**
 * HTTP Metrics Middleware
 *
 * Opens an instrumentation scope for every request and finishes it when the
 * response is fully written (`finish`) or the connection goes away (`close`),
 * whichever comes first. A request whose connection closed before the
 * response finished is counted with status 499.
 *
 * Mount the export route ahead of `middleware` so scrapes are never
 * instrumented, and `errorObserver` right after the routes:
 *
 *   app.get('/metrics', createMetricsHandler(registry));
 *   app.use(httpMetrics.middleware);
 *   mountRoutes(app, routes);
 *   app.use(httpMetrics.errorObserver);
 *   app.use(notFoundHandler);
 *   app.use(errorHandler);
 */

import type { ErrorRequestHandler, Request, RequestHandler, Response } from 'express';
import { statusCodeForError } from '../errors';
import type { HttpInstrumentation } from '../infrastructure/httpInstrumentation';
import { RouteMatcher, UNMATCHED_ROUTE } from '../infrastructure/routeMatcher';

/** nginx's "client closed request". */
export const CLIENT_CLOSED_REQUEST = 499;

export interface HttpMetricsMiddlewareOptions {
  instrumentation: HttpInstrumentation;
  routeMatcher: RouteMatcher;
}

export interface HttpMetricsMiddleware {
  middleware: RequestHandler;
  /** Records the handler's error for the request's labels, then passes it on unchanged. */
  errorObserver: ErrorRequestHandler;
}

export function createHttpMetricsMiddleware(options: HttpMetricsMiddlewareOptions): HttpMetricsMiddleware {
  const { instrumentation, routeMatcher } = options;
  const observedErrors = new WeakMap<Request, unknown>();

  const middleware: RequestHandler = (req, res, next) => {
    const route = routeMatcher.resolve(req.method, req.path) ?? UNMATCHED_ROUTE;
    const scope = instrumentation.begin({ method: req.method, route });
    const requestBytes = parseContentLength(req.headers['content-length']);

    const settle = (): void => {
      res.removeListener('finish', settle);
      res.removeListener('close', settle);

      const error = observedErrors.get(req);
      if (res.writableFinished) {
        scope.finish({
          statusCode: res.statusCode,
          requestBytes,
          responseBytes: parseContentLength(res.getHeader('content-length')),
          error,
        });
        return;
      }
      scope.finish({
        statusCode: error === undefined ? CLIENT_CLOSED_REQUEST : statusForUnsentError(res, error),
        requestBytes,
        responseBytes: 0,
        error,
      });
    };

    res.on('finish', settle);
    res.on('close', settle);
    next();
  };

  const errorObserver: ErrorRequestHandler = (err, req, _res, next) => {
    if (!observedErrors.has(req)) {
      observedErrors.set(req, err);
    }
    next(err);
  };

  return { middleware, errorObserver };
}

function statusForUnsentError(res: Response, error: unknown): number {
  return res.headersSent ? res.statusCode : statusCodeForError(error);
}

function parseContentLength(value: string | number | string[] | undefined): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string') {
    const parsed = Number.parseInt(value, 10);
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : 0;
  }
  return 0;
}
