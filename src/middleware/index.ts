/**
 * Middleware barrel export
 */
export { errorHandler, notFoundHandler } from './errorHandler';
export { requestIdMiddleware, getRequestId, REQUEST_ID_HEADER } from './requestId';
export { validateBody } from './validateRequest';
export {
  createHttpMetricsMiddleware,
  CLIENT_CLOSED_REQUEST,
  type HttpMetricsMiddleware,
  type HttpMetricsMiddlewareOptions,
} from './httpMetrics';
