import type { IRouter } from 'express';
import type { RouteDefinition } from '../infrastructure/routeMatcher';

export { buildApiRoutes, API_PREFIX } from './api';
export { buildHealthRoutes } from './health';
export { createMetricsHandler } from './metrics';

/** Mount a route table; the same table feeds the metrics `RouteMatcher`. */
export function mountRoutes(router: IRouter, routes: readonly RouteDefinition[]): void {
  for (const route of routes) {
    router[route.method](route.path, ...route.handlers);
  }
}
