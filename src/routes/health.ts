import type { Request, Response } from 'express';
import { getHealthStatus, getMetricsHealth } from '../infrastructure/healthCheck';
import type { MetricsRegistry } from '../infrastructure/metrics';
import type { RouteDefinition } from '../infrastructure/routeMatcher';

export interface HealthRouteOptions {
  serviceName: string;
  /** `null` when metrics are disabled. */
  registry: MetricsRegistry | null;
  inProgressMetric: string;
}

export function buildHealthRoutes(options: HealthRouteOptions): RouteDefinition[] {
  return [
    {
      method: 'get',
      path: '/health',
      handlers: [
        (_req: Request, res: Response) => {
          res.json(getHealthStatus(options.serviceName));
        },
      ],
    },
    {
      method: 'get',
      path: '/health/metrics',
      handlers: [
        (_req: Request, res: Response) => {
          const health = getMetricsHealth(options.registry, options.inProgressMetric);
          res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
        },
      ],
    },
  ];
}
