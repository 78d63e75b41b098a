/**
 * Application factory
 *
 * Every dependency comes in through `AppDependencies`, so tests build
 * isolated apps around their own registry.
 *
 * Pipeline order matters:
 *   requestId → export route → metrics → cors → json → routes → errorObserver → 404 → errorHandler
 * The export route answers before the metrics middleware, so Express's own
 * matching (case-insensitive, optional trailing slash) keeps every scrape out
 * of the HTTP metrics. The metrics middleware sits ahead of body parsing so
 * parse time and parse failures are measured; the error observer sits ahead
 * of the 404 handler so unmatched paths are not counted as handler errors.
 */

import cors, { type CorsOptions } from 'cors';
import express, { type Express } from 'express';
import type { Env } from './config/env';
import { HttpInstrumentation, RouteMatcher, type MetricsRegistry } from './infrastructure';
import {
  createHttpMetricsMiddleware,
  errorHandler,
  notFoundHandler,
  requestIdMiddleware,
} from './middleware';
import { buildApiRoutes, buildHealthRoutes, createMetricsHandler, mountRoutes } from './routes';
import { createServices, type Services } from './services';
import type { RandomSource } from './utils/latency';

export type AppConfig = Pick<
  Env,
  | 'SERVICE_NAME'
  | 'CORS_ALLOWED_ORIGINS'
  | 'METRICS_ENABLED'
  | 'METRICS_PATH'
  | 'METRICS_PREFIX'
  | 'SIMULATED_LATENCY_MIN_MS'
  | 'SIMULATED_LATENCY_MAX_MS'
  | 'PAYMENT_FAILURE_RATE'
>;

export interface AppDependencies {
  config: AppConfig;
  registry: MetricsRegistry;
  /** Prebuilt services; built from `config` when omitted. */
  services?: Services;
  random?: RandomSource;
}

export interface App {
  app: Express;
  services: Services;
  /** `null` when metrics are disabled. */
  instrumentation: HttpInstrumentation | null;
}

export function createApp({ config, registry, services: provided, random }: AppDependencies): App {
  const services =
    provided ??
    createServices({
      registry,
      metricsPrefix: config.METRICS_PREFIX,
      latency: { minMs: config.SIMULATED_LATENCY_MIN_MS, maxMs: config.SIMULATED_LATENCY_MAX_MS },
      paymentFailureRate: config.PAYMENT_FAILURE_RATE,
      random,
    });

  const instrumentation = config.METRICS_ENABLED
    ? new HttpInstrumentation(registry, { prefix: config.METRICS_PREFIX })
    : null;

  const routes = [
    ...buildHealthRoutes({
      serviceName: config.SERVICE_NAME,
      registry: instrumentation ? registry : null,
      inProgressMetric: instrumentation?.metrics.requestsInProgress.name ?? '',
    }),
    ...buildApiRoutes(services),
  ];

  const app = express();
  app.disable('x-powered-by');
  app.use(requestIdMiddleware);

  const httpMetrics = instrumentation
    ? createHttpMetricsMiddleware({
        instrumentation,
        routeMatcher: new RouteMatcher(routes),
      })
    : null;

  if (httpMetrics) {
    app.get(config.METRICS_PATH, createMetricsHandler(registry));
    app.use(httpMetrics.middleware);
  }

  app.use(cors(buildCorsOptions(config.CORS_ALLOWED_ORIGINS)));
  app.use(express.json({ limit: '1mb' }));

  mountRoutes(app, routes);

  if (httpMetrics) {
    app.use(httpMetrics.errorObserver);
  }
  app.use(notFoundHandler);
  app.use(errorHandler);

  return { app, services, instrumentation };
}

// ─────────────────────────────────────────────────────────────────────────────
// CORS
// ─────────────────────────────────────────────────────────────────────────────

export function buildCorsOptions(raw: string): CorsOptions {
  const allowedOrigins = resolveAllowedOrigins(raw);
  const allowAll = allowedOrigins.has('*');

  return {
    origin(origin, callback) {
      if (!origin || allowAll || allowedOrigins.has(origin)) {
        callback(null, true);
        return;
      }
      callback(null, false);
    },
    credentials: true,
  };
}

function resolveAllowedOrigins(raw: string): Set<string> {
  const origins = raw
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
  return new Set(origins.length > 0 ? origins : ['*']);
}
