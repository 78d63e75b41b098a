/**
 * HTTP request instrumentation
 *
 * Framework-agnostic core of the metrics middleware. `begin()` opens a
 * request scope (start time + in-progress gauge); the scope's `finish()`
 * records count, duration, payload sizes and errors, then releases the
 * gauge. `finish()` takes effect once; every later call is a no-op, so
 * callers can attach it to several exit paths.
 *
 * Every registry update is fail-open: a metrics failure is logged and
 * dropped, never surfaced to the request.
 */

import { statusCodeForError } from '../errors';
import { createLogger, errorFields, type Logger } from '../utils/logger';
import type { MetricHandle, MetricsRegistry } from './metrics';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface RouteLabels {
  method: string;
  route: string;
}

export interface RequestOutcome {
  statusCode: number | string;
  requestBytes?: number;
  responseBytes?: number;
  /** The error the handler raised, if any. Only observed, never altered. */
  error?: unknown;
}

export interface RequestScope {
  readonly labels: RouteLabels;
  /** Returns `false` when the scope was already finished. */
  finish(outcome: RequestOutcome): boolean;
}

export interface HttpInstrumentationOptions {
  /** Prepended to every metric name, e.g. `shop_`. */
  prefix?: string;
  durationBuckets?: readonly number[];
  sizeBuckets?: readonly number[];
  logger?: Logger;
}

export interface HttpMetricHandles {
  requestsTotal: MetricHandle<'counter', 'method' | 'route' | 'status_code'>;
  requestDuration: MetricHandle<'histogram', 'method' | 'route'>;
  requestsInProgress: MetricHandle<'gauge', 'method' | 'route'>;
  requestSize: MetricHandle<'histogram', 'method' | 'route'>;
  responseSize: MetricHandle<'histogram', 'method' | 'route'>;
  requestErrors: MetricHandle<'counter', 'method' | 'route' | 'error_class'>;
}

export const DURATION_BUCKETS: readonly number[] = [
  0.005, 0.01, 0.025, 0.05, 0.075, 0.1, 0.25, 0.5, 0.75, 1, 2.5, 5, 7.5, 10,
];

export const SIZE_BUCKETS: readonly number[] = [100, 1_000, 10_000, 100_000, 1_000_000, 10_000_000];

// ─────────────────────────────────────────────────────────────────────────────
// Registration
// ─────────────────────────────────────────────────────────────────────────────

export function registerHttpMetrics(
  registry: MetricsRegistry,
  options: Pick<HttpInstrumentationOptions, 'prefix' | 'durationBuckets' | 'sizeBuckets'> = {},
): HttpMetricHandles {
  const prefix = options.prefix ?? '';
  const routeLabels = ['method', 'route'] as const;

  return {
    requestsTotal: registry.register({
      name: `${prefix}http_requests_total`,
      help: 'Total number of HTTP requests',
      kind: 'counter',
      labelNames: ['method', 'route', 'status_code'],
    }),
    requestDuration: registry.register({
      name: `${prefix}http_request_duration_seconds`,
      help: 'HTTP request duration in seconds',
      kind: 'histogram',
      labelNames: routeLabels,
      buckets: options.durationBuckets ?? DURATION_BUCKETS,
    }),
    requestsInProgress: registry.register({
      name: `${prefix}http_requests_in_progress`,
      help: 'Number of HTTP requests currently being processed',
      kind: 'gauge',
      labelNames: routeLabels,
    }),
    requestSize: registry.register({
      name: `${prefix}http_request_size_bytes`,
      help: 'HTTP request size in bytes',
      kind: 'histogram',
      labelNames: routeLabels,
      buckets: options.sizeBuckets ?? SIZE_BUCKETS,
    }),
    responseSize: registry.register({
      name: `${prefix}http_response_size_bytes`,
      help: 'HTTP response size in bytes',
      kind: 'histogram',
      labelNames: routeLabels,
      buckets: options.sizeBuckets ?? SIZE_BUCKETS,
    }),
    requestErrors: registry.register({
      name: `${prefix}http_request_errors_total`,
      help: 'Requests whose handler raised an error, by error class',
      kind: 'counter',
      labelNames: ['method', 'route', 'error_class'],
    }),
  };
}

export function errorClassOf(error: unknown): string {
  return error instanceof Error ? error.name : 'UnknownError';
}

// ─────────────────────────────────────────────────────────────────────────────
// Instrumentation
// ─────────────────────────────────────────────────────────────────────────────

export class HttpInstrumentation {
  readonly metrics: HttpMetricHandles;
  private readonly logger: Logger;

  constructor(
    private readonly registry: MetricsRegistry,
    options: HttpInstrumentationOptions = {},
  ) {
    this.metrics = registerHttpMetrics(registry, options);
    this.logger = options.logger ?? createLogger('httpMetrics');
  }

  begin(labels: RouteLabels): RequestScope {
    const { method, route } = labels;
    const started = performance.now();
    const entered = this.safely('enter', labels, () => {
      this.registry.gauge(this.metrics.requestsInProgress, { method, route }).inc();
    });
    let finished = false;

    return {
      labels,
      finish: (outcome) => {
        if (finished) {
          return false;
        }
        finished = true;

        const elapsedSeconds = (performance.now() - started) / 1000;
        const statusCode = String(outcome.statusCode);

        this.safely('count', labels, () => {
          this.registry.counter(this.metrics.requestsTotal, { method, route, status_code: statusCode }).increment();
        });
        this.safely('duration', labels, () => {
          this.registry.histogram(this.metrics.requestDuration, { method, route }).observe(elapsedSeconds);
        });
        this.safely('size', labels, () => {
          this.registry.histogram(this.metrics.requestSize, { method, route }).observe(outcome.requestBytes ?? 0);
          this.registry.histogram(this.metrics.responseSize, { method, route }).observe(outcome.responseBytes ?? 0);
        });
        if (outcome.error !== undefined) {
          const errorClass = errorClassOf(outcome.error);
          this.safely('error', labels, () => {
            this.registry.counter(this.metrics.requestErrors, { method, route, error_class: errorClass }).increment();
          });
        }
        if (entered) {
          this.safely('exit', labels, () => {
            this.registry.gauge(this.metrics.requestsInProgress, { method, route }).dec();
          });
        }
        return true;
      },
    };
  }

  /**
   * Run `fn` inside a request scope. The scope finishes on every exit
   * path; a thrown error is counted with its status and re-thrown as is.
   */
  async instrument<T>(labels: RouteLabels, fn: () => Promise<T>): Promise<T> {
    const scope = this.begin(labels);
    let outcome: RequestOutcome = { statusCode: 500 };
    try {
      const result = await fn();
      outcome = { statusCode: 200 };
      return result;
    } catch (error) {
      outcome = { statusCode: statusCodeForError(error), error };
      throw error;
    } finally {
      scope.finish(outcome);
    }
  }

  /** Returns whether the update was applied. */
  private safely(step: string, labels: RouteLabels, update: () => void): boolean {
    try {
      update();
      return true;
    } catch (error) {
      this.logger.warn({ step, ...labels, ...errorFields(error) }, 'Dropped metric update');
      return false;
    }
  }
}
