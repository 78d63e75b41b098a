/**
 * Infrastructure Module
 *
 * - Metrics registry, exposition format and process metrics
 * - HTTP request instrumentation and route template resolution
 * - Health checks
 */

export {
  MetricsRegistry,
  DEFAULT_BUCKETS,
  type MetricKind,
  type MetricHandle,
  type MetricDefinition,
  type MetricFamilySnapshot,
  type LabelValues,
} from './metrics';
export { renderExposition, CONTENT_TYPE } from './exposition';
export { collectProcessMetrics } from './processMetrics';
export {
  HttpInstrumentation,
  registerHttpMetrics,
  type HttpMetricHandles,
  type RequestScope,
  type RouteLabels,
} from './httpInstrumentation';
export { RouteMatcher, UNMATCHED_ROUTE, toTemplateLabel, type RouteDefinition, type HttpMethod } from './routeMatcher';
export { getHealthStatus, getMetricsHealth, type HealthStatus, type MetricsHealth } from './healthCheck';
