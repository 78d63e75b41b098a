/**
 * Health Check Utilities
 *
 * Backs `/health` (liveness) and `/health/metrics` (registry self-check).
 */

import type { MetricsRegistry } from './metrics';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface HealthStatus {
  status: 'healthy';
  timestamp: string;
  uptime: number;
  service: string;
}

export interface MetricsHealth {
  status: 'healthy' | 'unhealthy' | 'disabled';
  families?: number;
  /** Sum of the in-progress gauge across routes, including this request. */
  inFlight?: number;
  error?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Checks
// ─────────────────────────────────────────────────────────────────────────────

const startTime = Date.now();

export function getHealthStatus(service: string): HealthStatus {
  return {
    status: 'healthy',
    timestamp: new Date().toISOString(),
    uptime: Math.floor((Date.now() - startTime) / 1000),
    service,
  };
}

/**
 * Take a snapshot and report how many families it holds and the current
 * in-flight total. A negative in-flight total means a gauge leaked.
 */
export function getMetricsHealth(registry: MetricsRegistry | null, inProgressMetric: string): MetricsHealth {
  if (!registry) {
    return { status: 'disabled' };
  }
  try {
    const families = registry.snapshot();
    const inProgress = families.find((family) => family.name === inProgressMetric);
    const inFlight =
      inProgress && inProgress.kind !== 'histogram'
        ? inProgress.samples.reduce((total, sample) => total + sample.value, 0)
        : 0;
    return {
      status: inFlight >= 0 ? 'healthy' : 'unhealthy',
      families: families.length,
      inFlight,
    };
  } catch (error) {
    return { status: 'unhealthy', error: error instanceof Error ? error.message : String(error) };
  }
}
