/**
 * Process metrics, refreshed by a collector at scrape time.
 */

import type { MetricsRegistry } from './metrics';

export function collectProcessMetrics(registry: MetricsRegistry, prefix = ''): void {
  const startTime = registry.register({
    name: `${prefix}process_start_time_seconds`,
    help: 'Start time of the process since unix epoch in seconds',
    kind: 'gauge',
    labelNames: [],
  });
  const uptime = registry.register({
    name: `${prefix}process_uptime_seconds`,
    help: 'Seconds since the process started',
    kind: 'gauge',
    labelNames: [],
  });
  const residentMemory = registry.register({
    name: `${prefix}process_resident_memory_bytes`,
    help: 'Resident memory size in bytes',
    kind: 'gauge',
    labelNames: [],
  });
  const heapUsed = registry.register({
    name: `${prefix}nodejs_heap_used_bytes`,
    help: 'V8 heap used in bytes',
    kind: 'gauge',
    labelNames: [],
  });
  const heapTotal = registry.register({
    name: `${prefix}nodejs_heap_total_bytes`,
    help: 'V8 heap allocated in bytes',
    kind: 'gauge',
    labelNames: [],
  });

  const startedAt = Math.floor(Date.now() / 1000 - process.uptime());

  registry.registerCollector(() => {
    const memory = process.memoryUsage();
    registry.gauge(startTime, {}).set(startedAt);
    registry.gauge(uptime, {}).set(process.uptime());
    registry.gauge(residentMemory, {}).set(memory.rss);
    registry.gauge(heapUsed, {}).set(memory.heapUsed);
    registry.gauge(heapTotal, {}).set(memory.heapTotal);
  });
}
