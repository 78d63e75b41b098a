/**
 * Business operation metrics shared by the demo services.
 */

import type { MetricHandle, MetricsRegistry } from '../infrastructure/metrics';

export type OperationStatus = 'success' | 'failure';

const OPERATION_BUCKETS: readonly number[] = [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5];

export class BusinessMetrics {
  private readonly operations: MetricHandle<'counter', 'operation_type' | 'status'>;
  private readonly duration: MetricHandle<'histogram', 'operation_type'>;

  constructor(
    private readonly registry: MetricsRegistry,
    prefix = '',
  ) {
    this.operations = registry.register({
      name: `${prefix}business_operations_total`,
      help: 'Total number of business operations',
      kind: 'counter',
      labelNames: ['operation_type', 'status'],
    });
    this.duration = registry.register({
      name: `${prefix}business_operation_duration_seconds`,
      help: 'Business operation duration in seconds',
      kind: 'histogram',
      labelNames: ['operation_type'],
      buckets: OPERATION_BUCKETS,
    });
  }

  record(operationType: string, status: OperationStatus): void {
    this.registry.counter(this.operations, { operation_type: operationType, status }).increment();
  }

  /** Times `fn` and counts it as success or failure; errors are re-thrown. */
  async track<T>(operationType: string, fn: () => Promise<T>): Promise<T> {
    const stopTimer = this.registry.histogram(this.duration, { operation_type: operationType }).startTimer();
    try {
      const result = await fn();
      this.record(operationType, 'success');
      return result;
    } catch (error) {
      this.record(operationType, 'failure');
      throw error;
    } finally {
      stopTimer();
    }
  }
}
