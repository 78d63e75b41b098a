/**
 * Metrics errors
 *
 * Registration errors (duplicate / invalid names / invalid buckets) are
 * programming errors that should stop the process before it serves traffic.
 * Update errors (labels / values) are raised by the registry and dropped by
 * the HTTP middleware, which never fails a request over metrics.
 */

export interface MetricShape {
  kind: string;
  labelNames: readonly string[];
  buckets?: readonly number[];
}

function describeShape(shape: MetricShape): string {
  const labels = `[${shape.labelNames.join(', ')}]`;
  return shape.buckets
    ? `${shape.kind} labels=${labels} buckets=[${shape.buckets.join(', ')}]`
    : `${shape.kind} labels=${labels}`;
}

export class MetricsError extends Error {
  constructor(
    message: string,
    public readonly metricName: string,
  ) {
    super(message);
    this.name = 'MetricsError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class DuplicateMetricError extends MetricsError {
  constructor(
    metricName: string,
    public readonly existing: MetricShape,
    public readonly requested: MetricShape,
  ) {
    super(
      `Metric "${metricName}" is already registered as ${describeShape(existing)}; ` +
        `cannot re-register as ${describeShape(requested)}`,
      metricName,
    );
    this.name = 'DuplicateMetricError';
  }
}

export class InvalidLabelError extends MetricsError {
  constructor(
    metricName: string,
    public readonly expected: readonly string[],
    public readonly received: readonly string[],
    reason?: string,
  ) {
    super(
      `Invalid labels for "${metricName}": expected [${expected.join(', ')}], ` +
        `received [${received.join(', ')}]${reason ? ` (${reason})` : ''}`,
      metricName,
    );
    this.name = 'InvalidLabelError';
  }
}

export class InvalidMetricValueError extends MetricsError {
  constructor(
    metricName: string,
    public readonly value: number,
    reason: string,
  ) {
    super(`Invalid value ${value} for "${metricName}": ${reason}`, metricName);
    this.name = 'InvalidMetricValueError';
  }
}

export class InvalidMetricNameError extends MetricsError {
  constructor(metricName: string, reason: string) {
    super(`Invalid metric definition "${metricName}": ${reason}`, metricName);
    this.name = 'InvalidMetricNameError';
  }
}

export class InvalidBucketsError extends MetricsError {
  constructor(
    metricName: string,
    public readonly buckets: readonly number[],
  ) {
    super(
      `Invalid buckets for "${metricName}": [${buckets.join(', ')}] ` +
        'must be non-empty, finite and strictly increasing',
      metricName,
    );
    this.name = 'InvalidBucketsError';
  }
}

/** Thrown when a handle does not belong to the registry it is used with. */
export class UnknownMetricError extends MetricsError {
  constructor(metricName: string, expectedKind: string) {
    super(`No ${expectedKind} named "${metricName}" is registered in this registry`, metricName);
    this.name = 'UnknownMetricError';
  }
}
