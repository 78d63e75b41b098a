/**
 * Metrics Registry
 *
 * Counter / gauge / histogram primitives keyed by fixed-shape label sets,
 * owned by an explicitly constructed registry. Nothing here is a module
 * singleton: the process builds one `MetricsRegistry` at startup and hands
 * it to every consumer (HTTP middleware, services, the /metrics route).
 *
 * Each cell update is one synchronous step on the event loop, so updates
 * are atomic per cell and concurrent requests never lose increments.
 * `snapshot()` copies cell values and never blocks writers.
 */

import {
  DuplicateMetricError,
  InvalidBucketsError,
  InvalidLabelError,
  InvalidMetricNameError,
  InvalidMetricValueError,
  UnknownMetricError,
} from '../errors';
import { createLogger, errorFields, type Logger } from '../utils/logger';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type MetricKind = 'counter' | 'gauge' | 'histogram';

export type LabelValues<L extends string> = Readonly<Record<L, string>>;

export type LabelRecord = Readonly<Record<string, string>>;

export interface MetricDefinition<K extends MetricKind, L extends string> {
  name: string;
  help: string;
  kind: K;
  labelNames: readonly L[];
  /** Upper bounds for histograms; `+Inf` is implicit. */
  buckets?: readonly number[];
}

/**
 * Returned by `register`. Carries the kind and label names at the type
 * level so `registry.counter(handle, labels)` checks label keys statically.
 */
export interface MetricHandle<K extends MetricKind = MetricKind, L extends string = string> {
  readonly name: string;
  readonly kind: K;
  readonly labelNames: readonly L[];
}

export interface CounterCell {
  increment(amount?: number): void;
}

export interface GaugeCell {
  add(delta: number): void;
  inc(): void;
  dec(): void;
  set(value: number): void;
}

export interface HistogramCell {
  observe(value: number): void;
  /** Starts a monotonic timer; the returned function observes elapsed seconds once. */
  startTimer(): () => number;
}

export interface ScalarSample {
  labels: LabelRecord;
  value: number;
}

export interface BucketSample {
  le: number;
  count: number;
}

export interface HistogramSample {
  labels: LabelRecord;
  /** Cumulative counts, one per declared bound (the `+Inf` bucket equals `count`). */
  buckets: BucketSample[];
  sum: number;
  count: number;
}

interface FamilySnapshotBase {
  name: string;
  help: string;
  labelNames: readonly string[];
}

export interface ScalarFamilySnapshot extends FamilySnapshotBase {
  kind: 'counter' | 'gauge';
  samples: ScalarSample[];
}

export interface HistogramFamilySnapshot extends FamilySnapshotBase {
  kind: 'histogram';
  buckets: readonly number[];
  samples: HistogramSample[];
}

export type MetricFamilySnapshot = ScalarFamilySnapshot | HistogramFamilySnapshot;

export type MetricCollector = () => void;

export interface MetricsRegistryOptions {
  logger?: Logger;
}

// ─────────────────────────────────────────────────────────────────────────────
// Internal state
// ─────────────────────────────────────────────────────────────────────────────

interface ScalarState {
  labels: LabelRecord;
  value: number;
}

interface HistogramState {
  labels: LabelRecord;
  bucketCounts: number[];
  sum: number;
  count: number;
}

interface FamilyBase {
  handle: MetricHandle;
  help: string;
}

interface ScalarFamily extends FamilyBase {
  kind: 'counter' | 'gauge';
  cells: Map<string, ScalarState>;
}

interface HistogramFamily extends FamilyBase {
  kind: 'histogram';
  buckets: readonly number[];
  cells: Map<string, HistogramState>;
}

type Family = ScalarFamily | HistogramFamily;

export const DEFAULT_BUCKETS: readonly number[] = [
  0.005, 0.01, 0.025, 0.05, 0.075, 0.1, 0.25, 0.5, 0.75, 1, 2.5, 5, 7.5, 10,
];

const METRIC_NAME_PATTERN = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

// ─────────────────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────────────────

export class MetricsRegistry {
  private readonly families = new Map<string, Family>();
  private readonly collectors: MetricCollector[] = [];
  private readonly logger: Logger;

  constructor(options: MetricsRegistryOptions = {}) {
    this.logger = options.logger ?? createLogger('metrics');
  }

  /**
   * Declare a metric family. Registering the same name again with an
   * identical shape returns the existing handle; any other shape throws
   * `DuplicateMetricError`.
   */
  register<K extends MetricKind, L extends string = never>(
    definition: MetricDefinition<K, L>,
  ): MetricHandle<K, L> {
    const { name, kind, labelNames } = definition;
    validateDefinition(definition);

    const buckets = kind === 'histogram' ? [...(definition.buckets ?? DEFAULT_BUCKETS)] : undefined;
    if (buckets && !areValidBuckets(buckets)) {
      throw new InvalidBucketsError(name, buckets);
    }

    const existing = this.families.get(name);
    if (existing) {
      const existingBuckets = existing.kind === 'histogram' ? existing.buckets : undefined;
      const sameShape =
        existing.kind === kind &&
        sameSequence(existing.handle.labelNames, labelNames) &&
        sameSequence(existingBuckets ?? [], buckets ?? []);
      if (!sameShape) {
        throw new DuplicateMetricError(
          name,
          { kind: existing.kind, labelNames: existing.handle.labelNames, buckets: existingBuckets },
          { kind, labelNames, buckets },
        );
      }
    }

    const handle: MetricHandle<K, L> = Object.freeze({
      name,
      kind,
      labelNames: Object.freeze([...labelNames]),
    });

    if (existing) {
      return handle;
    }

    if (buckets) {
      this.families.set(name, {
        kind: 'histogram',
        handle,
        help: definition.help,
        buckets: Object.freeze(buckets),
        cells: new Map(),
      });
    } else {
      this.families.set(name, {
        kind: kind === 'gauge' ? 'gauge' : 'counter',
        handle,
        help: definition.help,
        cells: new Map(),
      });
    }
    return handle;
  }

  counter<L extends string>(handle: MetricHandle<'counter', L>, labels: LabelValues<L>): CounterCell {
    const family = this.scalarFamily(handle, 'counter');
    const cell = this.scalarCell(family, labels);
    return {
      increment: (amount = 1) => {
        if (!Number.isFinite(amount) || amount < 0) {
          throw new InvalidMetricValueError(handle.name, amount, 'counters only increase by finite non-negative amounts');
        }
        cell().value += amount;
      },
    };
  }

  gauge<L extends string>(handle: MetricHandle<'gauge', L>, labels: LabelValues<L>): GaugeCell {
    const family = this.scalarFamily(handle, 'gauge');
    const cell = this.scalarCell(family, labels);
    const assertFinite = (value: number): void => {
      if (!Number.isFinite(value)) {
        throw new InvalidMetricValueError(handle.name, value, 'gauge values must be finite');
      }
    };
    return {
      add: (delta) => {
        assertFinite(delta);
        cell().value += delta;
      },
      inc: () => {
        cell().value += 1;
      },
      dec: () => {
        cell().value -= 1;
      },
      set: (value) => {
        assertFinite(value);
        cell().value = value;
      },
    };
  }

  histogram<L extends string>(handle: MetricHandle<'histogram', L>, labels: LabelValues<L>): HistogramCell {
    const family = this.families.get(handle.name);
    if (!family || family.kind !== 'histogram' || !sameFamily(family, handle)) {
      throw new UnknownMetricError(handle.name, 'histogram');
    }
    const key = labelKey(handle.name, family.handle.labelNames, labels);
    const values = pickLabels(family.handle.labelNames, labels);

    const cell = (): HistogramState => {
      let state = family.cells.get(key);
      if (!state) {
        state = { labels: values, bucketCounts: new Array<number>(family.buckets.length).fill(0), sum: 0, count: 0 };
        family.cells.set(key, state);
      }
      return state;
    };

    const observe = (value: number): void => {
      if (!Number.isFinite(value) || value < 0) {
        throw new InvalidMetricValueError(handle.name, value, 'observations must be finite and non-negative');
      }
      const state = cell();
      for (let i = 0; i < family.buckets.length; i++) {
        if (value <= family.buckets[i]) {
          state.bucketCounts[i]++;
        }
      }
      state.sum += value;
      state.count++;
    };

    return {
      observe,
      startTimer: () => {
        const start = performance.now();
        let elapsed: number | undefined;
        return () => {
          if (elapsed === undefined) {
            elapsed = (performance.now() - start) / 1000;
            observe(elapsed);
          }
          return elapsed;
        };
      },
    };
  }

  /**
   * Current value of a counter or gauge cell, `undefined` if the label set
   * has never been touched.
   */
  getSampleValue<L extends string>(
    handle: MetricHandle<'counter' | 'gauge', L>,
    labels: LabelValues<L>,
  ): number | undefined {
    const family = this.families.get(handle.name);
    if (!family || family.kind === 'histogram' || !sameFamily(family, handle)) {
      throw new UnknownMetricError(handle.name, handle.kind);
    }
    return family.cells.get(labelKey(handle.name, family.handle.labelNames, labels))?.value;
  }

  /** Run `collector` before every snapshot, e.g. to refresh on-demand gauges. */
  registerCollector(collector: MetricCollector): void {
    this.collectors.push(collector);
  }

  /**
   * Point-in-time copy of every family, in registration order, samples in
   * first-use order. Exact consistency across families is not guaranteed.
   */
  snapshot(): MetricFamilySnapshot[] {
    for (const collect of this.collectors) {
      try {
        collect();
      } catch (error) {
        this.logger.warn(errorFields(error), 'Metric collector failed; serving previous values');
      }
    }

    const result: MetricFamilySnapshot[] = [];
    for (const family of this.families.values()) {
      const base = { name: family.handle.name, help: family.help, labelNames: family.handle.labelNames };
      if (family.kind === 'histogram') {
        result.push({
          ...base,
          kind: 'histogram',
          buckets: family.buckets,
          samples: Array.from(family.cells.values(), (state) => ({
            labels: state.labels,
            buckets: family.buckets.map((le, i) => ({ le, count: state.bucketCounts[i] })),
            sum: state.sum,
            count: state.count,
          })),
        });
      } else {
        result.push({
          ...base,
          kind: family.kind,
          samples: Array.from(family.cells.values(), (state) => ({ labels: state.labels, value: state.value })),
        });
      }
    }
    return result;
  }

  /** Drop every cell; families stay registered and handles stay valid. */
  reset(): void {
    for (const family of this.families.values()) {
      family.cells.clear();
    }
  }

  // ───────────────────────────────────────────────────────────────────────────

  private scalarFamily(handle: MetricHandle, kind: 'counter' | 'gauge'): ScalarFamily {
    const family = this.families.get(handle.name);
    if (!family || family.kind !== kind || !sameFamily(family, handle)) {
      throw new UnknownMetricError(handle.name, kind);
    }
    return family;
  }

  /**
   * Validates labels eagerly; the cell itself is created on first write so a
   * read-only accessor never materialises an empty sample.
   */
  private scalarCell(family: ScalarFamily, labels: LabelRecord): () => ScalarState {
    const key = labelKey(family.handle.name, family.handle.labelNames, labels);
    const values = pickLabels(family.handle.labelNames, labels);
    return () => {
      let state = family.cells.get(key);
      if (!state) {
        state = { labels: values, value: 0 };
        family.cells.set(key, state);
      }
      return state;
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function validateDefinition(definition: MetricDefinition<MetricKind, string>): void {
  const { name, kind, labelNames } = definition;
  if (!METRIC_NAME_PATTERN.test(name)) {
    throw new InvalidMetricNameError(name, 'metric names must match [a-zA-Z_:][a-zA-Z0-9_:]*');
  }
  const seen = new Set<string>();
  for (const label of labelNames) {
    if (!LABEL_NAME_PATTERN.test(label) || label.startsWith('__')) {
      throw new InvalidMetricNameError(name, `label "${label}" is not a valid label name`);
    }
    if (kind === 'histogram' && label === 'le') {
      throw new InvalidMetricNameError(name, 'label "le" is reserved for histogram buckets');
    }
    if (seen.has(label)) {
      throw new InvalidMetricNameError(name, `label "${label}" is declared twice`);
    }
    seen.add(label);
  }
  if (kind !== 'histogram' && definition.buckets) {
    throw new InvalidMetricNameError(name, `buckets are only valid for histograms, not ${kind}s`);
  }
}

function areValidBuckets(buckets: readonly number[]): boolean {
  if (buckets.length === 0) return false;
  return buckets.every((bound, i) => Number.isFinite(bound) && (i === 0 || bound > buckets[i - 1]));
}

function sameSequence<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

/**
 * Cell key: label values in declared order, so the caller's key order is
 * irrelevant. Missing, extra or non-string labels throw `InvalidLabelError`.
 */
function labelKey(metricName: string, labelNames: readonly string[], labels: LabelRecord): string {
  const received = Object.keys(labels);
  const expected = new Set(labelNames);
  const unknown = received.filter((key) => !expected.has(key));
  const missing = labelNames.filter((name) => !Object.prototype.hasOwnProperty.call(labels, name));
  if (unknown.length > 0 || missing.length > 0) {
    const reason = [
      unknown.length > 0 ? `unknown: ${unknown.join(', ')}` : '',
      missing.length > 0 ? `missing: ${missing.join(', ')}` : '',
    ]
      .filter(Boolean)
      .join('; ');
    throw new InvalidLabelError(metricName, labelNames, received, reason);
  }
  const values = labelNames.map((name) => labels[name]);
  const nonString = labelNames.filter((_, i) => typeof values[i] !== 'string');
  if (nonString.length > 0) {
    throw new InvalidLabelError(metricName, labelNames, received, `non-string value for: ${nonString.join(', ')}`);
  }
  return JSON.stringify(values);
}

function pickLabels(labelNames: readonly string[], labels: LabelRecord): LabelRecord {
  const picked: Record<string, string> = {};
  for (const name of labelNames) {
    picked[name] = labels[name];
  }
  return Object.freeze(picked);
}

/** Handles are plain values: any handle with the family's name, kind and labels is accepted. */
function sameFamily(family: Family, handle: MetricHandle): boolean {
  return family.kind === handle.kind && sameSequence(family.handle.labelNames, handle.labelNames);
}
