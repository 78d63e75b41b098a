/**
 * Prometheus text exposition format (version 0.0.4).
 *
 *   # HELP http_requests_total Total number of HTTP requests
 *   # TYPE http_requests_total counter
 *   http_requests_total{method="GET",route="/api/v1/users",status_code="200"} 50
 */

import type { LabelRecord, MetricFamilySnapshot } from './metrics';

export const CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export function renderExposition(families: readonly MetricFamilySnapshot[]): string {
  if (families.length === 0) {
    return '';
  }
  return families.map(renderFamily).join('\n') + '\n';
}

function renderFamily(family: MetricFamilySnapshot): string {
  const lines: string[] = [
    `# HELP ${family.name} ${escapeHelp(family.help)}`,
    `# TYPE ${family.name} ${family.kind}`,
  ];

  if (family.kind === 'histogram') {
    for (const sample of family.samples) {
      for (const bucket of sample.buckets) {
        lines.push(
          `${family.name}_bucket${formatLabels(sample.labels, ['le', formatValue(bucket.le)])} ${formatValue(bucket.count)}`,
        );
      }
      lines.push(`${family.name}_bucket${formatLabels(sample.labels, ['le', '+Inf'])} ${formatValue(sample.count)}`);
      lines.push(`${family.name}_sum${formatLabels(sample.labels)} ${formatValue(sample.sum)}`);
      lines.push(`${family.name}_count${formatLabels(sample.labels)} ${formatValue(sample.count)}`);
    }
  } else {
    for (const sample of family.samples) {
      lines.push(`${family.name}${formatLabels(sample.labels)} ${formatValue(sample.value)}`);
    }
  }

  return lines.join('\n');
}

export function formatLabels(labels: LabelRecord, extra?: [name: string, value: string]): string {
  const pairs = Object.entries(labels).map(([name, value]) => `${name}="${escapeLabelValue(value)}"`);
  if (extra) {
    pairs.push(`${extra[0]}="${escapeLabelValue(extra[1])}"`);
  }
  return pairs.length > 0 ? `{${pairs.join(',')}}` : '';
}

export function formatValue(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  return String(value);
}

export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function escapeHelp(help: string): string {
  return help.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}
