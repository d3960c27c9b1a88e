/**
 * Prometheus text exposition, as accepted by the store's import endpoint
 * and served by the state exporter.
 */

export type Labels = Record<string, string>;

export interface Sample {
  name: string;
  value: number;
  labels?: Labels;
  /** Unix epoch milliseconds */
  timestamp?: number;
}

export function sample(name: string, value: number, labels?: Labels, timestamp?: number): Sample {
  return { name, value, labels, timestamp };
}

/** Info-style series: constant 1, the payload lives in the labels. */
export function info(name: string, labels: Labels, timestamp?: number): Sample {
  return { name, value: 1, labels, timestamp };
}

export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

export function formatValue(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  return String(value);
}

export function formatLabels(labels: Labels | undefined): string {
  if (!labels) return '';
  const pairs = Object.entries(labels).map(([key, value]) => `${key}="${escapeLabelValue(value)}"`);
  return pairs.length > 0 ? `{${pairs.join(',')}}` : '';
}

/** `name{k="v"} value [timestamp]` */
export function formatSample(s: Sample): string {
  const line = `${s.name}${formatLabels(s.labels)} ${formatValue(s.value)}`;
  return s.timestamp === undefined ? line : `${line} ${Math.round(s.timestamp)}`;
}

export function formatSamples(samples: Sample[]): string {
  return samples.map(formatSample).join('\n');
}
