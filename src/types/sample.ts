// SPDX-License-Identifier: MIT
import { InvalidArgumentError } from './errors.js';

/**
 * Label set of a series, without the metric name.
 */
export type Labels = Record<string, string>;

/**
 * Reserved label carrying the metric name on the wire.
 */
export const METRIC_NAME_LABEL = '__name__';

/**
 * One time-series data point.
 *
 * `timestamp` is unix seconds; the fractional part carries milliseconds.
 * It is `undefined` only when a format allows omitting it (Prometheus text).
 * `value` keeps `NaN` and `±Infinity` as they arrive.
 */
export interface Sample {
  readonly metricName: string;
  readonly labels: Readonly<Labels>;
  readonly timestamp: number | undefined;
  readonly value: number;
}

/**
 * Create a sample. A `__name__` entry in `labels` is moved into the metric name.
 */
export function createSample(
  metricName: string,
  labels: Labels,
  timestamp: number | undefined,
  value: number
): Sample {
  const { [METRIC_NAME_LABEL]: labelName, ...rest } = labels;
  const name = metricName !== '' ? metricName : (labelName ?? '');
  if (name === '') {
    throw new InvalidArgumentError('Sample must have a non-empty metric name');
  }
  return { metricName: name, labels: rest, timestamp, value };
}

/**
 * Split a backend `metric` object into metric name and labels.
 */
export function splitMetric(metric: Readonly<Labels>): { metricName: string; labels: Labels } {
  const { [METRIC_NAME_LABEL]: metricName, ...labels } = metric;
  return { metricName: metricName ?? '', labels };
}

/**
 * Join metric name and labels into a backend `metric` object, name first.
 */
export function joinMetric(metricName: string, labels: Readonly<Labels>): Labels {
  return { [METRIC_NAME_LABEL]: metricName, ...labels };
}

/**
 * Render a sample value the way the backend does: `NaN`, `+Inf`, `-Inf` or a decimal.
 */
export function formatValue(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }
  if (value === Infinity) {
    return '+Inf';
  }
  if (value === -Infinity) {
    return '-Inf';
  }
  return String(value);
}

const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a sample value. Accepts the `NaN`/`Inf` sentinels case-insensitively.
 *
 * @returns The value, or `undefined` when the text is not a number.
 */
export function parseValue(text: string): number | undefined {
  const t = text.trim();
  const lower = t.toLowerCase();
  if (lower === 'nan') {
    return NaN;
  }
  if (lower === 'inf' || lower === '+inf' || lower === 'infinity' || lower === '+infinity') {
    return Infinity;
  }
  if (lower === '-inf' || lower === '-infinity') {
    return -Infinity;
  }
  if (!NUMBER_PATTERN.test(t)) {
    return undefined;
  }
  return Number(t);
}

/**
 * Parse a timestamp given in milliseconds into unix seconds.
 */
export function millisToSeconds(ms: number): number {
  return ms / 1000;
}

/**
 * Convert unix seconds to integer milliseconds.
 */
export function secondsToMillis(seconds: number): number {
  return Math.round(seconds * 1000);
}

/**
 * Stable identity of a series: metric name plus labels in key order.
 */
export function seriesKey(metricName: string, labels: Readonly<Labels>): string {
  const keys = Object.keys(labels).sort();
  return JSON.stringify([metricName, ...keys.map((k) => [k, labels[k]])]);
}

const METRIC_NAME_PATTERN = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Whether a string is a valid metric name.
 */
export function isValidMetricName(name: string): boolean {
  return METRIC_NAME_PATTERN.test(name);
}

/**
 * Whether a string is a valid label name.
 */
export function isValidLabelName(name: string): boolean {
  return LABEL_NAME_PATTERN.test(name);
}
