// SPDX-License-Identifier: MIT
import type { Labels, Sample } from './sample.js';
import { formatValue, splitMetric } from './sample.js';

/**
 * A `[timestamp, value]` pair; timestamp in unix seconds.
 */
export type Point = readonly [timestamp: number, value: number];

/**
 * One series of a query result.
 */
export interface Series {
  /** Full label set as returned by the backend, `__name__` included when present. */
  metric: Labels;
  points: Point[];
}

/**
 * Types of query results.
 */
export type ResultType = 'vector' | 'matrix' | 'scalar' | 'string';

/**
 * Instant vector: one point per series.
 */
export interface VectorResult {
  status: 'success';
  resultType: 'vector';
  series: Series[];
  warnings: string[];
}

/**
 * Range vector: many points per series.
 */
export interface MatrixResult {
  status: 'success';
  resultType: 'matrix';
  series: Series[];
  warnings: string[];
}

/**
 * Scalar: a single series with no labels and one point.
 */
export interface ScalarResult {
  status: 'success';
  resultType: 'scalar';
  series: Series[];
  warnings: string[];
}

/**
 * String result.
 */
export interface StringResult {
  status: 'success';
  resultType: 'string';
  timestamp: number;
  value: string;
  series: Series[];
  warnings: string[];
}

/**
 * Discriminated union of all query result types.
 */
export type QueryResult = VectorResult | MatrixResult | ScalarResult | StringResult;

/**
 * Type guard for instant vectors.
 */
export function isVectorResult(result: QueryResult): result is VectorResult {
  return result.resultType === 'vector';
}

/**
 * Type guard for range vectors.
 */
export function isMatrixResult(result: QueryResult): result is MatrixResult {
  return result.resultType === 'matrix';
}

/**
 * Type guard for scalars.
 */
export function isScalarResult(result: QueryResult): result is ScalarResult {
  return result.resultType === 'scalar';
}

/**
 * Type guard for strings.
 */
export function isStringResult(result: QueryResult): result is StringResult {
  return result.resultType === 'string';
}

/**
 * Number of points across all series.
 */
export function countPoints(result: QueryResult): number {
  let n = 0;
  for (const s of result.series) {
    n += s.points.length;
  }
  return n;
}

/**
 * Flatten a result into samples, series by series, in backend order.
 * Series without a `__name__` (aggregations, scalars) get `fallbackName`.
 */
export function resultToSamples(result: QueryResult, fallbackName = 'value'): Sample[] {
  const samples: Sample[] = [];
  for (const s of result.series) {
    const { metricName, labels } = splitMetric(s.metric);
    const name = metricName !== '' ? metricName : fallbackName;
    for (const [timestamp, value] of s.points) {
      samples.push({ metricName: name, labels, timestamp, value });
    }
  }
  return samples;
}

/**
 * Convert a series to a plain object with the backend's JSON shape.
 */
export function seriesToObject(series: Series): Record<string, unknown> {
  return {
    metric: { ...series.metric },
    values: series.points.map(([ts, v]) => [ts, formatValue(v)]),
  };
}
