// SPDX-License-Identifier: MIT
/**
 * Query engine: instant and range queries, metric-name listing and raw
 * series export, decoded into normalized results.
 */
import { z } from 'zod';
import { decodeJsonlLine } from './codecs/jsonl.js';
import type { EndpointSet, OperationKind } from './endpoints.js';
import * as log from './logger.js';
import type { TimeInput } from './time.js';
import { formatTimestamp, parseDuration, parseTimestamp } from './time.js';
import type { QueryParams, HttpTransport } from './transport.js';
import { ParseError, QueryError, TransportError } from './types/errors.js';
import type { TimeRange } from './types/pipeline.js';
import type { Point, QueryResult } from './types/query-result.js';
import type { Sample } from './types/sample.js';
import { parseValue } from './types/sample.js';

export interface InstantQueryOptions {
  /** Evaluation time (default: backend's now). */
  time?: TimeInput;
  signal?: AbortSignal | undefined;
}

export interface RangeQueryOptions {
  start: TimeInput;
  end: TimeInput;
  /** Seconds, or a duration such as `1m`. */
  step: number | string;
  signal?: AbortSignal | undefined;
}

export interface LabelValuesOptions {
  /** Series selectors restricting the names returned. */
  match?: readonly string[];
  start?: TimeInput;
  end?: TimeInput;
  signal?: AbortSignal | undefined;
}

const pointSchema = z.tuple([z.number(), z.string()]);
const metricSchema = z.record(z.string());

const envelopeSchema = z.object({
  status: z.string(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  errorType: z.string().optional(),
  warnings: z.array(z.string()).optional(),
});

const dataSchema = z.discriminatedUnion('resultType', [
  z.object({
    resultType: z.literal('vector'),
    result: z.array(z.object({ metric: metricSchema, value: pointSchema })),
  }),
  z.object({
    resultType: z.literal('matrix'),
    result: z.array(z.object({ metric: metricSchema, values: z.array(pointSchema) })),
  }),
  z.object({ resultType: z.literal('scalar'), result: pointSchema }),
  z.object({ resultType: z.literal('string'), result: pointSchema }),
]);

const stringListSchema = z.object({
  status: z.literal('success'),
  data: z.array(z.string()),
});

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    throw QueryError.decode(err instanceof Error ? err.message : 'invalid JSON', err);
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
    .join('; ');
}

function toPoint([ts, raw]: readonly [number, string]): Point {
  const value = parseValue(raw);
  if (value === undefined) {
    throw QueryError.decode(`invalid sample value "${raw}"`);
  }
  return [ts, value];
}

/**
 * If the body is a backend error envelope, the matching `QueryError`.
 */
export function backendErrorFrom(body: string): QueryError | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  const envelope = envelopeSchema.safeParse(parsed);
  if (!envelope.success || envelope.data.status !== 'error') {
    return undefined;
  }
  return QueryError.backend(envelope.data.error ?? 'unknown backend error', envelope.data.errorType);
}

/**
 * Decode a `/api/v1/query` or `/api/v1/query_range` response body.
 *
 * @throws QueryError
 */
export function decodeQueryResponse(body: string): QueryResult {
  const envelope = envelopeSchema.safeParse(parseJson(body));
  if (!envelope.success) {
    throw QueryError.decode(describeIssues(envelope.error));
  }
  const { status, error, errorType } = envelope.data;
  if (status !== 'success') {
    throw QueryError.backend(error ?? `unexpected status "${status}"`, errorType);
  }
  const warnings = envelope.data.warnings ?? [];

  const data = dataSchema.safeParse(envelope.data.data);
  if (!data.success) {
    throw QueryError.decode(describeIssues(data.error));
  }

  switch (data.data.resultType) {
    case 'vector':
      return {
        status: 'success',
        resultType: 'vector',
        series: data.data.result.map((r) => ({ metric: r.metric, points: [toPoint(r.value)] })),
        warnings,
      };
    case 'matrix':
      return {
        status: 'success',
        resultType: 'matrix',
        series: data.data.result.map((r) => ({ metric: r.metric, points: r.values.map(toPoint) })),
        warnings,
      };
    case 'scalar':
      return {
        status: 'success',
        resultType: 'scalar',
        series: [{ metric: {}, points: [toPoint(data.data.result)] }],
        warnings,
      };
    case 'string': {
      const [timestamp, value] = data.data.result;
      return { status: 'success', resultType: 'string', timestamp, value, series: [], warnings };
    }
  }
}

/**
 * Executes queries against resolved endpoints.
 */
export class QueryEngine {
  constructor(
    private readonly transport: HttpTransport,
    private readonly endpoints: EndpointSet
  ) {}

  /**
   * Evaluate an expression at a single point in time.
   */
  async instantQuery(expr: string, options: InstantQueryOptions = {}): Promise<QueryResult> {
    const params: QueryParams = { query: expr };
    if (options.time !== undefined) {
      params['time'] = formatTimestamp(parseTimestamp(options.time));
    }
    const t = log.timer('instant query');
    const body = await this.fetch('query', params, options.signal);
    const result = decodeQueryResponse(body);
    t.end({ expr, series: result.series.length });
    return result;
  }

  /**
   * Evaluate an expression over `[start, end]` at `step` intervals.
   *
   * @throws QueryError `invalid_range` before dispatch when `start > end` or `step` is under a millisecond.
   */
  async rangeQuery(expr: string, options: RangeQueryOptions): Promise<QueryResult> {
    const start = parseTimestamp(options.start);
    const end = parseTimestamp(options.end);
    const step = parseDuration(options.step);
    if (start > end) {
      throw QueryError.invalidRange(`start (${start}) is after end (${end})`);
    }
    // the backend receives millisecond precision
    if (Math.round(step * 1000) < 1) {
      throw QueryError.invalidRange(`step must be at least 1ms, got ${step}`);
    }
    const t = log.timer('range query');
    const body = await this.fetch(
      'query_range',
      {
        query: expr,
        start: formatTimestamp(start),
        end: formatTimestamp(end),
        step: formatTimestamp(step),
      },
      options.signal
    );
    const result = decodeQueryResponse(body);
    t.end({ expr, series: result.series.length });
    return result;
  }

  /**
   * List metric names, optionally restricted by series selectors.
   */
  async labelValues(options: LabelValuesOptions = {}): Promise<string[]> {
    const params: QueryParams = {};
    if (options.match !== undefined && options.match.length > 0) {
      params['match[]'] = options.match;
    }
    if (options.start !== undefined) {
      params['start'] = formatTimestamp(parseTimestamp(options.start));
    }
    if (options.end !== undefined) {
      params['end'] = formatTimestamp(parseTimestamp(options.end));
    }
    const body = await this.fetch('label_values', params, options.signal);
    const parsed = parseJson(body);
    const list = stringListSchema.safeParse(parsed);
    if (!list.success) {
      throw backendErrorFrom(body) ?? QueryError.decode(describeIssues(list.error));
    }
    return list.data.data;
  }

  /**
   * Fetch raw samples of the series matching `selector` within `range`,
   * in backend order.
   */
  async exportRaw(selector: string, range: TimeRange, signal?: AbortSignal): Promise<Sample[]> {
    if (range.start > range.end) {
      throw QueryError.invalidRange(`start (${range.start}) is after end (${range.end})`);
    }
    const body = await this.fetch(
      'series_export',
      {
        'match[]': [selector],
        start: formatTimestamp(range.start),
        end: formatTimestamp(range.end),
      },
      signal
    );

    const samples: Sample[] = [];
    let line = 0;
    for (const raw of body.split('\n')) {
      line++;
      if (raw.trim() === '') continue;
      const decoded = decodeJsonlLine(raw, line);
      if (decoded instanceof ParseError) {
        throw QueryError.decode(decoded.message, decoded);
      }
      samples.push(...decoded);
    }
    return samples;
  }

  private async fetch(
    operation: OperationKind,
    params: QueryParams,
    signal: AbortSignal | undefined
  ): Promise<string> {
    const endpoint = this.endpoints.get(operation);
    try {
      const response = await this.transport.send(endpoint, { params, signal });
      return response.body;
    } catch (err) {
      if (err instanceof TransportError && err.kind === 'http_status' && err.body !== undefined) {
        const backend = backendErrorFrom(err.body);
        if (backend !== undefined) {
          throw backend;
        }
      }
      throw err;
    }
  }
}
