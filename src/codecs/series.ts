// SPDX-License-Identifier: MIT
/**
 * The `[{metric, values}]` document shape shared by the JSON and YAML codecs.
 */
import { z } from 'zod';
import { ParseError } from '../types/errors.js';
import type { Labels, Sample } from '../types/sample.js';
import { formatValue, joinMetric, parseValue, seriesKey, splitMetric } from '../types/sample.js';
import type { DecodeItem } from './types.js';

/**
 * One series: backend metric object plus `[timestamp_s, "value"]` pairs.
 * A `null` timestamp stands for a sample without one.
 */
export interface SeriesRecord {
  metric: Labels;
  values: Array<[number | null, string]>;
}

/**
 * Groups consecutive samples of the same series into records.
 */
export class SeriesGrouper {
  private current: SeriesRecord | undefined;
  private currentKey = '';

  /**
   * Add a sample.
   *
   * @returns The previous record, when this sample starts a new series.
   */
  push(sample: Sample): SeriesRecord | undefined {
    const key = seriesKey(sample.metricName, sample.labels);
    const point: [number | null, string] = [sample.timestamp ?? null, formatValue(sample.value)];
    if (this.current !== undefined && key === this.currentKey) {
      this.current.values.push(point);
      return undefined;
    }
    const done = this.current;
    this.current = { metric: joinMetric(sample.metricName, sample.labels), values: [point] };
    this.currentKey = key;
    return done;
  }

  /**
   * The record in progress, if any. Resets the grouper.
   */
  flush(): SeriesRecord | undefined {
    const done = this.current;
    this.current = undefined;
    this.currentKey = '';
    return done;
  }
}

const recordSchema = z.object({
  metric: z.record(z.unknown()),
  values: z.array(z.tuple([z.union([z.number(), z.null()]), z.union([z.string(), z.number()])])),
});

/**
 * Decode a parsed `[{metric, values}]` document. Record numbers are 1-based.
 */
export function* decodeSeriesDocument(doc: unknown): Generator<DecodeItem> {
  if (!Array.isArray(doc)) {
    yield new ParseError('MissingField', truncate(doc), 1, 'document must be an array of series');
    return;
  }

  let index = 0;
  for (const element of doc) {
    index++;
    const raw = truncate(element);
    const parsed = recordSchema.safeParse(element);
    if (!parsed.success) {
      yield new ParseError('MissingField', raw, index, 'series needs "metric" and "values"');
      continue;
    }

    const metric: Labels = {};
    let malformed: string | undefined;
    for (const [key, value] of Object.entries(parsed.data.metric)) {
      if (typeof value !== 'string') {
        malformed = `label "${key}" is not a string`;
        break;
      }
      metric[key] = value;
    }
    if (malformed !== undefined) {
      yield new ParseError('MalformedLabelSet', raw, index, malformed);
      continue;
    }

    const { metricName, labels } = splitMetric(metric);
    if (metricName === '') {
      yield new ParseError('MissingField', raw, index, '__name__');
      continue;
    }

    for (const [ts, rawValue] of parsed.data.values) {
      const value = typeof rawValue === 'number' ? rawValue : parseValue(rawValue);
      if (value === undefined) {
        yield new ParseError('InvalidNumber', raw, index, `value "${String(rawValue)}"`);
        continue;
      }
      yield { metricName, labels, timestamp: ts ?? undefined, value };
    }
  }
}

function truncate(value: unknown): string {
  const text = JSON.stringify(value) ?? String(value);
  return text.length > 200 ? `${text.slice(0, 200)}...` : text;
}
