// SPDX-License-Identifier: MIT
/**
 * The backend's native JSON-lines format, used by `/api/v1/export` and
 * `/api/v1/import`: `{"metric":{...},"values":[...],"timestamps":[ms,...]}`.
 */
import { z } from 'zod';
import { InvalidArgumentError, ParseError } from '../types/errors.js';
import type { Labels, Sample } from '../types/sample.js';
import {
  formatValue,
  joinMetric,
  millisToSeconds,
  parseValue,
  secondsToMillis,
  seriesKey,
  splitMetric,
} from '../types/sample.js';
import { BaseCodec, readLines } from './base.js';
import type { DecodeItem, Encoder, TextSource } from './types.js';

const lineSchema = z.object({
  metric: z.record(z.unknown()),
  values: z.array(z.union([z.number(), z.string(), z.null()])),
  timestamps: z.array(z.number()),
});

/**
 * Decode one line into the samples it carries.
 */
export function decodeJsonlLine(raw: string, line: number): Sample[] | ParseError {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return new ParseError('MalformedLabelSet', raw, line, err instanceof Error ? err.message : 'invalid JSON');
  }
  const record = lineSchema.safeParse(parsed);
  if (!record.success) {
    return new ParseError('MissingField', raw, line, 'expected "metric", "values" and "timestamps"');
  }
  const { metric, values, timestamps } = record.data;
  if (values.length !== timestamps.length) {
    return new ParseError(
      'MissingField',
      raw,
      line,
      `${values.length} values but ${timestamps.length} timestamps`
    );
  }

  const labelSet: Labels = {};
  for (const [key, value] of Object.entries(metric)) {
    if (typeof value !== 'string') {
      return new ParseError('MalformedLabelSet', raw, line, `label "${key}" is not a string`);
    }
    labelSet[key] = value;
  }
  const { metricName, labels } = splitMetric(labelSet);
  if (metricName === '') {
    return new ParseError('MissingField', raw, line, '__name__');
  }

  const samples: Sample[] = [];
  for (let i = 0; i < values.length; i++) {
    const rawValue = values[i];
    const value =
      typeof rawValue === 'number' ? rawValue : rawValue === null ? NaN : parseValue(rawValue);
    if (value === undefined) {
      return new ParseError('InvalidNumber', raw, line, `value "${String(rawValue)}"`);
    }
    samples.push({ metricName, labels, timestamp: millisToSeconds(timestamps[i] ?? 0), value });
  }
  return samples;
}

interface PendingLine {
  key: string;
  metric: Labels;
  values: Array<number | string>;
  timestamps: number[];
}

function renderLine(p: PendingLine): string {
  return `${JSON.stringify({ metric: p.metric, values: p.values, timestamps: p.timestamps })}\n`;
}

/**
 * Consecutive samples of one series share a line.
 */
class JsonlEncoder implements Encoder {
  private pending: PendingLine | undefined;

  begin(): string {
    return '';
  }

  encode(samples: readonly Sample[]): string {
    let out = '';
    for (const s of samples) {
      if (s.timestamp === undefined) {
        throw new InvalidArgumentError(`Sample of "${s.metricName}" has no timestamp`);
      }
      const value = Number.isFinite(s.value) ? s.value : formatValue(s.value);
      const key = seriesKey(s.metricName, s.labels);
      if (this.pending !== undefined && this.pending.key === key) {
        this.pending.values.push(value);
        this.pending.timestamps.push(secondsToMillis(s.timestamp));
        continue;
      }
      if (this.pending !== undefined) {
        out += renderLine(this.pending);
      }
      this.pending = {
        key,
        metric: joinMetric(s.metricName, s.labels),
        values: [value],
        timestamps: [secondsToMillis(s.timestamp)],
      };
    }
    return out;
  }

  end(): string {
    const last = this.pending;
    this.pending = undefined;
    return last !== undefined ? renderLine(last) : '';
  }
}

export class JsonlCodec extends BaseCodec {
  override readonly format = 'jsonl' as const;
  override readonly extension = 'jsonl';
  override readonly contentType = 'application/stream+json';

  override createEncoder(): Encoder {
    return new JsonlEncoder();
  }

  override async *decode(source: TextSource): AsyncIterable<DecodeItem> {
    let line = 0;
    for await (const raw of readLines(source)) {
      line++;
      if (raw.trim() === '') continue;
      const decoded = decodeJsonlLine(raw, line);
      if (decoded instanceof ParseError) {
        yield decoded;
        continue;
      }
      yield* decoded;
    }
  }
}
