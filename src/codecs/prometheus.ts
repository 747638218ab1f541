// SPDX-License-Identifier: MIT
/**
 * Prometheus exposition text: `name{k="v",...} value [timestamp_ms]`.
 */
import { ParseError } from '../types/errors.js';
import type { Labels, Sample } from '../types/sample.js';
import {
  METRIC_NAME_LABEL,
  formatValue,
  isValidMetricName,
  millisToSeconds,
  parseValue,
  secondsToMillis,
} from '../types/sample.js';
import { BaseCodec, readLines } from './base.js';
import type { DecodeItem, Encoder, TextSource } from './types.js';

/**
 * Escape a label value: backslash, double quote and newline.
 */
export function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/**
 * Render one sample as an exposition line, without the trailing newline.
 */
export function formatSampleLine(sample: Sample): string {
  const pairs = Object.entries(sample.labels).map(([k, v]) => `${k}="${escapeLabelValue(v)}"`);
  const labels = pairs.length > 0 ? `{${pairs.join(',')}}` : '';
  const ts = sample.timestamp !== undefined ? ` ${secondsToMillis(sample.timestamp)}` : '';
  return `${sample.metricName}${labels} ${formatValue(sample.value)}${ts}`;
}

class LineSyntaxError extends Error {
  constructor(
    readonly reason: ParseError['reason'],
    detail: string
  ) {
    super(detail);
  }
}

const NAME_CHARS = /[a-zA-Z0-9_:]/;
const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Parse a `{k="v",...}` block starting at `text[start] === '{'`.
 *
 * @returns The labels and the index just past the closing brace.
 */
function parseLabelBlock(text: string, start: number): { labels: Labels; next: number } {
  const labels: Labels = {};
  let i = start + 1;
  const skipSpace = (): void => {
    while (i < text.length && (text[i] === ' ' || text[i] === '\t')) i++;
  };

  skipSpace();
  if (text[i] === '}') {
    return { labels, next: i + 1 };
  }
  for (;;) {
    skipSpace();
    const nameStart = i;
    while (i < text.length && text[i] !== '=' && text[i] !== ' ' && text[i] !== '}') i++;
    const name = text.slice(nameStart, i);
    if (!LABEL_NAME.test(name)) {
      throw new LineSyntaxError('MalformedLabelSet', `invalid label name "${name}"`);
    }
    skipSpace();
    if (text[i] !== '=') {
      throw new LineSyntaxError('MalformedLabelSet', `expected "=" after label "${name}"`);
    }
    i++;
    skipSpace();
    if (text[i] !== '"') {
      throw new LineSyntaxError('MalformedLabelSet', `expected quoted value for label "${name}"`);
    }
    i++;
    let value = '';
    let closed = false;
    while (i < text.length) {
      const c = text[i];
      if (c === '\\') {
        const n = text[i + 1];
        if (n === 'n') value += '\n';
        else if (n === '\\' || n === '"') value += n;
        else throw new LineSyntaxError('MalformedLabelSet', `invalid escape in label "${name}"`);
        i += 2;
        continue;
      }
      if (c === '"') {
        closed = true;
        i++;
        break;
      }
      value += c;
      i++;
    }
    if (!closed) {
      throw new LineSyntaxError('MalformedLabelSet', `unterminated value for label "${name}"`);
    }
    if (Object.prototype.hasOwnProperty.call(labels, name)) {
      throw new LineSyntaxError('MalformedLabelSet', `duplicate label "${name}"`);
    }
    labels[name] = value;
    skipSpace();
    if (text[i] === ',') {
      i++;
      skipSpace();
      if (text[i] === '}') return { labels, next: i + 1 };
      continue;
    }
    if (text[i] === '}') {
      return { labels, next: i + 1 };
    }
    throw new LineSyntaxError('MalformedLabelSet', 'expected "," or "}"');
  }
}

/**
 * Parse one non-comment exposition line.
 *
 * @returns A sample, or a `ParseError` for the line.
 */
export function parseSampleLine(raw: string, line: number): Sample | ParseError {
  const text = raw.trim();
  try {
    let i = 0;
    while (i < text.length && NAME_CHARS.test(text.charAt(i))) i++;
    let metricName = text.slice(0, i);
    let labels: Labels = {};
    if (text[i] === '{') {
      const block = parseLabelBlock(text, i);
      const { [METRIC_NAME_LABEL]: nameLabel, ...rest } = block.labels;
      labels = rest;
      if (metricName === '' && nameLabel !== undefined) {
        metricName = nameLabel;
      }
      i = block.next;
    }
    if (metricName === '' || !isValidMetricName(metricName)) {
      throw new LineSyntaxError('MissingField', 'metric name');
    }

    const fields = text.slice(i).trim().split(/\s+/).filter((f) => f !== '');
    const [valueText, tsText, extra] = fields;
    if (valueText === undefined) {
      throw new LineSyntaxError('MissingField', 'value');
    }
    if (extra !== undefined) {
      throw new LineSyntaxError('InvalidNumber', `unexpected trailing field "${extra}"`);
    }
    const value = parseValue(valueText);
    if (value === undefined) {
      throw new LineSyntaxError('InvalidNumber', `value "${valueText}"`);
    }
    let timestamp: number | undefined;
    if (tsText !== undefined) {
      const ms = /^-?\d+$/.test(tsText) ? Number(tsText) : NaN;
      if (!Number.isFinite(ms)) {
        throw new LineSyntaxError('InvalidNumber', `timestamp "${tsText}"`);
      }
      timestamp = millisToSeconds(ms);
    }
    return { metricName, labels, timestamp, value };
  } catch (err) {
    if (err instanceof LineSyntaxError) {
      return new ParseError(err.reason, raw, line, err.message);
    }
    throw err;
  }
}

class PrometheusEncoder implements Encoder {
  begin(): string {
    return '';
  }

  encode(samples: readonly Sample[]): string {
    let out = '';
    for (const s of samples) {
      out += formatSampleLine(s) + '\n';
    }
    return out;
  }

  end(): string {
    return '';
  }
}

export class PrometheusCodec extends BaseCodec {
  override readonly format = 'prometheus' as const;
  override readonly extension = 'prom';
  override readonly contentType = 'text/plain; version=0.0.4';

  override createEncoder(): Encoder {
    return new PrometheusEncoder();
  }

  override async *decode(source: TextSource): AsyncIterable<DecodeItem> {
    let line = 0;
    for await (const raw of readLines(source)) {
      line++;
      const trimmed = raw.trim();
      if (trimmed === '' || trimmed.startsWith('#')) continue;
      yield parseSampleLine(raw, line);
    }
  }
}
