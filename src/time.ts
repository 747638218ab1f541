// SPDX-License-Identifier: MIT
/**
 * Timestamp and duration parsing. Everything is unix seconds.
 */
import { InvalidArgumentError } from './types/errors.js';
import type { TimeRange } from './types/pipeline.js';

/**
 * Accepted timestamp inputs: unix seconds, a `Date`, or a string
 * (`now`, `now-1h`, RFC 3339, or unix seconds as text).
 */
export type TimeInput = number | Date | string;

const UNIT_SECONDS: Record<string, number> = {
  ms: 0.001,
  s: 1,
  m: 60,
  h: 3600,
  d: 86_400,
  w: 604_800,
  y: 31_536_000,
};

const DURATION_PART = /(\d+(?:\.\d+)?)(ms|s|m|h|d|w|y)/gy;
const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const RFC3339 = /^\d{4}-\d{2}-\d{2}([Tt ]\d{2}:\d{2}(:\d{2}(\.\d+)?)?([Zz]|[+-]\d{2}:?\d{2})?)?$/;
const RELATIVE = /^now\s*(?:([+-])\s*(.+))?$/i;

/**
 * Parse a duration such as `30s`, `1m`, `1h30m`, `500ms` or a bare number of seconds.
 *
 * @returns Seconds.
 * @throws InvalidArgumentError when the text is not a duration.
 */
export function parseDuration(input: string | number): number {
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new InvalidArgumentError(`Invalid duration: ${input}`);
    }
    return input;
  }
  const text = input.trim();
  if (NUMERIC.test(text)) {
    return Number(text);
  }
  if (text === '') {
    throw new InvalidArgumentError('Invalid duration: empty string');
  }

  let total = 0;
  DURATION_PART.lastIndex = 0;
  let pos = 0;
  while (pos < text.length) {
    const match = DURATION_PART.exec(text);
    if (match === null || match.index !== pos) {
      throw new InvalidArgumentError(`Invalid duration: "${input}"`);
    }
    const [whole, amount = '0', unit = 's'] = match;
    total += Number(amount) * (UNIT_SECONDS[unit] ?? 1);
    pos += whole.length;
  }
  return total;
}

/**
 * Render seconds as a compact duration (`1h30m`, `45s`).
 */
export function formatDuration(seconds: number): string {
  if (seconds === 0) {
    return '0s';
  }
  const parts: string[] = [];
  let rest = Math.abs(seconds);
  for (const [unit, size] of [
    ['d', 86_400],
    ['h', 3600],
    ['m', 60],
  ] as const) {
    const n = Math.floor(rest / size);
    if (n > 0) {
      parts.push(`${n}${unit}`);
      rest -= n * size;
    }
  }
  if (rest > 0) {
    parts.push(Number.isInteger(rest) ? `${rest}s` : `${Math.round(rest * 1000)}ms`);
  }
  return (seconds < 0 ? '-' : '') + parts.join('');
}

/**
 * Parse a timestamp into unix seconds.
 *
 * @param now - Reference time in milliseconds for relative forms.
 * @throws InvalidArgumentError when the input is not a timestamp.
 */
export function parseTimestamp(input: TimeInput, now: number = Date.now()): number {
  if (typeof input === 'number') {
    if (!Number.isFinite(input)) {
      throw new InvalidArgumentError(`Invalid timestamp: ${input}`);
    }
    return input;
  }
  if (input instanceof Date) {
    const ms = input.getTime();
    if (Number.isNaN(ms)) {
      throw new InvalidArgumentError('Invalid timestamp: invalid Date');
    }
    return ms / 1000;
  }

  const text = input.trim();
  if (NUMERIC.test(text)) {
    return Number(text);
  }
  const relative = RELATIVE.exec(text);
  if (relative !== null) {
    const [, sign, offset] = relative;
    const base = now / 1000;
    if (sign === undefined || offset === undefined) {
      return base;
    }
    const delta = parseDuration(offset);
    return sign === '-' ? base - delta : base + delta;
  }
  if (RFC3339.test(text)) {
    const ms = Date.parse(text);
    if (!Number.isNaN(ms)) {
      return ms / 1000;
    }
  }
  throw new InvalidArgumentError(`Invalid timestamp: "${input}"`);
}

/**
 * Format unix seconds for a query-string parameter, with at most millisecond precision.
 */
export function formatTimestamp(seconds: number): string {
  return String(Math.round(seconds * 1000) / 1000);
}

const RANGE_ALIASES: Record<string, string> = {
  '1hour': '1h',
  '6hours': '6h',
  '1day': '1d',
  '7days': '7d',
  '30days': '30d',
};

/**
 * Turn a lookback such as `1h`, `24h`, `7d` or `1day` into a range ending now.
 *
 * @param now - Reference time in milliseconds.
 */
export function parseTimeRange(range: string, now: number = Date.now()): TimeRange {
  const key = range.trim().toLowerCase();
  const lookback = parseDuration(RANGE_ALIASES[key] ?? key);
  if (lookback <= 0) {
    throw new InvalidArgumentError(`Invalid time range: "${range}"`);
  }
  const end = Math.floor(now / 1000);
  return { start: end - lookback, end };
}
