// SPDX-License-Identifier: MIT
/**
 * Option value parsers shared by the commands.
 */
import { InvalidArgumentError as OptionError } from 'commander';
import { InvalidArgumentError } from '../types/errors.js';
import type { TimeRange } from '../types/pipeline.js';
import { parseTimeRange, parseTimestamp } from '../time.js';

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new OptionError('Not a positive integer.');
  }
  return n;
}

export function parseNonNegativeNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n < 0) {
    throw new OptionError('Not a non-negative number.');
  }
  return n;
}

export interface RangeOptions {
  range?: string;
  start?: string;
  end?: string;
}

/**
 * Resolve `--range` or `--start`/`--end` into a time range. `--end`
 * defaults to now.
 *
 * @returns `undefined` when none of the options is set.
 */
export function resolveRange(options: RangeOptions, now: number = Date.now()): TimeRange | undefined {
  if (options.range !== undefined) {
    if (options.start !== undefined || options.end !== undefined) {
      throw new InvalidArgumentError('--range cannot be combined with --start or --end.');
    }
    return parseTimeRange(options.range, now);
  }
  if (options.start === undefined && options.end === undefined) {
    return undefined;
  }
  if (options.start === undefined) {
    throw new InvalidArgumentError('--end needs --start.');
  }
  return {
    start: parseTimestamp(options.start, now),
    end: parseTimestamp(options.end ?? 'now', now),
  };
}
