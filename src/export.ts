// SPDX-License-Identifier: MIT
/**
 * Export pipeline: walks a time range in adaptive windows, encodes each
 * chunk and writes it to a sink before fetching the next.
 */
import { once } from 'node:events';
import type { Writable } from 'node:stream';
import { getCodec } from './codecs/index.js';
import * as log from './logger.js';
import type { QueryEngine } from './query.js';
import type { TimeInput } from './time.js';
import { parseDuration, parseTimestamp } from './time.js';
import { ExportError, InvalidArgumentError, QueryError, TransportError } from './types/errors.js';
import type { ExportChunk, ExportProgress, ExportSummary, TimeRange } from './types/pipeline.js';
import { resultToSamples } from './types/query-result.js';
import type { Sample } from './types/sample.js';

/**
 * `raw` reads stored samples through the export API and only takes series
 * selectors; `range` evaluates any expression at `step`; `auto` picks `raw`
 * for selectors.
 */
export type ExportMode = 'raw' | 'range' | 'auto';

/**
 * The part of the query engine the export pipeline needs.
 */
export type ExportSource = Pick<QueryEngine, 'exportRaw' | 'rangeQuery'>;

/**
 * Destination for encoded output.
 */
export interface ExportSink {
  write(data: string): Promise<void>;
}

export interface ChunkOptions {
  expr: string;
  start: TimeInput;
  end: TimeInput;
  /** Upper bound of samples per chunk (>= 1). */
  chunkSize: number;
  mode?: ExportMode;
  /** Evaluation step for range mode (default: `1m`). */
  step?: number | string;
  /** Width of the first window in seconds (default: 3600). */
  windowS?: number;
  /** Continue from a cursor of an earlier, interrupted export. */
  resumeFrom?: number;
  signal?: AbortSignal | undefined;
}

export interface ExportOptions extends ChunkOptions {
  format: string;
  sink: ExportSink;
  onProgress?: (progress: ExportProgress) => void;
}

const SELECTOR = /^\s*(?:[a-zA-Z_:][a-zA-Z0-9_:]*\s*(?:\{[^{}]*\})?|\{[^{}]*\})\s*$/;

/**
 * Whether an expression is a plain series selector, such as `up{job="a"}`.
 */
export function isSeriesSelector(expr: string): boolean {
  return SELECTOR.test(expr);
}

/**
 * Pick the concrete mode for an expression.
 */
export function resolveMode(expr: string, mode: ExportMode = 'auto'): 'raw' | 'range' {
  if (mode === 'auto') {
    return isSeriesSelector(expr) ? 'raw' : 'range';
  }
  if (mode === 'raw' && !isSeriesSelector(expr)) {
    throw new InvalidArgumentError(`Raw export needs a series selector, got "${expr}"`);
  }
  return mode;
}

/**
 * Position in the range, counted in windows' smallest unit: one millisecond
 * in raw mode, one step in range mode.
 */
interface Grid {
  originMs: number;
  unitMs: number;
  lastUnit: number;
}

function unitTime(grid: Grid, unit: number): number {
  return (grid.originMs + unit * grid.unitMs) / 1000;
}

/**
 * Progress counters shared by `iterateChunks` and the error summaries.
 */
interface ChunkState {
  chunks: number;
  samples: number;
  cursor: number | undefined;
  startedAt: number;
}

function summarize(state: ChunkState, complete: boolean): ExportSummary {
  const summary: ExportSummary = {
    totalSamples: state.samples,
    totalChunks: state.chunks,
    elapsedMs: Math.round(performance.now() - state.startedAt),
    complete,
  };
  if (!complete && state.cursor !== undefined) {
    summary.cursor = state.cursor;
  }
  return summary;
}

function isCancellation(err: unknown): boolean {
  return err instanceof TransportError && err.kind === 'cancelled';
}

/**
 * Produce the export as a lazy, finite sequence of chunks of at most
 * `chunkSize` samples. Windows that return too many samples are bisected;
 * a window that cannot shrink further is paged. Sparse windows grow.
 *
 * @throws ExportError `chunk_failed` when a fetch fails, `cancelled` on abort.
 */
export async function* iterateChunks(
  source: ExportSource,
  options: ChunkOptions
): AsyncGenerator<ExportChunk, ExportSummary, undefined> {
  const state: ChunkState = { chunks: 0, samples: 0, cursor: undefined, startedAt: performance.now() };
  yield* walk(source, options, state);
  return summarize(state, true);
}

async function* walk(
  source: ExportSource,
  options: ChunkOptions,
  state: ChunkState
): AsyncGenerator<ExportChunk, void, undefined> {
  if (!Number.isInteger(options.chunkSize) || options.chunkSize < 1) {
    throw new InvalidArgumentError(`chunkSize must be a positive integer, got ${options.chunkSize}`);
  }
  const start = parseTimestamp(options.start);
  const end = parseTimestamp(options.end);
  if (start > end) {
    throw QueryError.invalidRange(`start (${start}) is after end (${end})`);
  }
  const mode = resolveMode(options.expr, options.mode);
  const stepS = parseDuration(options.step ?? '1m');
  if (mode === 'range' && Math.round(stepS * 1000) < 1) {
    throw QueryError.invalidRange(`step must be at least 1ms, got ${stepS}`);
  }
  const windowS = options.windowS ?? 3600;
  if (!(windowS > 0)) {
    throw new InvalidArgumentError(`windowS must be positive, got ${windowS}`);
  }

  const originMs = Math.round(start * 1000);
  const unitMs = mode === 'raw' ? 1 : Math.max(1, Math.round(stepS * 1000));
  const grid: Grid = {
    originMs,
    unitMs,
    lastUnit: Math.floor((Math.round(end * 1000) - originMs) / unitMs),
  };
  const totalUnits = grid.lastUnit + 1;
  const maxWidth = totalUnits;

  let unit = 0;
  if (options.resumeFrom !== undefined) {
    const resumeMs = Math.round(parseTimestamp(options.resumeFrom) * 1000);
    unit = Math.max(0, Math.ceil((resumeMs - originMs) / unitMs));
  }
  const firstUnit = unit;
  let width = Math.max(1, Math.floor((windowS * 1000) / unitMs));

  const fetch = async (range: TimeRange): Promise<Sample[]> => {
    if (mode === 'raw') {
      return source.exportRaw(options.expr, range, options.signal);
    }
    const result = await source.rangeQuery(options.expr, {
      start: range.start,
      end: range.end,
      step: stepS,
      signal: options.signal,
    });
    return resultToSamples(result);
  };

  log.debug('Export started', { expr: options.expr, mode, start, end, chunkSize: options.chunkSize });

  while (unit <= grid.lastUnit) {
    state.cursor = unitTime(grid, unit);
    if (options.signal?.aborted) {
      throw ExportError.cancelled(summarize(state, false));
    }

    const hi = Math.min(unit + width - 1, grid.lastUnit);
    const range: TimeRange = { start: unitTime(grid, unit), end: unitTime(grid, hi) };

    let samples: Sample[];
    try {
      samples = await fetch(range);
    } catch (err) {
      if (isCancellation(err) || options.signal?.aborted) {
        throw ExportError.cancelled(summarize(state, false));
      }
      throw ExportError.chunkFailed(range, err, summarize(state, false));
    }

    if (samples.length > options.chunkSize && hi > unit) {
      width = Math.max(1, Math.ceil((hi - unit + 1) / 2));
      log.debug('Export window too dense, bisecting', { range, samples: samples.length, width });
      continue;
    }

    const next = hi < grid.lastUnit ? unitTime(grid, hi + 1) : undefined;
    for (let offset = 0; offset < samples.length; offset += options.chunkSize) {
      const slice = samples.slice(offset, offset + options.chunkSize);
      const lastSlice = offset + options.chunkSize >= samples.length;
      state.chunks++;
      state.samples += slice.length;
      state.cursor = lastSlice ? next : range.start;
      yield { index: state.chunks - 1, range, samples: slice, cursor: state.cursor };
    }

    unit = hi + 1;
    state.cursor = next;
    if (samples.length < options.chunkSize / 2 && width < maxWidth) {
      width = Math.min(width * 2, maxWidth);
    }
  }

  log.debug('Export finished', { chunks: state.chunks, samples: state.samples, from: firstUnit });
}

/**
 * Extrapolate the total sample count from the share of the range covered.
 */
function estimateTotal(
  chunk: ExportChunk,
  cumulative: number,
  end: number,
  from: number
): number | undefined {
  const span = end - from;
  if (span <= 0) {
    return cumulative;
  }
  const covered = Math.min(chunk.range.end, end) - from;
  if (covered <= 0) {
    return undefined;
  }
  if (chunk.cursor === undefined) {
    return cumulative;
  }
  return Math.max(cumulative, Math.round((cumulative * span) / covered));
}

/**
 * Export `expr` over `[start, end]` to `sink` in `format`.
 *
 * Output already written stays in place when the export fails.
 *
 * @throws ExportError
 */
export async function exportSeries(source: ExportSource, options: ExportOptions): Promise<ExportSummary> {
  const codec = getCodec(options.format);
  const encoder = codec.createEncoder();
  const start = parseTimestamp(options.start);
  const end = parseTimestamp(options.end);
  const from = options.resumeFrom !== undefined ? Math.max(start, parseTimestamp(options.resumeFrom)) : start;

  const chunks = iterateChunks(source, options);
  let cumulative = 0;
  let next = await chunks.next();
  const head = encoder.begin();
  if (head !== '') {
    await options.sink.write(head);
  }

  for (;; next = await chunks.next()) {
    if (next.done === true) {
      const tail = encoder.end();
      if (tail !== '') {
        await options.sink.write(tail);
      }
      return next.value;
    }
    const chunk = next.value;
    const encoded = encoder.encode(chunk.samples);
    if (encoded !== '') {
      await options.sink.write(encoded);
    }
    cumulative += chunk.samples.length;
    const progress: ExportProgress = {
      chunkIndex: chunk.index,
      samplesInChunk: chunk.samples.length,
      cumulativeSamples: cumulative,
      range: chunk.range,
    };
    const estimate = estimateTotal(chunk, cumulative, end, from);
    if (estimate !== undefined) {
      progress.estimatedTotal = estimate;
    }
    options.onProgress?.(progress);
  }
}

/**
 * Sink over a Node writable stream. Waits for `drain` when the stream is full.
 * A stream error fails the next write.
 */
export function writableSink(stream: Writable): ExportSink {
  let failure: Error | undefined;
  stream.on('error', (error) => {
    failure = error;
  });
  return {
    async write(data: string): Promise<void> {
      if (failure !== undefined) {
        throw failure;
      }
      if (!stream.write(data)) {
        await once(stream, 'drain');
      }
    },
  };
}

/**
 * Sink that keeps everything written, for tests and small exports.
 */
export interface MemorySink extends ExportSink {
  readonly parts: string[];
  text(): string;
}

export function memorySink(): MemorySink {
  const parts: string[] = [];
  return {
    parts,
    async write(data: string): Promise<void> {
      parts.push(data);
    },
    text(): string {
      return parts.join('');
    },
  };
}
