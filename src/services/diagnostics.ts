// SPDX-License-Identifier: MIT
/**
 * Diagnostics built on the query engine: metric statistics, query latency
 * benchmarks and gap detection.
 */
import type { QueryEngine } from '../query.js';
import type { TimeInput } from '../time.js';
import { parseDuration } from '../time.js';
import { InvalidArgumentError } from '../types/errors.js';
import type { Labels } from '../types/sample.js';

export interface PrefixCount {
  prefix: string;
  count: number;
}

export interface MetricStats {
  total: number;
  pattern?: string;
  /** Names containing the pattern, in backend order. */
  matching: string[];
  topPrefixes: PrefixCount[];
}

export interface BenchmarkIteration {
  iteration: number;
  latencyMs: number;
  ok: boolean;
  error?: string;
}

export interface BenchmarkReport {
  expr: string;
  iterations: BenchmarkIteration[];
  succeeded: number;
  failed: number;
  /** Latency statistics over successful iterations; absent when none succeeded. */
  minMs?: number;
  avgMs?: number;
  maxMs?: number;
  p95Ms?: number;
}

export interface Gap {
  metric: Labels;
  /** Timestamp of the last point before the gap. */
  from: number;
  /** Timestamp of the first point after the gap. */
  to: number;
  durationS: number;
}

export interface GapReport {
  seriesChecked: number;
  gaps: Gap[];
}

export interface FindGapsOptions {
  start: TimeInput;
  end: TimeInput;
  step: number | string;
  /** Report intervals between points longer than this (default: 60). */
  minGapS?: number;
  signal?: AbortSignal | undefined;
}

export interface BenchmarkOptions {
  signal?: AbortSignal | undefined;
  /** Millisecond clock (default: `performance.now`). */
  clock?: () => number;
}

/**
 * Nearest-rank percentile of an ascending list.
 */
export function percentile(sorted: readonly number[], p: number): number | undefined {
  if (sorted.length === 0) {
    return undefined;
  }
  const rank = Math.ceil((p / 100) * sorted.length);
  return sorted[Math.min(sorted.length, Math.max(1, rank)) - 1];
}

/**
 * Service client for diagnostics.
 */
export class DiagnosticsClient {
  constructor(private readonly engine: QueryEngine) {}

  /**
   * Count metric names, filter them by a substring, and rank name prefixes
   * (the part before the first `_`).
   */
  async metricStats(pattern?: string, topN = 10, signal?: AbortSignal): Promise<MetricStats> {
    const names = await this.engine.labelValues({ signal });
    const needle = pattern?.toLowerCase();
    const matching = needle !== undefined ? names.filter((n) => n.toLowerCase().includes(needle)) : [];

    const counts = new Map<string, number>();
    for (const name of names) {
      const underscore = name.indexOf('_');
      const prefix = underscore > 0 ? name.slice(0, underscore) : name;
      counts.set(prefix, (counts.get(prefix) ?? 0) + 1);
    }
    const topPrefixes = [...counts.entries()]
      .map(([prefix, count]) => ({ prefix, count }))
      .sort((a, b) => b.count - a.count || a.prefix.localeCompare(b.prefix))
      .slice(0, topN);

    const stats: MetricStats = { total: names.length, matching, topPrefixes };
    if (pattern !== undefined) {
      stats.pattern = pattern;
    }
    return stats;
  }

  /**
   * Run an instant query `count` times in sequence and report latencies.
   */
  async benchmark(expr: string, count: number, options: BenchmarkOptions = {}): Promise<BenchmarkReport> {
    if (!Number.isInteger(count) || count < 1) {
      throw new InvalidArgumentError(`count must be a positive integer, got ${count}`);
    }
    const clock = options.clock ?? (() => performance.now());
    const iterations: BenchmarkIteration[] = [];

    for (let i = 1; i <= count; i++) {
      const started = clock();
      try {
        await this.engine.instantQuery(expr, { signal: options.signal });
        iterations.push({ iteration: i, latencyMs: clock() - started, ok: true });
      } catch (err) {
        if (options.signal?.aborted) {
          throw err;
        }
        iterations.push({
          iteration: i,
          latencyMs: clock() - started,
          ok: false,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    const latencies = iterations
      .filter((it) => it.ok)
      .map((it) => it.latencyMs)
      .sort((a, b) => a - b);
    const report: BenchmarkReport = {
      expr,
      iterations,
      succeeded: latencies.length,
      failed: iterations.length - latencies.length,
    };
    const min = latencies[0];
    const max = latencies[latencies.length - 1];
    const p95 = percentile(latencies, 95);
    if (min !== undefined && max !== undefined && p95 !== undefined) {
      report.minMs = min;
      report.maxMs = max;
      report.avgMs = latencies.reduce((sum, v) => sum + v, 0) / latencies.length;
      report.p95Ms = p95;
    }
    return report;
  }

  /**
   * Run a range query and report, per series, every interval between
   * consecutive points longer than `minGapS`.
   */
  async findGaps(expr: string, options: FindGapsOptions): Promise<GapReport> {
    const minGapS = options.minGapS ?? 60;
    const step = parseDuration(options.step);
    if (minGapS < step) {
      throw new InvalidArgumentError(`minGapS (${minGapS}) must not be below the step (${step})`);
    }
    const result = await this.engine.rangeQuery(expr, {
      start: options.start,
      end: options.end,
      step,
      signal: options.signal,
    });

    const gaps: Gap[] = [];
    for (const series of result.series) {
      for (let i = 1; i < series.points.length; i++) {
        const prev = series.points[i - 1];
        const cur = series.points[i];
        if (prev === undefined || cur === undefined) continue;
        const durationS = cur[0] - prev[0];
        if (durationS > minGapS) {
          gaps.push({ metric: series.metric, from: prev[0], to: cur[0], durationS });
        }
      }
    }
    return { seriesChecked: result.series.length, gaps };
  }
}
