// SPDX-License-Identifier: MIT
import { Command } from 'commander';
import type { OutputFormat } from '../../config.js';
import { parseTimeRange } from '../../time.js';
import type { CliContext } from '../context.js';
import { withSession } from '../context.js';
import { parseNonNegativeNumber, parsePositiveInt, resolveRange } from '../options.js';
import {
  formatMs,
  formatPercentage,
  formatSeriesName,
  parseOutputFormat,
  renderRecord,
  renderTable,
} from '../render.js';

interface MetricsCommandOptions {
  top: number;
}

interface PerformanceCommandOptions {
  query: string;
  count: number;
}

interface GapsCommandOptions {
  range?: string;
  start?: string;
  end?: string;
  step: string;
  minGap: number;
}

interface BuildInfoCommandOptions {
  format?: OutputFormat;
}

function metricsCommand(ctx: CliContext): Command {
  return new Command('metrics')
    .description('Count metric names and rank their prefixes')
    .argument('[pattern]', 'list names containing this text')
    .option('--top <n>', 'number of prefixes to show', parsePositiveInt, 10)
    .action(async (pattern: string | undefined, opts: MetricsCommandOptions, command: Command) => {
      await withSession(ctx, command, async ({ client, colors, out }) => {
        const stats = await client.diagnostics.metricStats(pattern, opts.top, ctx.signal);
        out(`Total metric names: ${stats.total}`);
        if (stats.pattern !== undefined) {
          out(`Matching "${stats.pattern}": ${stats.matching.length}`);
          for (const name of stats.matching) {
            out(`  ${name}`);
          }
        }
        if (stats.topPrefixes.length > 0) {
          const rows = stats.topPrefixes.map((p) => [
            p.prefix,
            String(p.count),
            formatPercentage(p.count, stats.total),
          ]);
          out(renderTable(['prefix', 'count', 'share'], rows, colors));
        }
      });
    });
}

function performanceCommand(ctx: CliContext): Command {
  return new Command('performance')
    .description('Measure instant query latency')
    .option('-q, --query <expr>', 'query to run', 'up')
    .option('-n, --count <n>', 'number of runs', parsePositiveInt, 10)
    .action(async (opts: PerformanceCommandOptions, command: Command) => {
      await withSession(ctx, command, async ({ client, colors, out }) => {
        const report = await client.diagnostics.benchmark(opts.query, opts.count, { signal: ctx.signal });
        const rows = report.iterations.map((it) => [
          String(it.iteration),
          formatMs(it.latencyMs),
          it.ok ? 'ok' : `failed: ${it.error ?? 'unknown error'}`,
        ]);
        out(renderTable(['run', 'latency', 'result'], rows, colors));
        out(`Succeeded: ${report.succeeded}/${report.iterations.length}`);
        if (report.minMs !== undefined && report.avgMs !== undefined && report.maxMs !== undefined && report.p95Ms !== undefined) {
          out(
            `min ${formatMs(report.minMs)}  avg ${formatMs(report.avgMs)}  max ${formatMs(report.maxMs)}  p95 ${formatMs(report.p95Ms)}`
          );
        }
        if (report.failed > 0) {
          ctx.exitCode = 1;
        }
      });
    });
}

function gapsCommand(ctx: CliContext): Command {
  return new Command('gaps')
    .description('Find gaps in series data')
    .argument('<expr>', 'series selector or expression')
    .option('-r, --range <range>', 'lookback ending now (default: 24h)')
    .option('--start <time>', 'range start')
    .option('--end <time>', 'range end (default: now)')
    .option('--step <duration>', 'query step', '1m')
    .option('--min-gap <seconds>', 'report gaps longer than this', parseNonNegativeNumber, 60)
    .action(async (expr: string, opts: GapsCommandOptions, command: Command) => {
      await withSession(ctx, command, async ({ client, colors, out }) => {
        const range = resolveRange(opts) ?? parseTimeRange('24h');
        const report = await client.diagnostics.findGaps(expr, {
          ...range,
          step: opts.step,
          minGapS: opts.minGap,
          signal: ctx.signal,
        });
        if (report.gaps.length === 0) {
          out(colors.green(`No gaps in ${report.seriesChecked} series`));
          return;
        }
        const rows = report.gaps.map((g) => [
          formatSeriesName(g.metric),
          new Date(g.from * 1000).toISOString(),
          new Date(g.to * 1000).toISOString(),
          `${g.durationS}s`,
        ]);
        out(renderTable(['series', 'from', 'to', 'gap'], rows, colors));
        out(colors.yellow(`${report.gaps.length} gaps in ${report.seriesChecked} series`));
      });
    });
}

function buildInfoCommand(ctx: CliContext): Command {
  return new Command('buildinfo')
    .description('Show server build information')
    .option('-f, --format <format>', 'output format: table, json, yaml, csv', parseOutputFormat)
    .action(async (opts: BuildInfoCommandOptions, command: Command) => {
      await withSession(ctx, command, async ({ client, config, colors, out }) => {
        const info = await client.admin.buildInfo(ctx.signal);
        out(renderRecord(info, { format: opts.format ?? config.output.format, colors, pretty: config.output.pretty }));
      });
    });
}

export function debugCommand(ctx: CliContext): Command {
  return new Command('debug')
    .description('Diagnostics')
    .addCommand(metricsCommand(ctx))
    .addCommand(performanceCommand(ctx))
    .addCommand(gapsCommand(ctx))
    .addCommand(buildInfoCommand(ctx));
}
