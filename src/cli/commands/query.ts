// SPDX-License-Identifier: MIT
import { Command } from 'commander';
import type { OutputFormat } from '../../config.js';
import { InvalidArgumentError } from '../../types/errors.js';
import type { CliContext } from '../context.js';
import { withSession } from '../context.js';
import { resolveRange } from '../options.js';
import { formatSeriesName, parseOutputFormat, renderQueryResult } from '../render.js';

interface QueryCommandOptions {
  time?: string;
  range?: string;
  start?: string;
  end?: string;
  step: string;
  format?: OutputFormat;
  count?: boolean;
  metricsOnly?: boolean;
}

export function queryCommand(ctx: CliContext): Command {
  return new Command('query')
    .description('Run a PromQL/MetricsQL query')
    .argument('<expr>', 'query expression')
    .option('--time <time>', 'evaluation time of an instant query')
    .option('-r, --range <range>', 'run a range query over this lookback, e.g. 1h, 24h, 7d')
    .option('--start <time>', 'range query start')
    .option('--end <time>', 'range query end (default: now)')
    .option('--step <duration>', 'range query step', '1m')
    .option('-f, --format <format>', 'output format: table, json, yaml, csv', parseOutputFormat)
    .option('--count', 'print the number of series only')
    .option('--metrics-only', 'print the series label sets only')
    .action(async (expr: string, opts: QueryCommandOptions, command: Command) => {
      await withSession(ctx, command, async (session) => {
        const range = resolveRange(opts);
        if (range !== undefined && opts.time !== undefined) {
          throw new InvalidArgumentError('--time applies to instant queries only.');
        }
        const result =
          range !== undefined
            ? await session.client.queryRange(expr, { ...range, step: opts.step, signal: ctx.signal })
            : await session.client.query(expr, { time: opts.time, signal: ctx.signal });

        if (opts.count === true) {
          session.out(String(result.series.length));
          return;
        }
        if (opts.metricsOnly === true) {
          session.out(result.series.map((s) => formatSeriesName(s.metric)).join('\n'));
          return;
        }
        session.out(
          renderQueryResult(result, {
            format: opts.format ?? session.config.output.format,
            colors: session.colors,
            pretty: session.config.output.pretty,
          })
        );
      });
    });
}
