// SPDX-License-Identifier: MIT
import { Command } from 'commander';
import type { CliContext } from '../context.js';
import { withSession } from '../context.js';
import { renderTable } from '../render.js';

interface HealthCommandOptions {
  verbose?: boolean;
  statusOnly?: boolean;
}

export function healthCommand(ctx: CliContext): Command {
  return new Command('health')
    .description('Check server health')
    .option('-v, --verbose', 'also probe a query and the metric-name listing')
    .option('--status-only', 'print the status word only')
    .action(async (opts: HealthCommandOptions, command: Command) => {
      await withSession(ctx, command, async ({ client, colors, out }) => {
        if (opts.verbose === true) {
          const result = await client.health.extendedCheck(ctx.signal);
          if (opts.statusOnly === true) {
            out(result.healthy ? 'OK' : 'UNHEALTHY');
          } else {
            const rows = result.probes.map((p) => [
              p.name,
              p.ok ? 'ok' : 'failed',
              `${p.latencyMs}ms`,
              p.detail,
            ]);
            out(renderTable(['probe', 'result', 'latency', 'detail'], rows, colors));
          }
          if (!result.healthy) ctx.exitCode = 1;
          return;
        }

        const result = await client.health.check(ctx.signal);
        if (opts.statusOnly === true) {
          out(result.status);
        } else if (result.healthy) {
          out(`${colors.green('✓')} ${client.clientConfig.host} is healthy (${result.latencyMs}ms)`);
        } else {
          out(`${colors.red('✗')} ${client.clientConfig.host} answered "${result.raw}"`);
        }
        if (!result.healthy) ctx.exitCode = 1;
      });
    });
}
