// SPDX-License-Identifier: MIT
import { Command } from 'commander';
import type { OutputFormat } from '../../config.js';
import { formatDuration } from '../../time.js';
import { InvalidArgumentError } from '../../types/errors.js';
import type { CliContext } from '../context.js';
import { withSession } from '../context.js';
import { parseOutputFormat, renderRecord, renderTable } from '../render.js';

interface DeleteCommandOptions {
  start?: string;
  end?: string;
  yes?: boolean;
}

interface FlagsCommandOptions {
  filter?: string;
  format?: OutputFormat;
}

function deleteCommand(ctx: CliContext): Command {
  return new Command('delete')
    .description('Delete every series matching the selectors')
    .argument('<selectors...>', 'series selectors, e.g. \'up{job="old"}\'')
    .option('--start <time>', 'only delete samples after this time')
    .option('--end <time>', 'only delete samples before this time')
    .option('-y, --yes', 'confirm the deletion')
    .action(async (selectors: string[], opts: DeleteCommandOptions, command: Command) => {
      if (opts.yes !== true) {
        throw new InvalidArgumentError('Deleting series cannot be undone; pass --yes to confirm.');
      }
      await withSession(ctx, command, async ({ client, colors, out }) => {
        await client.admin.deleteSeries(selectors, {
          signal: ctx.signal,
          ...(opts.start !== undefined && { start: opts.start }),
          ...(opts.end !== undefined && { end: opts.end }),
        });
        out(colors.green(`Deleted series matching ${selectors.join(', ')}`));
      });
    });
}

function snapshotCommand(ctx: CliContext): Command {
  const snapshot = new Command('snapshot').description('Manage storage snapshots');

  snapshot
    .command('create')
    .description('Create a snapshot')
    .action(async (_opts: unknown, command: Command) => {
      await withSession(ctx, command, async ({ client, out }) => {
        out(await client.admin.createSnapshot(ctx.signal));
      });
    });

  snapshot
    .command('list')
    .description('List snapshots')
    .action(async (_opts: unknown, command: Command) => {
      await withSession(ctx, command, async ({ client, colors, out }) => {
        const snapshots = await client.admin.listSnapshots(ctx.signal);
        if (snapshots.length === 0) {
          out(colors.yellow('No snapshots'));
          return;
        }
        const rows = snapshots.map((s) => [s.name, s.createdAt ?? '', s.size ?? '', s.status ?? '']);
        out(renderTable(['name', 'created', 'size', 'status'], rows, colors));
      });
    });

  snapshot
    .command('delete')
    .description('Delete a snapshot')
    .argument('<name>', 'snapshot name')
    .action(async (name: string, _opts: unknown, command: Command) => {
      await withSession(ctx, command, async ({ client, colors, out }) => {
        await client.admin.deleteSnapshot(name, ctx.signal);
        out(colors.green(`Deleted snapshot ${name}`));
      });
    });

  return snapshot;
}

function retentionCommand(ctx: CliContext): Command {
  return new Command('retention')
    .description('Show the configured retention period')
    .action(async (_opts: unknown, command: Command) => {
      await withSession(ctx, command, async ({ client, out }) => {
        const retention = await client.admin.getRetention(ctx.signal);
        const readable = retention.seconds !== undefined ? ` (${formatDuration(retention.seconds)})` : '';
        out(`retentionPeriod: ${retention.period}${readable}`);
      });
    });
}

function flagsCommand(ctx: CliContext): Command {
  return new Command('flags')
    .description('Show server command-line flags')
    .option('--filter <text>', 'only flags whose name contains this text')
    .option('-f, --format <format>', 'output format: table, json, yaml, csv', parseOutputFormat)
    .action(async (opts: FlagsCommandOptions, command: Command) => {
      await withSession(ctx, command, async ({ client, config, colors, out }) => {
        const flags = await client.admin.getFlags(ctx.signal);
        const needle = opts.filter?.toLowerCase();
        const shown = Object.fromEntries(
          Object.entries(flags)
            .filter(([name]) => needle === undefined || name.toLowerCase().includes(needle))
            .sort(([a], [b]) => a.localeCompare(b))
        );
        out(renderRecord(shown, { format: opts.format ?? config.output.format, colors, pretty: config.output.pretty }));
      });
    });
}

export function adminCommand(ctx: CliContext): Command {
  return new Command('admin')
    .description('Administrative operations')
    .addCommand(deleteCommand(ctx))
    .addCommand(snapshotCommand(ctx))
    .addCommand(retentionCommand(ctx))
    .addCommand(flagsCommand(ctx));
}
