// SPDX-License-Identifier: MIT
import { Command } from 'commander';
import { formatFromPath } from '../../codecs/index.js';
import type { TextSource } from '../../codecs/types.js';
import { fileSource } from '../../import.js';
import type { ImportProgress, ImportSummary } from '../../types/pipeline.js';
import type { CliContext, Session } from '../context.js';
import { withSession } from '../context.js';
import { parsePositiveInt } from '../options.js';

interface ImportCommandOptions {
  format?: string;
  dryRun?: boolean;
  skipErrors?: boolean;
  batchSize?: number;
  progress?: boolean;
}

/** Skipped records listed after an import; the rest are only counted. */
const SHOWN_ERRORS = 10;

function reportSummary(summary: ImportSummary, { colors, err }: Session): void {
  const headline = summary.dryRun
    ? `Dry run: ${summary.samplesIngested} samples in ${summary.batchesSent} batches would be sent`
    : `Imported ${summary.samplesIngested} samples in ${summary.batchesSent} batches (${Math.round(summary.elapsedMs)}ms)`;
  err(colors.green(headline));

  if (summary.samplesSkipped > 0) {
    err(colors.yellow(`Skipped ${summary.samplesSkipped} invalid records`));
    for (const record of summary.errors.slice(0, SHOWN_ERRORS)) {
      err(`  line ${record.line}: ${record.reason}`);
    }
    if (summary.samplesSkipped > SHOWN_ERRORS) {
      err(`  ... and ${summary.samplesSkipped - SHOWN_ERRORS} more`);
    }
  }
  for (const batch of summary.failedBatches) {
    err(colors.red(`Batch ${batch.index} (${batch.size} samples) failed: ${batch.error}`));
  }
}

function describeProgress(p: ImportProgress): string {
  const verb = p.sent ? 'sent' : 'validated';
  return `batch ${p.batchIndex + 1}: ${verb} ${p.samplesInBatch} samples (${p.cumulativeSamples} total, ${p.samplesSkipped} skipped)`;
}

export function importCommand(ctx: CliContext): Command {
  return new Command('import')
    .description('Import samples from a file, or stdin with "-"')
    .argument('<file>', 'input file')
    .option('-f, --format <format>', 'prometheus, json, csv, yaml or jsonl (default: from the extension, then config)')
    .option('--dry-run', 'validate and count without sending')
    .option('--skip-errors', 'skip invalid records and failed batches')
    .option('--batch-size <n>', 'maximum samples per request', parsePositiveInt)
    .option('--progress', 'report progress on stderr')
    .action(async (file: string, opts: ImportCommandOptions, command: Command) => {
      await withSession(ctx, command, async (session) => {
        const format = opts.format ?? formatFromPath(file) ?? session.config.export.defaultFormat;
        const source: TextSource = file === '-' ? ctx.openStdin() : fileSource(file);

        const summary = await session.client.import({
          source,
          format,
          dryRun: opts.dryRun === true,
          skipErrors: opts.skipErrors === true,
          signal: ctx.signal,
          ...(opts.batchSize !== undefined && { batchSize: opts.batchSize }),
          ...(opts.progress === true && { onProgress: (p: ImportProgress) => session.err(describeProgress(p)) }),
        });
        reportSummary(summary, session);
        if (summary.batchesFailed > 0) {
          ctx.exitCode = 1;
        }
      });
    });
}
