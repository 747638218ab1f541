// SPDX-License-Identifier: MIT
import type { WriteStream } from 'node:fs';
import { open } from 'node:fs/promises';
import { finished } from 'node:stream/promises';
import { Command } from 'commander';
import { formatFromPath, getCodec } from '../../codecs/index.js';
import type { ExportMode } from '../../export.js';
import { writableSink } from '../../export.js';
import { parseTimeRange } from '../../time.js';
import { ExportError, InvalidArgumentError } from '../../types/errors.js';
import type { ExportProgress } from '../../types/pipeline.js';
import type { CliContext } from '../context.js';
import { withSession } from '../context.js';
import { parseNonNegativeNumber, parsePositiveInt, resolveRange } from '../options.js';

interface ExportCommandOptions {
  range?: string;
  start?: string;
  end?: string;
  format?: string;
  output?: string;
  chunkSize?: number;
  step?: string;
  mode: string;
  resumeFrom?: number;
  progress?: boolean;
}

function parseMode(value: string): ExportMode {
  if (value === 'raw' || value === 'range' || value === 'auto') {
    return value;
  }
  throw new InvalidArgumentError(`Unknown export mode "${value}" (expected raw, range or auto)`);
}

async function openOutput(path: string): Promise<WriteStream> {
  try {
    const handle = await open(path, 'w');
    return handle.createWriteStream();
  } catch (error) {
    throw new InvalidArgumentError(`Cannot write ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

function describeProgress(p: ExportProgress): string {
  const total = p.estimatedTotal !== undefined ? ` of ~${p.estimatedTotal}` : '';
  return `chunk ${p.chunkIndex + 1}: ${p.samplesInChunk} samples (${p.cumulativeSamples}${total})`;
}

export function exportCommand(ctx: CliContext): Command {
  return new Command('export')
    .description('Export series to a file or stdout')
    .argument('<selector>', 'series selector, or any expression in range mode')
    .option('-r, --range <range>', 'lookback ending now, e.g. 1h, 24h, 7d (default: 1h)')
    .option('--start <time>', 'export start')
    .option('--end <time>', 'export end (default: now)')
    .option('-f, --format <format>', 'prometheus, json, csv, yaml or jsonl (default: from --output, then config)')
    .option('-o, --output <file>', 'write to a file instead of stdout')
    .option('--chunk-size <n>', 'maximum samples per chunk', parsePositiveInt)
    .option('--step <duration>', 'evaluation step in range mode')
    .option('--mode <mode>', 'raw, range or auto', 'auto')
    .option('--resume-from <seconds>', 'continue an interrupted export from its cursor', parseNonNegativeNumber)
    .option('--progress', 'report progress on stderr')
    .action(async (selector: string, opts: ExportCommandOptions, command: Command) => {
      await withSession(ctx, command, async ({ client, config, colors, err }) => {
        const range = resolveRange(opts) ?? parseTimeRange('1h');
        const format =
          opts.format ?? (opts.output !== undefined ? formatFromPath(opts.output) : undefined) ?? config.export.defaultFormat;
        const mode = parseMode(opts.mode);
        // fail before creating the output file
        getCodec(format);

        const file = opts.output !== undefined ? await openOutput(opts.output) : undefined;
        try {
          const summary = await client.export({
            expr: selector,
            start: range.start,
            end: range.end,
            format,
            mode,
            sink: writableSink(file ?? ctx.stdout),
            signal: ctx.signal,
            ...(opts.chunkSize !== undefined && { chunkSize: opts.chunkSize }),
            ...(opts.step !== undefined && { step: opts.step }),
            ...(opts.resumeFrom !== undefined && { resumeFrom: opts.resumeFrom }),
            ...(opts.progress === true && { onProgress: (p: ExportProgress) => err(describeProgress(p)) }),
          });
          const target = opts.output !== undefined ? ` to ${opts.output}` : '';
          err(
            colors.green(
              `Exported ${summary.totalSamples} samples in ${summary.totalChunks} chunks${target} (${Math.round(summary.elapsedMs)}ms)`
            )
          );
        } catch (error) {
          if (error instanceof ExportError && error.summary.cursor !== undefined) {
            err(colors.yellow(`Export stopped; resume with --resume-from ${error.summary.cursor}`));
          }
          throw error;
        } finally {
          if (file !== undefined) {
            file.end();
            await finished(file);
          }
        }
      });
    });
}
