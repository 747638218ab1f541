// SPDX-License-Identifier: MIT
import chalk from 'chalk';
import { Command, CommanderError } from 'commander';
import { VERSION } from '../version.js';
import { VmError } from '../types/errors.js';
import { adminCommand } from './commands/admin.js';
import { debugCommand } from './commands/debug.js';
import { exportCommand } from './commands/export.js';
import { healthCommand } from './commands/health.js';
import { importCommand } from './commands/import.js';
import { queryCommand } from './commands/query.js';
import type { CliContext } from './context.js';
import { exitCodeFor, print } from './context.js';

/**
 * Build the `vm-cli` command tree. Global options must precede the command.
 */
export function buildProgram(ctx: CliContext): Command {
  const program = new Command('vm-cli')
    .description('Query, export and import VictoriaMetrics data')
    .version(VERSION)
    .option('--host <url>', 'server URL (default: $VM_HOST or http://localhost:8428)')
    .option('--timeout <duration>', 'request timeout, e.g. 30s')
    .option('-c, --config <path>', 'configuration file')
    .option('-v, --verbose', 'debug logging')
    .option('--no-color', 'disable colours')
    .enablePositionalOptions();

  for (const command of [
    queryCommand(ctx),
    healthCommand(ctx),
    exportCommand(ctx),
    importCommand(ctx),
    adminCommand(ctx),
    debugCommand(ctx),
  ]) {
    program.addCommand(command);
  }
  applySettings(program, ctx);
  return program;
}

/**
 * `addCommand` does not pass settings down, so apply them to the whole tree.
 */
function applySettings(command: Command, ctx: CliContext): void {
  command.exitOverride().configureOutput({
    writeOut: (text) => ctx.stdout.write(text),
    writeErr: (text) => ctx.stderr.write(text),
  });
  for (const sub of command.commands) {
    applySettings(sub, ctx);
  }
}

function describeError(error: unknown): string {
  if (error instanceof VmError) {
    return error.toString();
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parse `argv` (without the node and script entries) and run the command.
 *
 * @returns The process exit code.
 */
export async function run(argv: readonly string[], ctx: CliContext): Promise<number> {
  const program = buildProgram(ctx);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return ctx.exitCode ?? 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // help, version and usage errors; commander already printed them
      return error.exitCode;
    }
    const useColor = program.opts<{ color?: boolean }>().color !== false;
    const message = describeError(error);
    print(ctx.stderr, useColor ? chalk.red(message) : message);
    return exitCodeFor(error);
  }
}
