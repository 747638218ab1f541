// SPDX-License-Identifier: MIT
import type { Readable, Writable } from 'node:stream';
import { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import type { Command } from 'commander';
import type { Dispatcher } from 'undici';
import { VmClient } from '../client.js';
import type { ClientConfig, PartialClientConfig } from '../config.js';
import { loadConfig } from '../config-loader.js';
import * as log from '../logger.js';
import { parseDuration } from '../time.js';
import { ExportError, ImportError, ResolutionError, ConfigurationError, TransportError } from '../types/errors.js';

/**
 * Everything a command touches outside its arguments.
 */
export interface CliContext {
  openStdin(): Readable;
  stdout: Writable;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Aborted on Ctrl-C. */
  signal: AbortSignal;
  /** Route requests through this dispatcher instead of the network. */
  dispatcher?: Dispatcher;
  /** Set by a command that finished without error but should not exit 0. */
  exitCode?: number;
}

/**
 * Options shared by every command.
 */
export interface GlobalOptions {
  host?: string;
  timeout?: string;
  config?: string;
  verbose?: boolean;
  color?: boolean;
}

/**
 * A configured client plus presentation settings for one command run.
 */
export interface Session {
  client: VmClient;
  config: ClientConfig;
  colors: ChalkInstance;
  out(text: string): void;
  err(text: string): void;
}

export function print(stream: Writable, text: string): void {
  stream.write(text.endsWith('\n') ? text : `${text}\n`);
}

function overridesFrom(globals: GlobalOptions): PartialClientConfig {
  const overrides: PartialClientConfig = {};
  if (globals.host !== undefined) {
    overrides.host = globals.host;
  }
  if (globals.timeout !== undefined) {
    overrides.timeoutS = parseDuration(globals.timeout);
  }
  if (globals.verbose === true) {
    overrides.logging = { level: 'debug' };
  }
  if (globals.color === false) {
    overrides.output = { color: false };
  }
  return overrides;
}

/**
 * Resolve configuration, set up logging and open a client for the duration
 * of `run`. The client is closed afterwards.
 */
export async function withSession<T>(
  ctx: CliContext,
  command: Command,
  run: (session: Session) => Promise<T>
): Promise<T> {
  let root = command;
  while (root.parent !== null) {
    root = root.parent;
  }
  const globals = root.opts<GlobalOptions>();
  const loadOptions = {
    env: ctx.env,
    cwd: ctx.cwd,
    overrides: overridesFrom(globals),
    ...(globals.config !== undefined && { path: globals.config }),
  };
  const { config, source } = await loadConfig(loadOptions);

  log.setLogLevel(config.logging.level);
  const detach = config.logging.file !== undefined ? log.attachLogFile(config.logging.file) : undefined;
  if (source !== undefined) {
    log.debug('Using config file', { path: source });
  }

  const client = VmClient.create(
    ctx.dispatcher !== undefined ? { config, dispatcher: ctx.dispatcher } : { config }
  );
  const colors = new Chalk({ level: config.output.color ? 1 : 0 });
  try {
    return await run({
      client,
      config,
      colors,
      out: (text) => print(ctx.stdout, text),
      err: (text) => print(ctx.stderr, text),
    });
  } finally {
    await client.close();
    detach?.();
  }
}

/**
 * Process exit code for an error: 2 for configuration problems, 130 for
 * cancellation, 1 otherwise.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError || error instanceof ResolutionError) {
    return 2;
  }
  if (
    (error instanceof TransportError && error.kind === 'cancelled') ||
    (error instanceof ExportError && error.kind === 'cancelled') ||
    (error instanceof ImportError && error.kind === 'cancelled')
  ) {
    return 130;
  }
  return 1;
}
