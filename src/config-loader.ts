// SPDX-License-Identifier: MIT
/**
 * Resolves a `ClientConfig` from a config file, environment variables and
 * explicit overrides, in that order of precedence (lowest first).
 */
import { access, readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { extname, join, resolve } from 'node:path';
import yaml from 'js-yaml';
import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';
import type { AuthConfig, ClientConfig, PartialClientConfig } from './config.js';
import { mergeClientConfig } from './config.js';
import * as log from './logger.js';
import { parseDuration } from './time.js';
import { ConfigurationError } from './types/errors.js';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
const idSchema = z.union([z.string(), z.number().int().nonnegative()]).transform(String);

/**
 * On-disk shape. Keys are snake_case.
 */
const fileSchema = z.object({
  host: z.string().optional(),
  timeout: z.number().positive().optional(),
  auth: z
    .object({
      username: z.string().optional(),
      password: z.string().optional(),
      token: z.string().optional(),
    })
    .optional(),
  output: z
    .object({
      format: z.enum(['table', 'json', 'yaml', 'csv']).optional(),
      color: z.boolean().optional(),
      pretty: z.boolean().optional(),
    })
    .optional(),
  cluster: z
    .object({
      use_select_endpoint: z.boolean().optional(),
      select_account_id: idSchema.optional(),
      select_project_id: idSchema.optional(),
      vminsert_host: z.string().optional(),
      vmstorage_host: z.string().optional(),
    })
    .optional(),
  export: z
    .object({
      default_format: z.string().optional(),
      chunk_size: z.number().int().positive().optional(),
      window: z.union([z.string(), z.number().positive()]).optional(),
      step: z.string().optional(),
    })
    .optional(),
  import: z
    .object({
      batch_size: z.number().int().positive().optional(),
    })
    .optional(),
  retry: z
    .object({
      max_attempts: z.number().int().positive().optional(),
      initial_backoff_ms: z.number().nonnegative().optional(),
      max_backoff_ms: z.number().nonnegative().optional(),
      backoff_multiplier: z.number().positive().optional(),
      jitter: z.boolean().optional(),
    })
    .optional(),
  logging: z
    .object({
      level: logLevelSchema.optional(),
      file: z.string().optional(),
    })
    .optional(),
  tls_insecure: z.boolean().optional(),
});

export type ConfigFile = z.infer<typeof fileSchema>;

/**
 * Checks applied to the merged result.
 */
const resolvedSchema = z.object({
  host: z.string().url(),
  timeoutS: z.number().positive(),
  export: z.object({
    chunkSize: z.number().int().positive(),
    windowS: z.number().positive(),
    step: z.string().min(1),
  }),
  import: z.object({ batchSize: z.number().int().positive() }),
  retry: z.object({
    maxAttempts: z.number().int().positive(),
    initialBackoffMs: z.number().nonnegative(),
    maxBackoffMs: z.number().nonnegative(),
    backoffMultiplier: z.number().positive(),
  }),
  cluster: z
    .object({
      vminsertHost: z.string().url().optional(),
      vmstorageHost: z.string().url().optional(),
    })
    .optional(),
});

export interface LoadConfigOptions {
  /** Explicit config file; must exist. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Highest-precedence values, typically from command-line flags. */
  overrides?: PartialClientConfig;
}

export interface LoadedConfig {
  config: ClientConfig;
  /** The file that was read, if any. */
  source: string | undefined;
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join('.') : '(root)'}: ${i.message}`);
}

function authFrom(
  section: { username?: string | undefined; password?: string | undefined; token?: string | undefined },
  origin: string
): AuthConfig | undefined {
  if (section.token !== undefined && section.token !== '') {
    return { type: 'bearer', token: section.token };
  }
  if (section.username !== undefined && section.username !== '') {
    return { type: 'basic', username: section.username, password: section.password ?? '' };
  }
  if (section.password !== undefined && section.password !== '') {
    throw new ConfigurationError(`Invalid ${origin}`, ['auth.password: set without a username']);
  }
  return undefined;
}

function durationSeconds(value: string | number, path: string): number {
  try {
    return parseDuration(value);
  } catch (err) {
    throw new ConfigurationError('Invalid configuration', [
      `${path}: ${err instanceof Error ? err.message : String(err)}`,
    ]);
  }
}

/**
 * Convert a validated file into partial config.
 */
export function fromConfigFile(file: ConfigFile): PartialClientConfig {
  const partial: PartialClientConfig = {};
  if (file.host !== undefined) partial.host = file.host;
  if (file.timeout !== undefined) partial.timeoutS = file.timeout;
  if (file.auth !== undefined) {
    const auth = authFrom(file.auth, 'config file');
    if (auth !== undefined) partial.auth = auth;
  }
  if (file.output !== undefined) {
    partial.output = {
      ...(file.output.format !== undefined && { format: file.output.format }),
      ...(file.output.color !== undefined && { color: file.output.color }),
      ...(file.output.pretty !== undefined && { pretty: file.output.pretty }),
    };
  }
  if (file.cluster !== undefined) {
    const c = file.cluster;
    partial.cluster = {
      ...(c.use_select_endpoint !== undefined && { useSelectEndpoint: c.use_select_endpoint }),
      ...(c.select_account_id !== undefined && { selectAccountId: c.select_account_id }),
      ...(c.select_project_id !== undefined && { selectProjectId: c.select_project_id }),
      ...(c.vminsert_host !== undefined && { vminsertHost: c.vminsert_host }),
      ...(c.vmstorage_host !== undefined && { vmstorageHost: c.vmstorage_host }),
    };
  }
  if (file.export !== undefined) {
    const e = file.export;
    partial.export = {
      ...(e.default_format !== undefined && { defaultFormat: e.default_format }),
      ...(e.chunk_size !== undefined && { chunkSize: e.chunk_size }),
      ...(e.window !== undefined && { windowS: durationSeconds(e.window, 'export.window') }),
      ...(e.step !== undefined && { step: e.step }),
    };
  }
  if (file.import?.batch_size !== undefined) {
    partial.import = { batchSize: file.import.batch_size };
  }
  if (file.retry !== undefined) {
    const r = file.retry;
    partial.retry = {
      ...(r.max_attempts !== undefined && { maxAttempts: r.max_attempts }),
      ...(r.initial_backoff_ms !== undefined && { initialBackoffMs: r.initial_backoff_ms }),
      ...(r.max_backoff_ms !== undefined && { maxBackoffMs: r.max_backoff_ms }),
      ...(r.backoff_multiplier !== undefined && { backoffMultiplier: r.backoff_multiplier }),
      ...(r.jitter !== undefined && { jitter: r.jitter }),
    };
  }
  if (file.logging !== undefined) {
    partial.logging = {
      ...(file.logging.level !== undefined && { level: file.logging.level }),
      ...(file.logging.file !== undefined && { file: file.logging.file }),
    };
  }
  if (file.tls_insecure !== undefined) partial.tlsInsecure = file.tls_insecure;
  return partial;
}

/**
 * Partial config from `VM_*` environment variables.
 */
export function fromEnv(env: NodeJS.ProcessEnv): PartialClientConfig {
  const partial: PartialClientConfig = {};
  const host = env['VM_HOST'];
  if (host !== undefined && host !== '') {
    partial.host = host;
  }
  const timeout = env['VM_TIMEOUT'];
  if (timeout !== undefined && timeout !== '') {
    partial.timeoutS = durationSeconds(timeout, 'VM_TIMEOUT');
  }
  const auth = authFrom(
    { username: env['VM_USERNAME'], password: env['VM_PASSWORD'], token: env['VM_TOKEN'] },
    'environment'
  );
  if (auth !== undefined) {
    partial.auth = auth;
  }
  const verbose = env['VM_VERBOSE'];
  const level = env['VM_LOG_LEVEL']?.toLowerCase();
  if (verbose === '1' || verbose === 'true') {
    partial.logging = { level: 'debug' };
  } else if (level !== undefined && level !== '') {
    const parsed = logLevelSchema.safeParse(level);
    if (!parsed.success) {
      throw new ConfigurationError('Invalid environment', [`VM_LOG_LEVEL: unknown level "${level}"`]);
    }
    partial.logging = { level: parsed.data };
  }
  return partial;
}

/**
 * Merge partial configs, later ones winning, section by section.
 */
export function layerConfigs(...layers: PartialClientConfig[]): PartialClientConfig {
  const out: PartialClientConfig = {};
  for (const layer of layers) {
    if (layer.host !== undefined) out.host = layer.host;
    if (layer.timeoutS !== undefined) out.timeoutS = layer.timeoutS;
    if (layer.auth !== undefined) out.auth = layer.auth;
    if (layer.tlsInsecure !== undefined) out.tlsInsecure = layer.tlsInsecure;
    if (layer.output !== undefined) out.output = { ...out.output, ...layer.output };
    if (layer.cluster !== undefined) out.cluster = { ...out.cluster, ...layer.cluster };
    if (layer.export !== undefined) out.export = { ...out.export, ...layer.export };
    if (layer.import !== undefined) out.import = { ...out.import, ...layer.import };
    if (layer.retry !== undefined) out.retry = { ...out.retry, ...layer.retry };
    if (layer.logging !== undefined) out.logging = { ...out.logging, ...layer.logging };
  }
  return out;
}

/**
 * Candidate config files in lookup order.
 */
export function configCandidates(env: NodeJS.ProcessEnv, cwd: string): string[] {
  const xdg = env['XDG_CONFIG_HOME'];
  const configHome = xdg !== undefined && xdg !== '' ? xdg : join(env['HOME'] ?? homedir(), '.config');
  return [
    join(configHome, 'vm-cli', 'config.toml'),
    join(configHome, 'vm-cli', 'config.yaml'),
    join(cwd, '.vm-cli.toml'),
    join(cwd, 'vm-cli.toml'),
    join(cwd, '.vm-cli.yaml'),
    join(cwd, 'vm-cli.yaml'),
    join(cwd, 'vm-cli.json'),
  ];
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function parseByExtension(text: string, path: string): unknown {
  switch (extname(path).toLowerCase()) {
    case '.json':
      return JSON.parse(text);
    case '.toml':
      return parseToml(text);
    default:
      return yaml.load(text);
  }
}

/**
 * Parse config file text. `.json` and `.toml` files are read by extension,
 * anything else as YAML. Unknown keys are ignored.
 *
 * @throws ConfigurationError
 */
export function parseConfigText(text: string, path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parseByExtension(text, path);
  } catch (err) {
    throw new ConfigurationError(`Cannot parse ${path}`, [err instanceof Error ? err.message : String(err)]);
  }
  if (raw === undefined || raw === null) {
    return {};
  }
  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config file ${path}`, issuesOf(parsed.error));
  }
  return parsed.data;
}

/**
 * Validate a merged configuration.
 *
 * @throws ConfigurationError listing every offending path.
 */
export function validateConfig(config: ClientConfig): ClientConfig {
  const result = resolvedSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigurationError('Invalid configuration', issuesOf(result.error));
  }
  return config;
}

/**
 * Resolve the configuration: defaults, then the first config file found,
 * then `VM_*` environment variables, then `overrides`.
 *
 * @throws ConfigurationError
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let source: string | undefined;
  if (options.path !== undefined) {
    source = resolve(cwd, options.path);
    if (!(await exists(source))) {
      throw new ConfigurationError(`Config file not found: ${source}`);
    }
  } else {
    for (const candidate of configCandidates(env, cwd)) {
      if (await exists(candidate)) {
        source = candidate;
        break;
      }
    }
  }

  let fromFile: PartialClientConfig = {};
  if (source !== undefined) {
    const text = await readFile(source, 'utf8');
    fromFile = fromConfigFile(parseConfigText(text, source));
    log.debug('Loaded config file', { path: source });
  }

  const merged = mergeClientConfig(layerConfigs(fromFile, fromEnv(env), options.overrides ?? {}));
  return { config: validateConfig(merged), source };
}
