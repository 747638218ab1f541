// SPDX-License-Identifier: MIT
/**
 * Configuration for the vm-cli client.
 */

import type { RetryConfig, PartialRetryConfig } from './retry.js';
import { DEFAULT_RETRY_CONFIG, mergeRetryConfig } from './retry.js';

/**
 * Authentication applied to every request.
 */
export type AuthConfig =
  | { type: 'none' }
  | { type: 'basic'; username: string; password: string }
  | { type: 'bearer'; token: string };

/**
 * Terminal output format for query results.
 */
export type OutputFormat = 'table' | 'json' | 'yaml' | 'csv';

/**
 * Output preferences, consumed by the CLI renderer.
 */
export interface OutputConfig {
  format: OutputFormat;
  color: boolean;
  pretty: boolean;
}

/**
 * Cluster topology. Its presence switches the resolver into cluster mode.
 */
export interface ClusterConfig {
  /** Prefix query paths with `/select/{account}/{project}/prometheus` (default: false). */
  useSelectEndpoint: boolean;
  /** Tenant account ID (default: "0"). */
  selectAccountId: string;
  /** Tenant project ID (default: "0"). */
  selectProjectId: string;
  /** vminsert base URL; ingest falls back to `host` when unset. */
  vminsertHost?: string | undefined;
  /** vmstorage base URL; required for snapshot operations. */
  vmstorageHost?: string | undefined;
}

/**
 * Export and import defaults.
 */
export interface ExportConfig {
  /** Format used when none is given (default: "prometheus"). */
  defaultFormat: string;
  /** Upper bound of samples per exported chunk (default: 1000). */
  chunkSize: number;
  /** Width of the first export window in seconds (default: 3600). */
  windowS: number;
  /** Step used for range-mode exports (default: "1m"). */
  step: string;
}

/**
 * Import defaults.
 */
export interface ImportConfig {
  /** Upper bound of samples per ingest request (default: 1000). */
  batchSize: number;
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  level: LogLevelName;
  /** Append log entries as JSON lines to this file. */
  file?: string | undefined;
}

/**
 * Complete client configuration. Immutable once resolved.
 */
export interface ClientConfig {
  /** Base URL of the standalone server or vmselect. */
  host: string;
  /** Per-request timeout in seconds (default: 30). */
  timeoutS: number;
  auth: AuthConfig;
  output: OutputConfig;
  cluster?: ClusterConfig | undefined;
  export: ExportConfig;
  import: ImportConfig;
  retry: RetryConfig;
  logging: LoggingConfig;
  /** Accept self-signed TLS certificates (default: false). */
  tlsInsecure: boolean;
}

/**
 * Partial client configuration for overrides.
 */
export interface PartialClientConfig {
  host?: string;
  timeoutS?: number;
  auth?: AuthConfig;
  output?: Partial<OutputConfig>;
  cluster?: Partial<ClusterConfig> | undefined;
  export?: Partial<ExportConfig>;
  import?: Partial<ImportConfig>;
  retry?: PartialRetryConfig;
  logging?: Partial<LoggingConfig>;
  tlsInsecure?: boolean;
}

export const DEFAULT_HOST = 'http://localhost:8428';

export const DEFAULT_OUTPUT_CONFIG: OutputConfig = {
  format: 'table',
  color: true,
  pretty: true,
};

export const DEFAULT_CLUSTER_CONFIG: ClusterConfig = {
  useSelectEndpoint: false,
  selectAccountId: '0',
  selectProjectId: '0',
};

export const DEFAULT_EXPORT_CONFIG: ExportConfig = {
  defaultFormat: 'prometheus',
  chunkSize: 1000,
  windowS: 3600,
  step: '1m',
};

export const DEFAULT_IMPORT_CONFIG: ImportConfig = {
  batchSize: 1000,
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: 'info',
};

/**
 * Default client configuration.
 */
export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  host: DEFAULT_HOST,
  timeoutS: 30,
  auth: { type: 'none' },
  output: DEFAULT_OUTPUT_CONFIG,
  export: DEFAULT_EXPORT_CONFIG,
  import: DEFAULT_IMPORT_CONFIG,
  retry: DEFAULT_RETRY_CONFIG,
  logging: DEFAULT_LOGGING_CONFIG,
  tlsInsecure: false,
};

/**
 * Merge partial config with defaults. The result is frozen.
 */
export function mergeClientConfig(partial: PartialClientConfig = {}): ClientConfig {
  const config: ClientConfig = {
    host: partial.host ?? DEFAULT_HOST,
    timeoutS: partial.timeoutS ?? DEFAULT_CLIENT_CONFIG.timeoutS,
    auth: partial.auth ?? { type: 'none' },
    output: { ...DEFAULT_OUTPUT_CONFIG, ...partial.output },
    cluster: partial.cluster ? { ...DEFAULT_CLUSTER_CONFIG, ...partial.cluster } : undefined,
    export: { ...DEFAULT_EXPORT_CONFIG, ...partial.export },
    import: { ...DEFAULT_IMPORT_CONFIG, ...partial.import },
    retry: mergeRetryConfig(partial.retry ?? {}),
    logging: { ...DEFAULT_LOGGING_CONFIG, ...partial.logging },
    tlsInsecure: partial.tlsInsecure ?? false,
  };
  return deepFreeze(config);
}

/**
 * Create a configuration with retry disabled.
 */
export function noRetryConfig(partial: PartialClientConfig = {}): ClientConfig {
  return mergeClientConfig({ ...partial, retry: { ...partial.retry, maxAttempts: 1 } });
}

/**
 * Create a configuration for fast failure detection.
 */
export function fastFailConfig(partial: PartialClientConfig = {}): ClientConfig {
  return mergeClientConfig({
    ...partial,
    timeoutS: 5,
    retry: { ...partial.retry, maxAttempts: 1 },
  });
}

/**
 * Create a configuration for high-latency environments.
 */
export function highLatencyConfig(partial: PartialClientConfig = {}): ClientConfig {
  return mergeClientConfig({
    ...partial,
    timeoutS: 120,
    retry: {
      ...partial.retry,
      maxAttempts: 5,
      initialBackoffMs: 500,
    },
  });
}

/**
 * Whether the configuration describes a clustered deployment.
 */
export function isClusterMode(config: ClientConfig): boolean {
  return config.cluster !== undefined;
}

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}
