// SPDX-License-Identifier: MIT
/**
 * vm-cli - TypeScript SDK for VictoriaMetrics
 *
 * Query, export and import time series against a standalone server or a
 * cluster (vmselect, vminsert and vmstorage).
 *
 * @example
 * ```typescript
 * import { VmClient, memorySink } from 'vm-cli';
 *
 * const client = VmClient.create({ config: { host: 'http://localhost:8428' } });
 *
 * // Instant query
 * const result = await client.query('up');
 * for (const series of result.series) {
 *   console.log(series.metric, series.points);
 * }
 *
 * // Chunked export
 * const sink = memorySink();
 * const summary = await client.export({
 *   expr: 'up{job="node"}',
 *   start: 'now-1h',
 *   end: 'now',
 *   format: 'csv',
 *   sink,
 * });
 *
 * await client.close();
 * ```
 *
 * @packageDocumentation
 */

// Main client
export { VmClient } from './client.js';
export type { CreateOptions } from './client.js';

// Configuration
export {
  DEFAULT_HOST,
  DEFAULT_CLIENT_CONFIG,
  DEFAULT_CLUSTER_CONFIG,
  DEFAULT_EXPORT_CONFIG,
  DEFAULT_IMPORT_CONFIG,
  mergeClientConfig,
  noRetryConfig,
  fastFailConfig,
  highLatencyConfig,
  isClusterMode,
} from './config.js';
export type {
  AuthConfig,
  ClientConfig,
  PartialClientConfig,
  ClusterConfig,
  ExportConfig,
  ImportConfig,
  OutputConfig,
  OutputFormat,
  LoggingConfig,
} from './config.js';
export { loadConfig, fromEnv, fromConfigFile, configCandidates, parseConfigText } from './config-loader.js';
export type { LoadConfigOptions, LoadedConfig, ConfigFile } from './config-loader.js';

// Retry
export { DEFAULT_RETRY_CONFIG, mergeRetryConfig, withRetry, calculateBackoff } from './retry.js';
export type { RetryConfig, PartialRetryConfig, RetryOptions } from './retry.js';

// Endpoints and transport
export { EndpointSet, resolveEndpoint, resolveEndpoints, normalizeHost, OPERATION_KINDS } from './endpoints.js';
export type { Endpoint, OperationKind, HttpMethod } from './endpoints.js';
export { HttpTransport } from './transport.js';
export type { QueryParams, SendOptions, RawResponse, TransportOptions } from './transport.js';

// Queries
export { QueryEngine, decodeQueryResponse } from './query.js';
export type { InstantQueryOptions, RangeQueryOptions, LabelValuesOptions } from './query.js';

// Export and import pipelines
export { iterateChunks, exportSeries, writableSink, memorySink, isSeriesSelector } from './export.js';
export type { ExportMode, ExportSource, ExportSink, MemorySink, ChunkOptions, ExportOptions } from './export.js';
export { importSamples, Ingestor, fileSource, textSource, MAX_RECORDED_ERRORS } from './import.js';
export type { ImportOptions, IngestTarget } from './import.js';

// Codecs
export { getCodec, isFormat, listFormats, formatFromPath, encodeToString, decodeAll } from './codecs/index.js';
export type { Codec, DecodeItem, Encoder, Format, SampleSource, TextSource } from './codecs/index.js';

// Time
export { parseDuration, formatDuration, parseTimestamp, formatTimestamp, parseTimeRange } from './time.js';
export type { TimeInput } from './time.js';

// Types
export type { Labels, Sample } from './types/sample.js';
export { METRIC_NAME_LABEL, createSample, splitMetric, joinMetric, formatValue, parseValue } from './types/sample.js';
export type {
  Point,
  Series,
  ResultType,
  QueryResult,
  VectorResult,
  MatrixResult,
  ScalarResult,
  StringResult,
} from './types/query-result.js';
export {
  isVectorResult,
  isMatrixResult,
  isScalarResult,
  isStringResult,
  countPoints,
  resultToSamples,
  seriesToObject,
} from './types/query-result.js';
export type {
  TimeRange,
  ExportChunk,
  ExportProgress,
  ExportSummary,
  FailedBatch,
  SkippedRecord,
  ImportProgress,
  ImportSummary,
} from './types/pipeline.js';

// Errors
export {
  ErrorCode,
  VmError,
  InvalidArgumentError,
  ConfigurationError,
  ResolutionError,
  TransportError,
  QueryError,
  ParseError,
  ExportError,
  ImportError,
  isParseError,
  errorFromStatus,
  isTransient,
} from './types/errors.js';
export type {
  ResolutionErrorKind,
  TransportErrorKind,
  QueryErrorKind,
  ParseErrorReason,
  ExportErrorKind,
  ImportErrorKind,
} from './types/errors.js';

// Services
export { HealthClient, HealthStatus, AdminClient, DiagnosticsClient } from './services/index.js';
export type {
  HealthCheckResult,
  ExtendedHealthResult,
  ProbeResult,
  DeleteSeriesOptions,
  SnapshotInfo,
  RetentionInfo,
  MetricStats,
  BenchmarkReport,
  GapReport,
} from './services/index.js';

// Logging
export { setLogLevel, getLogLevel, onLog, setConsoleOutput } from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';

export { VERSION } from './version.js';
