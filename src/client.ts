// SPDX-License-Identifier: MIT
import type { Dispatcher } from 'undici';
import type { ClientConfig, PartialClientConfig } from './config.js';
import { mergeClientConfig } from './config.js';
import type { EndpointSet } from './endpoints.js';
import { resolveEndpoints } from './endpoints.js';
import type { ChunkOptions, ExportOptions } from './export.js';
import { exportSeries, iterateChunks } from './export.js';
import type { ImportOptions } from './import.js';
import { Ingestor, importSamples } from './import.js';
import type { InstantQueryOptions, LabelValuesOptions, RangeQueryOptions } from './query.js';
import { QueryEngine } from './query.js';
import { AdminClient } from './services/admin.js';
import { DiagnosticsClient } from './services/diagnostics.js';
import { HealthClient } from './services/health.js';
import { HttpTransport } from './transport.js';
import type { ExportChunk, ExportSummary, ImportSummary } from './types/pipeline.js';
import type { QueryResult } from './types/query-result.js';

/**
 * Options for creating a client.
 */
export interface CreateOptions {
  /** Client configuration (host, auth, timeouts, retry, cluster). */
  config?: PartialClientConfig | ClientConfig;
  /** Send requests through this dispatcher, e.g. an undici `MockAgent`. */
  dispatcher?: Dispatcher;
}

/**
 * Client for a VictoriaMetrics server, standalone or clustered.
 *
 * Endpoints are resolved once when the client is created; an unparseable
 * host fails here, before any request.
 */
export class VmClient {
  readonly health: HealthClient;
  readonly admin: AdminClient;
  readonly diagnostics: DiagnosticsClient;

  private readonly transport: HttpTransport;
  private readonly engine: QueryEngine;
  private readonly ingestor: Ingestor;
  private closed = false;

  private constructor(
    private readonly config: ClientConfig,
    readonly endpoints: EndpointSet,
    dispatcher: Dispatcher | undefined
  ) {
    const transportOptions = {
      timeoutMs: Math.round(config.timeoutS * 1000),
      auth: config.auth,
      retry: config.retry,
      tlsInsecure: config.tlsInsecure,
    };
    this.transport = new HttpTransport(
      dispatcher !== undefined ? { ...transportOptions, dispatcher } : transportOptions
    );
    this.engine = new QueryEngine(this.transport, endpoints);
    this.ingestor = new Ingestor(this.transport, endpoints);
    this.health = new HealthClient(this.transport, endpoints, this.engine);
    this.admin = new AdminClient(this.transport, endpoints);
    this.diagnostics = new DiagnosticsClient(this.engine);
  }

  /**
   * Create a client.
   *
   * @throws ResolutionError when a configured host is not a valid URL.
   */
  static create(options: CreateOptions = {}): VmClient {
    const config = mergeClientConfig(options.config);
    const endpoints = resolveEndpoints(config);
    return new VmClient(config, endpoints, options.dispatcher);
  }

  /**
   * Get the client configuration.
   */
  get clientConfig(): ClientConfig {
    return this.config;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * The query engine, for pipelines that take an `ExportSource`.
   */
  get queries(): QueryEngine {
    return this.engine;
  }

  async query(expr: string, options: InstantQueryOptions = {}): Promise<QueryResult> {
    return this.engine.instantQuery(expr, options);
  }

  async queryRange(expr: string, options: RangeQueryOptions): Promise<QueryResult> {
    return this.engine.rangeQuery(expr, options);
  }

  /**
   * List metric names.
   */
  async metrics(options: LabelValuesOptions = {}): Promise<string[]> {
    return this.engine.labelValues(options);
  }

  /**
   * Export with the configured chunk size, window and step as defaults.
   */
  async export(
    options: Omit<ExportOptions, 'chunkSize' | 'format'> & Partial<Pick<ExportOptions, 'chunkSize' | 'format'>>
  ): Promise<ExportSummary> {
    return exportSeries(this.engine, {
      ...options,
      chunkSize: options.chunkSize ?? this.config.export.chunkSize,
      format: options.format ?? this.config.export.defaultFormat,
      windowS: options.windowS ?? this.config.export.windowS,
      step: options.step ?? this.config.export.step,
    });
  }

  chunks(
    options: Omit<ChunkOptions, 'chunkSize'> & Partial<Pick<ChunkOptions, 'chunkSize'>>
  ): AsyncGenerator<ExportChunk, ExportSummary, undefined> {
    return iterateChunks(this.engine, {
      ...options,
      chunkSize: options.chunkSize ?? this.config.export.chunkSize,
      windowS: options.windowS ?? this.config.export.windowS,
      step: options.step ?? this.config.export.step,
    });
  }

  /**
   * Import with the configured batch size as default.
   */
  async import(
    options: Omit<ImportOptions, 'batchSize'> & Partial<Pick<ImportOptions, 'batchSize'>>
  ): Promise<ImportSummary> {
    return importSamples(this.ingestor, {
      ...options,
      batchSize: options.batchSize ?? this.config.import.batchSize,
    });
  }

  /**
   * Release pooled connections.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.transport.close();
  }
}
