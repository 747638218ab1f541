// SPDX-License-Identifier: MIT
/**
 * Import pipeline: decode a source, validate, batch, and push each batch to
 * the ingest endpoint once.
 */
import { createReadStream } from 'node:fs';
import { getCodec } from './codecs/index.js';
import { formatSampleLine } from './codecs/prometheus.js';
import type { TextSource } from './codecs/types.js';
import type { EndpointSet } from './endpoints.js';
import * as log from './logger.js';
import type { HttpTransport } from './transport.js';
import { ImportError, InvalidArgumentError, ParseError, TransportError } from './types/errors.js';
import type { ImportProgress, ImportSummary } from './types/pipeline.js';
import type { Sample } from './types/sample.js';
import { isValidLabelName, isValidMetricName } from './types/sample.js';

/**
 * Upper bound of skipped records kept in `ImportSummary.errors`.
 */
export const MAX_RECORDED_ERRORS = 100;

const INGEST_CONTENT_TYPE = 'application/stream+json';

/**
 * Receives encoded batches.
 */
export interface IngestTarget {
  ingest(body: string, signal?: AbortSignal): Promise<void>;
}

/**
 * Posts JSON-line batches to the import endpoint. Never retried.
 */
export class Ingestor implements IngestTarget {
  constructor(
    private readonly transport: HttpTransport,
    private readonly endpoints: EndpointSet
  ) {}

  async ingest(body: string, signal?: AbortSignal): Promise<void> {
    await this.transport.send(this.endpoints.get('import'), {
      body,
      contentType: INGEST_CONTENT_TYPE,
      signal,
    });
  }
}

export interface ImportOptions {
  source: TextSource;
  format: string;
  /** Upper bound of samples per ingest request (>= 1). */
  batchSize: number;
  /** Validate and count, but send nothing. */
  dryRun?: boolean;
  /** Skip bad records and failed batches instead of stopping. */
  skipErrors?: boolean;
  /** Clock in milliseconds for samples without a timestamp (default: `Date.now`). */
  now?: () => number;
  onProgress?: (progress: ImportProgress) => void;
  signal?: AbortSignal | undefined;
}

/**
 * Shape check applied to every decoded sample.
 *
 * @returns The problem, or `undefined` when the sample is valid.
 */
export function validateSample(sample: Sample): { reason: ParseError['reason']; detail: string } | undefined {
  if (!isValidMetricName(sample.metricName)) {
    return { reason: 'MissingField', detail: `invalid metric name "${sample.metricName}"` };
  }
  for (const name of Object.keys(sample.labels)) {
    if (!isValidLabelName(name)) {
      return { reason: 'MalformedLabelSet', detail: `invalid label name "${name}"` };
    }
  }
  if (sample.timestamp !== undefined && !Number.isFinite(sample.timestamp)) {
    return { reason: 'InvalidNumber', detail: 'timestamp is not finite' };
  }
  return undefined;
}

/**
 * Read a file lazily.
 */
export async function* fileSource(path: string): AsyncGenerator<string | Uint8Array> {
  for await (const chunk of createReadStream(path)) {
    if (typeof chunk === 'string' || chunk instanceof Uint8Array) {
      yield chunk;
    }
  }
}

/**
 * Wrap in-memory text as a source.
 */
export function textSource(text: string): TextSource {
  return [text];
}

function isCancellation(err: unknown, signal: AbortSignal | undefined): boolean {
  return (err instanceof TransportError && err.kind === 'cancelled') || signal?.aborted === true;
}

/**
 * Import samples from `source` in `format`.
 *
 * Under `skipErrors`, bad records are counted and skipped and failed batches
 * are recorded while the import continues. Otherwise the first bad record
 * stops the import once the valid samples before it are flushed, and the
 * first failed batch stops it immediately.
 *
 * @throws ImportError
 */
export async function importSamples(target: IngestTarget, options: ImportOptions): Promise<ImportSummary> {
  if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
    throw new InvalidArgumentError(`batchSize must be a positive integer, got ${options.batchSize}`);
  }
  const codec = getCodec(options.format);
  const wire = getCodec('jsonl');
  const dryRun = options.dryRun ?? false;
  const skipErrors = options.skipErrors ?? false;
  const now = options.now ?? Date.now;
  const startedAt = performance.now();

  const summary: ImportSummary = {
    samplesIngested: 0,
    samplesSkipped: 0,
    batchesSent: 0,
    batchesFailed: 0,
    failedBatches: [],
    errors: [],
    dryRun,
    elapsedMs: 0,
  };
  const snapshot = (): ImportSummary => ({
    ...summary,
    failedBatches: [...summary.failedBatches],
    errors: [...summary.errors],
    elapsedMs: Math.round(performance.now() - startedAt),
  });

  let pending: Sample[] = [];
  let batchIndex = 0;

  const flush = async (): Promise<void> => {
    if (pending.length === 0) return;
    const batch = pending;
    pending = [];
    const index = batchIndex++;

    if (!dryRun) {
      const encoder = wire.createEncoder();
      const body = encoder.begin() + encoder.encode(batch) + encoder.end();
      log.debug('Sending import batch', { batch: index, samples: batch.length, bytes: body.length });
      try {
        await target.ingest(body, options.signal);
      } catch (err) {
        if (isCancellation(err, options.signal)) {
          throw ImportError.cancelled(snapshot());
        }
        summary.batchesFailed++;
        summary.failedBatches.push({
          index,
          size: batch.length,
          error: err instanceof Error ? err.message : String(err),
        });
        if (!skipErrors) {
          throw ImportError.ingestFailed(index, err, snapshot());
        }
        log.warn('Import batch failed, continuing', { batch: index, samples: batch.length });
        options.onProgress?.({
          batchIndex: index,
          samplesInBatch: batch.length,
          cumulativeSamples: summary.samplesIngested,
          samplesSkipped: summary.samplesSkipped,
          sent: false,
        });
        return;
      }
    }

    summary.batchesSent++;
    summary.samplesIngested += batch.length;
    options.onProgress?.({
      batchIndex: index,
      samplesInBatch: batch.length,
      cumulativeSamples: summary.samplesIngested,
      samplesSkipped: summary.samplesSkipped,
      sent: !dryRun,
    });
  };

  const reject = async (error: ParseError): Promise<void> => {
    if (!skipErrors) {
      await flush();
      throw ImportError.parseFailed(error, snapshot());
    }
    summary.samplesSkipped++;
    if (summary.errors.length < MAX_RECORDED_ERRORS) {
      summary.errors.push({ line: error.line, reason: `${error.reason}: ${error.detail}`, raw: error.raw });
    }
    log.debug('Skipping record', { line: error.line, reason: error.reason });
  };

  let record = 0;
  for await (const item of codec.decode(options.source)) {
    record++;
    if (options.signal?.aborted) {
      throw ImportError.cancelled(snapshot());
    }
    if (item instanceof ParseError) {
      await reject(item);
      continue;
    }
    const problem = validateSample(item);
    if (problem !== undefined) {
      await reject(new ParseError(problem.reason, formatSampleLine(item), record, problem.detail));
      continue;
    }
    pending.push(item.timestamp !== undefined ? item : { ...item, timestamp: now() / 1000 });
    if (pending.length >= options.batchSize) {
      await flush();
    }
  }
  if (options.signal?.aborted) {
    throw ImportError.cancelled(snapshot());
  }
  await flush();

  const result = snapshot();
  log.debug('Import finished', {
    ingested: result.samplesIngested,
    skipped: result.samplesSkipped,
    failedBatches: result.batchesFailed,
    dryRun,
  });
  return result;
}
