// SPDX-License-Identifier: MIT
import type { Sample } from './sample.js';

/**
 * Inclusive time range in unix seconds.
 */
export interface TimeRange {
  start: number;
  end: number;
}

/**
 * A bounded batch of exported samples.
 */
export interface ExportChunk {
  /** 0-based position in the export. */
  index: number;
  /** Window the samples were fetched for. */
  range: TimeRange;
  samples: Sample[];
  /**
   * Where the next chunk starts, in unix seconds, or `undefined` after the last chunk.
   * Pass it as `resumeFrom` to continue an interrupted export.
   */
  cursor: number | undefined;
}

/**
 * Emitted once per exported chunk.
 */
export interface ExportProgress {
  chunkIndex: number;
  samplesInChunk: number;
  cumulativeSamples: number;
  /** Extrapolated from the share of the time range covered so far. */
  estimatedTotal?: number;
  range: TimeRange;
}

/**
 * Outcome of an export. Carried by `ExportError` when it stops early.
 */
export interface ExportSummary {
  totalSamples: number;
  totalChunks: number;
  elapsedMs: number;
  /** False when the export stopped before covering its whole range. */
  complete: boolean;
  /** Where to resume from, when incomplete. */
  cursor?: number;
}

/**
 * A batch that the ingest endpoint rejected.
 */
export interface FailedBatch {
  index: number;
  size: number;
  error: string;
}

/**
 * A record skipped during import.
 */
export interface SkippedRecord {
  line: number;
  reason: string;
  raw: string;
}

/**
 * Emitted once per import batch.
 */
export interface ImportProgress {
  batchIndex: number;
  samplesInBatch: number;
  cumulativeSamples: number;
  samplesSkipped: number;
  sent: boolean;
}

/**
 * Outcome of an import. Carried by `ImportError` when it stops early.
 */
export interface ImportSummary {
  /** Samples accepted by the backend, or that would have been sent in dry-run mode. */
  samplesIngested: number;
  samplesSkipped: number;
  batchesSent: number;
  batchesFailed: number;
  failedBatches: FailedBatch[];
  /** Records skipped under `skipErrors`, capped at `MAX_RECORDED_ERRORS`. */
  errors: SkippedRecord[];
  dryRun: boolean;
  elapsedMs: number;
}
