// SPDX-License-Identifier: MIT
import type { ExportSummary, ImportSummary, TimeRange } from './pipeline.js';

/**
 * Error codes used across the client.
 */
export enum ErrorCode {
  UNKNOWN = 0,
  INVALID_ARGUMENT = 1,
  CONFIGURATION = 2,
  RESOLUTION = 3,
  TRANSPORT = 4,
  QUERY = 5,
  PARSE = 6,
  EXPORT = 7,
  IMPORT = 8,
}

/**
 * Base error class for all vm-cli errors.
 */
export class VmError extends Error {
  readonly code: ErrorCode;

  constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VmError';
    this.code = code;
    Object.setPrototypeOf(this, VmError.prototype);
  }

  override toString(): string {
    return `[${ErrorCode[this.code]}] ${this.message}`;
  }
}

/**
 * Invalid argument provided by the caller.
 */
export class InvalidArgumentError extends VmError {
  constructor(message: string) {
    super(message, ErrorCode.INVALID_ARGUMENT);
    this.name = 'InvalidArgumentError';
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

/**
 * Configuration file or values failed validation.
 */
export class ConfigurationError extends VmError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, ErrorCode.CONFIGURATION);
    this.name = 'ConfigurationError';
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export type ResolutionErrorKind = 'invalid_host' | 'missing_cluster_host';

/**
 * An endpoint could not be derived from the configuration.
 */
export class ResolutionError extends VmError {
  readonly kind: ResolutionErrorKind;

  private constructor(kind: ResolutionErrorKind, message: string) {
    super(message, ErrorCode.RESOLUTION);
    this.name = 'ResolutionError';
    this.kind = kind;
    Object.setPrototypeOf(this, ResolutionError.prototype);
  }

  static invalidHost(host: string, reason: string): ResolutionError {
    return new ResolutionError('invalid_host', `Invalid host "${host}": ${reason}`);
  }

  static missingClusterHost(component: 'vminsert' | 'vmstorage', operation: string): ResolutionError {
    return new ResolutionError(
      'missing_cluster_host',
      `Operation "${operation}" requires cluster.${component}_host to be configured`
    );
  }
}

export type TransportErrorKind = 'network' | 'http_status' | 'timeout' | 'cancelled';

/**
 * A request failed on the wire.
 */
export class TransportError extends VmError {
  readonly kind: TransportErrorKind;
  /** HTTP status, set for `http_status`. */
  readonly status?: number;
  /** Response body, set for `http_status`. */
  readonly body?: string;
  /** Number of attempts made before giving up. */
  attempts = 1;

  private constructor(
    kind: TransportErrorKind,
    message: string,
    details: { status?: number; body?: string; cause?: unknown } = {}
  ) {
    super(message, ErrorCode.TRANSPORT, { cause: details.cause });
    this.name = 'TransportError';
    this.kind = kind;
    if (details.status !== undefined) {
      this.status = details.status;
    }
    if (details.body !== undefined) {
      this.body = details.body;
    }
    Object.setPrototypeOf(this, TransportError.prototype);
  }

  static network(detail: string, cause?: unknown): TransportError {
    return new TransportError('network', `Network error: ${detail}`, { cause });
  }

  static httpStatus(status: number, body: string): TransportError {
    const snippet = body.trim().slice(0, 512);
    const suffix = snippet.length > 0 ? `: ${snippet}` : '';
    return new TransportError('http_status', `HTTP ${status}${suffix}`, { status, body });
  }

  static timeout(timeoutMs: number): TransportError {
    return new TransportError('timeout', `Request timed out after ${timeoutMs}ms`);
  }

  static cancelled(): TransportError {
    return new TransportError('cancelled', 'Request cancelled');
  }
}

export type QueryErrorKind = 'invalid_range' | 'backend_error' | 'decode_error';

/**
 * The backend rejected a query or its response could not be decoded.
 */
export class QueryError extends VmError {
  readonly kind: QueryErrorKind;
  /** Backend error type from the response envelope, e.g. `bad_data`. */
  readonly errorType?: string;

  private constructor(kind: QueryErrorKind, message: string, errorType?: string, cause?: unknown) {
    super(message, ErrorCode.QUERY, { cause });
    this.name = 'QueryError';
    this.kind = kind;
    if (errorType !== undefined) {
      this.errorType = errorType;
    }
    Object.setPrototypeOf(this, QueryError.prototype);
  }

  static invalidRange(message: string): QueryError {
    return new QueryError('invalid_range', message);
  }

  /** The message is the backend's error text, verbatim. */
  static backend(message: string, errorType?: string): QueryError {
    return new QueryError('backend_error', message, errorType);
  }

  static decode(message: string, cause?: unknown): QueryError {
    return new QueryError('decode_error', `Failed to decode response: ${message}`, undefined, cause);
  }
}

export type ParseErrorReason = 'InvalidNumber' | 'MissingField' | 'MalformedLabelSet';

/**
 * A record could not be decoded. Yielded in-band by codecs, never thrown by them.
 */
export class ParseError extends VmError {
  readonly reason: ParseErrorReason;
  /** The offending raw line or record. */
  readonly raw: string;
  /** 1-based line (or record) number within the source. */
  readonly line: number;
  readonly detail: string;

  constructor(reason: ParseErrorReason, raw: string, line: number, detail: string) {
    super(`Line ${line}: ${reason} (${detail})`, ErrorCode.PARSE);
    this.name = 'ParseError';
    this.reason = reason;
    this.raw = raw;
    this.line = line;
    this.detail = detail;
    Object.setPrototypeOf(this, ParseError.prototype);
  }
}

/**
 * Type guard for in-band parse errors.
 */
export function isParseError(value: unknown): value is ParseError {
  return value instanceof ParseError;
}

export type ExportErrorKind = 'chunk_failed' | 'cancelled';

/**
 * An export stopped before covering its whole range. Output already written stays in place.
 */
export class ExportError extends VmError {
  readonly kind: ExportErrorKind;
  readonly summary: ExportSummary;
  /** The window being fetched when the export stopped. */
  readonly range?: TimeRange;

  private constructor(
    kind: ExportErrorKind,
    message: string,
    summary: ExportSummary,
    range?: TimeRange,
    cause?: unknown
  ) {
    super(message, ErrorCode.EXPORT, { cause });
    this.name = 'ExportError';
    this.kind = kind;
    this.summary = summary;
    if (range !== undefined) {
      this.range = range;
    }
    Object.setPrototypeOf(this, ExportError.prototype);
  }

  static chunkFailed(range: TimeRange, cause: unknown, summary: ExportSummary): ExportError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ExportError(
      'chunk_failed',
      `Export chunk [${range.start}, ${range.end}] failed after ${summary.totalSamples} samples: ${reason}`,
      summary,
      range,
      cause
    );
  }

  static cancelled(summary: ExportSummary): ExportError {
    return new ExportError(
      'cancelled',
      `Export cancelled after ${summary.totalChunks} chunks (${summary.totalSamples} samples)`,
      summary
    );
  }
}

export type ImportErrorKind = 'parse_failed' | 'ingest_failed' | 'cancelled';

/**
 * An import stopped early. Batches already ingested are not rolled back.
 */
export class ImportError extends VmError {
  readonly kind: ImportErrorKind;
  readonly summary: ImportSummary;
  /** Source line of the record that stopped the import, for `parse_failed`. */
  readonly line?: number;

  private constructor(
    kind: ImportErrorKind,
    message: string,
    summary: ImportSummary,
    line?: number,
    cause?: unknown
  ) {
    super(message, ErrorCode.IMPORT, { cause });
    this.name = 'ImportError';
    this.kind = kind;
    this.summary = summary;
    if (line !== undefined) {
      this.line = line;
    }
    Object.setPrototypeOf(this, ImportError.prototype);
  }

  static parseFailed(error: ParseError, summary: ImportSummary): ImportError {
    return new ImportError(
      'parse_failed',
      `Import stopped at line ${error.line}: ${error.reason} (${error.detail}); ${summary.samplesIngested} samples ingested`,
      summary,
      error.line,
      error
    );
  }

  static ingestFailed(batchIndex: number, cause: unknown, summary: ImportSummary): ImportError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ImportError(
      'ingest_failed',
      `Import batch ${batchIndex} failed: ${reason}; ${summary.samplesIngested} samples ingested`,
      summary,
      undefined,
      cause
    );
  }

  static cancelled(summary: ImportSummary): ImportError {
    return new ImportError(
      'cancelled',
      `Import cancelled after ${summary.batchesSent} batches (${summary.samplesIngested} samples)`,
      summary
    );
  }
}

/**
 * Create the transport error for a non-2xx HTTP response.
 */
export function errorFromStatus(status: number, body: string): TransportError {
  return TransportError.httpStatus(status, body);
}

/**
 * Whether an error is a transient transport fault worth retrying:
 * network failures, timeouts, 5xx responses and 429.
 */
export function isTransient(error: unknown): boolean {
  if (!(error instanceof TransportError)) {
    return false;
  }
  switch (error.kind) {
    case 'network':
    case 'timeout':
      return true;
    case 'http_status':
      return error.status === 429 || (error.status !== undefined && error.status >= 500);
    case 'cancelled':
      return false;
  }
}
