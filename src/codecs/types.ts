// SPDX-License-Identifier: MIT
import type { ParseError } from '../types/errors.js';
import type { Sample } from '../types/sample.js';

/**
 * Supported file and wire formats.
 */
export type Format = 'prometheus' | 'json' | 'csv' | 'yaml' | 'jsonl';

/**
 * One decoded record: a sample, or the in-band error for a bad record.
 */
export type DecodeItem = Sample | ParseError;

/**
 * Text input for decoders: chunks of text or bytes, in any split.
 */
export type TextSource = AsyncIterable<string | Uint8Array> | Iterable<string | Uint8Array>;

export type SampleSource = AsyncIterable<Sample> | Iterable<Sample>;

/**
 * Stateful incremental encoder. Output of `begin()`, every `encode()` and
 * `end()` concatenated forms one complete document.
 */
export interface Encoder {
  begin(): string;
  encode(samples: readonly Sample[]): string;
  end(): string;
}

/**
 * Bidirectional converter for one format.
 */
export interface Codec {
  readonly format: Format;
  /** Default file extension, without the dot. */
  readonly extension: string;
  readonly contentType: string;
  createEncoder(): Encoder;
  /** Lazily encode samples. Restartable by calling again with the same input. */
  encode(samples: SampleSource): AsyncIterable<string>;
  /** Lazily decode a source, consuming it once. Bad records are yielded, never thrown. */
  decode(source: TextSource): AsyncIterable<DecodeItem>;
}
