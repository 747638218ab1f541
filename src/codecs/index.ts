// SPDX-License-Identifier: MIT
/**
 * Codec registry.
 */
import { InvalidArgumentError } from '../types/errors.js';
import { CsvCodec } from './csv.js';
import { JsonCodec } from './json.js';
import { JsonlCodec } from './jsonl.js';
import { PrometheusCodec } from './prometheus.js';
import type { Codec, Format } from './types.js';
import { YamlCodec } from './yaml.js';

const CODECS: Readonly<Record<Format, Codec>> = {
  prometheus: new PrometheusCodec(),
  json: new JsonCodec(),
  csv: new CsvCodec(),
  yaml: new YamlCodec(),
  jsonl: new JsonlCodec(),
};

const ALIASES: Readonly<Partial<Record<string, Format>>> = {
  prom: 'prometheus',
  txt: 'prometheus',
  yml: 'yaml',
  ndjson: 'jsonl',
};

export function isFormat(value: string): value is Format {
  return Object.prototype.hasOwnProperty.call(CODECS, value);
}

export function listFormats(): Format[] {
  return Object.keys(CODECS).filter(isFormat);
}

/**
 * Look up the codec for a format name or alias (`prom`, `yml`, `ndjson`).
 *
 * @throws InvalidArgumentError for unknown formats.
 */
export function getCodec(format: string): Codec {
  const name = format.trim().toLowerCase();
  const resolved = isFormat(name) ? name : ALIASES[name];
  if (resolved === undefined) {
    throw new InvalidArgumentError(
      `Unknown format "${format}" (expected one of: ${listFormats().join(', ')})`
    );
  }
  return CODECS[resolved];
}

/**
 * Guess a format from a file name's extension.
 */
export function formatFromPath(path: string): Format | undefined {
  const dot = path.lastIndexOf('.');
  if (dot === -1) {
    return undefined;
  }
  const ext = path.slice(dot + 1).toLowerCase();
  return isFormat(ext) ? ext : ALIASES[ext];
}

export { BaseCodec, readLines, readAll, encodeToString, decodeAll } from './base.js';
export type { ReadLinesOptions } from './base.js';
export { CsvCodec, csvEscape, formatLabelField, parseLabelField } from './csv.js';
export { JsonCodec } from './json.js';
export { JsonlCodec, decodeJsonlLine } from './jsonl.js';
export { PrometheusCodec, escapeLabelValue, formatSampleLine, parseSampleLine } from './prometheus.js';
export { YamlCodec } from './yaml.js';
export type { Codec, DecodeItem, Encoder, Format, SampleSource, TextSource } from './types.js';
