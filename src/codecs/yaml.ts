// SPDX-License-Identifier: MIT
import yaml from 'js-yaml';
import { ParseError } from '../types/errors.js';
import type { Sample } from '../types/sample.js';
import { BaseCodec, readAll } from './base.js';
import type { SeriesRecord } from './series.js';
import { SeriesGrouper, decodeSeriesDocument } from './series.js';
import type { DecodeItem, Encoder, TextSource } from './types.js';

/**
 * Each finished series is dumped as a one-element sequence; the pieces
 * concatenate into one YAML sequence.
 */
class YamlEncoder implements Encoder {
  private readonly grouper = new SeriesGrouper();
  private written = 0;

  begin(): string {
    return '';
  }

  encode(samples: readonly Sample[]): string {
    let out = '';
    for (const s of samples) {
      const done = this.grouper.push(s);
      if (done !== undefined) {
        out += this.emit(done);
      }
    }
    return out;
  }

  end(): string {
    const last = this.grouper.flush();
    if (last !== undefined) {
      return this.emit(last);
    }
    return this.written === 0 ? '[]\n' : '';
  }

  private emit(record: SeriesRecord): string {
    this.written++;
    return yaml.dump([record], { lineWidth: -1, noRefs: true });
  }
}

/**
 * Same structure as the JSON format, serialized as YAML.
 */
export class YamlCodec extends BaseCodec {
  override readonly format = 'yaml' as const;
  override readonly extension = 'yaml';
  override readonly contentType = 'application/yaml';

  override createEncoder(): Encoder {
    return new YamlEncoder();
  }

  override async *decode(source: TextSource): AsyncIterable<DecodeItem> {
    const text = await readAll(source);
    let doc: unknown;
    try {
      doc = yaml.load(text);
    } catch (err) {
      const detail = err instanceof Error ? err.message : 'invalid YAML';
      yield new ParseError('MalformedLabelSet', text.slice(0, 200), 1, detail);
      return;
    }
    if (doc === undefined || doc === null) {
      return;
    }
    yield* decodeSeriesDocument(doc);
  }
}
