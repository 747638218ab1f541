// SPDX-License-Identifier: MIT
import { ParseError } from '../types/errors.js';
import type { Sample } from '../types/sample.js';
import { BaseCodec, readAll } from './base.js';
import type { SeriesRecord } from './series.js';
import { SeriesGrouper, decodeSeriesDocument } from './series.js';
import type { DecodeItem, Encoder, TextSource } from './types.js';

function renderRecord(record: SeriesRecord): string {
  return JSON.stringify(record);
}

/**
 * Streams the array one series object per line.
 */
class JsonEncoder implements Encoder {
  private readonly grouper = new SeriesGrouper();
  private written = 0;

  begin(): string {
    return '[';
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
    const tail = last !== undefined ? this.emit(last) : '';
    return `${tail}${this.written > 0 ? '\n' : ''}]\n`;
  }

  private emit(record: SeriesRecord): string {
    const sep = this.written > 0 ? ',\n' : '\n';
    this.written++;
    return sep + renderRecord(record);
  }
}

/**
 * `[{"metric": {...}, "values": [[ts, "v"], ...]}, ...]`, the backend's range-query shape.
 * Decoding reads the whole document before yielding.
 */
export class JsonCodec extends BaseCodec {
  override readonly format = 'json' as const;
  override readonly extension = 'json';
  override readonly contentType = 'application/json';

  override createEncoder(): Encoder {
    return new JsonEncoder();
  }

  override async *decode(source: TextSource): AsyncIterable<DecodeItem> {
    const text = await readAll(source);
    if (text.trim() === '') {
      return;
    }
    let doc: unknown;
    try {
      doc = JSON.parse(text);
    } catch (err) {
      const detail = err instanceof Error ? err.message : 'invalid JSON';
      yield new ParseError('MalformedLabelSet', text.slice(0, 200), 1, detail);
      return;
    }
    yield* decodeSeriesDocument(doc);
  }
}
