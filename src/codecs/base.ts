// SPDX-License-Identifier: MIT
import type { Codec, DecodeItem, Encoder, Format, SampleSource, TextSource } from './types.js';

export interface ReadLinesOptions {
  /** Leave the `\r` of a `\r\n` ending on the line. */
  keepCr?: boolean;
}

/**
 * Split a text source into lines. `\r\n` and `\n` both end a line; a final
 * line without a newline is still yielded.
 */
export async function* readLines(source: TextSource, options: ReadLinesOptions = {}): AsyncGenerator<string> {
  const end = options.keepCr === true ? (line: string): string => line : stripCr;
  const decoder = new TextDecoder();
  let pending = '';
  for await (const chunk of source) {
    pending += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
    let nl = pending.indexOf('\n');
    while (nl !== -1) {
      yield end(pending.slice(0, nl));
      pending = pending.slice(nl + 1);
      nl = pending.indexOf('\n');
    }
  }
  pending += decoder.decode();
  if (pending !== '') {
    yield end(pending);
  }
}

/**
 * Read a whole text source into one string.
 */
export async function readAll(source: TextSource): Promise<string> {
  const decoder = new TextDecoder();
  let text = '';
  for await (const chunk of source) {
    text += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
  }
  return text + decoder.decode();
}

export function stripCr(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Shared plumbing: streaming `encode()` on top of `createEncoder()`.
 */
export abstract class BaseCodec implements Codec {
  abstract readonly format: Format;
  abstract readonly extension: string;
  abstract readonly contentType: string;

  abstract createEncoder(): Encoder;

  abstract decode(source: TextSource): AsyncIterable<DecodeItem>;

  async *encode(samples: SampleSource): AsyncIterable<string> {
    const encoder = this.createEncoder();
    const head = encoder.begin();
    if (head !== '') yield head;
    for await (const sample of samples) {
      const out = encoder.encode([sample]);
      if (out !== '') yield out;
    }
    const tail = encoder.end();
    if (tail !== '') yield tail;
  }
}

/**
 * Encode samples to a single string.
 */
export async function encodeToString(codec: Codec, samples: SampleSource): Promise<string> {
  let out = '';
  for await (const part of codec.encode(samples)) {
    out += part;
  }
  return out;
}

/**
 * Collect every decoded item.
 */
export async function decodeAll(codec: Codec, source: TextSource): Promise<DecodeItem[]> {
  const items: DecodeItem[] = [];
  for await (const item of codec.decode(source)) {
    items.push(item);
  }
  return items;
}
