// SPDX-License-Identifier: MIT
import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '../types/errors.js';
import { formatFromPath, getCodec, isFormat, listFormats, readLines } from './index.js';

describe('getCodec', () => {
  it('should resolve names and aliases case-insensitively', () => {
    expect(getCodec('PROM').format).toBe('prometheus');
    expect(getCodec('ndjson').format).toBe('jsonl');
    expect(getCodec(' yml ').format).toBe('yaml');
    expect(getCodec('csv').contentType).toBe('text/csv');
  });

  it('should list the known formats when the name is unknown', () => {
    expect(() => getCodec('xml')).toThrow(
      new InvalidArgumentError('Unknown format "xml" (expected one of: prometheus, json, csv, yaml, jsonl)')
    );
  });
});

describe('formatFromPath', () => {
  it('should map extensions', () => {
    expect(formatFromPath('out/metrics.yml')).toBe('yaml');
    expect(formatFromPath('dump.TXT')).toBe('prometheus');
    expect(formatFromPath('series.jsonl')).toBe('jsonl');
  });

  it('should return undefined for unknown or missing extensions', () => {
    expect(formatFromPath('data')).toBeUndefined();
    expect(formatFromPath('x.parquet')).toBeUndefined();
  });
});

describe('isFormat', () => {
  it('should accept only canonical names', () => {
    expect(listFormats().every(isFormat)).toBe(true);
    expect(isFormat('prom')).toBe(false);
  });
});

describe('readLines', () => {
  it('should split on both line endings and keep a final partial line', async () => {
    const lines: string[] = [];
    for await (const line of readLines(['a\r\nb', '\nc'])) {
      lines.push(line);
    }
    expect(lines).toEqual(['a', 'b', 'c']);
  });

  it('should leave carriage returns when asked', async () => {
    const lines: string[] = [];
    for await (const line of readLines(['a\r\nb\r'], { keepCr: true })) {
      lines.push(line);
    }
    expect(lines).toEqual(['a\r', 'b\r']);
  });

  it('should decode multi-byte characters split across chunks', async () => {
    const bytes = new TextEncoder().encode('héllo\n');
    const lines: string[] = [];
    for await (const line of readLines([bytes.slice(0, 2), bytes.slice(2)])) {
      lines.push(line);
    }
    expect(lines).toEqual(['héllo']);
  });
});
