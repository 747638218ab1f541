// SPDX-License-Identifier: MIT
import { describe, it, expect } from 'vitest';
import { isParseError } from '../types/errors.js';
import type { Sample } from '../types/sample.js';
import { decodeAll, encodeToString } from './base.js';
import { CsvCodec, csvEscape, formatLabelField, parseLabelField, splitCsvRecord } from './csv.js';
import type { DecodeItem } from './types.js';

const codec = new CsvCodec();

function describeItem(item: DecodeItem): unknown {
  return isParseError(item) ? [item.reason, item.line, item.detail] : item;
}

describe('csvEscape', () => {
  it('should quote only when needed', () => {
    expect(csvEscape('plain')).toBe('plain');
    expect(csvEscape('a,b')).toBe('"a,b"');
    expect(csvEscape('say "hi"')).toBe('"say ""hi"""');
    expect(csvEscape('two\nlines')).toBe('"two\nlines"');
  });
});

describe('label field', () => {
  it('should escape separators', () => {
    expect(formatLabelField({ host: 'a', expr: 'x=1;y' })).toBe('host=a;expr=x\\=1\\;y');
  });

  it('should parse escaped separators', () => {
    expect(parseLabelField('host=a;expr=x\\=1\\;y')).toEqual({ host: 'a', expr: 'x=1;y' });
    expect(parseLabelField('')).toEqual({});
  });

  it('should describe malformed fields', () => {
    expect(parseLabelField('a=1;b')).toBe('label "b" has no "="');
    expect(parseLabelField('1x=2')).toBe('invalid label name "1x"');
    expect(parseLabelField('a=1;a=2')).toBe('duplicate label "a"');
    expect(parseLabelField('a=1\\')).toBe('dangling escape');
  });
});

describe('splitCsvRecord', () => {
  it('should handle quoted fields', () => {
    expect(splitCsvRecord('1,"a,b","say ""hi""",')).toEqual(['1', 'a,b', 'say "hi"', '']);
  });

  it('should reject text after a closing quote', () => {
    expect(splitCsvRecord('"a"b,c')).toBeUndefined();
    expect(splitCsvRecord('"open')).toBeUndefined();
  });
});

describe('CsvCodec', () => {
  it('should write a header and one row per sample', async () => {
    const samples: Sample[] = [
      { metricName: 'cpu', labels: { host: 'a,b', mode: 'x;y' }, timestamp: 1700000000.25, value: 0.5 },
      { metricName: 'cpu', labels: {}, timestamp: undefined, value: NaN },
    ];
    await expect(encodeToString(codec, samples)).resolves.toBe(
      'timestamp,value,metric_name,labels\n1700000000.25,0.5,cpu,"host=a,b;mode=x\\;y"\n,NaN,cpu,\n'
    );
  });

  it('should decode rows and report bad ones in place', async () => {
    const text = [
      'timestamp,value,metric_name,labels',
      '1700000000,1,up,job=a',
      ',NaN,up,',
      'abc,1,up,',
      '1,2',
      '1,2,up,a=1,extra',
      '',
    ].join('\n');
    const items = await decodeAll(codec, [text]);
    expect(items.map(describeItem)).toEqual([
      { metricName: 'up', labels: { job: 'a' }, timestamp: 1700000000, value: 1 },
      { metricName: 'up', labels: {}, timestamp: undefined, value: NaN },
      ['InvalidNumber', 4, 'timestamp "abc"'],
      ['MissingField', 5, 'expected timestamp,value,metric_name[,labels]'],
      ['MalformedLabelSet', 6, 'expected 4 fields, got 5'],
    ]);
  });

  it('should accept input without a header', async () => {
    const items = await decodeAll(codec, ['1,2,up\n']);
    expect(items).toEqual([{ metricName: 'up', labels: {}, timestamp: 1, value: 2 }]);
  });

  it('should join a quoted field that spans lines', async () => {
    const items = await decodeAll(codec, ['1,1,up,"job=line1\nline2"\n2,2,up,\n']);
    expect(items.map(describeItem)).toEqual([
      { metricName: 'up', labels: { job: 'line1\nline2' }, timestamp: 1, value: 1 },
      { metricName: 'up', labels: {}, timestamp: 2, value: 2 },
    ]);
  });

  it('should keep CRLF inside a quoted field and strip it after a row', async () => {
    const items = await decodeAll(codec, ['1,1,up,"job=a\r\nb"\r\n2,2,up,\r\n']);
    expect(items.map(describeItem)).toEqual([
      { metricName: 'up', labels: { job: 'a\r\nb' }, timestamp: 1, value: 1 },
      { metricName: 'up', labels: {}, timestamp: 2, value: 2 },
    ]);
  });

  it('should round-trip a label value with a CRLF break', async () => {
    const samples: Sample[] = [{ metricName: 'up', labels: { cr: 'line\r\nbreak' }, timestamp: 1, value: 1 }];
    const text = await encodeToString(codec, samples);
    await expect(decodeAll(codec, [text])).resolves.toEqual(samples);
  });

  it('should decode what it encodes', async () => {
    const samples: Sample[] = [
      { metricName: 'disk', labels: { path: '/var,"x"', note: 'a=b;c' }, timestamp: 1700000000.5, value: -Infinity },
    ];
    const text = await encodeToString(codec, samples);
    await expect(decodeAll(codec, [text])).resolves.toEqual(samples);
  });
});
