// SPDX-License-Identifier: MIT
import { describe, it, expect } from 'vitest';
import { InvalidArgumentError, isParseError } from '../types/errors.js';
import type { Sample } from '../types/sample.js';
import { decodeAll, encodeToString } from './base.js';
import { JsonlCodec, decodeJsonlLine } from './jsonl.js';

const codec = new JsonlCodec();

function failure(raw: string): unknown {
  const item = decodeJsonlLine(raw, 3);
  return isParseError(item) ? [item.reason, item.line, item.detail] : item;
}

describe('decodeJsonlLine', () => {
  it('should expand a line into samples in seconds', () => {
    expect(
      decodeJsonlLine('{"metric":{"__name__":"up","job":"a"},"values":[1,"+Inf"],"timestamps":[1000,2500]}', 1)
    ).toEqual([
      { metricName: 'up', labels: { job: 'a' }, timestamp: 1, value: 1 },
      { metricName: 'up', labels: { job: 'a' }, timestamp: 2.5, value: Infinity },
    ]);
  });

  it('should report each kind of bad line', () => {
    expect(failure('{"metric":{"__name__":"a"},"values":[1,2],"timestamps":[1]}')).toEqual([
      'MissingField',
      3,
      '2 values but 1 timestamps',
    ]);
    expect(failure('{"metric":{"__name__":"a","n":5},"values":[],"timestamps":[]}')).toEqual([
      'MalformedLabelSet',
      3,
      'label "n" is not a string',
    ]);
    expect(failure('{"metric":{"job":"a"},"values":[],"timestamps":[]}')).toEqual(['MissingField', 3, '__name__']);
    expect(failure('{"metric":{"__name__":"a"},"values":["x"],"timestamps":[1]}')).toEqual([
      'InvalidNumber',
      3,
      'value "x"',
    ]);
    expect(failure('{"metric":{}}')).toEqual(['MissingField', 3, 'expected "metric", "values" and "timestamps"']);
  });

  it('should report invalid JSON as a malformed line', () => {
    const item = decodeJsonlLine('nope', 9);
    expect(isParseError(item) && [item.reason, item.line, item.raw]).toEqual(['MalformedLabelSet', 9, 'nope']);
  });
});

describe('JsonlCodec', () => {
  it('should put consecutive samples of a series on one line', async () => {
    const samples: Sample[] = [
      { metricName: 'up', labels: { job: 'a' }, timestamp: 1700000000, value: 1 },
      { metricName: 'up', labels: { job: 'a' }, timestamp: 1700000001.5, value: Infinity },
      { metricName: 'x', labels: {}, timestamp: 1, value: 2 },
    ];
    await expect(encodeToString(codec, samples)).resolves.toBe(
      '{"metric":{"__name__":"up","job":"a"},"values":[1,"+Inf"],"timestamps":[1700000000000,1700000001500]}\n' +
        '{"metric":{"__name__":"x"},"values":[2],"timestamps":[1000]}\n'
    );
  });

  it('should refuse samples without a timestamp', () => {
    const encoder = codec.createEncoder();
    expect(() => encoder.encode([{ metricName: 'up', labels: {}, timestamp: undefined, value: 1 }])).toThrow(
      new InvalidArgumentError('Sample of "up" has no timestamp')
    );
  });

  it('should skip blank lines but count them', async () => {
    const text = '\n{"metric":{"__name__":"a"},"values":[1],"timestamps":[1000]}\n\nbroken\n';
    const items = await decodeAll(codec, [text]);
    expect(items.map((i) => (isParseError(i) ? i.line : i.metricName))).toEqual(['a', 4]);
  });
});
