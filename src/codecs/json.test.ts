// SPDX-License-Identifier: MIT
import { describe, it, expect } from 'vitest';
import yaml from 'js-yaml';
import { isParseError } from '../types/errors.js';
import type { Sample } from '../types/sample.js';
import { decodeAll, encodeToString } from './base.js';
import { JsonCodec } from './json.js';
import type { DecodeItem } from './types.js';
import { YamlCodec } from './yaml.js';

function describeItem(item: DecodeItem): unknown {
  return isParseError(item) ? [item.reason, item.line, item.detail] : item;
}

const samples: Sample[] = [
  { metricName: 'up', labels: { job: 'a' }, timestamp: 1, value: 1 },
  { metricName: 'up', labels: { job: 'a' }, timestamp: 2, value: NaN },
  { metricName: 'down', labels: {}, timestamp: undefined, value: 0 },
];

describe('JsonCodec', () => {
  const codec = new JsonCodec();

  it('should group consecutive samples of a series', async () => {
    await expect(encodeToString(codec, samples)).resolves.toBe(
      [
        '[',
        '{"metric":{"__name__":"up","job":"a"},"values":[[1,"1"],[2,"NaN"]]},',
        '{"metric":{"__name__":"down"},"values":[[null,"0"]]}',
        ']',
        '',
      ].join('\n')
    );
  });

  it('should encode an empty array', async () => {
    await expect(encodeToString(codec, [])).resolves.toBe('[]\n');
  });

  it('should decode series and report bad records by position', async () => {
    const doc = JSON.stringify([
      { metric: { __name__: 'up' }, values: [[1, '2'], [3, 4]] },
      { metric: { job: 'x' }, values: [] },
      { metric: { __name__: 'bad', n: 1 }, values: [] },
      { metric: { __name__: 'v' }, values: [[1, 'zz']] },
      { values: [] },
    ]);
    const items = await decodeAll(codec, [doc]);
    expect(items.map(describeItem)).toEqual([
      { metricName: 'up', labels: {}, timestamp: 1, value: 2 },
      { metricName: 'up', labels: {}, timestamp: 3, value: 4 },
      ['MissingField', 2, '__name__'],
      ['MalformedLabelSet', 3, 'label "n" is not a string'],
      ['InvalidNumber', 4, 'value "zz"'],
      ['MissingField', 5, 'series needs "metric" and "values"'],
    ]);
  });

  it('should report a document that is not an array', async () => {
    const items = await decodeAll(codec, ['{"metric":{}}']);
    expect(items.map(describeItem)).toEqual([['MissingField', 1, 'document must be an array of series']]);
  });

  it('should report invalid JSON once', async () => {
    const items = await decodeAll(codec, ['[{']);
    expect(items).toHaveLength(1);
    expect(isParseError(items[0]) && items[0].reason).toBe('MalformedLabelSet');
  });

  it('should yield nothing for empty input', async () => {
    await expect(decodeAll(codec, ['  \n'])).resolves.toEqual([]);
  });

  it('should decode what it encodes', async () => {
    const text = await encodeToString(codec, samples);
    await expect(decodeAll(codec, [text])).resolves.toEqual(samples);
  });
});

describe('YamlCodec', () => {
  const codec = new YamlCodec();

  it('should concatenate series into one YAML sequence', async () => {
    const text = await encodeToString(codec, samples);
    expect(yaml.load(text)).toEqual([
      { metric: { __name__: 'up', job: 'a' }, values: [[1, '1'], [2, 'NaN']] },
      { metric: { __name__: 'down' }, values: [[null, '0']] },
    ]);
  });

  it('should encode an empty sequence', async () => {
    await expect(encodeToString(codec, [])).resolves.toBe('[]\n');
  });

  it('should decode a hand-written document', async () => {
    const text = [
      '- metric:',
      '    __name__: temp',
      '    room: kitchen',
      '  values:',
      '    - [1700000000, "21.5"]',
      '    - [1700000060, 22]',
      '',
    ].join('\n');
    await expect(decodeAll(codec, [text])).resolves.toEqual([
      { metricName: 'temp', labels: { room: 'kitchen' }, timestamp: 1700000000, value: 21.5 },
      { metricName: 'temp', labels: { room: 'kitchen' }, timestamp: 1700000060, value: 22 },
    ]);
  });

  it('should report a syntax error on line 1', async () => {
    const items = await decodeAll(codec, ['- metric: [\n']);
    expect(items.map((i) => isParseError(i) && [i.reason, i.line])).toEqual([['MalformedLabelSet', 1]]);
  });

  it('should decode what it encodes', async () => {
    const labels = { flag: 'true', empty: 'null', tilde: '~', path: 'C:\\temp', quote: 'say "hi"', text: 'two\nlines' };
    const samples: Sample[] = [
      { metricName: 'app_state', labels, timestamp: 1700000000.123, value: NaN },
      { metricName: 'app_state', labels, timestamp: undefined, value: Infinity },
      { metricName: 'down', labels: {}, timestamp: 5, value: -Infinity },
    ];
    const text = await encodeToString(codec, samples);
    await expect(decodeAll(codec, [text])).resolves.toEqual(samples);
  });

  it('should yield nothing for an empty document', async () => {
    await expect(decodeAll(codec, [''])).resolves.toEqual([]);
  });
});
