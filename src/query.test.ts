// SPDX-License-Identifier: MIT
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { MockAgent } from 'undici';
import { resolveEndpoints } from './endpoints.js';
import { QueryEngine, backendErrorFrom, decodeQueryResponse } from './query.js';
import { TEST_HOST, createMockAgent, paramsOf, pathIs, successEnvelope, testConfig } from './test-helpers.js';
import { HttpTransport } from './transport.js';
import { QueryError, TransportError } from './types/errors.js';

async function queryFailure(promise: Promise<unknown>): Promise<QueryError> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!(error instanceof QueryError)) {
    throw new Error(`expected a QueryError, got ${String(error)}`);
  }
  return error;
}

describe('decodeQueryResponse', () => {
  it('should decode a vector', () => {
    const result = decodeQueryResponse(
      successEnvelope('vector', [{ metric: { __name__: 'up', job: 'node' }, value: [1700000000, '1'] }])
    );
    expect(result).toEqual({
      status: 'success',
      resultType: 'vector',
      series: [{ metric: { __name__: 'up', job: 'node' }, points: [[1700000000, 1]] }],
      warnings: [],
    });
  });

  it('should decode a matrix with special values', () => {
    const result = decodeQueryResponse(
      successEnvelope('matrix', [
        {
          metric: { __name__: 'load' },
          values: [
            [1700000000, '0.5'],
            [1700000060, 'NaN'],
            [1700000120, '+Inf'],
          ],
        },
      ])
    );
    expect(result.resultType).toBe('matrix');
    const points = result.series[0]?.points ?? [];
    expect(points.map(([ts]) => ts)).toEqual([1700000000, 1700000060, 1700000120]);
    expect(points[0]?.[1]).toBe(0.5);
    expect(Number.isNaN(points[1]?.[1])).toBe(true);
    expect(points[2]?.[1]).toBe(Infinity);
  });

  it('should wrap a scalar into one unlabeled series', () => {
    const result = decodeQueryResponse(successEnvelope('scalar', [1700000000, '42']));
    expect(result.series).toEqual([{ metric: {}, points: [[1700000000, 42]] }]);
  });

  it('should keep a string result out of the series', () => {
    const result = decodeQueryResponse(successEnvelope('string', [1700000000, 'hello']));
    expect(result).toMatchObject({ resultType: 'string', timestamp: 1700000000, value: 'hello', series: [] });
  });

  it('should carry warnings', () => {
    const body = JSON.stringify({
      status: 'success',
      data: { resultType: 'vector', result: [] },
      warnings: ['partial response'],
    });
    expect(decodeQueryResponse(body).warnings).toEqual(['partial response']);
  });

  it('should map an error envelope to a backend error', () => {
    try {
      decodeQueryResponse(JSON.stringify({ status: 'error', errorType: 'bad_data', error: 'parse error at 3' }));
      expect.fail('expected a QueryError');
    } catch (err) {
      expect(err).toBeInstanceOf(QueryError);
      expect(err instanceof QueryError && [err.kind, err.errorType, err.message]).toEqual([
        'backend_error',
        'bad_data',
        'parse error at 3',
      ]);
    }
  });

  it('should reject malformed bodies as decode errors', () => {
    const kindOf = (body: string): string | undefined => {
      try {
        decodeQueryResponse(body);
        return undefined;
      } catch (err) {
        return err instanceof QueryError ? err.kind : 'other';
      }
    };
    expect(kindOf('not json')).toBe('decode_error');
    expect(kindOf('{"data": {}}')).toBe('decode_error');
    expect(kindOf(successEnvelope('vector', 'nope'))).toBe('decode_error');
    expect(kindOf(successEnvelope('histogram', []))).toBe('decode_error');
  });

  it('should reject an unparseable sample value', () => {
    expect(() => decodeQueryResponse(successEnvelope('scalar', [1700000000, 'abc']))).toThrow(
      'Failed to decode response: invalid sample value "abc"'
    );
  });
});

describe('backendErrorFrom', () => {
  it('should only recognize error envelopes', () => {
    expect(backendErrorFrom('{"status":"error","error":"boom"}')?.message).toBe('boom');
    expect(backendErrorFrom('{"status":"success","data":[]}')).toBeUndefined();
    expect(backendErrorFrom('plain text')).toBeUndefined();
  });
});

describe('QueryEngine', () => {
  let agent: MockAgent;
  let transport: HttpTransport;
  let engine: QueryEngine;
  let lastPath: string;

  const capture =
    (pathname: string) =>
    (path: string): boolean => {
      if (!pathIs(pathname)(path)) return false;
      lastPath = path;
      return true;
    };

  beforeEach(() => {
    const config = testConfig();
    agent = createMockAgent();
    transport = new HttpTransport({ dispatcher: agent, retry: config.retry });
    engine = new QueryEngine(transport, resolveEndpoints(config));
    lastPath = '';
  });

  afterEach(async () => {
    await transport.close();
    await agent.close();
  });

  it('should send an instant query with an evaluation time', async () => {
    agent
      .get(TEST_HOST)
      .intercept({ path: capture('/api/v1/query'), method: 'GET' })
      .reply(200, successEnvelope('vector', []));

    const result = await engine.instantQuery('up', { time: 1700000000.5 });
    expect(result.series).toEqual([]);
    const params = paramsOf(lastPath);
    expect(params.get('query')).toBe('up');
    expect(params.get('time')).toBe('1700000000.5');
  });

  it('should send range parameters', async () => {
    agent
      .get(TEST_HOST)
      .intercept({ path: capture('/api/v1/query_range'), method: 'GET' })
      .reply(200, successEnvelope('matrix', []));

    await engine.rangeQuery('rate(x[5m])', { start: 1700000000, end: 1700000600, step: '1m' });
    const params = paramsOf(lastPath);
    expect([params.get('query'), params.get('start'), params.get('end'), params.get('step')]).toEqual([
      'rate(x[5m])',
      '1700000000',
      '1700000600',
      '60',
    ]);
  });

  it('should reject an inverted range before sending anything', async () => {
    const error = await queryFailure(engine.rangeQuery('up', { start: 20, end: 10, step: 1 }));
    expect(error.kind).toBe('invalid_range');
    expect(error.message).toBe('start (20) is after end (10)');
  });

  it('should reject a zero step', async () => {
    const error = await queryFailure(engine.rangeQuery('up', { start: 10, end: 20, step: 0 }));
    expect(error.kind).toBe('invalid_range');
  });

  it('should reject a step that rounds to zero milliseconds', async () => {
    const error = await queryFailure(engine.rangeQuery('up', { start: 0, end: 10, step: 0.0004 }));
    expect(error.kind).toBe('invalid_range');
    expect(error.message).toBe('step must be at least 1ms, got 0.0004');
  });

  it('should turn a 400 error envelope into a backend error', async () => {
    agent
      .get(TEST_HOST)
      .intercept({ path: pathIs('/api/v1/query'), method: 'GET' })
      .reply(400, JSON.stringify({ status: 'error', errorType: 'bad_data', error: 'unexpected token' }));

    const error = await queryFailure(engine.instantQuery('up{'));
    expect(error.kind).toBe('backend_error');
    expect(error.errorType).toBe('bad_data');
    expect(error.message).toBe('unexpected token');
  });

  it('should keep transport errors for non-envelope bodies', async () => {
    agent.get(TEST_HOST).intercept({ path: pathIs('/api/v1/query'), method: 'GET' }).reply(400, 'bad');
    await expect(engine.instantQuery('up')).rejects.toBeInstanceOf(TransportError);
  });

  it('should list metric names with match selectors', async () => {
    agent
      .get(TEST_HOST)
      .intercept({ path: capture('/api/v1/label/__name__/values'), method: 'GET' })
      .reply(200, JSON.stringify({ status: 'success', data: ['go_gc', 'up'] }));

    await expect(engine.labelValues({ match: ['{job="node"}'] })).resolves.toEqual(['go_gc', 'up']);
    expect(paramsOf(lastPath).getAll('match[]')).toEqual(['{job="node"}']);
  });

  it('should omit empty match lists', async () => {
    agent
      .get(TEST_HOST)
      .intercept({ path: capture('/api/v1/label/__name__/values'), method: 'GET' })
      .reply(200, JSON.stringify({ status: 'success', data: [] }));

    await engine.labelValues({ match: [] });
    expect(paramsOf(lastPath).has('match[]')).toBe(false);
  });

  it('should export raw samples in seconds', async () => {
    const body = [
      JSON.stringify({
        metric: { __name__: 'up', job: 'node' },
        values: [1, null],
        timestamps: [1700000000000, 1700000015500],
      }),
      '',
    ].join('\n');
    agent
      .get(TEST_HOST)
      .intercept({ path: capture('/api/v1/export'), method: 'GET' })
      .reply(200, body);

    const samples = await engine.exportRaw('up', { start: 1700000000, end: 1700000060 });
    expect(samples).toHaveLength(2);
    expect(samples[0]).toEqual({ metricName: 'up', labels: { job: 'node' }, timestamp: 1700000000, value: 1 });
    expect(samples[1]?.timestamp).toBe(1700000015.5);
    expect(Number.isNaN(samples[1]?.value)).toBe(true);
    const params = paramsOf(lastPath);
    expect(params.getAll('match[]')).toEqual(['up']);
    expect(params.get('start')).toBe('1700000000');
  });

  it('should fail the export on an undecodable line', async () => {
    agent
      .get(TEST_HOST)
      .intercept({ path: pathIs('/api/v1/export'), method: 'GET' })
      .reply(200, '{"metric":{"job":"x"},"values":[1],"timestamps":[1]}\n');

    const error = await queryFailure(engine.exportRaw('x', { start: 0, end: 1 }));
    expect(error.kind).toBe('decode_error');
    expect(error.message).toBe('Failed to decode response: Line 1: MissingField (__name__)');
  });
});
