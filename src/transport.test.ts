// SPDX-License-Identifier: MIT
import { createServer } from 'node:http';
import type { Server } from 'node:http';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { MockAgent } from 'undici';
import { resolveEndpoint } from './endpoints.js';
import type { Endpoint } from './endpoints.js';
import { HttpTransport, authorizationHeader, buildUrl } from './transport.js';
import type { RetryConfig } from './retry.js';
import { TEST_HOST, createMockAgent, pathIs, testConfig } from './test-helpers.js';
import { TransportError } from './types/errors.js';
import { USER_AGENT } from './version.js';

const retry: RetryConfig = {
  maxAttempts: 3,
  initialBackoffMs: 1,
  maxBackoffMs: 2,
  backoffMultiplier: 2,
  jitter: false,
};

async function failure(promise: Promise<unknown>): Promise<TransportError> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!(error instanceof TransportError)) {
    throw new Error(`expected a TransportError, got ${String(error)}`);
  }
  return error;
}

describe('buildUrl', () => {
  it('should repeat array parameters and drop undefined ones', () => {
    expect(buildUrl('http://h/api', { 'match[]': ['a', 'b{x="1"}'], start: 10, end: undefined })).toBe(
      'http://h/api?match%5B%5D=a&match%5B%5D=b%7Bx%3D%221%22%7D&start=10'
    );
  });

  it('should leave the URL alone without parameters', () => {
    expect(buildUrl('http://h/api', {})).toBe('http://h/api');
  });
});

describe('authorizationHeader', () => {
  it('should encode basic credentials', () => {
    expect(authorizationHeader({ type: 'basic', username: 'user', password: 'test-secret' })).toBe(
      `Basic ${Buffer.from('user:test-secret').toString('base64')}`
    );
  });

  it('should build bearer and empty headers', () => {
    expect(authorizationHeader({ type: 'bearer', token: 'test-token' })).toBe('Bearer test-token');
    expect(authorizationHeader({ type: 'none' })).toBeUndefined();
  });
});

describe('HttpTransport', () => {
  let agent: MockAgent;
  let transport: HttpTransport;
  const config = testConfig();
  const query: Endpoint = resolveEndpoint(config, 'query');
  const imp: Endpoint = resolveEndpoint(config, 'import');

  beforeEach(() => {
    agent = createMockAgent();
    transport = new HttpTransport({ dispatcher: agent, retry, timeoutMs: 5000 });
  });

  afterEach(async () => {
    await transport.close();
    await agent.close();
  });

  it('should send the user agent and return the body', async () => {
    agent
      .get(TEST_HOST)
      .intercept({ path: pathIs('/api/v1/query'), method: 'GET', headers: { 'user-agent': USER_AGENT } })
      .reply(200, 'hello', { headers: { 'content-type': 'text/plain' } });

    const response = await transport.send(query, { params: { query: 'up' } });
    expect(response.status).toBe(200);
    expect(response.body).toBe('hello');
    expect(response.headers['content-type']).toBe('text/plain');
  });

  it('should send the authorization header', async () => {
    const authed = new HttpTransport({
      dispatcher: agent,
      retry,
      auth: { type: 'bearer', token: 'test-token' },
    });
    agent
      .get(TEST_HOST)
      .intercept({ path: pathIs('/api/v1/query'), method: 'GET', headers: { authorization: 'Bearer test-token' } })
      .reply(200, 'ok');

    await expect(authed.send(query)).resolves.toMatchObject({ body: 'ok' });
  });

  it('should retry a 503 and succeed', async () => {
    const pool = agent.get(TEST_HOST);
    pool.intercept({ path: pathIs('/api/v1/query'), method: 'GET' }).reply(503, 'busy');
    pool.intercept({ path: pathIs('/api/v1/query'), method: 'GET' }).reply(200, 'ok');

    const response = await transport.send(query);
    expect(response.body).toBe('ok');
  });

  it('should give up after maxAttempts', async () => {
    agent.get(TEST_HOST).intercept({ path: pathIs('/api/v1/query'), method: 'GET' }).reply(500, 'down').times(3);

    const error = await failure(transport.send(query));
    expect(error.kind).toBe('http_status');
    expect(error.status).toBe(500);
    expect(error.attempts).toBe(3);
  });

  it('should not retry a 400', async () => {
    agent.get(TEST_HOST).intercept({ path: pathIs('/api/v1/query'), method: 'GET' }).reply(400, 'bad query');

    const error = await failure(transport.send(query));
    expect(error.status).toBe(400);
    expect(error.body).toBe('bad query');
    expect(error.attempts).toBe(1);
  });

  it('should never retry a non-idempotent request', async () => {
    agent
      .get(TEST_HOST)
      .intercept({ path: '/api/v1/import', method: 'POST', body: '{"x":1}' })
      .reply(503, 'busy');

    const error = await failure(
      transport.send(imp, { body: '{"x":1}', contentType: 'application/stream+json' })
    );
    expect(error.status).toBe(503);
    expect(error.attempts).toBe(1);
  });

  it('should map connection failures to network errors', async () => {
    agent
      .get(TEST_HOST)
      .intercept({ path: pathIs('/api/v1/query'), method: 'GET' })
      .replyWithError(new Error('socket hang up'))
      .times(3);

    const error = await failure(transport.send(query));
    expect(error.kind).toBe('network');
    expect(error.message).toBe('Network error: socket hang up');
    expect(error.attempts).toBe(3);
  });

  it('should refuse to start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const error = await failure(transport.send(query, { signal: controller.signal }));
    expect(error.kind).toBe('cancelled');
  });
});

describe('HttpTransport against a stalled server', () => {
  let server: Server;
  let endpoint: Endpoint;

  beforeEach(async () => {
    server = createServer(() => {
      // never answers
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    endpoint = {
      operation: 'health',
      method: 'GET',
      url: `http://127.0.0.1:${address.port}/health`,
      idempotent: true,
    };
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('should time out each attempt', async () => {
    const transport = new HttpTransport({ timeoutMs: 50, retry: { ...retry, maxAttempts: 2 } });
    try {
      const error = await failure(transport.send(endpoint));
      expect(error.kind).toBe('timeout');
      expect(error.message).toBe('Request timed out after 50ms');
      expect(error.attempts).toBe(2);
    } finally {
      await transport.close();
    }
  });

  it('should cancel an in-flight request', async () => {
    const transport = new HttpTransport({ timeoutMs: 5000, retry });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 30);
    try {
      const error = await failure(transport.send(endpoint, { signal: controller.signal }));
      expect(error.kind).toBe('cancelled');
      expect(error.attempts).toBe(1);
    } finally {
      await transport.close();
    }
  });
});
