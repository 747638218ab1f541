// SPDX-License-Identifier: MIT
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { MockAgent } from 'undici';
import { resolveEndpoints } from '../endpoints.js';
import { QueryEngine } from '../query.js';
import { TEST_HOST, createMockAgent, pathIs, successEnvelope, testConfig } from '../test-helpers.js';
import { HttpTransport } from '../transport.js';
import { TransportError } from '../types/errors.js';
import { HealthClient, HealthStatus } from './health.js';

describe('HealthClient', () => {
  let agent: MockAgent;
  let transport: HttpTransport;
  let client: HealthClient;

  beforeEach(() => {
    const config = testConfig({ retry: { maxAttempts: 1 } });
    agent = createMockAgent();
    transport = new HttpTransport({ dispatcher: agent, retry: config.retry });
    const endpoints = resolveEndpoints(config);
    client = new HealthClient(transport, endpoints, new QueryEngine(transport, endpoints));
  });

  afterEach(async () => {
    await transport.close();
    await agent.close();
  });

  function replyHealth(body: string): void {
    agent.get(TEST_HOST).intercept({ path: '/health', method: 'GET' }).reply(200, body);
  }

  describe('check', () => {
    it('should return healthy status for OK', async () => {
      replyHealth('OK\n');

      const result = await client.check();

      expect(result.status).toBe(HealthStatus.Ok);
      expect(result.healthy).toBe(true);
      expect(result.raw).toBe('OK');
      expect(result.latencyMs).toBeGreaterThanOrEqual(0);
    });

    it('should accept any casing of ok', async () => {
      replyHealth('ok');
      await expect(client.check()).resolves.toMatchObject({ status: HealthStatus.Ok, healthy: true });
    });

    it('should return unhealthy for any other answer', async () => {
      replyHealth('starting');
      await expect(client.check()).resolves.toMatchObject({
        status: HealthStatus.Unhealthy,
        healthy: false,
        raw: 'starting',
      });
    });

    it('should return unknown for an empty body', async () => {
      replyHealth('');
      await expect(client.check()).resolves.toMatchObject({ status: HealthStatus.Unknown, healthy: false });
    });

    it('should propagate transport errors', async () => {
      agent.get(TEST_HOST).intercept({ path: '/health', method: 'GET' }).reply(503, 'down');
      await expect(client.check()).rejects.toBeInstanceOf(TransportError);
    });
  });

  describe('isHealthy', () => {
    it('should return true when serving', async () => {
      replyHealth('OK');
      await expect(client.isHealthy()).resolves.toBe(true);
    });

    it('should return false on connection failure', async () => {
      agent
        .get(TEST_HOST)
        .intercept({ path: '/health', method: 'GET' })
        .replyWithError(new Error('connection refused'));
      await expect(client.isHealthy()).resolves.toBe(false);
    });
  });

  describe('extendedCheck', () => {
    it('should run every probe', async () => {
      replyHealth('OK');
      agent
        .get(TEST_HOST)
        .intercept({ path: pathIs('/api/v1/query'), method: 'GET' })
        .reply(
          200,
          successEnvelope('vector', [
            { metric: { __name__: 'up', job: 'a' }, value: [1, '1'] },
            { metric: { __name__: 'up', job: 'b' }, value: [1, '0'] },
          ])
        );
      agent
        .get(TEST_HOST)
        .intercept({ path: pathIs('/api/v1/label/__name__/values'), method: 'GET' })
        .reply(200, JSON.stringify({ status: 'success', data: ['a', 'b', 'up'] }));

      const result = await client.extendedCheck();

      expect(result.healthy).toBe(true);
      expect(result.status).toBe(HealthStatus.Ok);
      expect(result.probes.map((p) => [p.name, p.ok, p.detail])).toEqual([
        ['health', true, 'OK'],
        ['query', true, '2 series for "up"'],
        ['metrics', true, '3 metric names'],
      ]);
    });

    it('should report failing probes without throwing', async () => {
      replyHealth('degraded');
      agent
        .get(TEST_HOST)
        .intercept({ path: pathIs('/api/v1/query'), method: 'GET' })
        .reply(200, successEnvelope('vector', []));
      agent
        .get(TEST_HOST)
        .intercept({ path: pathIs('/api/v1/label/__name__/values'), method: 'GET' })
        .reply(500, 'storage unavailable');

      const result = await client.extendedCheck();

      expect(result.healthy).toBe(false);
      expect(result.status).toBe(HealthStatus.Unhealthy);
      expect(result.probes.map((p) => [p.name, p.ok, p.detail])).toEqual([
        ['health', false, 'server answered "degraded"'],
        ['query', true, '0 series for "up"'],
        ['metrics', false, 'HTTP 500: storage unavailable'],
      ]);
    });
  });
});
