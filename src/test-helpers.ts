// SPDX-License-Identifier: MIT
/**
 * Shared fixtures for tests: a MockAgent with network access disabled and
 * helpers for matching request paths and reading request parameters.
 */
import { MockAgent } from 'undici';
import type { ClientConfig, PartialClientConfig } from './config.js';
import { mergeClientConfig } from './config.js';

export const TEST_HOST = 'http://vm.test:8428';

export function createMockAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return agent;
}

/**
 * Matcher for an interceptor: the request path (before `?`) equals `pathname`.
 */
export function pathIs(pathname: string): (path: string) => boolean {
  return (path) => path.split('?')[0] === pathname;
}

/**
 * Query-string parameters of a request path.
 */
export function paramsOf(path: string): URLSearchParams {
  const qs = path.indexOf('?');
  return new URLSearchParams(qs === -1 ? '' : path.slice(qs + 1));
}

/**
 * Configuration pointing at `TEST_HOST` with fast, jitter-free retries.
 */
export function testConfig(partial: PartialClientConfig = {}): ClientConfig {
  return mergeClientConfig({
    host: TEST_HOST,
    ...partial,
    retry: { initialBackoffMs: 1, maxBackoffMs: 5, jitter: false, ...partial.retry },
    logging: { level: 'silent', ...partial.logging },
  });
}

/**
 * A backend JSON envelope for `/api/v1/query` and `/api/v1/query_range`.
 */
export function successEnvelope(resultType: string, result: unknown): string {
  return JSON.stringify({ status: 'success', data: { resultType, result } });
}
