// SPDX-License-Identifier: MIT
import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CLIENT_CONFIG,
  DEFAULT_HOST,
  fastFailConfig,
  highLatencyConfig,
  isClusterMode,
  mergeClientConfig,
  noRetryConfig,
} from './config.js';
import { DEFAULT_RETRY_CONFIG } from './retry.js';

describe('mergeClientConfig', () => {
  it('should return defaults for an empty partial', () => {
    const config = mergeClientConfig();
    expect(config.host).toBe(DEFAULT_HOST);
    expect(config.timeoutS).toBe(30);
    expect(config.auth).toEqual({ type: 'none' });
    expect(config.retry).toEqual(DEFAULT_RETRY_CONFIG);
    expect(config.export).toEqual({ defaultFormat: 'prometheus', chunkSize: 1000, windowS: 3600, step: '1m' });
    expect(config.import.batchSize).toBe(1000);
    expect(config.cluster).toBeUndefined();
  });

  it('should merge nested sections field by field', () => {
    const config = mergeClientConfig({ export: { chunkSize: 50 }, retry: { maxAttempts: 7 } });
    expect(config.export.chunkSize).toBe(50);
    expect(config.export.step).toBe('1m');
    expect(config.retry.maxAttempts).toBe(7);
    expect(config.retry.initialBackoffMs).toBe(DEFAULT_RETRY_CONFIG.initialBackoffMs);
  });

  it('should fill cluster defaults when a cluster section is present', () => {
    const config = mergeClientConfig({ cluster: { vmstorageHost: 'http://vmstorage:8482' } });
    expect(config.cluster).toEqual({
      useSelectEndpoint: false,
      selectAccountId: '0',
      selectProjectId: '0',
      vmstorageHost: 'http://vmstorage:8482',
    });
    expect(isClusterMode(config)).toBe(true);
    expect(isClusterMode(DEFAULT_CLIENT_CONFIG)).toBe(false);
  });

  it('should freeze the result', () => {
    const config = mergeClientConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.retry)).toBe(true);
  });
});

describe('presets', () => {
  it('should disable retry', () => {
    expect(noRetryConfig({ host: 'http://a:1' })).toMatchObject({ host: 'http://a:1', retry: { maxAttempts: 1 } });
  });

  it('should fail fast', () => {
    const config = fastFailConfig();
    expect(config.timeoutS).toBe(5);
    expect(config.retry.maxAttempts).toBe(1);
  });

  it('should tolerate high latency', () => {
    const config = highLatencyConfig({ retry: { jitter: true } });
    expect(config.timeoutS).toBe(120);
    expect(config.retry).toMatchObject({ maxAttempts: 5, initialBackoffMs: 500, jitter: true });
  });
});
