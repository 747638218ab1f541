// SPDX-License-Identifier: MIT
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Readable, Writable } from 'node:stream';
import type { MockAgent } from 'undici';
import { TEST_HOST, createMockAgent, pathIs, successEnvelope } from '../test-helpers.js';
import { ConfigurationError, TransportError } from '../types/errors.js';
import { VERSION } from '../version.js';
import type { CliContext } from './context.js';
import { exitCodeFor } from './context.js';
import { run } from './program.js';

class Collector extends Writable {
  text = '';

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.text += chunk.toString();
    callback();
  }
}

interface CliRun {
  code: number;
  stdout: string;
  stderr: string;
}

describe('vm-cli', () => {
  let agent: MockAgent;
  let dir: string;

  beforeEach(async () => {
    agent = createMockAgent();
    dir = await mkdtemp(join(tmpdir(), 'vm-cli-'));
  });

  afterEach(async () => {
    await agent.close();
    await rm(dir, { recursive: true, force: true });
  });

  async function runCli(args: string[], stdin = ''): Promise<CliRun> {
    const stdout = new Collector();
    const stderr = new Collector();
    const ctx: CliContext = {
      openStdin: () => Readable.from([stdin]),
      stdout,
      stderr,
      env: { HOME: dir, VM_LOG_LEVEL: 'silent' },
      cwd: dir,
      signal: new AbortController().signal,
      dispatcher: agent,
    };
    const code = await run(['--host', TEST_HOST, '--no-color', ...args], ctx);
    return { code, stdout: stdout.text, stderr: stderr.text };
  }

  describe('program', () => {
    it('should print the version', async () => {
      const result = await runCli(['--version']);
      expect(result).toEqual({ code: 0, stdout: `${VERSION}\n`, stderr: '' });
    });

    it('should reject an unknown command', async () => {
      const result = await runCli(['nope']);
      expect(result.code).toBe(1);
      expect(result.stderr).toContain("unknown command 'nope'");
    });

    it('should exit 2 on an unusable host', async () => {
      const result = await runCli(['--host', 'ftp://vm.test:21', 'health']);
      expect(result.code).toBe(2);
    });
  });

  describe('health', () => {
    it('should report a healthy server', async () => {
      agent.get(TEST_HOST).intercept({ path: '/health', method: 'GET' }).reply(200, 'OK');
      const result = await runCli(['health']);
      expect(result.code).toBe(0);
      expect(result.stdout).toMatch(/^✓ http:\/\/vm\.test:8428 is healthy \(\d+(\.\d+)?ms\)\n$/);
    });

    it('should exit 1 when the server is unhealthy', async () => {
      agent.get(TEST_HOST).intercept({ path: '/health', method: 'GET' }).reply(200, 'starting');
      const result = await runCli(['health', '--status-only']);
      expect(result).toEqual({ code: 1, stdout: 'UNHEALTHY\n', stderr: '' });
    });
  });

  describe('query', () => {
    function replyVector(): void {
      agent
        .get(TEST_HOST)
        .intercept({ path: pathIs('/api/v1/query'), method: 'GET' })
        .reply(
          200,
          successEnvelope('vector', [
            { metric: { __name__: 'up', job: 'a' }, value: [1700000000, '1'] },
            { metric: { __name__: 'up', job: 'b' }, value: [1700000000, '0'] },
          ])
        );
    }

    it('should print the series count', async () => {
      replyVector();
      const result = await runCli(['query', 'up', '--count']);
      expect(result).toEqual({ code: 0, stdout: '2\n', stderr: '' });
    });

    it('should print label sets only', async () => {
      replyVector();
      const result = await runCli(['query', 'up', '--metrics-only']);
      expect(result.stdout).toBe('up{job="a"}\nup{job="b"}\n');
    });

    it('should render json', async () => {
      replyVector();
      const result = await runCli(['query', 'up', '-f', 'json']);
      expect(JSON.parse(result.stdout)).toEqual({
        status: 'success',
        data: {
          resultType: 'vector',
          result: [
            { metric: { __name__: 'up', job: 'a' }, value: [1700000000, '1'] },
            { metric: { __name__: 'up', job: 'b' }, value: [1700000000, '0'] },
          ],
        },
      });
    });

    it('should print backend errors and exit 1', async () => {
      agent
        .get(TEST_HOST)
        .intercept({ path: pathIs('/api/v1/query'), method: 'GET' })
        .reply(400, JSON.stringify({ status: 'error', errorType: 'bad_data', error: 'unexpected token' }));
      const result = await runCli(['query', 'up{']);
      expect(result.code).toBe(1);
      expect(result.stdout).toBe('');
      expect(result.stderr).toContain('unexpected token');
    });
  });

  describe('export', () => {
    beforeEach(() => {
      agent
        .get(TEST_HOST)
        .intercept({ path: pathIs('/api/v1/export'), method: 'GET' })
        .reply(200, '{"metric":{"__name__":"up"},"values":[1,0],"timestamps":[1000000,1005000]}\n');
    });

    it('should write to stdout and summarize on stderr', async () => {
      const result = await runCli(['export', 'up', '--start', '1000', '--end', '1009', '-f', 'prometheus']);
      expect(result.code).toBe(0);
      expect(result.stdout).toBe('up 1 1000000\nup 0 1005000\n');
      expect(result.stderr).toMatch(/^Exported 2 samples in 1 chunks \(\d+ms\)\n$/);
    });

    it('should take the format from the output file', async () => {
      const output = join(dir, 'out.csv');
      const result = await runCli(['export', 'up', '--start', '1000', '--end', '1009', '-o', output]);
      expect(result.code).toBe(0);
      await expect(readFile(output, 'utf8')).resolves.toBe('timestamp,value,metric_name,labels\n1000,1,up,\n1005,0,up,\n');
    });
  });

  describe('export output', () => {
    it('should report an output file that cannot be opened', async () => {
      const output = join(dir, 'missing', 'out.prom');
      const result = await runCli(['export', 'up', '--start', '999', '--end', '1001', '-o', output]);
      expect(result.code).toBe(1);
      expect(result.stdout).toBe('');
      expect(result.stderr).toContain(`[INVALID_ARGUMENT] Cannot write ${output}: ENOENT`);
    });
  });

  describe('import', () => {
    it('should read stdin for "-"', async () => {
      agent.get(TEST_HOST).intercept({ path: '/api/v1/import', method: 'POST' }).reply(204, '');
      const result = await runCli(['import', '-', '-f', 'prometheus'], 'up 1 1000\nup 2 2000\n');
      expect(result.code).toBe(0);
      expect(result.stderr).toMatch(/^Imported 2 samples in 1 batches \(\d+ms\)\n$/);
    });

    it('should count without sending on a dry run', async () => {
      const input = join(dir, 'data.prom');
      await writeFile(input, 'up 1 1000\nbad line here\nup 2 2000\n');
      const result = await runCli(['import', input, '-f', 'prometheus', '--dry-run', '--skip-errors']);
      expect(result.code).toBe(0);
      expect(result.stderr.split('\n')[0]).toBe('Dry run: 2 samples in 1 batches would be sent');
      expect(result.stderr.split('\n')[1]).toBe('Skipped 1 invalid records');
    });
  });

  describe('admin', () => {
    it('should refuse to delete without confirmation', async () => {
      const result = await runCli(['admin', 'delete', 'up']);
      expect(result).toEqual({
        code: 1,
        stdout: '',
        stderr: '[INVALID_ARGUMENT] Deleting series cannot be undone; pass --yes to confirm.\n',
      });
    });

    it('should show the retention period', async () => {
      agent.get(TEST_HOST).intercept({ path: '/flags', method: 'GET' }).reply(200, '-retentionPeriod=90d\n');
      const result = await runCli(['admin', 'retention']);
      expect(result.stdout).toBe('retentionPeriod: 90d (90d)\n');
    });
  });
});

describe('exitCodeFor', () => {
  it('should map errors to exit codes', () => {
    expect(exitCodeFor(new ConfigurationError('bad'))).toBe(2);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
    expect(exitCodeFor(TransportError.cancelled())).toBe(130);
  });
});
