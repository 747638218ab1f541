// SPDX-License-Identifier: MIT
/**
 * HTTP transport: authentication, per-attempt timeouts and retry of
 * idempotent requests, on top of undici.
 */
import { Agent, request } from 'undici';
import type { Dispatcher } from 'undici';
import type { AuthConfig } from './config.js';
import type { Endpoint } from './endpoints.js';
import * as log from './logger.js';
import type { RetryConfig } from './retry.js';
import { DEFAULT_RETRY_CONFIG, withRetry } from './retry.js';
import { TransportError, errorFromStatus } from './types/errors.js';
import { USER_AGENT } from './version.js';

export type QueryParamValue = string | number | readonly string[] | undefined;

/**
 * Query-string parameters. Array values repeat the key (`match[]=a&match[]=b`).
 */
export type QueryParams = Record<string, QueryParamValue>;

export interface SendOptions {
  params?: QueryParams;
  body?: string | Uint8Array;
  contentType?: string;
  signal?: AbortSignal | undefined;
}

/**
 * A successful (2xx/3xx) response with its body fully read.
 */
export interface RawResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface TransportOptions {
  /** Per-attempt timeout in milliseconds (default: 30000). */
  timeoutMs?: number;
  auth?: AuthConfig;
  retry?: RetryConfig;
  /** Use this dispatcher instead of a private connection pool; it is not closed by `close()`. */
  dispatcher?: Dispatcher;
  /** Accept self-signed certificates. Ignored when `dispatcher` is given. */
  tlsInsecure?: boolean;
}

/**
 * Build the `Authorization` header value, if any.
 */
export function authorizationHeader(auth: AuthConfig): string | undefined {
  switch (auth.type) {
    case 'none':
      return undefined;
    case 'basic':
      return 'Basic ' + Buffer.from(`${auth.username}:${auth.password}`).toString('base64');
    case 'bearer':
      return `Bearer ${auth.token}`;
  }
}

/**
 * Append query parameters to a URL. Undefined values are dropped.
 */
export function buildUrl(url: string, params: QueryParams = {}): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (typeof value === 'string' || typeof value === 'number') {
      search.append(key, String(value));
    } else {
      for (const v of value) {
        search.append(key, v);
      }
    }
  }
  const qs = search.toString();
  return qs === '' ? url : `${url}?${qs}`;
}

/**
 * Sends requests to resolved endpoints.
 */
export class HttpTransport {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private readonly timeoutMs: number;
  private readonly retry: RetryConfig;
  private readonly authHeader: string | undefined;

  constructor(options: TransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retry = options.retry ?? DEFAULT_RETRY_CONFIG;
    this.authHeader = authorizationHeader(options.auth ?? { type: 'none' });
    if (options.dispatcher !== undefined) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        connect: {
          rejectUnauthorized: !(options.tlsInsecure ?? false),
        },
      });
      this.ownsDispatcher = true;
    }
  }

  /**
   * Send a request. Idempotent endpoints are retried on transient failures.
   *
   * @throws TransportError
   */
  async send(endpoint: Endpoint, options: SendOptions = {}): Promise<RawResponse> {
    const url = buildUrl(endpoint.url, options.params);
    const config: RetryConfig = endpoint.idempotent ? this.retry : { ...this.retry, maxAttempts: 1 };

    return withRetry((attempt) => this.attempt(endpoint, url, options, attempt), config, {
      signal: options.signal,
      onRetry: (error, attempt, backoffMs) => {
        log.debug('Retrying request', {
          operation: endpoint.operation,
          attempt: attempt + 1,
          backoffMs,
          error: error instanceof Error ? error.message : String(error),
        });
      },
    });
  }

  /**
   * Release pooled connections.
   */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  private async attempt(
    endpoint: Endpoint,
    url: string,
    options: SendOptions,
    attempt: number
  ): Promise<RawResponse> {
    const callerSignal = options.signal;
    if (callerSignal?.aborted) {
      throw TransportError.cancelled();
    }

    const controller = new AbortController();
    let timedOut = false;
    const onCallerAbort = (): void => controller.abort();
    callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const headers: Record<string, string> = { 'user-agent': USER_AGENT };
    if (this.authHeader !== undefined) {
      headers['authorization'] = this.authHeader;
    }
    if (options.contentType !== undefined) {
      headers['content-type'] = options.contentType;
    }

    log.debug('HTTP request', { operation: endpoint.operation, method: endpoint.method, url, attempt });
    const t = log.timer(`${endpoint.method} ${endpoint.operation}`);
    try {
      const response = await request(url, {
        method: endpoint.method,
        headers,
        body: options.body ?? null,
        dispatcher: this.dispatcher,
        signal: controller.signal,
      });
      const body = await response.body.text();
      t.end({ status: response.statusCode });

      if (response.statusCode >= 400) {
        throw errorFromStatus(response.statusCode, body);
      }
      return {
        status: response.statusCode,
        headers: flattenHeaders(response.headers),
        body,
      };
    } catch (err) {
      if (err instanceof TransportError) {
        throw err;
      }
      if (timedOut) {
        throw TransportError.timeout(this.timeoutMs);
      }
      if (callerSignal?.aborted) {
        throw TransportError.cancelled();
      }
      throw TransportError.network(describe(err), err);
    } finally {
      clearTimeout(timeout);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }
}

function flattenHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) continue;
    out[key] = Array.isArray(value) ? value.join(', ') : value;
  }
  return out;
}

function describe(err: unknown): string {
  if (err instanceof Error) {
    const cause: unknown = err.cause;
    if (cause instanceof Error && cause.message !== '') {
      return `${err.message} (${cause.message})`;
    }
    return err.message;
  }
  return String(err);
}
