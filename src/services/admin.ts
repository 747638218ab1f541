// SPDX-License-Identifier: MIT
/**
 * Admin operations: series deletion, snapshots, flags, retention, build info.
 */
import { z } from 'zod';
import type { EndpointSet, OperationKind } from '../endpoints.js';
import * as log from '../logger.js';
import type { TimeInput } from '../time.js';
import { formatTimestamp, parseTimestamp } from '../time.js';
import type { HttpTransport, QueryParams, SendOptions } from '../transport.js';
import { InvalidArgumentError, QueryError, TransportError } from '../types/errors.js';

export interface DeleteSeriesOptions {
  start?: TimeInput;
  end?: TimeInput;
  signal?: AbortSignal | undefined;
}

/**
 * A snapshot as listed by the storage node.
 */
export interface SnapshotInfo {
  name: string;
  createdAt?: string;
  size?: string;
  status?: string;
}

/**
 * Retention derived from the `-retentionPeriod` flag.
 */
export interface RetentionInfo {
  /** Flag value as configured, e.g. `1`, `90d`, `1y`. */
  period: string;
  /** Period in seconds, when the value could be interpreted. */
  seconds: number | undefined;
}

/** A bare retention number counts months of 31 days. */
const MONTH_S = 31 * 86_400;

const RETENTION_UNITS: Record<string, number> = {
  h: 3600,
  d: 86_400,
  w: 604_800,
  y: 365 * 86_400,
};

const statusSchema = z.object({
  status: z.string(),
  msg: z.string().optional(),
  error: z.string().optional(),
});

const snapshotCreatedSchema = z.object({ status: z.literal('ok'), snapshot: z.string() });

const snapshotListSchema = z.object({
  status: z.literal('ok'),
  snapshots: z.array(
    z.union([
      z.string(),
      z.object({
        name: z.string(),
        created_at: z.string().optional(),
        size: z.string().optional(),
        status: z.string().optional(),
      }),
    ])
  ),
});

const buildInfoSchema = z.object({
  status: z.literal('success'),
  data: z.record(z.unknown()),
});

/**
 * Parse a `-retentionPeriod` value into seconds.
 */
export function parseRetentionPeriod(value: string): number | undefined {
  const match = /^(\d+(?:\.\d+)?)([hdwy])?$/.exec(value.trim());
  if (match === null) {
    return undefined;
  }
  const [, amount = '0', unit] = match;
  const size = unit !== undefined ? RETENTION_UNITS[unit] : MONTH_S;
  return size !== undefined ? Number(amount) * size : undefined;
}

/**
 * Parse the `/flags` page: one `-name=value` (or `name = value`) per line.
 */
export function parseFlags(body: string): Record<string, string> {
  const flags: Record<string, string> = {};
  for (const line of body.split('\n')) {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;
    const eq = trimmed.indexOf('=');
    if (eq === -1) continue;
    const name = trimmed.slice(0, eq).trim().replace(/^-+/, '');
    let value = trimmed.slice(eq + 1).trim();
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
      value = value.slice(1, -1);
    }
    if (name !== '') {
      flags[name] = value;
    }
  }
  return flags;
}

function parseBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    throw QueryError.decode(err instanceof Error ? err.message : 'invalid JSON', err);
  }
}

/**
 * Turn a `{"status":"error","msg":...}` body into a `QueryError`.
 */
function adminError(body: string): QueryError | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return undefined;
  }
  const status = statusSchema.safeParse(parsed);
  if (!status.success || status.data.status === 'ok' || status.data.status === 'success') {
    return undefined;
  }
  return QueryError.backend(status.data.msg ?? status.data.error ?? `status "${status.data.status}"`);
}

/**
 * Service client for admin operations.
 */
export class AdminClient {
  constructor(
    private readonly transport: HttpTransport,
    private readonly endpoints: EndpointSet
  ) {}

  /**
   * Delete every series matching the selectors. Sent once, never retried.
   */
  async deleteSeries(match: string | readonly string[], options: DeleteSeriesOptions = {}): Promise<void> {
    const selectors = typeof match === 'string' ? [match] : [...match];
    if (selectors.length === 0 || selectors.some((s) => s.trim() === '')) {
      throw new InvalidArgumentError('deleteSeries needs at least one non-empty selector');
    }
    const params: QueryParams = { 'match[]': selectors };
    if (options.start !== undefined) {
      params['start'] = formatTimestamp(parseTimestamp(options.start));
    }
    if (options.end !== undefined) {
      params['end'] = formatTimestamp(parseTimestamp(options.end));
    }
    log.info('Deleting series', { match: selectors });
    await this.call('delete_series', { params, signal: options.signal });
  }

  /**
   * Create a snapshot on the storage node.
   *
   * @returns The snapshot name.
   */
  async createSnapshot(signal?: AbortSignal): Promise<string> {
    const body = await this.call('snapshot_create', { signal });
    const created = snapshotCreatedSchema.safeParse(parseBody(body));
    if (!created.success) {
      throw adminError(body) ?? QueryError.decode('unexpected snapshot/create response');
    }
    log.info('Snapshot created', { snapshot: created.data.snapshot });
    return created.data.snapshot;
  }

  async listSnapshots(signal?: AbortSignal): Promise<SnapshotInfo[]> {
    const body = await this.call('snapshot_list', { signal });
    const list = snapshotListSchema.safeParse(parseBody(body));
    if (!list.success) {
      throw adminError(body) ?? QueryError.decode('unexpected snapshot/list response');
    }
    return list.data.snapshots.map((entry) => {
      if (typeof entry === 'string') {
        return { name: entry };
      }
      const info: SnapshotInfo = { name: entry.name };
      if (entry.created_at !== undefined) info.createdAt = entry.created_at;
      if (entry.size !== undefined) info.size = entry.size;
      if (entry.status !== undefined) info.status = entry.status;
      return info;
    });
  }

  async deleteSnapshot(name: string, signal?: AbortSignal): Promise<void> {
    if (name.trim() === '') {
      throw new InvalidArgumentError('Snapshot name must not be empty');
    }
    const body = await this.call('snapshot_delete', { params: { snapshot: name }, signal });
    const error = adminError(body);
    if (error !== undefined) {
      throw error;
    }
    log.info('Snapshot deleted', { snapshot: name });
  }

  /**
   * Command-line flags of the server, without the leading dash.
   */
  async getFlags(signal?: AbortSignal): Promise<Record<string, string>> {
    const body = await this.call('flags', { signal });
    return parseFlags(body);
  }

  async getRetention(signal?: AbortSignal): Promise<RetentionInfo> {
    const flags = await this.getFlags(signal);
    const period = flags['retentionPeriod'] ?? '1';
    return { period, seconds: parseRetentionPeriod(period) };
  }

  /**
   * The `data` object of `/api/v1/status/buildinfo`, values rendered as strings.
   */
  async buildInfo(signal?: AbortSignal): Promise<Record<string, string>> {
    const body = await this.call('build_info', { signal });
    const info = buildInfoSchema.safeParse(parseBody(body));
    if (!info.success) {
      throw adminError(body) ?? QueryError.decode('unexpected buildinfo response');
    }
    const out: Record<string, string> = {};
    for (const [key, value] of Object.entries(info.data.data)) {
      out[key] = typeof value === 'string' ? value : JSON.stringify(value);
    }
    return out;
  }

  private async call(operation: OperationKind, options: SendOptions): Promise<string> {
    try {
      const response = await this.transport.send(this.endpoints.get(operation), options);
      return response.body;
    } catch (err) {
      if (err instanceof TransportError && err.kind === 'http_status' && err.body !== undefined) {
        const backend = adminError(err.body);
        if (backend !== undefined) {
          throw backend;
        }
      }
      throw err;
    }
  }
}
