// SPDX-License-Identifier: MIT
/**
 * Maps logical operations to concrete backend URLs for standalone and
 * cluster deployments. Pure: derived from configuration only.
 */
import type { ClientConfig, ClusterConfig } from './config.js';
import { ResolutionError } from './types/errors.js';

export type OperationKind =
  | 'query'
  | 'query_range'
  | 'health'
  | 'label_values'
  | 'series_export'
  | 'import'
  | 'delete_series'
  | 'snapshot_create'
  | 'snapshot_list'
  | 'snapshot_delete'
  | 'flags'
  | 'build_info';

export type HttpMethod = 'GET' | 'POST';

/**
 * A resolved backend endpoint.
 */
export interface Endpoint {
  readonly operation: OperationKind;
  readonly method: HttpMethod;
  /** Absolute URL without query string. */
  readonly url: string;
  /** Whether the transport may retry the request. */
  readonly idempotent: boolean;
}

type Route = 'select' | 'plain' | 'insert' | 'storage' | 'snapshot';

interface OperationSpec {
  method: HttpMethod;
  path: string;
  idempotent: boolean;
  route: Route;
}

const OPERATIONS: Readonly<Record<OperationKind, OperationSpec>> = {
  query: { method: 'GET', path: '/api/v1/query', idempotent: true, route: 'select' },
  query_range: { method: 'GET', path: '/api/v1/query_range', idempotent: true, route: 'select' },
  health: { method: 'GET', path: '/health', idempotent: true, route: 'plain' },
  label_values: {
    method: 'GET',
    path: '/api/v1/label/__name__/values',
    idempotent: true,
    route: 'select',
  },
  series_export: { method: 'GET', path: '/api/v1/export', idempotent: true, route: 'select' },
  import: { method: 'POST', path: '/api/v1/import', idempotent: false, route: 'insert' },
  delete_series: {
    method: 'POST',
    path: '/api/v1/admin/tsdb/delete_series',
    idempotent: false,
    route: 'storage',
  },
  snapshot_create: { method: 'POST', path: '/snapshot/create', idempotent: false, route: 'snapshot' },
  snapshot_list: { method: 'GET', path: '/snapshot/list', idempotent: true, route: 'snapshot' },
  snapshot_delete: { method: 'POST', path: '/snapshot/delete', idempotent: false, route: 'snapshot' },
  flags: { method: 'GET', path: '/flags', idempotent: true, route: 'plain' },
  build_info: { method: 'GET', path: '/api/v1/status/buildinfo', idempotent: true, route: 'select' },
};

export const OPERATION_KINDS: readonly OperationKind[] = Object.freeze(
  Object.keys(OPERATIONS).filter(isOperationKind)
);

export function isOperationKind(value: string): value is OperationKind {
  return Object.prototype.hasOwnProperty.call(OPERATIONS, value);
}

/**
 * Validate and normalize a base URL: absolute http(s), no query or fragment,
 * trailing slashes trimmed. A path prefix (reverse proxy) is kept.
 */
export function normalizeHost(host: string): string {
  let url: URL;
  try {
    url = new URL(host.trim());
  } catch {
    throw ResolutionError.invalidHost(host, 'not an absolute URL');
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw ResolutionError.invalidHost(host, `unsupported scheme "${url.protocol.replace(/:$/, '')}"`);
  }
  if (url.search !== '' || url.hash !== '') {
    throw ResolutionError.invalidHost(host, 'query strings and fragments are not allowed');
  }
  return `${url.origin}${url.pathname.replace(/\/+$/, '')}`;
}

function selectPrefix(cluster: ClusterConfig): string {
  return `/select/${encodeURIComponent(cluster.selectAccountId)}/${encodeURIComponent(cluster.selectProjectId)}/prometheus`;
}

function insertPrefix(cluster: ClusterConfig): string {
  return `/insert/${encodeURIComponent(cluster.selectAccountId)}/${encodeURIComponent(cluster.selectProjectId)}/prometheus`;
}

/**
 * Resolve one operation.
 *
 * @throws ResolutionError for an unparseable host, or a snapshot operation in
 *   cluster mode without `vmstorageHost`.
 */
export function resolveEndpoint(config: ClientConfig, operation: OperationKind): Endpoint {
  const spec = OPERATIONS[operation];
  const host = normalizeHost(config.host);
  const cluster = config.cluster;

  let base = host;
  let prefix = '';
  if (cluster !== undefined) {
    switch (spec.route) {
      case 'select':
        prefix = cluster.useSelectEndpoint ? selectPrefix(cluster) : '';
        break;
      case 'plain':
        break;
      case 'insert':
        base = cluster.vminsertHost !== undefined ? normalizeHost(cluster.vminsertHost) : host;
        prefix = cluster.useSelectEndpoint ? insertPrefix(cluster) : '';
        break;
      case 'storage':
        base = cluster.vmstorageHost !== undefined ? normalizeHost(cluster.vmstorageHost) : host;
        break;
      case 'snapshot':
        if (cluster.vmstorageHost === undefined) {
          throw ResolutionError.missingClusterHost('vmstorage', operation);
        }
        base = normalizeHost(cluster.vmstorageHost);
        break;
    }
  }

  return Object.freeze({
    operation,
    method: spec.method,
    url: `${base}${prefix}${spec.path}`,
    idempotent: spec.idempotent,
  });
}

/**
 * Every operation resolved once. Per-operation failures are kept and raised on access.
 */
export class EndpointSet {
  private readonly endpoints: ReadonlyMap<OperationKind, Endpoint | ResolutionError>;

  private constructor(endpoints: Map<OperationKind, Endpoint | ResolutionError>) {
    this.endpoints = endpoints;
  }

  /**
   * Resolve all operations. Fails immediately when a configured host is unparseable.
   */
  static resolve(config: ClientConfig): EndpointSet {
    normalizeHost(config.host);
    if (config.cluster?.vminsertHost !== undefined) {
      normalizeHost(config.cluster.vminsertHost);
    }
    if (config.cluster?.vmstorageHost !== undefined) {
      normalizeHost(config.cluster.vmstorageHost);
    }

    const endpoints = new Map<OperationKind, Endpoint | ResolutionError>();
    for (const op of OPERATION_KINDS) {
      try {
        endpoints.set(op, resolveEndpoint(config, op));
      } catch (err) {
        if (!(err instanceof ResolutionError)) {
          throw err;
        }
        endpoints.set(op, err);
      }
    }
    return new EndpointSet(endpoints);
  }

  /**
   * @throws ResolutionError stored for the operation.
   */
  get(operation: OperationKind): Endpoint {
    const entry = this.endpoints.get(operation);
    if (entry === undefined) {
      throw ResolutionError.invalidHost('', `unknown operation "${operation}"`);
    }
    if (entry instanceof ResolutionError) {
      throw entry;
    }
    return entry;
  }

  /** Whether the operation resolved. */
  has(operation: OperationKind): boolean {
    const entry = this.endpoints.get(operation);
    return entry !== undefined && !(entry instanceof ResolutionError);
  }
}

/**
 * Resolve every operation of a configuration.
 */
export function resolveEndpoints(config: ClientConfig): EndpointSet {
  return EndpointSet.resolve(config);
}
