// SPDX-License-Identifier: MIT
/**
 * Health service client for server health checks.
 */
import type { EndpointSet } from '../endpoints.js';
import type { QueryEngine } from '../query.js';
import type { HttpTransport } from '../transport.js';

/**
 * Health status enum.
 */
export enum HealthStatus {
  Unknown = 'UNKNOWN',
  Ok = 'OK',
  Unhealthy = 'UNHEALTHY',
}

/**
 * Health check result.
 */
export interface HealthCheckResult {
  status: HealthStatus;
  /** Whether the server answered `OK`. */
  healthy: boolean;
  /** Response body as returned by the server. */
  raw: string;
  latencyMs: number;
}

/**
 * Outcome of one probe of an extended check.
 */
export interface ProbeResult {
  name: string;
  ok: boolean;
  /** Summary on success, error text on failure. */
  detail: string;
  latencyMs: number;
}

export interface ExtendedHealthResult {
  /** Every probe succeeded. */
  healthy: boolean;
  status: HealthStatus;
  probes: ProbeResult[];
}

/**
 * Service client for health checks.
 */
export class HealthClient {
  constructor(
    private readonly transport: HttpTransport,
    private readonly endpoints: EndpointSet,
    private readonly engine: QueryEngine
  ) {}

  /**
   * Check the health endpoint.
   *
   * @throws TransportError when the server cannot be reached.
   */
  async check(signal?: AbortSignal): Promise<HealthCheckResult> {
    const started = performance.now();
    const response = await this.transport.send(this.endpoints.get('health'), { signal });
    const raw = response.body.trim();
    const status = this.mapStatus(raw);
    return {
      status,
      healthy: status === HealthStatus.Ok,
      raw,
      latencyMs: Math.round(performance.now() - started),
    };
  }

  /**
   * Check if the server is healthy.
   *
   * @returns True if the server answered `OK`; false on any failure.
   */
  async isHealthy(signal?: AbortSignal): Promise<boolean> {
    try {
      const result = await this.check(signal);
      return result.healthy;
    } catch {
      return false;
    }
  }

  /**
   * Health endpoint plus a query of `up` and the metric-name listing.
   * Never throws; failures are reported per probe.
   */
  async extendedCheck(signal?: AbortSignal): Promise<ExtendedHealthResult> {
    let status = HealthStatus.Unknown;
    const probes: ProbeResult[] = [];

    probes.push(
      await this.probe('health', async () => {
        const result = await this.check(signal);
        status = result.status;
        if (!result.healthy) {
          throw new Error(`server answered "${result.raw}"`);
        }
        return result.raw;
      })
    );
    probes.push(
      await this.probe('query', async () => {
        const result = await this.engine.instantQuery('up', { signal });
        return `${result.series.length} series for "up"`;
      })
    );
    probes.push(
      await this.probe('metrics', async () => {
        const names = await this.engine.labelValues({ signal });
        return `${names.length} metric names`;
      })
    );

    return { healthy: probes.every((p) => p.ok), status, probes };
  }

  private async probe(name: string, run: () => Promise<string>): Promise<ProbeResult> {
    const started = performance.now();
    try {
      const detail = await run();
      return { name, ok: true, detail, latencyMs: Math.round(performance.now() - started) };
    } catch (err) {
      return {
        name,
        ok: false,
        detail: err instanceof Error ? err.message : String(err),
        latencyMs: Math.round(performance.now() - started),
      };
    }
  }

  private mapStatus(body: string): HealthStatus {
    if (body.toUpperCase() === 'OK') {
      return HealthStatus.Ok;
    }
    return body === '' ? HealthStatus.Unknown : HealthStatus.Unhealthy;
  }
}
