// SPDX-License-Identifier: MIT
/**
 * Service clients for vm-cli.
 */

export { HealthClient, HealthStatus } from './health.js';
export type { HealthCheckResult, ProbeResult, ExtendedHealthResult } from './health.js';

export { AdminClient, parseFlags, parseRetentionPeriod } from './admin.js';
export type { DeleteSeriesOptions, SnapshotInfo, RetentionInfo } from './admin.js';

export { DiagnosticsClient, percentile } from './diagnostics.js';
export type {
  MetricStats,
  PrefixCount,
  BenchmarkIteration,
  BenchmarkReport,
  BenchmarkOptions,
  Gap,
  GapReport,
  FindGapsOptions,
} from './diagnostics.js';
