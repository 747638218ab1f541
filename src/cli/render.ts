// SPDX-License-Identifier: MIT
/**
 * Terminal rendering for query results and command reports.
 */
import type { ChalkInstance } from 'chalk';
import yaml from 'js-yaml';
import { CsvCodec, csvEscape } from '../codecs/csv.js';
import type { OutputFormat } from '../config.js';
import { InvalidArgumentError } from '../types/errors.js';
import type { QueryResult, Series } from '../types/query-result.js';
import { resultToSamples } from '../types/query-result.js';
import type { Labels } from '../types/sample.js';
import { METRIC_NAME_LABEL, formatValue } from '../types/sample.js';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'yaml', 'csv'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((f) => f === value);
}

export function parseOutputFormat(value: string): OutputFormat {
  const format = value.toLowerCase();
  if (!isOutputFormat(format)) {
    throw new InvalidArgumentError(`Unknown output format "${value}" (expected one of ${OUTPUT_FORMATS.join(', ')})`);
  }
  return format;
}

export interface RenderOptions {
  format: OutputFormat;
  colors: ChalkInstance;
  /** Indent JSON output. */
  pretty: boolean;
}

/**
 * Align cells into columns separated by two spaces. The header row is bold.
 */
export function renderTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
  colors: ChalkInstance
): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((row) => (row[i] ?? '').length)));
  const line = (cells: readonly string[]): string =>
    cells.map((cell, i) => (i === cells.length - 1 ? cell : cell.padEnd(widths[i] ?? 0))).join('  ');
  return [colors.bold(line(headers)), line(widths.map((w) => '-'.repeat(w))), ...rows.map(line)].join('\n');
}

/**
 * `name{k="v",...}`, or `{}` for a series without labels.
 */
export function formatSeriesName(metric: Readonly<Labels>): string {
  const name = metric[METRIC_NAME_LABEL] ?? '';
  const pairs = Object.entries(metric)
    .filter(([key]) => key !== METRIC_NAME_LABEL)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`);
  if (pairs.length === 0) {
    return name !== '' ? name : '{}';
  }
  return `${name}{${pairs.join(',')}}`;
}

function isoTime(seconds: number): string {
  return new Date(Math.round(seconds * 1000)).toISOString();
}

/**
 * Result in the backend's `{status, data: {resultType, result}}` shape.
 */
export function toResponseObject(result: QueryResult): Record<string, unknown> {
  let data: unknown;
  switch (result.resultType) {
    case 'vector':
      data = result.series.map((s) => ({
        metric: { ...s.metric },
        value: s.points[0] !== undefined ? [s.points[0][0], formatValue(s.points[0][1])] : null,
      }));
      break;
    case 'matrix':
      data = result.series.map((s) => ({
        metric: { ...s.metric },
        values: s.points.map(([ts, v]) => [ts, formatValue(v)]),
      }));
      break;
    case 'scalar': {
      const point = result.series[0]?.points[0];
      data = point !== undefined ? [point[0], formatValue(point[1])] : null;
      break;
    }
    case 'string':
      data = [result.timestamp, result.value];
      break;
  }
  const out: Record<string, unknown> = {
    status: result.status,
    data: { resultType: result.resultType, result: data },
  };
  if (result.warnings.length > 0) {
    out['warnings'] = [...result.warnings];
  }
  return out;
}

function tableRows(series: readonly Series[]): string[][] {
  const rows: string[][] = [];
  for (const s of series) {
    const name = formatSeriesName(s.metric);
    for (const [ts, value] of s.points) {
      rows.push([name, isoTime(ts), formatValue(value)]);
    }
  }
  return rows;
}

function renderCsv(result: QueryResult): string {
  const encoder = new CsvCodec().createEncoder();
  return encoder.begin() + encoder.encode(resultToSamples(result)) + encoder.end();
}

/**
 * Render a query result in the requested output format.
 */
export function renderQueryResult(result: QueryResult, options: RenderOptions): string {
  switch (options.format) {
    case 'json':
      return JSON.stringify(toResponseObject(result), null, options.pretty ? 2 : undefined);
    case 'yaml':
      return yaml.dump(toResponseObject(result), { lineWidth: -1, noRefs: true }).trimEnd();
    case 'csv':
      return renderCsv(result).trimEnd();
    case 'table': {
      const warnings = result.warnings.map((w) => options.colors.yellow(`warning: ${w}`));
      if (result.resultType === 'string') {
        return [...warnings, result.value].join('\n');
      }
      if (result.series.length === 0) {
        return [...warnings, options.colors.yellow('No data')].join('\n');
      }
      const table = renderTable(['metric', 'timestamp', 'value'], tableRows(result.series), options.colors);
      return [...warnings, table].join('\n');
    }
  }
}

/**
 * Render a flat report (health, build info, stats) in the requested format.
 * Tables become two columns of keys and values.
 */
export function renderRecord(record: Readonly<Record<string, unknown>>, options: RenderOptions): string {
  switch (options.format) {
    case 'json':
      return JSON.stringify(record, null, options.pretty ? 2 : undefined);
    case 'yaml':
      return yaml.dump(record, { lineWidth: -1, noRefs: true }).trimEnd();
    case 'csv':
    case 'table': {
      const rows = Object.entries(record).map(([key, value]) => [
        key,
        typeof value === 'string' ? value : JSON.stringify(value),
      ]);
      return options.format === 'table'
        ? renderTable(['key', 'value'], rows, options.colors)
        : ['key,value', ...rows.map((row) => row.map(csvEscape).join(','))].join('\n');
    }
  }
}

export function formatPercentage(part: number, total: number): string {
  if (total === 0) return '0.0%';
  return `${((part / total) * 100).toFixed(1)}%`;
}

export function formatMs(ms: number): string {
  return `${ms.toFixed(1)}ms`;
}
