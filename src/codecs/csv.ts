// SPDX-License-Identifier: MIT
/**
 * CSV: `timestamp,value,metric_name,labels`, one row per sample. Labels are
 * one `k=v;k=v` field with `\`, `;` and `=` backslash-escaped.
 */
import { ParseError } from '../types/errors.js';
import type { Labels, Sample } from '../types/sample.js';
import { formatValue, isValidLabelName, parseValue } from '../types/sample.js';
import { BaseCodec, readLines, stripCr } from './base.js';
import type { DecodeItem, Encoder, TextSource } from './types.js';

export const CSV_HEADER = ['timestamp', 'value', 'metric_name', 'labels'] as const;

/**
 * Quote a field when it contains a comma, quote or line break.
 */
export function csvEscape(field: string): string {
  if (/[",\r\n]/.test(field)) {
    return `"${field.replace(/"/g, '""')}"`;
  }
  return field;
}

function escapeLabelPart(text: string): string {
  return text.replace(/[\\;=]/g, (c) => `\\${c}`);
}

/**
 * Serialize labels as `k=v;k=v`.
 */
export function formatLabelField(labels: Readonly<Labels>): string {
  return Object.entries(labels)
    .map(([k, v]) => `${escapeLabelPart(k)}=${escapeLabelPart(v)}`)
    .join(';');
}

/**
 * Parse a `k=v;k=v` field.
 *
 * @returns The labels, or an error message.
 */
export function parseLabelField(field: string): Labels | string {
  const labels: Labels = {};
  if (field === '') {
    return labels;
  }
  let key = '';
  let value = '';
  let inValue = false;
  const commit = (): string | undefined => {
    if (!inValue) return `label "${key}" has no "="`;
    if (!isValidLabelName(key)) return `invalid label name "${key}"`;
    if (Object.prototype.hasOwnProperty.call(labels, key)) return `duplicate label "${key}"`;
    labels[key] = value;
    key = '';
    value = '';
    inValue = false;
    return undefined;
  };

  for (let i = 0; i < field.length; i++) {
    let c = field.charAt(i);
    if (c === '\\') {
      i++;
      if (i >= field.length) return 'dangling escape';
      c = field.charAt(i);
      if (inValue) value += c;
      else key += c;
      continue;
    }
    if (c === ';') {
      const problem = commit();
      if (problem !== undefined) return problem;
      continue;
    }
    if (c === '=' && !inValue) {
      inValue = true;
      continue;
    }
    if (inValue) value += c;
    else key += c;
  }
  const problem = commit();
  return problem ?? labels;
}

/**
 * Split one CSV record into fields.
 *
 * @returns The fields, or `undefined` when a quoted field is malformed.
 */
export function splitCsvRecord(record: string): string[] | undefined {
  const fields: string[] = [];
  let field = '';
  let i = 0;
  let quoted = false;
  while (i < record.length) {
    const c = record.charAt(i);
    if (quoted) {
      if (c === '"') {
        if (record.charAt(i + 1) === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
        i++;
        const next = record.charAt(i);
        if (next !== ',' && next !== '') return undefined;
        continue;
      }
      field += c;
      i++;
      continue;
    }
    if (c === '"' && field === '') {
      quoted = true;
      i++;
      continue;
    }
    if (c === ',') {
      fields.push(field);
      field = '';
      i++;
      continue;
    }
    field += c;
    i++;
  }
  if (quoted) return undefined;
  fields.push(field);
  return fields;
}

/**
 * Group physical lines into records; a quoted field may span lines.
 */
async function* readRecords(source: TextSource): AsyncGenerator<{ text: string; line: number }> {
  let buffer: string | undefined;
  let startLine = 0;
  let line = 0;
  // line breaks inside a quoted field are kept as written, `\r\n` included
  for await (const l of readLines(source, { keepCr: true })) {
    line++;
    if (buffer === undefined) {
      buffer = l;
      startLine = line;
    } else {
      buffer += `\n${l}`;
    }
    if (countQuotes(buffer) % 2 === 0) {
      yield { text: stripCr(buffer), line: startLine };
      buffer = undefined;
    }
  }
  if (buffer !== undefined) {
    yield { text: stripCr(buffer), line: startLine };
  }
}

function countQuotes(text: string): number {
  let n = 0;
  for (const c of text) {
    if (c === '"') n++;
  }
  return n;
}

function isHeader(fields: readonly string[]): boolean {
  return fields.length === CSV_HEADER.length && CSV_HEADER.every((h, i) => fields[i]?.trim() === h);
}

/**
 * Decode one data row.
 */
export function parseCsvRow(raw: string, line: number): Sample | ParseError {
  const fields = splitCsvRecord(raw);
  if (fields === undefined) {
    return new ParseError('MalformedLabelSet', raw, line, 'unbalanced quotes');
  }
  const [tsText, valueText, metricName, labelText = ''] = fields;
  if (tsText === undefined || valueText === undefined || metricName === undefined || metricName === '') {
    return new ParseError('MissingField', raw, line, 'expected timestamp,value,metric_name[,labels]');
  }
  if (fields.length > CSV_HEADER.length) {
    return new ParseError('MalformedLabelSet', raw, line, `expected 4 fields, got ${fields.length}`);
  }
  let timestamp: number | undefined;
  if (tsText.trim() !== '') {
    timestamp = parseValue(tsText);
    if (timestamp === undefined || !Number.isFinite(timestamp)) {
      return new ParseError('InvalidNumber', raw, line, `timestamp "${tsText}"`);
    }
  }
  const value = parseValue(valueText);
  if (value === undefined) {
    return new ParseError('InvalidNumber', raw, line, `value "${valueText}"`);
  }
  const labels = parseLabelField(labelText);
  if (typeof labels === 'string') {
    return new ParseError('MalformedLabelSet', raw, line, labels);
  }
  return { metricName, labels, timestamp, value };
}

class CsvEncoder implements Encoder {
  begin(): string {
    return `${CSV_HEADER.join(',')}\n`;
  }

  encode(samples: readonly Sample[]): string {
    let out = '';
    for (const s of samples) {
      const row = [
        s.timestamp !== undefined ? String(s.timestamp) : '',
        formatValue(s.value),
        s.metricName,
        formatLabelField(s.labels),
      ];
      out += row.map(csvEscape).join(',') + '\n';
    }
    return out;
  }

  end(): string {
    return '';
  }
}

export class CsvCodec extends BaseCodec {
  override readonly format = 'csv' as const;
  override readonly extension = 'csv';
  override readonly contentType = 'text/csv';

  override createEncoder(): Encoder {
    return new CsvEncoder();
  }

  override async *decode(source: TextSource): AsyncIterable<DecodeItem> {
    let first = true;
    for await (const { text, line } of readRecords(source)) {
      if (text.trim() === '') continue;
      if (first) {
        first = false;
        const fields = splitCsvRecord(text);
        if (fields !== undefined && isHeader(fields)) continue;
      }
      yield parseCsvRow(text, line);
    }
  }
}
