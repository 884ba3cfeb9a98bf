/**
 * Minimal table formatter for CLI output.
 * Prints a simple ASCII table with column headers and rows.
 */

import type { Row } from '@askerp/core';

const MAX_WIDTH = 60;

/** Columns in first-seen order across all rows */
export function columnsOf(rows: Row[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) seen.add(key);
  }
  return [...seen];
}

export function formatTable(columns: string[], rows: Row[]): string {
  if (columns.length === 0) return '(no columns)';
  if (rows.length === 0) return '(0 rows)';

  const widths = columns.map((col) => Math.min(col.length, MAX_WIDTH));
  for (const row of rows) {
    for (let i = 0; i < columns.length; i++) {
      const val = formatValue(row[columns[i]]);
      widths[i] = Math.min(Math.max(widths[i], val.length), MAX_WIDTH);
    }
  }

  const lines: string[] = [];
  lines.push(columns.map((col, i) => fit(col, widths[i])).join(' | '));
  lines.push(widths.map((w) => '-'.repeat(w)).join('-+-'));

  for (const row of rows) {
    lines.push(columns.map((col, i) => fit(formatValue(row[col]), widths[i])).join(' | '));
  }

  return lines.join('\n');
}

function fit(val: string, width: number): string {
  return val.length > width ? val.slice(0, width - 1) + '…' : val.padEnd(width);
}

export function formatValue(val: unknown): string {
  if (val === null || val === undefined) return 'NULL';
  if (val instanceof Date) return val.toISOString();
  if (typeof val === 'bigint') return val.toString();
  if (typeof val === 'object') return JSON.stringify(val, (_k, v: unknown) => (typeof v === 'bigint' ? v.toString() : v));
  return String(val);
}
