/**
 * Template renderer for assistant answers.
 *
 * Four forms, nothing else:
 *   {key} / {{key}}                      scalar
 *   {key.field} / {{key.field}}          field of the first row
 *   {{key[N].field}}                     field of row N (zero-based)
 *   {% for v in key %}...{% endfor %}    body once per row
 *
 * Loops are cut out first; the text around them and each loop body are then
 * substituted in one pass, so values coming from the data are never
 * scanned again. Anything that does not resolve stays as written, except a
 * loop, which renders to nothing.
 */

import type { Row } from '../db/types.js';
import type { BindingValue, RenderOptions, ResultBinding } from './types.js';

const LOOP_RE = /\{%\s*for\s+(\w+)\s+in\s+(\w+)\s*%\}([\s\S]*?)\{%\s*endfor\s*%\}/g;

// {{ expr }} or a lone { expr } that is not part of a double brace
const PLACEHOLDER_RE = /\{\{\s*([^{}]*?)\s*\}\}|(?<!\{)\{\s*([^{}%]*?)\s*\}(?!\})/g;

const EXPR_RE = /^(\w+)(?:\[(\d+)\])?(?:\.(\w+))?$/;

interface Expression {
  key: string;
  index: number | null;
  field: string | null;
}

interface LoopFrame {
  variable: string;
  row: Row;
  /** 1-based */
  position: number;
}

function isRows(value: BindingValue | undefined): value is readonly Row[] {
  return Array.isArray(value);
}

function lookup(binding: ResultBinding, key: string): BindingValue | undefined {
  return Object.hasOwn(binding, key) ? binding[key] : undefined;
}

function bigintSafe(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/** String form of one value as it appears in rendered text */
export function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? '' : value.toISOString();
  }
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value, bigintSafe) ?? '';
    } catch {
      return String(value);
    }
  }
  return String(value);
}

/** A row used as a scalar: its only value, or the whole row as JSON */
function rowAsScalar(row: Row): string {
  const values = Object.values(row);
  return values.length === 1 ? stringifyValue(values[0]) : stringifyValue(row);
}

function field(row: Row | undefined, name: string): string | null {
  if (!row || !Object.hasOwn(row, name)) return null;
  return stringifyValue(row[name]);
}

function parseExpression(text: string): Expression | null {
  const match = text.match(EXPR_RE);
  if (!match) return null;
  return {
    key: match[1],
    index: match[2] !== undefined ? Number(match[2]) : null,
    field: match[3] ?? null,
  };
}

/** Resolve against the binding; null leaves the placeholder as written */
function resolveGlobal(expr: Expression, binding: ResultBinding): string | null {
  const value = lookup(binding, expr.key);
  if (value === undefined) return null;

  if (expr.index !== null) {
    if (!isRows(value) || expr.field === null) return null;
    return field(value[expr.index], expr.field);
  }

  if (expr.field !== null) {
    return isRows(value) ? field(value[0], expr.field) : null;
  }

  // A query that matched nothing renders as blank text, not as `[]`
  if (isRows(value)) {
    return value.length > 0 ? rowAsScalar(value[0]) : '';
  }
  return stringifyValue(value);
}

function resolveInLoop(expr: Expression, frame: LoopFrame): string | null {
  if (expr.index !== null) return null;
  if (expr.key === frame.variable) {
    return expr.field === null ? rowAsScalar(frame.row) : field(frame.row, expr.field);
  }
  if (expr.key === 'loop' && expr.field === 'index') {
    return String(frame.position);
  }
  return null;
}

function substitute(text: string, binding: ResultBinding, frame: LoopFrame | null): string {
  return text.replace(PLACEHOLDER_RE, (whole: string, double?: string, single?: string) => {
    const isDouble = double !== undefined;
    const expr = parseExpression((isDouble ? double : single) ?? '');
    if (!expr) return whole;
    // indexed access exists only in the double-brace spelling
    if (expr.index !== null && !isDouble) return whole;

    // inside a loop the loop variable and `loop` shadow binding keys of the same name
    if (frame && (expr.key === frame.variable || expr.key === 'loop')) {
      return resolveInLoop(expr, frame) ?? whole;
    }
    return resolveGlobal(expr, binding) ?? whole;
  });
}

/**
 * Rows a loop iterates: the exact key first, then (when enabled) the first
 * bound row sequence whose key contains the loop key or is contained in it.
 */
export function resolveLoopRows(
  key: string,
  binding: ResultBinding,
  fuzzy = true,
): readonly Row[] | null {
  const exact = lookup(binding, key);
  if (exact !== undefined) {
    return isRows(exact) ? exact : null;
  }
  if (!fuzzy) return null;

  for (const [candidate, value] of Object.entries(binding)) {
    if (!isRows(value)) continue;
    if (candidate.includes(key) || key.includes(candidate)) return value;
  }
  return null;
}

function renderLoop(
  variable: string,
  key: string,
  body: string,
  binding: ResultBinding,
  fuzzy: boolean,
): string {
  const rows = resolveLoopRows(key, binding, fuzzy);
  if (!rows || rows.length === 0) return '';
  return rows
    .map((row, i) => substitute(body, binding, { variable, row, position: i + 1 }))
    .join('');
}

/** Render `template` against `binding`. Pure; never throws. */
export function renderTemplate(
  template: string,
  binding: ResultBinding,
  options: RenderOptions = {},
): string {
  const fuzzy = options.fuzzyLoopKeys ?? true;
  let out = '';
  let cursor = 0;

  for (const match of template.matchAll(LOOP_RE)) {
    const start = match.index ?? 0;
    out += substitute(template.slice(cursor, start), binding, null);
    out += renderLoop(match[1], match[2], match[3], binding, fuzzy);
    cursor = start + match[0].length;
  }

  return out + substitute(template.slice(cursor), binding, null);
}
