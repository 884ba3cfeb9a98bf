/**
 * Statement classifier for the query guard.
 * Picks the operation class and extracts the tables a statement reads or
 * writes, straight from the text.
 */

import type { Operation } from './types.js';
import type { TableRef } from './parse.js';

const OPERATIONS: readonly Operation[] = ['SELECT', 'INSERT', 'SHOW', 'DESCRIBE'];

export interface OperationClassification {
  /** Leading word, upper-cased ('' when there is none) */
  keyword: string;
  /** The operation, or null when the keyword is not an allowed one */
  operation: Operation | null;
}

export function classifyOperation(sql: string): OperationClassification {
  const match = sql.trim().toUpperCase().match(/^[A-Z]+/);
  const keyword = match ? match[0] : '';
  const operation = OPERATIONS.find((op) => op === keyword) ?? null;
  return { keyword, operation };
}

// An identifier: `backticked name with spaces`, "double quoted", or bare
const IDENT = '(?:`[^`]+`|"[^"]+"|[\\w$]+)';
const QUALIFIED = `${IDENT}(?:\\s*\\.\\s*${IDENT})?`;
// Words that may follow a table but are never its alias
const CLAUSE_WORDS = [
  'FROM', 'JOIN', 'STRAIGHT_JOIN', 'INNER', 'LEFT', 'RIGHT', 'CROSS', 'NATURAL', 'FULL', 'OUTER',
  'ON', 'USING', 'WHERE', 'GROUP', 'ORDER', 'HAVING', 'LIMIT', 'OFFSET', 'UNION', 'EXCEPT',
  'INTERSECT', 'WINDOW', 'INTO', 'FOR', 'LOCK', 'IN', 'LIKE', 'PARTITION', 'USE', 'IGNORE', 'FORCE',
];
const ALIAS = `(?!(?:${CLAUSE_WORDS.join('|')})\\b)[\\w$]+`;
const TABLE_ITEM = `${QUALIFIED}(?:\\s+(?:AS\\s+)?${ALIAS})?`;

// STRAIGHT_JOIN is MariaDB's join-order hint and reads a table like JOIN
const TABLE_KEYWORD = '\\b(?:FROM|(?:STRAIGHT_)?JOIN)';
const TABLE_KEYWORD_RE = new RegExp(`${TABLE_KEYWORD}\\b`, 'gi');
const FROM_JOIN_RE = new RegExp(`${TABLE_KEYWORD}\\s+(${TABLE_ITEM}(?:\\s*,\\s*${TABLE_ITEM})*)`, 'gi');
const DESCRIBE_RE = new RegExp(`^\\s*DESCRIBE\\s+(${QUALIFIED})`, 'i');
const SHOW_COLUMNS_RE = new RegExp(
  `^\\s*SHOW\\s+(?:(?:FULL|EXTENDED)\\s+)*(?:COLUMNS|FIELDS|INDEX|INDEXES|KEYS)\\s+(?:FROM|IN)\\s+(${QUALIFIED})` +
    `(?:\\s+(?:FROM|IN)\\s+(${IDENT}))?`,
  'i',
);
const SHOW_CREATE_RE = new RegExp(`^\\s*SHOW\\s+CREATE\\s+(?:TABLE|VIEW)\\s+(${QUALIFIED})`, 'i');
const QUALIFIED_RE = new RegExp(`^\\s*(${IDENT})(?:\\s*\\.\\s*(${IDENT}))?`);

function unquote(ident: string): string {
  if (ident.length >= 2) {
    const first = ident[0];
    const last = ident[ident.length - 1];
    if ((first === '`' && last === '`') || (first === '"' && last === '"')) {
      return ident.slice(1, -1);
    }
  }
  return ident;
}

function toTableRef(text: string): TableRef | null {
  const match = text.match(QUALIFIED_RE);
  if (!match) return null;
  if (match[2] !== undefined) {
    return { schema: unquote(match[1]), table: unquote(match[2]) };
  }
  return { schema: null, table: unquote(match[1]) };
}

/**
 * Extract tables following FROM / JOIN (including comma-separated FROM
 * lists) and the target of DESCRIBE, SHOW COLUMNS / INDEX and SHOW CREATE.
 */
export function extractTables(sql: string): TableRef[] {
  const refs: TableRef[] = [];

  for (const match of sql.matchAll(FROM_JOIN_RE)) {
    for (const item of match[1].split(',')) {
      const ref = toTableRef(item);
      if (ref) refs.push(ref);
    }
  }

  const target = sql.match(DESCRIBE_RE) ?? sql.match(SHOW_CREATE_RE);
  if (target) {
    const ref = toTableRef(target[1]);
    if (ref) refs.push(ref);
  }

  // SHOW COLUMNS FROM tbl [FROM db]
  const columns = sql.match(SHOW_COLUMNS_RE);
  if (columns) {
    const ref = toTableRef(columns[1]);
    if (ref) refs.push(columns[2] !== undefined ? { schema: unquote(columns[2]), table: ref.table } : ref);
  }

  return dedupeTables(refs);
}

/**
 * True when every FROM / JOIN keyword in the statement introduces a table
 * list that extractTables() read. A keyword followed by a subquery or
 * anything else it cannot read makes this false.
 */
export function tableClausesResolved(sql: string): boolean {
  const read = new Set<number>();
  for (const match of sql.matchAll(FROM_JOIN_RE)) {
    if (match.index !== undefined) read.add(match.index);
  }
  for (const match of sql.matchAll(TABLE_KEYWORD_RE)) {
    if (match.index === undefined || !read.has(match.index)) return false;
  }
  return true;
}

export function dedupeTables(refs: TableRef[]): TableRef[] {
  const seen = new Set<string>();
  const out: TableRef[] = [];
  for (const ref of refs) {
    const id = `${ref.schema ?? ''}.${ref.table}`.toLowerCase();
    if (seen.has(id)) continue;
    seen.add(id);
    out.push(ref);
  }
  return out;
}

/**
 * Map a table name to its entity by stripping the table prefix:
 * `tabSales Invoice` → `Sales Invoice`. Null when the prefix is absent.
 */
export function tableToEntity(table: string, prefix: string): string | null {
  if (!prefix) return table;
  if (table.length > prefix.length && table.startsWith(prefix)) {
    return table.slice(prefix.length);
  }
  return null;
}

// MariaDB allows modifiers before the target and makes INTO optional
const INSERT_TARGET_RE = new RegExp(
  `^\\s*INSERT\\s+(?:(?:LOW_PRIORITY|DELAYED|HIGH_PRIORITY|IGNORE)\\s+)*(?:INTO\\s+)?(${QUALIFIED})`,
  'i',
);

/** The table an INSERT writes to, straight from the text */
export function insertTargetTable(sql: string): TableRef | null {
  const match = sql.match(INSERT_TARGET_RE);
  return match ? toTableRef(match[1]) : null;
}

/** The entity an `INSERT INTO <prefix><Entity>` statement writes to */
export function insertTargetEntity(sql: string, prefix: string): string | null {
  const ref = insertTargetTable(sql);
  return ref && !ref.schema ? tableToEntity(ref.table, prefix) : null;
}
