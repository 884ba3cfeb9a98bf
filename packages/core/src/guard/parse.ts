/**
 * AST helpers for the query guard, built on node-sql-parser.
 *
 * The parser sharpens table and column extraction when a statement parses.
 * It is never the only line of defence: when parsing fails the guard keeps
 * its lexical results and carries on.
 */

import pkg from 'node-sql-parser';
import type { SqlDialect } from '../db/types.js';
const { Parser } = pkg;

const parser = new Parser();

const PARSER_DATABASE: Record<SqlDialect, string> = {
  mariadb: 'MariaDB',
  sqlite: 'Sqlite',
};

export interface TableRef {
  schema: string | null;
  table: string;
  /** Statement action that touches the table, when the parser reported one */
  action?: string;
}

/**
 * List every table a statement touches, or null when it does not parse.
 * node-sql-parser reports entries as `<action>::<schema>::<table>`.
 */
export function listTables(sql: string, dialect: SqlDialect): TableRef[] | null {
  try {
    const entries = parser.tableList(sql, { database: PARSER_DATABASE[dialect] });
    const refs: TableRef[] = [];
    for (const entry of entries) {
      const [action, schema, table] = entry.split('::');
      if (!table) continue;
      refs.push({ schema: schema && schema !== 'null' ? schema : null, table, action });
    }
    return refs;
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function columnName(node: unknown): string | null {
  if (typeof node === 'string') return node;
  if (!isRecord(node)) return null;
  if (typeof node.column === 'string') return node.column;
  if (isRecord(node.column) && isRecord(node.column.expr) && typeof node.column.expr.value === 'string') {
    return node.column.expr.value;
  }
  if (typeof node.value === 'string') return node.value;
  return null;
}

/**
 * Column names an INSERT sets, from either the column list or a
 * MariaDB `INSERT ... SET col = value` clause. Null when the statement
 * does not parse as an INSERT.
 */
export function listInsertColumns(sql: string, dialect: SqlDialect): string[] | null {
  let ast: unknown;
  try {
    ast = parser.astify(sql, { database: PARSER_DATABASE[dialect] });
  } catch {
    return null;
  }

  const first: unknown = Array.isArray(ast) ? ast[0] : ast;
  if (!isRecord(first) || first.type !== 'insert') return null;

  const columns: string[] = [];
  for (const source of [first.columns, first.set]) {
    if (!Array.isArray(source)) continue;
    for (const node of source) {
      const name = columnName(node);
      if (name) columns.push(name);
    }
  }
  return columns;
}
