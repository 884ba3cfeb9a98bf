/**
 * SQLite row store used for local demo databases and tests.
 * Uses better-sqlite3; SQLite accepts the backtick-quoted `tabX` names
 * the ERP schema uses, so the same SQL runs against both stores.
 */

import Database from 'better-sqlite3';
import { SAFE_DEFAULTS } from '../defaults.js';
import type { Row, RowStore } from '../types.js';

export interface SqliteConnectionConfig {
  /** File path, or ':memory:' */
  database: string;
  readonly?: boolean;
  maxRows?: number;
}

function openDatabase(cfg: SqliteConnectionConfig): Database.Database {
  if (!cfg.database?.trim()) {
    throw new Error('SQLite database path is required.');
  }
  const readonly = cfg.readonly ?? false;
  const inMemory = cfg.database === ':memory:';
  return new Database(cfg.database, { readonly, fileMustExist: readonly && !inMemory });
}

export function quoteIdent(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

function queryAll(stmt: Database.Statement, params: unknown[]): Row[] {
  if (!params.length) return stmt.all() as Row[];
  return stmt.all(...params) as Row[];
}

function queryRun(stmt: Database.Statement, params: unknown[]): Database.RunResult {
  if (!params.length) return stmt.run();
  return stmt.run(...params);
}

export class SqliteRowStore implements RowStore {
  readonly dialect = 'sqlite' as const;
  private db: Database.Database;
  private maxRows: number;

  private constructor(db: Database.Database, maxRows: number) {
    this.db = db;
    this.maxRows = maxRows;
  }

  static open(cfg: SqliteConnectionConfig): SqliteRowStore {
    return new SqliteRowStore(openDatabase(cfg), cfg.maxRows ?? SAFE_DEFAULTS.maxRows);
  }

  /** Wrap an already-open handle, e.g. an in-memory database seeded by a test */
  static fromDatabase(db: Database.Database, maxRows: number = SAFE_DEFAULTS.maxRows): SqliteRowStore {
    return new SqliteRowStore(db, maxRows);
  }

  async query(sql: string, params: unknown[] = []): Promise<Row[]> {
    const stmt = this.db.prepare(sql);
    if (!stmt.reader) {
      queryRun(stmt, params);
      return [];
    }
    const rows = queryAll(stmt, params);
    return rows.length > this.maxRows ? rows.slice(0, this.maxRows) : rows;
  }

  async insert(table: string, values: Row): Promise<number> {
    const columns = Object.keys(values);
    if (columns.length === 0) {
      throw new Error(`Cannot insert an empty record into ${table}.`);
    }
    const sql =
      `INSERT INTO ${quoteIdent(table)} (${columns.map(quoteIdent).join(', ')}) ` +
      `VALUES (${columns.map(() => '?').join(', ')})`;
    const run = this.db.prepare(sql).run(...columns.map((c) => toSqliteValue(values[c])));
    return Number(run.changes ?? 0);
  }

  /** Direct access for schema setup in demos and tests */
  getDb(): Database.Database {
    return this.db;
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}

function toSqliteValue(value: unknown): unknown {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value === undefined) return null;
  return value;
}
