/**
 * Row store abstraction for askerp.
 * The guard runs validated SQL through a RowStore; adapters exist for
 * MariaDB (the ERP's database) and SQLite (local demos and tests).
 */

export type DbType = 'mariadb' | 'sqlite';

export type SqlDialect = DbType;

/** One result row: column name → value, in the order the store returned them */
export type Row = Record<string, unknown>;

export interface ConnectionConfig {
  type: DbType;
  host?: string;
  port?: number;
  database: string;
  user?: string;
  password?: string;
  /** Path for file-based DBs like SQLite */
  filepath?: string;
  /** Per-statement timeout in milliseconds */
  timeoutMs?: number;
  /** Hard cap on returned rows */
  maxRows?: number;
}

/**
 * A relational store that executes raw SQL text.
 * Implementations must reject on malformed SQL; the guard turns the
 * rejection into a failed QueryResult.
 */
export interface RowStore {
  readonly dialect: SqlDialect;

  /** Run a statement. Reader statements return rows, others return []. */
  query(sql: string, params?: unknown[]): Promise<Row[]>;

  /** Insert one record with bound values. Resolves to the affected row count. */
  insert(table: string, values: Row): Promise<number>;

  close(): Promise<void>;
}
