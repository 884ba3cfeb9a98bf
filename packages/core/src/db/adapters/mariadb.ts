/**
 * MariaDB row store for the ERP's production database.
 * Uses a mysql2 connection pool with strict safety defaults:
 * - single statements only (multipleStatements off)
 * - per-query timeout
 * - DATE/DATETIME values returned as strings, so rendering is timezone-free
 * - returned rows capped at maxRows
 */

import { createPool, type Pool, type PoolOptions } from 'mysql2/promise';
import { SAFE_DEFAULTS } from '../defaults.js';
import type { Row, RowStore } from '../types.js';

export interface MariaDbConnectionConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  ssl?: boolean;
  timeoutMs?: number;
  maxRows?: number;
  connectionLimit?: number;
}

function quoteIdent(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class MariaDbRowStore implements RowStore {
  readonly dialect = 'mariadb' as const;
  private pool: Pool;
  private timeoutMs: number;
  private maxRows: number;

  constructor(cfg: MariaDbConnectionConfig, password: string) {
    const options: PoolOptions = {
      host: cfg.host,
      port: cfg.port,
      database: cfg.database,
      user: cfg.user,
      password,
      ssl: cfg.ssl ? { rejectUnauthorized: false } : undefined,
      connectTimeout: 10_000,
      connectionLimit: cfg.connectionLimit ?? 4,
      multipleStatements: false,
      dateStrings: true,
      supportBigNumbers: true,
    };
    this.pool = createPool(options);
    this.timeoutMs = cfg.timeoutMs ?? SAFE_DEFAULTS.statementTimeoutMs;
    this.maxRows = cfg.maxRows ?? SAFE_DEFAULTS.maxRows;
  }

  async query(sql: string, params: unknown[] = []): Promise<Row[]> {
    const [result] = await this.pool.query({ sql, values: params, timeout: this.timeoutMs });
    if (!Array.isArray(result)) {
      // OkPacket / ResultSetHeader from INSERT and friends
      return [];
    }
    const rows: Row[] = [];
    for (const item of result) {
      if (!isRow(item)) continue;
      rows.push({ ...item });
      if (rows.length >= this.maxRows) break;
    }
    return rows;
  }

  async insert(table: string, values: Row): Promise<number> {
    const columns = Object.keys(values);
    if (columns.length === 0) {
      throw new Error(`Cannot insert an empty record into ${table}.`);
    }
    const sql =
      `INSERT INTO ${quoteIdent(table)} (${columns.map(quoteIdent).join(', ')}) ` +
      `VALUES (${columns.map(() => '?').join(', ')})`;
    const [result] = await this.pool.execute({ sql, timeout: this.timeoutMs }, columns.map((c) => values[c]));
    if (!Array.isArray(result) && 'affectedRows' in result) {
      return result.affectedRows;
    }
    return 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
