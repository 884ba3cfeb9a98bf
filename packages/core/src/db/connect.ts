/**
 * Row store dispatcher.
 * Selects the correct adapter based on the connection type.
 */

import { MariaDbRowStore } from './adapters/mariadb.js';
import { SqliteRowStore } from './adapters/sqlite.js';
import type { ConnectionConfig, DbType, RowStore } from './types.js';

const DEFAULT_MARIADB_PORT = 3306;

export function openRowStore(config: ConnectionConfig): RowStore {
  switch (config.type) {
    case 'mariadb':
      return new MariaDbRowStore(
        {
          host: config.host ?? 'localhost',
          port: config.port ?? DEFAULT_MARIADB_PORT,
          database: config.database,
          user: config.user ?? 'root',
          timeoutMs: config.timeoutMs,
          maxRows: config.maxRows,
        },
        config.password ?? '',
      );
    case 'sqlite':
      return SqliteRowStore.open({
        database: config.filepath ?? config.database,
        maxRows: config.maxRows,
      });
    default: {
      const unknownType: never = config.type;
      throw new Error(`Unsupported database type: ${String(unknownType)}. Supported: mariadb, sqlite.`);
    }
  }
}

function isDbType(value: string): value is DbType {
  return value === 'mariadb' || value === 'sqlite';
}

/**
 * Parse a database URL.
 *
 *   mariadb://user@host:3306/site_db   (mysql:// is accepted as an alias)
 *   sqlite:/path/to/demo.sqlite        (sqlite::memory: for an in-memory DB)
 *
 * Passwords embedded in the URL are honoured but discouraged.
 */
export function parseDatabaseUrl(raw: string): ConnectionConfig {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new Error('Database URL is empty.');
  }

  const schemeMatch = trimmed.match(/^([a-z0-9]+):/i);
  if (!schemeMatch) {
    throw new Error(`Database URL "${trimmed}" has no scheme. Expected mariadb:// or sqlite:.`);
  }
  const scheme = schemeMatch[1].toLowerCase() === 'mysql' ? 'mariadb' : schemeMatch[1].toLowerCase();
  if (!isDbType(scheme)) {
    throw new Error(`Unsupported database type: ${scheme}. Supported: mariadb, sqlite.`);
  }

  if (scheme === 'sqlite') {
    const path = trimmed.slice(schemeMatch[0].length).replace(/^\/\//, '');
    if (!path) throw new Error('SQLite database path is required.');
    return { type: 'sqlite', database: path, filepath: path };
  }

  const url = new URL(trimmed);
  const database = decodeURIComponent(url.pathname.replace(/^\//, ''));
  if (!database) {
    throw new Error('MariaDB URL must name a database, e.g. mariadb://user@host:3306/site_db');
  }
  return {
    type: 'mariadb',
    host: url.hostname || 'localhost',
    port: url.port ? parseInt(url.port, 10) : DEFAULT_MARIADB_PORT,
    database,
    user: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
  };
}
