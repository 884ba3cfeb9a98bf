/**
 * @askerp/core — barrel export
 *
 * Query guard, template renderer and the pieces the CLI wires around them.
 */

// Row stores
export type { ConnectionConfig, DbType, Row, RowStore, SqlDialect } from './db/types.js';
export { SAFE_DEFAULTS } from './db/defaults.js';
export { openRowStore, parseDatabaseUrl } from './db/connect.js';
export { SqliteRowStore } from './db/adapters/sqlite.js';
export type { SqliteConnectionConfig } from './db/adapters/sqlite.js';
export { MariaDbRowStore } from './db/adapters/mariadb.js';
export type { MariaDbConnectionConfig } from './db/adapters/mariadb.js';

// Query guard
export * from './guard/index.js';

// Template renderer
export * from './render/index.js';

// Completion contract
export * from './llm/index.js';

// Answer pipeline
export { FALLBACK_PREFIX, answerCompletion, askAssistant, runQueries } from './answer.js';
export type {
  AnswerOptions,
  AnswerResult,
  AnswerStatus,
  AskResult,
  QueryError,
  QueryOutcome,
  QueryRunner,
  RunQueriesResult,
} from './answer.js';

// Configuration
export * from './config/index.js';

// Logging
export { silentLogger } from './log.js';
export type { LogFields, Logger } from './log.js';

// Local storage
export { LocalStore, defaultDbPath } from './storage/sqlite.js';
export type { StoredAuditEvent } from './storage/sqlite.js';
