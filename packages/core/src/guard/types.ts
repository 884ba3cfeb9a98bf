/**
 * Query guard types for askerp.
 *
 * The guard judges every LLM-generated SQL statement before it reaches the
 * row store. Lexical checks run first and cannot be bypassed by statement
 * shape; structural and permission checks follow.
 */

import type { Row, SqlDialect } from '../db/types.js';

/** Statement classes the guard can let through */
export type Operation = 'SELECT' | 'INSERT' | 'SHOW' | 'DESCRIBE';

export type GuardRule =
  | 'empty_query'
  | 'forbidden_keyword'
  | 'privileged_procedure'
  | 'comment_marker'
  | 'multiple_statements'
  | 'operation_not_allowed'
  | 'blocked_function'
  | 'file_export'
  | 'blocked_table'
  | 'unresolved_tables'
  | 'no_read_permission'
  | 'missing_insert_target'
  | 'insert_target_mismatch'
  | 'insert_not_allowed'
  | 'no_create_permission'
  | 'reserved_field'
  | 'invalid_field_name'
  | 'permission_check_failed';

/** The guard's judgment for one SQL statement */
export interface SafetyVerdict {
  allowed: boolean;
  /** Reason for denial */
  reason?: string;
  /** Which rule denied the statement */
  rule?: GuardRule;
  /** Operation class, once classified */
  operation?: Operation;
}

/** One query proposed by the model */
export interface QueryRequest {
  /** Binding key, unique within a batch */
  key: string;
  sql: string;
  /** Primary entity the query touches, if the model named one */
  doctype?: string;
}

/** `rule` is set when the guard refused the statement, absent when the store failed */
export type QueryResult =
  | { success: true; rows: Row[] }
  | { success: false; error: string; rule?: GuardRule };

export type DraftRecordResult =
  | { success: true; name: string; message: string }
  | { success: false; error: string; rule?: GuardRule };

export interface AuditEvent {
  timestamp: Date;
  /** Short SHA-256 prefix of the statement; the SQL text itself is not kept */
  sqlHash: string;
  doctype?: string;
  operation?: Operation;
  decision: 'allowed' | 'denied';
  rule?: GuardRule;
  reason?: string;
}

export interface GuardConfig {
  /** Table-name prefix that maps tables to entities: `tabCustomer` → `Customer` */
  tablePrefix: string;

  /** Entities the assistant may create records for */
  insertAllowList: string[];

  /** Fields an INSERT may never set (document status, ordering, tree position) */
  reservedFields: string[];

  /** Tables or schemas that may never be read, compared case-insensitively */
  blockedTables: string[];

  /** Functions that may never be called */
  blockedFunctions: string[];

  /** Allow `;`-separated statement batches. Default: false */
  allowMultipleStatements: boolean;

  /** Dialect handed to the SQL parser */
  dialect: SqlDialect;
}

export function defaultGuardConfig(): GuardConfig {
  return {
    tablePrefix: 'tab',
    insertAllowList: ['Lead', 'Opportunity', 'Customer', 'Supplier', 'Item', 'Task', 'Event', 'Note'],
    reservedFields: ['docstatus', 'idx', 'lft', 'rgt', '_user_tags', '_liked_by'],
    blockedTables: ['information_schema', 'mysql', 'performance_schema', 'sys'],
    blockedFunctions: ['load_file', 'sleep', 'benchmark'],
    allowMultipleStatements: false,
    dialect: 'mariadb',
  };
}
