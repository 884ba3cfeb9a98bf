export { QueryGuard, hashSql } from './guard.js';
export type { QueryGuardOptions } from './guard.js';
export { DocPermOracle, StaticPermissionOracle, SUPERUSER } from './permissions.js';
export type { EntityGrant, PermissionOracle, StaticGrants } from './permissions.js';
export {
  classifyOperation,
  extractTables,
  insertTargetEntity,
  insertTargetTable,
  tableClausesResolved,
  tableToEntity,
} from './classify.js';
export type { OperationClassification } from './classify.js';
export { countStatements, findLexicalViolation } from './lexical.js';
export type { LexicalViolation } from './lexical.js';
export type { TableRef } from './parse.js';
export { defaultGuardConfig } from './types.js';
export type {
  AuditEvent,
  DraftRecordResult,
  GuardConfig,
  GuardRule,
  Operation,
  QueryRequest,
  QueryResult,
  SafetyVerdict,
} from './types.js';
