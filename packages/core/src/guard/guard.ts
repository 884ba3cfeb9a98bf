/**
 * Query guard: validates LLM-generated SQL and runs what passes.
 *
 * Order of checks: empty → lexical denylist → statement count → operation
 * class → blocked functions → per-operation rules (tables, permissions,
 * insert targets, reserved fields). The first failing check decides.
 */

import { createHash, randomBytes } from 'node:crypto';
import type { Row, RowStore } from '../db/types.js';
import { silentLogger, type Logger } from '../log.js';
import {
  classifyOperation,
  dedupeTables,
  extractTables,
  insertTargetTable,
  tableClausesResolved,
  tableToEntity,
} from './classify.js';
import {
  countStatements,
  findBlockedFunction,
  findLexicalViolation,
  findReservedField,
  hasFileExport,
} from './lexical.js';
import { listInsertColumns, listTables, type TableRef } from './parse.js';
import type { PermissionOracle } from './permissions.js';
import {
  defaultGuardConfig,
  type AuditEvent,
  type DraftRecordResult,
  type GuardConfig,
  type GuardRule,
  type Operation,
  type QueryResult,
  type SafetyVerdict,
} from './types.js';

export interface QueryGuardOptions {
  permissions: PermissionOracle;
  store: RowStore;
  config?: Partial<GuardConfig>;
  logger?: Logger;
  /** Called once per verdict, allowed or denied */
  onDecision?: (event: AuditEvent) => void;
}

/** Hash SQL for audit logging (privacy-preserving) */
export function hashSql(sql: string): string {
  return createHash('sha256').update(sql).digest('hex').slice(0, 16);
}

function deny(rule: GuardRule, reason: string, operation?: Operation): SafetyVerdict {
  return { allowed: false, rule, reason, operation };
}

function refuse(rule: GuardRule, error: string): DraftRecordResult {
  return { success: false, error, rule };
}

const FIELD_NAME_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export class QueryGuard {
  private readonly permissions: PermissionOracle;
  private readonly store: RowStore;
  private readonly config: GuardConfig;
  private readonly logger: Logger;
  private readonly onDecision?: (event: AuditEvent) => void;

  constructor(options: QueryGuardOptions) {
    this.permissions = options.permissions;
    this.store = options.store;
    this.config = { ...defaultGuardConfig(), dialect: options.store.dialect, ...options.config };
    this.logger = options.logger ?? silentLogger;
    this.onDecision = options.onDecision;
  }

  getConfig(): GuardConfig {
    return { ...this.config };
  }

  async validate(sql: string | null | undefined, doctype?: string | null): Promise<SafetyVerdict> {
    const verdict = await this.judge(sql ?? '', doctype?.trim() || null);
    this.report(sql ?? '', doctype ?? undefined, verdict);
    return verdict;
  }

  /**
   * Validate, then run on the row store. Never throws: denials and store
   * failures both come back as `{ success: false, error }`.
   */
  async execute(sql: string | null | undefined, doctype?: string | null): Promise<QueryResult> {
    let verdict: SafetyVerdict;
    try {
      verdict = await this.validate(sql, doctype);
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error('Query validation failed', { error: msg });
      return { success: false, error: `Query validation failed: ${msg}` };
    }

    if (!verdict.allowed) {
      return { success: false, error: verdict.reason ?? 'Query not allowed', rule: verdict.rule };
    }

    try {
      const rows = await this.store.query(sql ?? '');
      this.logger.debug('Query executed', { operation: verdict.operation, rowCount: rows.length });
      return { success: true, rows };
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error('Query execution error', { error: msg, sqlHash: hashSql(sql ?? '') });
      return { success: false, error: `Query execution failed: ${msg}` };
    }
  }

  /**
   * Create one record as a draft, bypassing SQL entirely. The record is
   * always written with `docstatus = 0`; callers cannot submit it.
   */
  async createDraftRecord(doctype: string, data: Row): Promise<DraftRecordResult> {
    try {
      const entity = doctype.trim();
      if (!this.config.insertAllowList.includes(entity)) {
        return refuse('insert_not_allowed', `Creating ${entity} records via the assistant is not allowed`);
      }
      const canCreate = await this.ask(() => this.permissions.hasCreatePermission(entity));
      if (canCreate === null) {
        return refuse('permission_check_failed', `permission check failed for ${entity}`);
      }
      if (!canCreate) {
        return refuse('no_create_permission', `No create permission for ${entity}`);
      }

      const reserved = new Set(this.config.reservedFields.map((f) => f.toLowerCase()));
      for (const field of Object.keys(data)) {
        if (!FIELD_NAME_RE.test(field)) {
          return refuse('invalid_field_name', `Invalid field name: ${field}`);
        }
        if (reserved.has(field.toLowerCase())) {
          return refuse('reserved_field', `Cannot set system field: ${field}`);
        }
      }

      const name = typeof data.name === 'string' && data.name.trim() ? data.name.trim() : newDocName();
      const record: Row = { ...data, name, docstatus: 0 };
      await this.store.insert(`${this.config.tablePrefix}${entity}`, record);

      this.logger.debug('Draft record created', { doctype: entity, name });
      return { success: true, name, message: `${entity} ${name} created successfully (draft)` };
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error('Draft record creation failed', { doctype, error: msg });
      return { success: false, error: msg };
    }
  }

  // ── Rules ──────────────────────────────────────────────────────────

  private async judge(sql: string, doctype: string | null): Promise<SafetyVerdict> {
    const trimmed = sql.trim();
    if (!trimmed) {
      return deny('empty_query', 'empty query');
    }

    const lexical = findLexicalViolation(trimmed);
    if (lexical) {
      return deny(lexical.rule, lexical.reason);
    }

    if (!this.config.allowMultipleStatements && countStatements(trimmed) > 1) {
      return deny('multiple_statements', 'Multiple statements are not allowed');
    }

    const { operation } = classifyOperation(trimmed);
    if (!operation) {
      return deny('operation_not_allowed', 'operation not allowed');
    }

    const blockedFn = findBlockedFunction(trimmed, this.config.blockedFunctions);
    if (blockedFn) {
      return deny('blocked_function', `Function "${blockedFn}" is not allowed`, operation);
    }

    const verdict =
      operation === 'INSERT'
        ? await this.judgeInsert(trimmed, doctype)
        : await this.judgeRead(trimmed, operation);
    return verdict.allowed ? { allowed: true, operation } : { ...verdict, operation };
  }

  private async judgeRead(sql: string, operation: Operation): Promise<SafetyVerdict> {
    if (hasFileExport(sql)) {
      return deny('file_export', 'File operations are not allowed', operation);
    }
    return this.checkTables(sql, operation);
  }

  private async judgeInsert(sql: string, doctype: string | null): Promise<SafetyVerdict> {
    const { tablePrefix, insertAllowList, reservedFields } = this.config;
    const targetRef = insertTargetTable(sql);
    if (!targetRef) {
      return deny('missing_insert_target', 'Cannot determine target table for INSERT', 'INSERT');
    }
    const target = targetRef.schema ? null : tableToEntity(targetRef.table, tablePrefix);
    if (!target) {
      const name = targetRef.schema ? `${targetRef.schema}.${targetRef.table}` : targetRef.table;
      return deny('insert_target_mismatch', `INSERT target ${name} is not a record table`, 'INSERT');
    }

    const entity = target;
    if (doctype && doctype !== target) {
      return deny(
        'insert_target_mismatch',
        `INSERT writes to ${target} but was requested for ${doctype}`,
        'INSERT',
      );
    }
    if (!insertAllowList.includes(entity)) {
      return deny('insert_not_allowed', `Creating ${entity} records via the assistant is not allowed`, 'INSERT');
    }

    const canCreate = await this.ask(() => this.permissions.hasCreatePermission(entity));
    if (canCreate === null) {
      return deny('permission_check_failed', `permission check failed for ${entity}`, 'INSERT');
    }
    if (!canCreate) {
      return deny('no_create_permission', `No create permission for ${entity}`, 'INSERT');
    }

    const reserved =
      findReservedField(sql, reservedFields) ?? this.findReservedColumn(sql, reservedFields);
    if (reserved) {
      return deny('reserved_field', `Cannot set system field: ${reserved}`, 'INSERT');
    }

    // INSERT ... SELECT reads other tables
    return this.checkTables(sql, 'INSERT');
  }

  private findReservedColumn(sql: string, reservedFields: string[]): string | null {
    const columns = listInsertColumns(sql, this.config.dialect);
    if (!columns) return null;
    const reserved = new Set(reservedFields.map((f) => f.toLowerCase()));
    return columns.find((c) => reserved.has(c.toLowerCase())) ?? null;
  }

  private async checkTables(sql: string, operation: Operation): Promise<SafetyVerdict> {
    const tables = this.tablesOf(sql);
    if (!tables) {
      return deny('unresolved_tables', 'Cannot determine which tables the query reads', operation);
    }
    return this.checkReadable(tables, operation);
  }

  /**
   * Tables a statement reads; an INSERT's own target is covered by the create check.
   * Null when the parser rejects the statement and the lexical scan could not
   * read every FROM / JOIN clause either.
   */
  private tablesOf(sql: string): TableRef[] | null {
    const lexical = extractTables(sql);
    const parsed = listTables(sql, this.config.dialect);
    if (!parsed && !tableClausesResolved(sql)) return null;
    return dedupeTables([...lexical, ...(parsed ?? []).filter((ref) => ref.action !== 'insert')]);
  }

  private async checkReadable(tables: TableRef[], operation: Operation): Promise<SafetyVerdict> {
    const blocked = new Set(this.config.blockedTables.map((t) => t.toLowerCase()));

    for (const ref of tables) {
      if (blocked.has(ref.table.toLowerCase()) || (ref.schema && blocked.has(ref.schema.toLowerCase()))) {
        const name = ref.schema ? `${ref.schema}.${ref.table}` : ref.table;
        return deny('blocked_table', `Table "${name}" is blocked by policy`, operation);
      }
    }

    for (const ref of tables) {
      const entity = tableToEntity(ref.table, this.config.tablePrefix);
      if (!entity) continue;
      const canRead = await this.ask(() => this.permissions.hasReadPermission(entity));
      if (canRead === null) {
        return deny('permission_check_failed', `permission check failed for ${entity}`, operation);
      }
      if (!canRead) {
        return deny('no_read_permission', `No read permission for ${entity}`, operation);
      }
    }

    return { allowed: true, operation };
  }

  /** Run an oracle call; null means the oracle itself failed (fail closed) */
  private async ask(check: () => boolean | Promise<boolean>): Promise<boolean | null> {
    try {
      return await check();
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error('Permission check failed', { error: msg });
      return null;
    }
  }

  private report(sql: string, doctype: string | undefined, verdict: SafetyVerdict): void {
    if (!verdict.allowed) {
      this.logger.warn('Query blocked', { rule: verdict.rule, reason: verdict.reason });
    }
    this.onDecision?.({
      timestamp: new Date(),
      sqlHash: hashSql(sql),
      doctype,
      operation: verdict.operation,
      decision: verdict.allowed ? 'allowed' : 'denied',
      rule: verdict.rule,
      reason: verdict.reason,
    });
  }
}

/** ERP-style random document name: 10 lowercase hex characters */
function newDocName(): string {
  return randomBytes(5).toString('hex');
}
