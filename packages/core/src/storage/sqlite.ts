/**
 * Local state store using better-sqlite3.
 * Stores assistant settings and the guard's audit trail.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import type { StoredSettings } from '../config/settings.js';
import { isSettingKey } from '../config/settings.js';
import type { AuditEvent, GuardRule, Operation } from '../guard/types.js';

// ── Schema migrations ────────────────────────────────────────────────

const MIGRATIONS: string[] = [
  // 0: migrations table (always runs first)
  `CREATE TABLE IF NOT EXISTS migrations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    version INTEGER NOT NULL UNIQUE,
    applied_at TEXT NOT NULL DEFAULT (datetime('now'))
  )`,

  // 1: settings (key-value)
  `CREATE TABLE IF NOT EXISTS settings (
    key TEXT PRIMARY KEY,
    value TEXT
  )`,

  // 2: audit_events (statement hashes only, never SQL text or row data)
  `CREATE TABLE IF NOT EXISTS audit_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    at TEXT NOT NULL,
    sql_hash TEXT NOT NULL,
    decision TEXT NOT NULL,
    operation TEXT,
    doctype TEXT,
    rule TEXT,
    reason TEXT
  )`,

  // 3: lookups by decision
  `CREATE INDEX IF NOT EXISTS idx_audit_events_decision ON audit_events (decision)`,
];

export interface StoredAuditEvent {
  id: number;
  at: string;
  sqlHash: string;
  decision: 'allowed' | 'denied';
  operation: Operation | null;
  doctype: string | null;
  rule: GuardRule | null;
  reason: string | null;
}

interface AuditRow {
  id: number;
  at: string;
  sql_hash: string;
  decision: 'allowed' | 'denied';
  operation: Operation | null;
  doctype: string | null;
  rule: GuardRule | null;
  reason: string | null;
}

// ── Default DB path ──────────────────────────────────────────────────

export function defaultDbPath(): string {
  return join(homedir(), '.askerp', 'askerp.db');
}

// ── LocalStore ───────────────────────────────────────────────────────

export class LocalStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
  }

  /** Run all pending migrations */
  migrate(): void {
    this.db.exec(MIGRATIONS[0]); // ensure migrations table exists

    const applied = this.db
      .prepare('SELECT version FROM migrations ORDER BY version')
      .all() as { version: number }[];
    const appliedSet = new Set(applied.map((r) => r.version));

    const insert = this.db.prepare('INSERT INTO migrations (version) VALUES (?)');

    for (let i = 1; i < MIGRATIONS.length; i++) {
      if (!appliedSet.has(i)) {
        this.db.exec(MIGRATIONS[i]);
        insert.run(i);
      }
    }
  }

  // ── Settings ─────────────────────────────────────────────────────

  setSetting(key: string, value: string): void {
    this.db.prepare('INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)').run(key, value);
  }

  getSetting(key: string): string | null {
    const row = this.db.prepare('SELECT value FROM settings WHERE key = ?').get(key) as
      | { value: string | null }
      | undefined;
    return row?.value ?? null;
  }

  deleteSetting(key: string): boolean {
    return this.db.prepare('DELETE FROM settings WHERE key = ?').run(key).changes > 0;
  }

  listSettings(): Array<{ key: string; value: string | null }> {
    return this.db.prepare('SELECT key, value FROM settings ORDER BY key').all() as Array<{
      key: string;
      value: string | null;
    }>;
  }

  /** Provider settings as resolveSettings() takes them; unknown keys are ignored */
  getStoredSettings(): StoredSettings {
    const out: StoredSettings = {};
    for (const { key, value } of this.listSettings()) {
      if (value !== null && isSettingKey(key)) out[key] = value;
    }
    return out;
  }

  // ── Audit events ─────────────────────────────────────────────────

  logAudit(event: AuditEvent): void {
    this.db
      .prepare(
        `INSERT INTO audit_events (at, sql_hash, decision, operation, doctype, rule, reason)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        event.timestamp.toISOString(),
        event.sqlHash,
        event.decision,
        event.operation ?? null,
        event.doctype ?? null,
        event.rule ?? null,
        event.reason ?? null,
      );
  }

  /** Newest first */
  listAuditEvents(opts?: { decision?: 'allowed' | 'denied'; limit?: number }): StoredAuditEvent[] {
    const limit = opts?.limit ?? 50;
    const rows = opts?.decision
      ? (this.db
          .prepare('SELECT * FROM audit_events WHERE decision = ? ORDER BY id DESC LIMIT ?')
          .all(opts.decision, limit) as AuditRow[])
      : (this.db.prepare('SELECT * FROM audit_events ORDER BY id DESC LIMIT ?').all(limit) as AuditRow[]);

    return rows.map((r) => ({
      id: r.id,
      at: r.at,
      sqlHash: r.sql_hash,
      decision: r.decision,
      operation: r.operation,
      doctype: r.doctype,
      rule: r.rule,
      reason: r.reason,
    }));
  }

  // ── Lifecycle ────────────────────────────────────────────────────

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    this.db.close();
  }
}
