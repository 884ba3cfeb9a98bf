/**
 * Query guard tests.
 * Runs against an in-memory SQLite row store seeded with ERP-style tables.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import Database from 'better-sqlite3';
import { SqliteRowStore } from '../../db/adapters/sqlite.js';
import type { Row, RowStore, SqlDialect } from '../../db/types.js';
import { QueryGuard, hashSql } from '../guard.js';
import { StaticPermissionOracle, type PermissionOracle } from '../permissions.js';
import type { AuditEvent } from '../types.js';

function seededStore(): SqliteRowStore {
  const db = new Database(':memory:');
  db.exec(`
    CREATE TABLE \`tabCustomer\` (name TEXT PRIMARY KEY, territory TEXT, balance INTEGER);
    INSERT INTO \`tabCustomer\` VALUES ('Acme', 'EU', 500), ('Globex', 'US', 120);
    CREATE TABLE \`tabLead\` (name TEXT PRIMARY KEY, lead_name TEXT, docstatus INTEGER NOT NULL DEFAULT 0);
    CREATE TABLE \`tabSalary Slip\` (name TEXT PRIMARY KEY, net_pay INTEGER);
  `);
  return SqliteRowStore.fromDatabase(db);
}

/** Records every call and returns no rows */
class RecordingStore implements RowStore {
  readonly calls: string[] = [];
  constructor(readonly dialect: SqlDialect) {}
  async query(sql: string): Promise<Row[]> {
    this.calls.push(sql);
    return [];
  }
  async insert(table: string): Promise<number> {
    this.calls.push(`insert ${table}`);
    return 1;
  }
  async close(): Promise<void> {}
}

const failingOracle: PermissionOracle = {
  hasReadPermission: () => Promise.reject(new Error('permission tables unavailable')),
  hasCreatePermission: () => {
    throw new Error('permission tables unavailable');
  },
};

const grants = new StaticPermissionOracle({ read: ['Customer', 'Lead'], create: ['Lead'] });

describe('QueryGuard.validate', () => {
  let store: SqliteRowStore;
  let guard: QueryGuard;

  beforeEach(() => {
    store = seededStore();
    guard = new QueryGuard({ permissions: grants, store });
  });

  it('rejects empty and absent SQL', async () => {
    for (const sql of ['', '   ', null, undefined]) {
      const verdict = await guard.validate(sql);
      assert.equal(verdict.allowed, false);
      assert.equal(verdict.reason, 'empty query');
    }
  });

  it('rejects a denylisted verb even after a SELECT', async () => {
    const verdict = await guard.validate('SELECT * FROM tabCustomer; DROP TABLE tabCustomer;');
    assert.equal(verdict.allowed, false);
    assert.equal(verdict.reason, 'Forbidden keyword: DROP');
  });

  it('rejects several statements', async () => {
    const verdict = await guard.validate('SELECT name FROM tabCustomer; SELECT name FROM tabLead');
    assert.equal(verdict.rule, 'multiple_statements');
  });

  it('accepts several statements when configured to', async () => {
    const lenient = new QueryGuard({ permissions: grants, store, config: { allowMultipleStatements: true } });
    const verdict = await lenient.validate('SELECT name FROM tabCustomer; SELECT name FROM tabLead');
    assert.equal(verdict.allowed, true);
  });

  it('rejects operations other than SELECT, INSERT, SHOW and DESCRIBE', async () => {
    const verdict = await guard.validate('WITH x AS (SELECT 1) SELECT * FROM x');
    assert.equal(verdict.allowed, false);
    assert.equal(verdict.reason, 'operation not allowed');
  });

  it('rejects blocked functions', async () => {
    const verdict = await guard.validate('SELECT SLEEP(5)');
    assert.equal(verdict.reason, 'Function "sleep" is not allowed');
    assert.equal(verdict.operation, 'SELECT');
  });

  it('allows a SELECT over readable entities', async () => {
    assert.deepEqual(await guard.validate('SELECT name, balance FROM `tabCustomer` WHERE territory = \'EU\''), {
      allowed: true,
      operation: 'SELECT',
    });
  });

  it('rejects a SELECT that joins an unreadable entity', async () => {
    const verdict = await guard.validate(
      'SELECT c.name FROM tabCustomer c JOIN `tabSalary Slip` s ON s.name = c.name',
    );
    assert.equal(verdict.allowed, false);
    assert.equal(verdict.rule, 'no_read_permission');
    assert.equal(verdict.reason, 'No read permission for Salary Slip');
  });

  it('rejects a SELECT that reaches an unreadable entity through STRAIGHT_JOIN', async () => {
    const verdict = await guard.validate(
      'SELECT s.name, s.net_pay FROM tabCustomer c STRAIGHT_JOIN `tabSalary Slip` s ON s.name = c.name',
    );
    assert.equal(verdict.rule, 'no_read_permission');
    assert.equal(verdict.reason, 'No read permission for Salary Slip');
  });

  it('rejects an unparseable SELECT whose tables cannot all be read off', async () => {
    const verdict = await guard.validate('SELECT name FROM (`tabSalary Slip`) WHERE name = = 1');
    assert.equal(verdict.allowed, false);
    assert.equal(verdict.rule, 'unresolved_tables');
    assert.equal(verdict.reason, 'Cannot determine which tables the query reads');
    assert.equal(verdict.operation, 'SELECT');
  });

  it('rejects file exports', async () => {
    const verdict = await guard.validate("SELECT name FROM tabCustomer INTO OUTFILE '/tmp/customers.csv'");
    assert.equal(verdict.rule, 'file_export');
    assert.equal(verdict.reason, 'File operations are not allowed');
  });

  it('rejects system schemas', async () => {
    const verdict = await guard.validate('SELECT * FROM information_schema.tables');
    assert.equal(verdict.reason, 'Table "information_schema.tables" is blocked by policy');
  });

  it('checks the DESCRIBE target', async () => {
    const verdict = await guard.validate('DESCRIBE `tabSalary Slip`');
    assert.equal(verdict.reason, 'No read permission for Salary Slip');
    assert.equal(verdict.operation, 'DESCRIBE');
  });

  it('checks the targets of SHOW statements that read table metadata', async () => {
    for (const sql of [
      'SHOW COLUMNS IN `tabSalary Slip`',
      'SHOW FULL FIELDS FROM `tabSalary Slip`',
      'SHOW INDEX FROM `tabSalary Slip`',
      'SHOW CREATE TABLE `tabSalary Slip`',
    ]) {
      const verdict = await guard.validate(sql);
      assert.equal(verdict.reason, 'No read permission for Salary Slip', sql);
      assert.equal(verdict.operation, 'SHOW');
    }
  });

  it('allows SHOW without tables', async () => {
    assert.deepEqual(await guard.validate('SHOW TABLES'), { allowed: true, operation: 'SHOW' });
  });

  it('allows an INSERT into an allow-listed, creatable entity', async () => {
    assert.deepEqual(await guard.validate("INSERT INTO `tabLead` (name, lead_name) VALUES ('L-1', 'Ann')"), {
      allowed: true,
      operation: 'INSERT',
    });
  });

  it('rejects an INSERT outside the allow-list despite blanket create permission', async () => {
    const everything = new QueryGuard({
      permissions: new StaticPermissionOracle({ read: '*', create: '*' }),
      store,
    });
    const verdict = await everything.validate("INSERT INTO `tabSalary Slip` (name, net_pay) VALUES ('S-1', 1)");
    assert.equal(verdict.rule, 'insert_not_allowed');
    assert.equal(verdict.reason, 'Creating Salary Slip records via the assistant is not allowed');
  });

  it('rejects an INSERT without create permission', async () => {
    const verdict = await guard.validate("INSERT INTO tabCustomer (name) VALUES ('Initech')");
    assert.equal(verdict.reason, 'No create permission for Customer');
  });

  it('rejects an INSERT whose target is not a record table', async () => {
    const verdict = await guard.validate("INSERT INTO users (name) VALUES ('x')", 'Lead');
    assert.equal(verdict.rule, 'insert_target_mismatch');
    assert.equal(verdict.reason, 'INSERT target users is not a record table');
  });

  it('rejects an INSERT whose doctype disagrees with its target', async () => {
    const verdict = await guard.validate("INSERT INTO tabLead (name) VALUES ('x')", 'Customer');
    assert.equal(verdict.reason, 'INSERT writes to Lead but was requested for Customer');
  });

  it('rejects an INSERT setting a reserved field', async () => {
    const verdict = await guard.validate("INSERT INTO tabLead (name, docstatus) VALUES ('L-2', 1)");
    assert.equal(verdict.rule, 'reserved_field');
    assert.equal(verdict.reason, 'Cannot set system field: docstatus');
  });

  it('checks read permission on tables an INSERT ... SELECT reads', async () => {
    const verdict = await guard.validate(
      'INSERT INTO tabLead (name, lead_name) SELECT name, net_pay FROM `tabSalary Slip`',
    );
    assert.equal(verdict.reason, 'No read permission for Salary Slip');
  });

  it('checks tables an INSERT ... SELECT reads through STRAIGHT_JOIN', async () => {
    const verdict = await guard.validate(
      'INSERT INTO tabLead (name, lead_name) ' +
        'SELECT s.name, s.net_pay FROM tabCustomer c STRAIGHT_JOIN `tabSalary Slip` s ON 1 = 1',
    );
    assert.equal(verdict.allowed, false);
    assert.equal(verdict.reason, 'No read permission for Salary Slip');
  });

  it('fails closed when the permission oracle throws', async () => {
    const broken = new QueryGuard({ permissions: failingOracle, store });
    const read = await broken.validate('SELECT name FROM tabCustomer');
    assert.equal(read.rule, 'permission_check_failed');
    assert.equal(read.reason, 'permission check failed for Customer');
    const insert = await broken.validate("INSERT INTO tabLead (name) VALUES ('x')");
    assert.equal(insert.reason, 'permission check failed for Lead');
  });

  it('reports every verdict with a hash of the SQL', async () => {
    const events: AuditEvent[] = [];
    const audited = new QueryGuard({ permissions: grants, store, onDecision: (e) => events.push(e) });
    await audited.validate('SELECT name FROM tabCustomer');
    await audited.validate('DELETE FROM tabCustomer', 'Customer');

    assert.equal(events.length, 2);
    assert.equal(events[0].decision, 'allowed');
    assert.equal(events[0].sqlHash, hashSql('SELECT name FROM tabCustomer'));
    assert.equal(events[1].decision, 'denied');
    assert.equal(events[1].doctype, 'Customer');
    assert.equal(events[1].rule, 'forbidden_keyword');
  });

  it('takes its dialect from the row store', () => {
    const mariadb = new QueryGuard({ permissions: grants, store: new RecordingStore('mariadb') });
    assert.equal(mariadb.getConfig().dialect, 'mariadb');
    assert.equal(guard.getConfig().dialect, 'sqlite');
  });
});

describe('QueryGuard.execute', () => {
  it('returns rows for an allowed SELECT', async () => {
    const guard = new QueryGuard({ permissions: grants, store: seededStore() });
    const result = await guard.execute('SELECT name, balance FROM `tabCustomer` ORDER BY name');
    assert.deepEqual(result, {
      success: true,
      rows: [
        { name: 'Acme', balance: 500 },
        { name: 'Globex', balance: 120 },
      ],
    });
  });

  it('does not touch the store when validation fails', async () => {
    const store = new RecordingStore('mariadb');
    const guard = new QueryGuard({ permissions: grants, store });
    const result = await guard.execute('SELECT * FROM `tabSalary Slip`');
    assert.deepEqual(result, {
      success: false,
      error: 'No read permission for Salary Slip',
      rule: 'no_read_permission',
    });
    assert.deepEqual(store.calls, []);
  });

  it('turns store errors into failed results', async () => {
    const guard = new QueryGuard({ permissions: grants, store: seededStore() });
    const result = await guard.execute('SELECT missing_col FROM tabCustomer');
    assert.equal(result.success, false);
    if (!result.success) {
      assert.match(result.error, /^Query execution failed: no such column: missing_col/);
      assert.equal(result.rule, undefined);
    }
  });

  it('runs an allowed INSERT and leaves the record as a draft', async () => {
    const store = seededStore();
    const guard = new QueryGuard({ permissions: grants, store });
    const result = await guard.execute("INSERT INTO `tabLead` (name, lead_name) VALUES ('L-1', 'Ann')", 'Lead');
    assert.deepEqual(result, { success: true, rows: [] });
    assert.deepEqual(store.getDb().prepare('SELECT name, lead_name, docstatus FROM tabLead').all(), [
      { name: 'L-1', lead_name: 'Ann', docstatus: 0 },
    ]);
  });

  it('keeps concurrent calls independent', async () => {
    const guard = new QueryGuard({ permissions: grants, store: seededStore() });
    const [customers, blocked] = await Promise.all([
      guard.execute("SELECT name FROM tabCustomer WHERE territory = 'US'"),
      guard.execute('SELECT name FROM `tabSalary Slip`'),
    ]);
    assert.deepEqual(customers, { success: true, rows: [{ name: 'Globex' }] });
    assert.equal(blocked.success, false);
  });
});

describe('QueryGuard.createDraftRecord', () => {
  it('creates a draft with the given name', async () => {
    const store = seededStore();
    const guard = new QueryGuard({ permissions: grants, store });
    const result = await guard.createDraftRecord('Lead', { name: 'LEAD-1', lead_name: 'Ann' });
    assert.deepEqual(result, {
      success: true,
      name: 'LEAD-1',
      message: 'Lead LEAD-1 created successfully (draft)',
    });
    assert.deepEqual(store.getDb().prepare('SELECT name, lead_name, docstatus FROM tabLead').all(), [
      { name: 'LEAD-1', lead_name: 'Ann', docstatus: 0 },
    ]);
  });

  it('generates a name when none is given', async () => {
    const guard = new QueryGuard({ permissions: grants, store: seededStore() });
    const result = await guard.createDraftRecord('Lead', { lead_name: 'Bob' });
    assert.equal(result.success, true);
    if (result.success) {
      assert.match(result.name, /^[0-9a-f]{10}$/);
    }
  });

  it('refuses to set reserved fields', async () => {
    const store = new RecordingStore('mariadb');
    const guard = new QueryGuard({ permissions: grants, store });
    const result = await guard.createDraftRecord('Lead', { lead_name: 'Ann', docstatus: 1 });
    assert.deepEqual(result, { success: false, error: 'Cannot set system field: docstatus', rule: 'reserved_field' });
    assert.deepEqual(store.calls, []);
  });

  it('refuses malformed field names', async () => {
    const guard = new QueryGuard({ permissions: grants, store: new RecordingStore('mariadb') });
    const result = await guard.createDraftRecord('Lead', { 'lead name': 'Ann' });
    assert.deepEqual(result, { success: false, error: 'Invalid field name: lead name', rule: 'invalid_field_name' });
  });

  it('refuses entities outside the allow-list', async () => {
    const guard = new QueryGuard({
      permissions: new StaticPermissionOracle({ read: '*', create: '*' }),
      store: new RecordingStore('mariadb'),
    });
    const result = await guard.createDraftRecord('Salary Slip', { net_pay: 1 });
    assert.equal(result.success, false);
    if (!result.success) {
      assert.equal(result.error, 'Creating Salary Slip records via the assistant is not allowed');
    }
  });

  it('reports store failures', async () => {
    const guard = new QueryGuard({ permissions: grants, store: seededStore() });
    const result = await guard.createDraftRecord('Lead', { name: 'L-9', no_such_column: 1 });
    assert.equal(result.success, false);
    if (!result.success) {
      assert.equal(result.rule, undefined);
      assert.match(result.error, /no_such_column/);
    }
  });
});
