/**
 * Permission oracles.
 *
 * The guard never reads an ambient "current user"; the caller hands it an
 * oracle bound to the acting principal.
 */

import type { RowStore } from '../db/types.js';

export interface PermissionOracle {
  hasReadPermission(entity: string): boolean | Promise<boolean>;
  hasCreatePermission(entity: string): boolean | Promise<boolean>;
}

export type EntityGrant = string[] | '*';

export interface StaticGrants {
  read: EntityGrant;
  create: EntityGrant;
}

function isGranted(grant: EntityGrant, entity: string): boolean {
  return grant === '*' || grant.includes(entity);
}

/** Fixed grants, for synthetic principals, demos and tests */
export class StaticPermissionOracle implements PermissionOracle {
  constructor(private readonly grants: StaticGrants) {}

  hasReadPermission(entity: string): boolean {
    return isGranted(this.grants.read, entity);
  }

  hasCreatePermission(entity: string): boolean {
    return isGranted(this.grants.create, entity);
  }
}

export const SUPERUSER = 'Administrator';

const GUEST = 'Guest';

type PermissionType = 'read' | 'create';

/**
 * Role-based permissions read from the ERP's own permission tables.
 *
 * A user's roles come from `tabHas Role`. An entity's rules come from
 * `tabCustom DocPerm` when it has any rows there, otherwise from
 * `tabDocPerm`. Only permission level 0 (document level) counts. Every
 * signed-in user also holds the implicit `All` and `Guest` roles.
 */
export class DocPermOracle implements PermissionOracle {
  private roles: Promise<string[]> | null = null;

  constructor(
    private readonly store: RowStore,
    readonly user: string,
  ) {}

  hasReadPermission(entity: string): Promise<boolean> {
    return this.check(entity, 'read');
  }

  hasCreatePermission(entity: string): Promise<boolean> {
    return this.check(entity, 'create');
  }

  private async check(entity: string, ptype: PermissionType): Promise<boolean> {
    if (this.user === SUPERUSER) return true;

    const roles = await this.loadRoles();

    const custom = await this.store.query(
      'SELECT COUNT(*) AS n FROM `tabCustom DocPerm` WHERE parent = ?',
      [entity],
    );
    const table = Number(custom[0]?.n ?? 0) > 0 ? 'tabCustom DocPerm' : 'tabDocPerm';

    const placeholders = roles.map(() => '?').join(', ');
    const rows = await this.store.query(
      `SELECT COUNT(*) AS n FROM \`${table}\` ` +
        `WHERE parent = ? AND permlevel = 0 AND \`${ptype}\` = 1 AND role IN (${placeholders})`,
      [entity, ...roles],
    );
    return Number(rows[0]?.n ?? 0) > 0;
  }

  private loadRoles(): Promise<string[]> {
    if (!this.roles) {
      this.roles = this.fetchRoles().catch((err: unknown) => {
        this.roles = null;
        throw err;
      });
    }
    return this.roles;
  }

  private async fetchRoles(): Promise<string[]> {
    const implicit = this.user === GUEST ? [GUEST] : ['All', GUEST];
    const rows = await this.store.query('SELECT role FROM `tabHas Role` WHERE parent = ?', [this.user]);
    const assigned = rows
      .map((row) => row.role)
      .filter((role): role is string => typeof role === 'string');
    return [...new Set([...assigned, ...implicit])];
  }
}
