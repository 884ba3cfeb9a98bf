/**
 * Guard policy file: a JSON object overriding parts of defaultGuardConfig().
 *
 *   { "insertAllowList": ["Lead", "Task"], "blockedTables": ["tabSalary Slip"] }
 *
 * The dialect is not configurable here; it always follows the row store.
 */

import { readFileSync } from 'node:fs';
import ajvModule from 'ajv';
import type { GuardConfig } from '../guard/types.js';

const Ajv = ajvModule.default;

export type GuardConfigOverrides = Partial<Omit<GuardConfig, 'dialect'>>;

const stringList = { type: 'array' as const, items: { type: 'string' as const, minLength: 1 } };

export const guardConfigSchema = {
  type: 'object' as const,
  properties: {
    tablePrefix: { type: 'string' as const },
    insertAllowList: stringList,
    reservedFields: stringList,
    blockedTables: stringList,
    blockedFunctions: stringList,
    allowMultipleStatements: { type: 'boolean' as const },
  },
  additionalProperties: false,
};

const validateOverrides = new Ajv({ allErrors: true }).compile<GuardConfigOverrides>(guardConfigSchema);

export function parseGuardConfig(data: unknown, source = 'guard config'): GuardConfigOverrides {
  if (!validateOverrides(data)) {
    const errors = validateOverrides.errors
      ?.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
      .join('; ');
    throw new Error(`Invalid ${source}: ${errors ?? 'unknown validation error'}`);
  }
  return data;
}

export function loadGuardConfig(path: string): GuardConfigOverrides {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read guard config ${path}: ${msg}`);
  }
  return parseGuardConfig(data, `guard config ${path}`);
}
