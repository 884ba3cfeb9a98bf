/**
 * Static permission file for the CLI's `--permissions` flag:
 *
 *   { "read": ["Customer", "Sales Invoice"], "create": ["Lead"] }
 *
 * Either list may be "*" to grant every entity.
 */

import { readFileSync } from 'node:fs';
import ajvModule from 'ajv';
import type { StaticGrants } from '../guard/permissions.js';

const Ajv = ajvModule.default;

const grant = {
  oneOf: [
    { type: 'string' as const, const: '*' },
    { type: 'array' as const, items: { type: 'string' as const } },
  ],
};

export const staticGrantsSchema = {
  type: 'object' as const,
  properties: { read: grant, create: grant },
  required: ['read', 'create'],
  additionalProperties: false,
};

const validateGrants = new Ajv({ allErrors: true }).compile<StaticGrants>(staticGrantsSchema);

export function loadStaticGrants(path: string): StaticGrants {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Cannot read permissions file ${path}: ${msg}`);
  }
  if (!validateGrants(data)) {
    const errors = validateGrants.errors
      ?.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
      .join('; ');
    throw new Error(`Invalid permissions file ${path}: ${errors ?? 'unknown validation error'}`);
  }
  return data;
}
