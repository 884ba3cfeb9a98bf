/**
 * Completion parsing: raw model text → AssistantPlan.
 *
 * Model output is untrusted: it may be fenced, wrapped in prose, or missing
 * fields. Anything that is not a JSON object of the right shape is an error
 * the caller turns into a fallback answer.
 */

import ajvModule from 'ajv';
import type { QueryRequest } from '../guard/types.js';
import { completionSchema, type RawCompletion } from './schema_json.js';
import type { AssistantPlan, ParseCompletionResult } from './types.js';

const Ajv = ajvModule.default;

export const DEFAULT_DIRECT_RESPONSE =
  "I understand your question, but I don't have a specific answer for that.";

const validateCompletion = new Ajv({ allErrors: true }).compile<RawCompletion>(completionSchema);

/**
 * Extract JSON from a string that may contain markdown fences or extra text.
 */
export function extractJson(text: string): string {
  const fenceMatch = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenceMatch) {
    return fenceMatch[1].trim();
  }
  const braceStart = text.indexOf('{');
  const braceEnd = text.lastIndexOf('}');
  if (braceStart !== -1 && braceEnd > braceStart) {
    return text.slice(braceStart, braceEnd + 1);
  }
  return text.trim();
}

function toRequests(queries: RawCompletion['queries']): QueryRequest[] {
  const requests: QueryRequest[] = [];
  for (const q of queries ?? []) {
    const key = q.key?.trim();
    const sql = q.query?.trim();
    // entries without a key or SQL are dropped, not errors
    if (!key || !sql) continue;
    const doctype = q.doctype?.trim();
    requests.push(doctype ? { key, sql, doctype } : { key, sql });
  }
  return requests;
}

export function toPlan(data: RawCompletion): AssistantPlan {
  if (data.needs_data === true) {
    return { kind: 'needs_data', queries: toRequests(data.queries), template: data.template ?? '' };
  }
  return { kind: 'direct', response: data.response ?? DEFAULT_DIRECT_RESPONSE };
}

export function parseCompletion(raw: string): ParseCompletionResult {
  const jsonStr = extractJson(raw);
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonStr);
  } catch {
    return { ok: false, error: `Invalid JSON: ${jsonStr.slice(0, 100)}...` };
  }

  if (!validateCompletion(parsed)) {
    const errors = validateCompletion.errors
      ?.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`)
      .join('; ');
    return { ok: false, error: errors ?? 'Unknown validation error' };
  }

  return { ok: true, plan: toPlan(parsed) };
}
