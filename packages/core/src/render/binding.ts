import type { Row } from '../db/types.js';
import type { BindingValue, ResultBinding } from './types.js';

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toBindingValue(key: string, value: unknown): BindingValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (Array.isArray(value)) {
    const rows: Row[] = [];
    value.forEach((item: unknown, i) => {
      if (!isRow(item)) {
        throw new Error(`Binding "${key}" item ${i} is not an object`);
      }
      rows.push(item);
    });
    return rows;
  }
  throw new Error(`Binding "${key}" must be a list of rows or a scalar`);
}

/** Build a ResultBinding from decoded JSON, e.g. a `--data` file */
export function parseBinding(data: unknown): ResultBinding {
  if (!isRow(data)) {
    throw new Error('Binding must be a JSON object mapping keys to rows');
  }
  const binding: Record<string, BindingValue> = {};
  for (const [key, value] of Object.entries(data)) {
    binding[key] = toBindingValue(key, value);
  }
  return binding;
}
