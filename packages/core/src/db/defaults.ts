/**
 * Safe session defaults for row stores.
 * Enforced at the row-store boundary; the guard itself has no timeouts.
 */

export const SAFE_DEFAULTS = {
  /** Hard cap on returned rows regardless of query LIMIT */
  maxRows: 5000,
  /** Statement timeout in milliseconds */
  statementTimeoutMs: 15_000,
} as const;
