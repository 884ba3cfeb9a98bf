import type { Row } from '../db/types.js';

export type Scalar = string | number | boolean | bigint | Date | null;

/** A query's rows, or a single value bound directly by the caller */
export type BindingValue = readonly Row[] | Scalar;

/** Query key → rows. The only data a template can see. */
export type ResultBinding = Readonly<Record<string, BindingValue>>;

export interface RenderOptions {
  /**
   * Let a loop over `key` fall back to any bound key that contains `key`
   * or is contained in it. Default true.
   */
  fuzzyLoopKeys?: boolean;
}
