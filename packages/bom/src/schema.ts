// Canonical BOM schema
// Types only. No functions.

/* ------------------------------ Raw input ----------------------------- */

export type RawCell = string | number | boolean | null | undefined;

/** One uploaded table, first row already consumed as headers. */
export interface RawBomFile {
  name: string;
  rows: Array<Record<string, unknown>>;
}

/* ------------------------------- Records ------------------------------ */

export interface BomRecord {
  product_id: string;
  component_id: string;
  component_name: string;
  unit_cost: number; // >= 0
  quantity: number; // integer >= 0
  source_file: string;
}

/**
 * One upload batch. Built once by the normalizer, frozen, and passed by
 * reference to every stage.
 */
export interface BomBatch {
  readonly batch_id: string; // batchFingerprint(records)
  readonly files: readonly string[];
  readonly records: readonly BomRecord[];
}

/* ------------------------------- Stock -------------------------------- */

export interface StockLevel {
  component_id: string;
  stock_on_hand: number;
}

/* ------------------------------ Columns ------------------------------- */

export type CanonicalField =
  | "product_id"
  | "component_id"
  | "component_name"
  | "unit_cost"
  | "quantity";

/** Accepted header names per canonical field, first match wins. */
export type ColumnMapping = Record<CanonicalField, string[]>;
