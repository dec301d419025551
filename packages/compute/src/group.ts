import type { BomRecord } from "../../bom/src/schema.js";

/** Code-unit order; independent of the host locale. */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function lineCost(r: BomRecord): number {
  return r.unit_cost * r.quantity;
}

/** Records grouped by key, keys in code-unit order, records in input order. */
export function groupBy(
  records: readonly BomRecord[],
  key: (r: BomRecord) => string
): Array<[string, BomRecord[]]> {
  const m = new Map<string, BomRecord[]>();
  for (const r of records) {
    const k = key(r);
    const list = m.get(k);
    if (list) list.push(r);
    else m.set(k, [r]);
  }
  return [...m.entries()].sort((a, b) => compareIds(a[0], b[0]));
}

export function groupByProduct(records: readonly BomRecord[]): Array<[string, BomRecord[]]> {
  return groupBy(records, (r) => r.product_id);
}

export function groupByComponent(records: readonly BomRecord[]): Array<[string, BomRecord[]]> {
  return groupBy(records, (r) => r.component_id);
}

/**
 * Per-product total cost, summed in record order. Every stage that reports a
 * product total goes through here so the figures agree bit for bit.
 */
export function productTotalCost(records: readonly BomRecord[]): number {
  let s = 0;
  for (const r of records) s += lineCost(r);
  return s;
}
