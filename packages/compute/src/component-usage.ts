import type { BomRecord } from "../../bom/src/schema.js";
import { compareIds, groupByComponent, lineCost } from "./group.js";
import { mean, sum } from "./stats.js";

export type ComponentUsageRow = {
  component_id: string;
  component_name: string;

  usage_count: number; // distinct products referencing the component
  occurrence_count: number; // product-component lines
  total_quantity: number;
  total_cost: number; // sum of unit_cost * quantity

  // straight per-line means (lines may be priced differently per product/supplier)
  average_unit_cost: number;
  average_quantity: number;

  product_ids: string[];
};

export type CostQuantityPoint = {
  component_id: string;
  total_cost: number;
  total_quantity: number;
};

/** One row per component, ordered by component_id. */
export function computeComponentUsage(records: readonly BomRecord[]): ComponentUsageRow[] {
  return groupByComponent(records).map(([component_id, rs]) => {
    const product_ids = [...new Set(rs.map((r) => r.product_id))].sort(compareIds);

    return {
      component_id,
      component_name: rs[0].component_name,
      usage_count: product_ids.length,
      occurrence_count: rs.length,
      total_quantity: sum(rs.map((r) => r.quantity)),
      total_cost: sum(rs.map(lineCost)),
      average_unit_cost: mean(rs.map((r) => r.unit_cost)),
      average_quantity: mean(rs.map((r) => r.quantity)),
      product_ids,
    };
  });
}

/**
 * Most used first. Ties: larger total_quantity, then component_id ascending.
 */
export function rankComponentUsage(rows: readonly ComponentUsageRow[], topN?: number): ComponentUsageRow[] {
  const ranked = [...rows].sort(
    (a, b) =>
      b.usage_count - a.usage_count ||
      b.total_quantity - a.total_quantity ||
      compareIds(a.component_id, b.component_id)
  );
  return topN == null ? ranked : ranked.slice(0, topN);
}

/** One scatter point per component, no binning. */
export function costVsQuantity(rows: readonly ComponentUsageRow[]): CostQuantityPoint[] {
  return rows.map((r) => ({
    component_id: r.component_id,
    total_cost: r.total_cost,
    total_quantity: r.total_quantity,
  }));
}
