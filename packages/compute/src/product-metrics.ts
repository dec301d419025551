import type { BomRecord } from "../../bom/src/schema.js";
import { DEFAULT_COMPLEXITY_WEIGHTS, type ComplexityWeights } from "../../bom/src/config.js";
import { EmptyProductError, InsufficientDataError } from "../../bom/src/errors.js";
import { compareIds, groupByProduct, productTotalCost } from "./group.js";
import { mean } from "./stats.js";

export type QuantityRange = {
  min: number;
  max: number;
};

export type ProductSummary = {
  product_id: string;
  component_count: number; // distinct component_id
  record_count: number;
  total_cost: number;
  production_quantity_range: QuantityRange;
  source_files: string[];
};

export type ProductMetricsRow = ProductSummary & {
  complexity_score: number; // 0..1
};

/**
 * Metrics for one product. Throws EmptyProductError when `records` is empty;
 * grouping never produces that, direct callers can.
 */
export function summarizeProduct(product_id: string, records: readonly BomRecord[]): ProductSummary {
  if (records.length === 0) throw new EmptyProductError(product_id);

  let min = records[0].quantity;
  let max = records[0].quantity;
  for (const r of records) {
    if (r.quantity < min) min = r.quantity;
    if (r.quantity > max) max = r.quantity;
  }

  return {
    product_id,
    component_count: new Set(records.map((r) => r.component_id)).size,
    record_count: records.length,
    total_cost: productTotalCost(records),
    production_quantity_range: { min, max },
    source_files: [...new Set(records.map((r) => r.source_file))],
  };
}

/**
 * One row per product, ordered by product_id.
 *
 * complexity_score = w.component_count * (component_count / max component_count)
 *                  + w.cost * (total_cost / max total_cost)
 * A zero maximum makes its term zero.
 */
export function computeProductMetrics(
  records: readonly BomRecord[],
  weights: ComplexityWeights = DEFAULT_COMPLEXITY_WEIGHTS
): ProductMetricsRow[] {
  const summaries = groupByProduct(records).map(([id, rs]) => summarizeProduct(id, rs));

  const maxCount = summaries.reduce((m, s) => Math.max(m, s.component_count), 0);
  const maxCost = summaries.reduce((m, s) => Math.max(m, s.total_cost), 0);

  return summaries.map((s) => ({
    ...s,
    complexity_score: complexityScore(s, maxCount, maxCost, weights),
  }));
}

export function complexityScore(
  s: Pick<ProductSummary, "component_count" | "total_cost">,
  maxCount: number,
  maxCost: number,
  weights: ComplexityWeights
): number {
  const countTerm = maxCount > 0 ? s.component_count / maxCount : 0;
  const costTerm = maxCost > 0 ? s.total_cost / maxCost : 0;
  return weights.component_count * countTerm + weights.cost * costTerm;
}

/**
 * Most complex first. Ties: more components, then higher cost, then
 * product_id ascending. Returns a new array.
 */
export function rankByComplexity(rows: readonly ProductMetricsRow[], topN?: number): ProductMetricsRow[] {
  const ranked = [...rows].sort(
    (a, b) =>
      b.complexity_score - a.complexity_score ||
      b.component_count - a.component_count ||
      b.total_cost - a.total_cost ||
      compareIds(a.product_id, b.product_id)
  );
  return topN == null ? ranked : ranked.slice(0, topN);
}

export function computeAverageProductCost(rows: readonly Pick<ProductSummary, "total_cost">[]): number {
  if (rows.length === 0) throw new InsufficientDataError("average product cost", 1, 0);
  return mean(rows.map((r) => r.total_cost));
}
