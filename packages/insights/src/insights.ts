import type { ProductMetricsRow } from "../../compute/src/product-metrics.js";
import { rankByComplexity } from "../../compute/src/product-metrics.js";
import type { ComponentUsageRow } from "../../compute/src/component-usage.js";
import { rankComponentUsage } from "../../compute/src/component-usage.js";
import type { CostDistribution } from "../../compute/src/cost-distribution.js";
import { compareIds } from "../../compute/src/group.js";

export type InsightKind =
  | "TOP_COMPLEXITY"
  | "TOP_COMPONENT_USAGE"
  | "COST_SKEW"
  | "AVERAGE_PRODUCT_COST"
  | "HIGHEST_COST_COMPONENT";

export type Insight = {
  kind: InsightKind;
  text: string;
  subject_id: string | null;
  metric: string;
  value: number;
};

export type InsightInput = {
  products: readonly ProductMetricsRow[];
  components: readonly ComponentUsageRow[];
  cost_distribution: CostDistribution | null;
  average_product_cost: number | null;
};

/**
 * Fixed rule set, fixed order. Every sentence quotes the metric it is built
 * from. No products means no insights.
 */
export function generateInsights(input: InsightInput): Insight[] {
  const insights: Insight[] = [];
  const productCount = input.products.length;
  if (productCount === 0) return insights;

  // ---- Most complex product
  const [top] = rankByComplexity(input.products, 1);
  insights.push({
    kind: "TOP_COMPLEXITY",
    text: `Product ${top.product_id} has the highest complexity score (${fmt(top.complexity_score)})`,
    subject_id: top.product_id,
    metric: "complexity_score",
    value: top.complexity_score,
  });

  // ---- Most used component
  const [used] = rankComponentUsage(input.components, 1);
  if (used) {
    insights.push({
      kind: "TOP_COMPONENT_USAGE",
      text: `Component ${used.component_id} is used in ${used.usage_count} of ${productCount} ${
        productCount === 1 ? "product" : "products"
      }`,
      subject_id: used.component_id,
      metric: "usage_count",
      value: used.usage_count,
    });
  }

  // ---- Skew (needs the full distribution)
  const cd = input.cost_distribution;
  if (cd) {
    const avg = cd.average_product_cost;
    const med = cd.median_product_cost;
    const op = avg > med ? ">" : avg < med ? "<" : "=";
    insights.push({
      kind: "COST_SKEW",
      text: `Product cost distribution is ${cd.skew} (mean ${fmt(avg)} ${op} median ${fmt(med)})`,
      subject_id: null,
      metric: "mean_minus_median",
      value: avg - med,
    });
  }

  // ---- Average cost
  if (input.average_product_cost != null) {
    insights.push({
      kind: "AVERAGE_PRODUCT_COST",
      text: `Average product cost is ${fmt(input.average_product_cost)}`,
      subject_id: null,
      metric: "average_product_cost",
      value: input.average_product_cost,
    });
  }

  // ---- Costliest component
  const costliest = [...input.components].sort(
    (a, b) => b.total_cost - a.total_cost || compareIds(a.component_id, b.component_id)
  )[0];
  if (costliest) {
    insights.push({
      kind: "HIGHEST_COST_COMPONENT",
      text: `Component ${costliest.component_id} has the highest total cost (${fmt(costliest.total_cost)})`,
      subject_id: costliest.component_id,
      metric: "total_cost",
      value: costliest.total_cost,
    });
  }

  return insights;
}

function fmt(n: number): string {
  return n.toFixed(2);
}
