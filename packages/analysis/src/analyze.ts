// packages/analysis/src/analyze.ts
import type { BomBatch, RawBomFile } from "../../bom/src/schema.js";
import { parseAnalysisConfig, type AnalysisConfig } from "../../bom/src/config.js";
import {
  InsufficientDataError,
  StageFailureError,
  ValidationError,
  type AnalysisStage,
} from "../../bom/src/errors.js";
import { checkRecordInvariants } from "../../bom/src/invariants.js";
import { createBomBatch } from "../../bom/src/normalize.js";
import {
  computeAverageProductCost,
  computeProductMetrics,
  rankByComplexity,
  type ProductMetricsRow,
} from "../../compute/src/product-metrics.js";
import {
  computeComponentUsage,
  costVsQuantity,
  rankComponentUsage,
  type ComponentUsageRow,
  type CostQuantityPoint,
} from "../../compute/src/component-usage.js";
import { computeCostDistribution, type CostDistribution } from "../../compute/src/cost-distribution.js";
import { sum } from "../../compute/src/stats.js";
import { generateInsights, type Insight } from "../../insights/src/insights.js";
import { deepFreeze } from "./freeze.js";

export type MetricNotice = {
  stage: AnalysisStage;
  metric: string;
  message: string;
  required: number;
  actual: number;
};

export type AnalysisOverview = {
  file_count: number;
  record_count: number;
  product_count: number;
  component_count: number;
  total_bom_cost: number;
  average_product_cost: number | null;
  median_product_cost: number | null;
};

export type AnalysisResult = {
  batch_id: string;
  files: string[];
  config: AnalysisConfig;

  overview: AnalysisOverview;

  products: ProductMetricsRow[]; // by product_id
  complexity_ranking: ProductMetricsRow[]; // top N

  components: ComponentUsageRow[]; // by component_id
  top_components: ComponentUsageRow[]; // top N
  cost_vs_quantity: CostQuantityPoint[];

  cost_distribution: CostDistribution | null;
  insights: Insight[];

  // metrics that could not be computed on this batch, and why
  notices: MetricNotice[];
};

type StageOutcome<T> = { ok: true; value: T } | { ok: false; notice: MetricNotice };

/**
 * Run every metric stage over one frozen batch and package the outcome.
 *
 * - InsufficientDataError is not fatal: the metric becomes null and a notice
 *   explains what was missing.
 * - Any other stage error aborts with StageFailureError naming the stage.
 *
 * The returned result is deep-frozen.
 */
export function analyzeBatch(batch: BomBatch, config: AnalysisConfig = parseAnalysisConfig()): AnalysisResult {
  const violations = checkRecordInvariants(batch.records);
  if (violations.length) {
    const v = violations[0];
    throw new ValidationError({ file: "batch", row: null, field: null, reason: `${v.path}: ${v.message}` });
  }

  const records = batch.records;
  const notices: MetricNotice[] = [];

  // ---- Independent stages (read-only over the same records)
  const products = required(runStage("product_metrics", () => computeProductMetrics(records, config.complexity_weights)));
  const components = required(runStage("component_usage", () => computeComponentUsage(records)));
  const cost = runStage("cost_distribution", () => computeCostDistribution(records, config.histogram_buckets));

  // ---- Join
  const average = runStage("product_metrics", () => computeAverageProductCost(products));

  const cost_distribution = cost.ok ? cost.value : null;
  const average_product_cost = average.ok ? average.value : null;
  if (!average.ok) notices.push(average.notice);
  if (!cost.ok) notices.push(cost.notice);

  const insights = required(
    runStage("insights", () =>
      generateInsights({ products, components, cost_distribution, average_product_cost })
    )
  );

  // ---- Package
  const total_bom_cost = sum(products.map((p) => p.total_cost));
  assertConsistent(total_bom_cost, products, cost_distribution);

  const result: AnalysisResult = {
    batch_id: batch.batch_id,
    files: [...batch.files],
    config: structuredClone(config),
    overview: {
      file_count: batch.files.length,
      record_count: records.length,
      product_count: products.length,
      component_count: components.length,
      total_bom_cost,
      average_product_cost,
      median_product_cost: cost_distribution?.median_product_cost ?? null,
    },
    products,
    complexity_ranking: rankByComplexity(products, config.top_n),
    components,
    top_components: rankComponentUsage(components, config.top_n),
    cost_vs_quantity: costVsQuantity(components),
    cost_distribution,
    insights,
    notices,
  };

  return deepFreeze(result);
}

/**
 * Normalize raw tables and analyze them as one batch. Normalization errors
 * propagate unwrapped: a corrupt batch is never partially analyzed.
 */
export function analyzeFiles(files: readonly RawBomFile[], configInput: unknown = {}): AnalysisResult {
  const config = parseAnalysisConfig(configInput);
  const batch = createBomBatch(files, config.columns);
  return analyzeBatch(batch, config);
}

/* ------------------------- helpers (deterministic) ------------------------- */

function runStage<T>(stage: AnalysisStage, fn: () => T): StageOutcome<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (e instanceof InsufficientDataError) {
      return {
        ok: false,
        notice: { stage, metric: e.metric, message: e.message, required: e.required, actual: e.actual },
      };
    }
    throw new StageFailureError(stage, e);
  }
}

// Stages whose output every later step needs: a notice here is a failure.
function required<T>(o: StageOutcome<T>): T {
  if (o.ok) return o.value;
  throw new StageFailureError(o.notice.stage, new Error(o.notice.message));
}

function assertConsistent(
  total: number,
  products: readonly ProductMetricsRow[],
  cd: CostDistribution | null
): void {
  if (!cd) return;
  if (cd.total_bom_cost !== total) {
    throw new StageFailureError(
      "package",
      new Error(`total BOM cost ${cd.total_bom_cost} does not match product total ${total}`)
    );
  }
  if (cd.product_count !== products.length) {
    throw new StageFailureError(
      "package",
      new Error(`cost distribution covers ${cd.product_count} products, metrics cover ${products.length}`)
    );
  }
}
