// ---------- Product metrics ----------
export {
  summarizeProduct,
  computeProductMetrics,
  complexityScore,
  rankByComplexity,
  computeAverageProductCost,
} from "./product-metrics.js";

export type {
  ProductSummary,
  ProductMetricsRow,
  QuantityRange,
} from "./product-metrics.js";

// ---------- Component usage ----------
export {
  computeComponentUsage,
  rankComponentUsage,
  costVsQuantity,
} from "./component-usage.js";

export type {
  ComponentUsageRow,
  CostQuantityPoint,
} from "./component-usage.js";

// ---------- Cost distribution ----------
export { computeCostDistribution, skewDirection } from "./cost-distribution.js";

export type {
  CostDistribution,
  BoxPlotSummary,
  CostOutlier,
  CostSkew,
} from "./cost-distribution.js";

export type { HistogramBucket } from "./stats.js";

// ---------- Requirements ----------
export { computeRequirements } from "./requirements.js";
export type { RequirementRow } from "./requirements.js";
