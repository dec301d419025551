import type { BomRecord } from "../../bom/src/schema.js";
import { DEFAULT_HISTOGRAM_BUCKETS } from "../../bom/src/config.js";
import { InsufficientDataError } from "../../bom/src/errors.js";
import { compareIds, groupByProduct, productTotalCost } from "./group.js";
import { histogram, median, quantile, sortAscending, sum, type HistogramBucket } from "./stats.js";

export type CostOutlier = {
  product_id: string;
  total_cost: number;
};

export type BoxPlotSummary = {
  q1: number;
  q2: number;
  q3: number;
  iqr: number;
  lower_fence: number; // q1 - 1.5 * iqr
  upper_fence: number; // q3 + 1.5 * iqr
  whisker_low: number; // lowest value inside the fences
  whisker_high: number; // highest value inside the fences
  outliers: CostOutlier[];
};

export type CostSkew = "right-skewed" | "left-skewed" | "symmetric";

export type CostDistribution = {
  product_count: number;
  total_bom_cost: number;
  average_product_cost: number;
  median_product_cost: number;
  min_product_cost: number;
  max_product_cost: number;
  skew: CostSkew;
  histogram: HistogramBucket[];
  box_plot: BoxPlotSummary;
};

const WHISKER_IQR_MULTIPLIER = 1.5;

/**
 * Distribution of per-product total cost. Needs at least two products:
 * median and quartiles of a single value say nothing.
 */
export function computeCostDistribution(
  records: readonly BomRecord[],
  bucketCount: number = DEFAULT_HISTOGRAM_BUCKETS
): CostDistribution {
  const totals = groupByProduct(records).map(([product_id, rs]) => ({
    product_id,
    total_cost: productTotalCost(rs),
  }));

  if (totals.length < 2) throw new InsufficientDataError("cost distribution", 2, totals.length);

  const values = totals.map((t) => t.total_cost);
  const sorted = sortAscending(values);

  const total_bom_cost = sum(values);
  const average_product_cost = total_bom_cost / values.length;
  const median_product_cost = median(sorted);

  return {
    product_count: totals.length,
    total_bom_cost,
    average_product_cost,
    median_product_cost,
    min_product_cost: sorted[0],
    max_product_cost: sorted[sorted.length - 1],
    skew: skewDirection(average_product_cost, median_product_cost),
    histogram: histogram(values, bucketCount),
    box_plot: boxPlot(totals, sorted, median_product_cost),
  };
}

export function skewDirection(avg: number, med: number): CostSkew {
  if (avg > med) return "right-skewed";
  if (avg < med) return "left-skewed";
  return "symmetric";
}

function boxPlot(
  totals: readonly CostOutlier[],
  sorted: readonly number[],
  q2: number
): BoxPlotSummary {
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  const lower_fence = q1 - WHISKER_IQR_MULTIPLIER * iqr;
  const upper_fence = q3 + WHISKER_IQR_MULTIPLIER * iqr;

  const inside = sorted.filter((v) => v >= lower_fence && v <= upper_fence);

  const outliers = totals
    .filter((t) => t.total_cost < lower_fence || t.total_cost > upper_fence)
    .sort((a, b) => a.total_cost - b.total_cost || compareIds(a.product_id, b.product_id));

  return {
    q1,
    q2,
    q3,
    iqr,
    lower_fence,
    upper_fence,
    // some value always lies in [q1, q3], so `inside` is never empty
    whisker_low: inside[0],
    whisker_high: inside[inside.length - 1],
    outliers,
  };
}
