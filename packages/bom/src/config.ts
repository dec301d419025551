import { z } from "zod";
import type { ColumnMapping } from "./schema.js";

/* ------------------------------------------------------------------ */
/*                              Defaults                              */
/* ------------------------------------------------------------------ */

export const DEFAULT_HISTOGRAM_BUCKETS = 10;
export const DEFAULT_TOP_N = 10;

/**
 * complexity = component_count * (count / max count) + cost * (total_cost / max total_cost)
 */
export const DEFAULT_COMPLEXITY_WEIGHTS: ComplexityWeights = {
  component_count: 0.5,
  cost: 0.5,
};

// Snake-case names first, then the legacy FG/L2 export headers.
export const DEFAULT_COLUMNS: ColumnMapping = {
  product_id: ["product_id", "FG Code"],
  component_id: ["component_id", "L2 Code"],
  component_name: ["component_name", "L2 Description"],
  unit_cost: ["unit_cost", "L2 CostInBOM"],
  quantity: ["quantity", "L2 Unti Qty", "L2 Unit Qty"],
};

/* ------------------------------------------------------------------ */
/*                               Schema                               */
/* ------------------------------------------------------------------ */

const Aliases = z.array(z.string().trim().min(1)).min(1);

const ComplexityWeightsSchema = z
  .object({
    component_count: z.number().min(0).max(1),
    cost: z.number().min(0).max(1),
  })
  .refine(
    (w) => Math.abs(w.component_count + w.cost - 1) < 1e-9,
    "complexity_weights must sum to 1"
  );

export const AnalysisConfigSchema = z.object({
  histogram_buckets: z.number().int().min(1).optional(),
  top_n: z.number().int().min(1).optional(),
  complexity_weights: ComplexityWeightsSchema.optional(),
  columns: z
    .object({
      product_id: Aliases.optional(),
      component_id: Aliases.optional(),
      component_name: Aliases.optional(),
      unit_cost: Aliases.optional(),
      quantity: Aliases.optional(),
    })
    .optional(),
});

export type ComplexityWeights = {
  component_count: number;
  cost: number;
};

export type AnalysisConfigInput = z.input<typeof AnalysisConfigSchema>;

export type AnalysisConfig = {
  histogram_buckets: number;
  top_n: number;
  complexity_weights: ComplexityWeights;
  columns: ColumnMapping;
};

/**
 * Validate a user-supplied config and fill in defaults.
 * Throws the zod error as-is on bad input.
 */
export function parseAnalysisConfig(input: unknown = {}): AnalysisConfig {
  const c = AnalysisConfigSchema.parse(input ?? {});
  return {
    histogram_buckets: c.histogram_buckets ?? DEFAULT_HISTOGRAM_BUCKETS,
    top_n: c.top_n ?? DEFAULT_TOP_N,
    complexity_weights: c.complexity_weights ?? { ...DEFAULT_COMPLEXITY_WEIGHTS },
    columns: {
      product_id: c.columns?.product_id ?? DEFAULT_COLUMNS.product_id,
      component_id: c.columns?.component_id ?? DEFAULT_COLUMNS.component_id,
      component_name: c.columns?.component_name ?? DEFAULT_COLUMNS.component_name,
      unit_cost: c.columns?.unit_cost ?? DEFAULT_COLUMNS.unit_cost,
      quantity: c.columns?.quantity ?? DEFAULT_COLUMNS.quantity,
    },
  };
}
