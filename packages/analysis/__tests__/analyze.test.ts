// packages/analysis/__tests__/analyze.test.ts
import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { analyzeBatch, analyzeFiles } from "../src/analyze.js";
import { parseAnalysisConfig } from "../../bom/src/config.js";
import { StageFailureError, ValidationError } from "../../bom/src/errors.js";
import { freezeBatch } from "../../bom/src/normalize.js";
import { sum } from "../../compute/src/stats.js";
import { asRawFile, catchError, rec, twoProductScenario } from "../../bom/__tests__/_helpers/records.js";

describe("analyzeFiles", () => {
  it("packages the two-product scenario", () => {
    const r = analyzeFiles([asRawFile(twoProductScenario())]);

    expect(r.overview).toEqual({
      file_count: 1,
      record_count: 6,
      product_count: 2,
      component_count: 6,
      total_bom_cost: 75,
      average_product_cost: 37.5,
      median_product_cost: 37.5,
    });
    expect(r.products.map((p) => p.product_id)).toEqual(["P1", "P2"]);
    expect(r.complexity_ranking.map((p) => p.product_id)).toEqual(["P1", "P2"]);
    expect(r.top_components).toHaveLength(6);
    expect(r.cost_vs_quantity).toHaveLength(6);
    expect(r.cost_distribution?.total_bom_cost).toBe(75);
    expect(r.insights).toHaveLength(5);
    expect(r.notices).toEqual([]);
  });

  it("reports a total equal to the sum of per-product totals", () => {
    const records = [
      rec("A", "C1", 0.1, 3),
      rec("A", "C2", 0.2, 7),
      rec("B", "C1", 0.7, 1),
      rec("C", "C3", 1.15, 13),
      rec("C", "C1", 0.3, 2),
    ];
    const r = analyzeFiles([asRawFile(records)]);

    expect(r.overview.total_bom_cost).toBe(sum(r.products.map((p) => p.total_cost)));
    expect(r.cost_distribution?.total_bom_cost).toBe(r.overview.total_bom_cost);
  });

  it("merges several files into one batch", () => {
    const r = analyzeFiles([
      asRawFile([rec("P1", "C1", 2, 1)], "a-l.csv"),
      asRawFile([rec("P1", "C2", 3, 1), rec("P2", "C1", 2, 4)], "m-z.csv"),
    ]);

    expect(r.files).toEqual(["a-l.csv", "m-z.csv"]);
    expect(r.products[0]).toMatchObject({ product_id: "P1", component_count: 2, total_cost: 5 });
    expect(r.components[0]).toMatchObject({ component_id: "C1", usage_count: 2, total_quantity: 5 });
  });

  it("reads a pair split over two files as one line", () => {
    const r = analyzeFiles([
      asRawFile([rec("P1", "C1", 2, 3)], "a.csv"),
      asRawFile([rec("P1", "C1", 2, 5)], "b.csv"),
    ]);

    expect(r.overview.record_count).toBe(1);
    expect(r.products[0]).toMatchObject({
      component_count: 1,
      record_count: 1,
      total_cost: 16,
      production_quantity_range: { min: 8, max: 8 },
      source_files: ["a.csv"],
    });
    expect(r.components[0]).toMatchObject({ occurrence_count: 1, total_quantity: 8, average_unit_cost: 2 });
  });

  it("returns a deep-frozen, reproducible result", () => {
    const files = [asRawFile(twoProductScenario())];
    const a = analyzeFiles(files);
    const b = analyzeFiles(files);

    expect(Object.isFrozen(a)).toBe(true);
    expect(Object.isFrozen(a.products[0].production_quantity_range)).toBe(true);
    expect(Object.isFrozen(a.config.columns.product_id)).toBe(true);
    expect(a).toEqual(b);
  });

  it("applies top N and bucket settings", () => {
    const r = analyzeFiles([asRawFile(twoProductScenario())], { top_n: 1, histogram_buckets: 4 });

    expect(r.complexity_ranking.map((p) => p.product_id)).toEqual(["P1"]);
    expect(r.top_components.map((c) => c.component_id)).toEqual(["C1"]);
    expect(r.cost_distribution?.histogram).toHaveLength(4);
  });

  it("rejects an invalid config", () => {
    expect(() => analyzeFiles([], { top_n: 0 })).toThrow(ZodError);
    expect(() => analyzeFiles([], { complexity_weights: { component_count: 0.7, cost: 0.7 } })).toThrow(ZodError);
  });

  it("turns missing statistics into notices for an empty batch", () => {
    const r = analyzeFiles([{ name: "empty.csv", rows: [] }]);

    expect(r.overview).toMatchObject({ product_count: 0, total_bom_cost: 0, average_product_cost: null, median_product_cost: null });
    expect(r.cost_distribution).toBeNull();
    expect(r.insights).toEqual([]);
    expect(r.notices).toEqual([
      {
        stage: "product_metrics",
        metric: "average product cost",
        message: "average product cost requires at least 1 product (0 present)",
        required: 1,
        actual: 0,
      },
      {
        stage: "cost_distribution",
        metric: "cost distribution",
        message: "cost distribution requires at least 2 products (0 present)",
        required: 2,
        actual: 0,
      },
    ]);
  });

  it("keeps single-product uploads usable", () => {
    const r = analyzeFiles([asRawFile([rec("P1", "C1", 4, 2)])]);

    expect(r.overview.average_product_cost).toBe(8);
    expect(r.cost_distribution).toBeNull();
    expect(r.notices.map((n) => n.stage)).toEqual(["cost_distribution"]);
    expect(r.insights.map((x) => x.kind)).not.toContain("COST_SKEW");
  });

  it("aborts the whole batch on a negative unit cost", () => {
    const bad = {
      name: "b.csv",
      rows: [
        { product_id: "P1", component_id: "C1", unit_cost: "1", quantity: "1" },
        { product_id: "P2", component_id: "C1", unit_cost: "-3", quantity: "1" },
      ],
    };
    const err = catchError(() => analyzeFiles([asRawFile(twoProductScenario()), bad]));

    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ file: "b.csv", row: 1, field: "unit_cost" });
  });
});

describe("analyzeBatch", () => {
  it("refuses a hand-built batch that breaks record invariants", () => {
    const batch = freezeBatch([rec("P1", "C1", -2, 1)], ["boms.csv"]);
    const err = catchError(() => analyzeBatch(batch));

    expect(err).toBeInstanceOf(ValidationError);
    expect((err as Error).message).toBe("batch: /records/0/unit_cost: unit_cost -2 is negative");
  });

  it("wraps an unexpected stage error with the stage name", () => {
    const batch = freezeBatch(twoProductScenario(), ["boms.csv"]);
    const err = catchError(() => analyzeBatch(batch, { ...parseAnalysisConfig(), histogram_buckets: 0 }));

    expect(err).toBeInstanceOf(StageFailureError);
    expect(err).toMatchObject({ code: "STAGE_FAILURE", stage: "cost_distribution" });
    expect((err as Error).cause).toBeInstanceOf(RangeError);
  });
});
