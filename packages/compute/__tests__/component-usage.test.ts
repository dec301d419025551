// packages/compute/__tests__/component-usage.test.ts
import { describe, it, expect } from "vitest";
import { computeComponentUsage, costVsQuantity, rankComponentUsage } from "../src/component-usage.js";
import { rec } from "../../bom/__tests__/_helpers/records.js";

const RECORDS = [
  rec("P1", "C1", 2, 3),
  rec("P1", "C2", 10, 1),
  rec("P2", "C1", 4, 1),
  rec("P3", "C1", 3, 2),
  rec("P3", "C2", 10, 5),
];

describe("computeComponentUsage", () => {
  it("aggregates usage, quantity and cost per component", () => {
    const rows = computeComponentUsage(RECORDS);

    expect(rows).toEqual([
      {
        component_id: "C1",
        component_name: "C1",
        usage_count: 3,
        occurrence_count: 3,
        total_quantity: 6,
        total_cost: 16,
        average_unit_cost: 3,
        average_quantity: 2,
        product_ids: ["P1", "P2", "P3"],
      },
      {
        component_id: "C2",
        component_name: "C2",
        usage_count: 2,
        occurrence_count: 2,
        total_quantity: 6,
        total_cost: 60,
        average_unit_cost: 10,
        average_quantity: 3,
        product_ids: ["P1", "P3"],
      },
    ]);
  });

  it("counts a product once even when it lists the part in several files", () => {
    const [row] = computeComponentUsage([rec("P1", "C1", 1, 1, "a.csv"), rec("P1", "C1", 3, 1, "b.csv")]);

    expect(row.usage_count).toBe(1);
    expect(row.occurrence_count).toBe(2);
    // straight per-line mean, not weighted by quantity
    expect(row.average_unit_cost).toBe(2);
  });
});

describe("rankComponentUsage", () => {
  it("orders by usage, then total quantity, then id", () => {
    const rows = computeComponentUsage([
      ...RECORDS,
      rec("P4", "C6", 1, 1),
      rec("P4", "C5", 1, 1),
      rec("P4", "C4", 1, 9),
    ]);

    expect(rankComponentUsage(rows).map((r) => r.component_id)).toEqual(["C1", "C2", "C4", "C5", "C6"]);
    expect(rankComponentUsage(rows, 2).map((r) => r.component_id)).toEqual(["C1", "C2"]);
  });
});

describe("costVsQuantity", () => {
  it("emits one point per component", () => {
    expect(costVsQuantity(computeComponentUsage(RECORDS))).toEqual([
      { component_id: "C1", total_cost: 16, total_quantity: 6 },
      { component_id: "C2", total_cost: 60, total_quantity: 6 },
    ]);
  });
});
