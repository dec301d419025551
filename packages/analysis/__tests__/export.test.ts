// packages/analysis/__tests__/export.test.ts
import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import { analyzeFiles } from "../src/analyze.js";
import { buildAnalysisWorkbook, writeAnalysisWorkbook } from "../src/export.js";
import { asRawFile, rec, twoProductScenario } from "../../bom/__tests__/_helpers/records.js";

function sheetRows(wb: XLSX.WorkBook, name: string): unknown[][] {
  const ws = wb.Sheets[name];
  if (!ws) throw new Error(`missing sheet ${name}`);
  return XLSX.utils.sheet_to_json<unknown[]>(ws, { header: 1 });
}

describe("buildAnalysisWorkbook", () => {
  const result = analyzeFiles([asRawFile(twoProductScenario())]);

  it("writes one sheet per metrics table", () => {
    expect(buildAnalysisWorkbook(result).SheetNames).toEqual([
      "Overview",
      "Product_Metrics",
      "Complexity_Ranking",
      "Component_Usage",
      "Cost_Distribution",
      "Insights",
    ]);
  });

  it("fills the per-product sheet from the result", () => {
    const wb = buildAnalysisWorkbook(result);
    const ws = wb.Sheets["Product_Metrics"];
    if (!ws) throw new Error("missing sheet Product_Metrics");

    expect(XLSX.utils.sheet_to_json(ws)).toEqual([
      {
        product_id: "P1",
        component_count: 3,
        record_count: 3,
        total_cost: 60,
        min_quantity: 1,
        max_quantity: 1,
        complexity_score: 1,
        source_files: "boms.csv",
      },
      {
        product_id: "P2",
        component_count: 3,
        record_count: 3,
        total_cost: 15,
        min_quantity: 1,
        max_quantity: 1,
        complexity_score: 0.625,
        source_files: "boms.csv",
      },
    ]);
  });

  it("lists the overview and cost figures", () => {
    const wb = buildAnalysisWorkbook(result);

    expect(sheetRows(wb, "Overview")).toContainEqual(["Total BOM Cost", 75]);
    expect(sheetRows(wb, "Overview")).toContainEqual(["Average Product Cost", 37.5]);

    const cost = sheetRows(wb, "Cost_Distribution");
    expect(cost).toContainEqual(["Median Product Cost", 37.5]);
    expect(cost).toContainEqual(["Skew", "symmetric"]);
    expect(cost).toContainEqual(["Bucket", "Lower", "Upper", "Count"]);
    expect(cost).toContainEqual([0, 15, 19.5, 1]);
  });

  it("explains a missing distribution and adds a notices sheet", () => {
    const single = analyzeFiles([asRawFile([rec("P1", "C1", 4, 2)])]);
    const wb = buildAnalysisWorkbook(single);

    expect(wb.SheetNames).toContain("Notices");
    expect(sheetRows(wb, "Cost_Distribution")).toEqual([
      ["Metric", "Value"],
      ["Status", "cost distribution requires at least 2 products (1 present)"],
    ]);
    expect(sheetRows(wb, "Overview")).toContainEqual(["Median Product Cost", "n/a"]);
  });
});

describe("writeAnalysisWorkbook", () => {
  it("produces xlsx bytes that read back", () => {
    const bytes = writeAnalysisWorkbook(analyzeFiles([asRawFile(twoProductScenario())]));
    const wb = XLSX.read(bytes, { type: "buffer" });
    const ws = wb.Sheets["Insights"];
    if (!ws) throw new Error("missing sheet Insights");

    const rows = XLSX.utils.sheet_to_json<{ kind: string; text: string }>(ws);
    expect(rows).toHaveLength(5);
    expect(rows[0]).toMatchObject({
      kind: "TOP_COMPLEXITY",
      text: "Product P1 has the highest complexity score (1.00)",
    });
  });
});
