import * as XLSX from "xlsx";

import type { AnalysisResult } from "./analyze.js";

export const SHEET_NAMES = {
  overview: "Overview",
  products: "Product_Metrics",
  complexity: "Complexity_Ranking",
  components: "Component_Usage",
  cost: "Cost_Distribution",
  insights: "Insights",
  notices: "Notices",
} as const;

/**
 * One sheet per metrics table. `Notices` is only added when some metric
 * could not be computed.
 */
export function buildAnalysisWorkbook(result: AnalysisResult): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  const o = result.overview;

  const overviewSheet = XLSX.utils.aoa_to_sheet([
    ["Metric", "Value"],
    ["Batch ID", result.batch_id],
    ["Files", result.files.join(", ")],
    ["Records", o.record_count],
    ["Products", o.product_count],
    ["Components", o.component_count],
    ["Total BOM Cost", o.total_bom_cost],
    ["Average Product Cost", o.average_product_cost ?? "n/a"],
    ["Median Product Cost", o.median_product_cost ?? "n/a"],
  ]);
  XLSX.utils.book_append_sheet(workbook, overviewSheet, SHEET_NAMES.overview);

  const productRows = result.products.map((p) => ({
    product_id: p.product_id,
    component_count: p.component_count,
    record_count: p.record_count,
    total_cost: p.total_cost,
    min_quantity: p.production_quantity_range.min,
    max_quantity: p.production_quantity_range.max,
    complexity_score: p.complexity_score,
    source_files: p.source_files.join(", "),
  }));
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.json_to_sheet(productRows, {
      header: [
        "product_id",
        "component_count",
        "record_count",
        "total_cost",
        "min_quantity",
        "max_quantity",
        "complexity_score",
        "source_files",
      ],
    }),
    SHEET_NAMES.products
  );

  const rankingRows = result.complexity_ranking.map((p, i) => ({
    rank: i + 1,
    product_id: p.product_id,
    complexity_score: p.complexity_score,
    component_count: p.component_count,
    total_cost: p.total_cost,
  }));
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.json_to_sheet(rankingRows, {
      header: ["rank", "product_id", "complexity_score", "component_count", "total_cost"],
    }),
    SHEET_NAMES.complexity
  );

  const componentRows = result.components.map((c) => ({
    component_id: c.component_id,
    component_name: c.component_name,
    usage_count: c.usage_count,
    occurrence_count: c.occurrence_count,
    total_quantity: c.total_quantity,
    total_cost: c.total_cost,
    average_unit_cost: c.average_unit_cost,
    average_quantity: c.average_quantity,
  }));
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.json_to_sheet(componentRows, {
      header: [
        "component_id",
        "component_name",
        "usage_count",
        "occurrence_count",
        "total_quantity",
        "total_cost",
        "average_unit_cost",
        "average_quantity",
      ],
    }),
    SHEET_NAMES.components
  );

  XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(costDistributionTable(result)), SHEET_NAMES.cost);

  const insightRows = result.insights.map((x) => ({
    kind: x.kind,
    text: x.text,
    metric: x.metric,
    value: x.value,
  }));
  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.json_to_sheet(insightRows, { header: ["kind", "text", "metric", "value"] }),
    SHEET_NAMES.insights
  );

  if (result.notices.length) {
    XLSX.utils.book_append_sheet(
      workbook,
      XLSX.utils.json_to_sheet(
        result.notices.map((n) => ({ ...n })),
        { header: ["stage", "metric", "message", "required", "actual"] }
      ),
      SHEET_NAMES.notices
    );
  }

  return workbook;
}

export function writeAnalysisWorkbook(result: AnalysisResult): Buffer {
  const bytes: Buffer = XLSX.write(buildAnalysisWorkbook(result), { type: "buffer", bookType: "xlsx" });
  return bytes;
}

type Cell = string | number;

function costDistributionTable(result: AnalysisResult): Cell[][] {
  const cd = result.cost_distribution;
  if (!cd) {
    const why = result.notices.find((n) => n.stage === "cost_distribution");
    return [
      ["Metric", "Value"],
      ["Status", why ? why.message : "not computed"],
    ];
  }

  const b = cd.box_plot;
  const rows: Cell[][] = [
    ["Metric", "Value"],
    ["Total BOM Cost", cd.total_bom_cost],
    ["Average Product Cost", cd.average_product_cost],
    ["Median Product Cost", cd.median_product_cost],
    ["Min Product Cost", cd.min_product_cost],
    ["Max Product Cost", cd.max_product_cost],
    ["Skew", cd.skew],
    ["Q1", b.q1],
    ["Q2", b.q2],
    ["Q3", b.q3],
    ["IQR", b.iqr],
    ["Lower Whisker", b.whisker_low],
    ["Upper Whisker", b.whisker_high],
    ["Outliers", b.outliers.map((x) => x.product_id).join(", ")],
    [],
    ["Bucket", "Lower", "Upper", "Count"],
  ];
  for (const h of cd.histogram) rows.push([h.index, h.lower, h.upper, h.count]);
  return rows;
}
