// Public entry point: the whole engine from one import.
export * from "../../bom/src/index.js";
export * from "../../compute/src/index.js";
export * from "../../insights/src/index.js";

export { analyzeBatch, analyzeFiles } from "./analyze.js";
export type { AnalysisResult, AnalysisOverview, MetricNotice } from "./analyze.js";

export { buildAnalysisWorkbook, writeAnalysisWorkbook, SHEET_NAMES } from "./export.js";
export { deepFreeze } from "./freeze.js";
