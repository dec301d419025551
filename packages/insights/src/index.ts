export { generateInsights } from "./insights.js";
export type { Insight, InsightInput, InsightKind } from "./insights.js";
