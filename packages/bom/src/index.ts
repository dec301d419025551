export type * from "./schema.js";

export {
  AnalysisConfigSchema,
  parseAnalysisConfig,
  DEFAULT_COLUMNS,
  DEFAULT_COMPLEXITY_WEIGHTS,
  DEFAULT_HISTOGRAM_BUCKETS,
  DEFAULT_TOP_N,
} from "./config.js";
export type { AnalysisConfig, AnalysisConfigInput, ComplexityWeights } from "./config.js";

export {
  BomAnalysisError,
  ValidationError,
  EmptyProductError,
  InsufficientDataError,
  StageFailureError,
  isBomAnalysisError,
} from "./errors.js";
export type { AnalysisStage, BomErrorCode } from "./errors.js";

export {
  normalizeBomFiles,
  createBomBatch,
  freezeBatch,
  normalizeStockRows,
  DEFAULT_STOCK_COLUMNS,
} from "./normalize.js";

export { checkRecordInvariants } from "./invariants.js";
export type { RecordViolation, RecordViolationCode } from "./invariants.js";

export { parseBomFileContent, readBomFile, detectFormat } from "./read.js";
export type { BomFileFormat } from "./read.js";

export { batchFingerprint } from "./fingerprint.js";
