// packages/bom/src/errors.ts

export type BomErrorCode =
  | "VALIDATION_ERROR"
  | "EMPTY_PRODUCT"
  | "INSUFFICIENT_DATA"
  | "STAGE_FAILURE";

export type AnalysisStage =
  | "product_metrics"
  | "component_usage"
  | "cost_distribution"
  | "insights"
  | "package";

/**
 * Base class for every failure the engine raises on purpose.
 * `code` is stable and safe to switch on (messages are not).
 */
export abstract class BomAnalysisError extends Error {
  abstract readonly code: BomErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Malformed or missing input field.
 * `row` is the zero-based data row index inside `file` (null for file-level problems).
 */
export class ValidationError extends BomAnalysisError {
  readonly code = "VALIDATION_ERROR" as const;
  readonly file: string;
  readonly row: number | null;
  readonly field: string | null;

  constructor(input: { file: string; row: number | null; field: string | null; reason: string }) {
    const where = input.row == null ? input.file : `${input.file} row ${input.row}`;
    const what = input.field ? `${input.field} ${input.reason}` : input.reason;
    super(`${where}: ${what}`);
    this.file = input.file;
    this.row = input.row;
    this.field = input.field;
  }
}

export class EmptyProductError extends BomAnalysisError {
  readonly code = "EMPTY_PRODUCT" as const;
  readonly product_id: string;

  constructor(product_id: string) {
    super(`Product '${product_id}' has no BOM records`);
    this.product_id = product_id;
  }
}

export class InsufficientDataError extends BomAnalysisError {
  readonly code = "INSUFFICIENT_DATA" as const;
  readonly metric: string;
  readonly required: number;
  readonly actual: number;

  constructor(metric: string, required: number, actual: number) {
    super(
      `${metric} requires at least ${required} product${required === 1 ? "" : "s"} (${actual} present)`
    );
    this.metric = metric;
    this.required = required;
    this.actual = actual;
  }
}

export class StageFailureError extends BomAnalysisError {
  readonly code = "STAGE_FAILURE" as const;
  readonly stage: AnalysisStage;

  constructor(stage: AnalysisStage, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Stage '${stage}' failed: ${detail}`, { cause });
    this.stage = stage;
  }
}

export function isBomAnalysisError(e: unknown): e is BomAnalysisError {
  return e instanceof BomAnalysisError;
}
