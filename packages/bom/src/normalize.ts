import { z } from "zod";
import { DEFAULT_COLUMNS } from "./config.js";
import { ValidationError } from "./errors.js";
import { batchFingerprint } from "./fingerprint.js";
import type {
  BomBatch,
  BomRecord,
  CanonicalField,
  ColumnMapping,
  RawBomFile,
  StockLevel,
} from "./schema.js";

/* ------------------------------------------------------------------ */
/*                            Cell schemas                            */
/* ------------------------------------------------------------------ */

const IdCell = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .pipe(z.string().min(1, "is missing"));

// Plain decimals, commas only as thousands grouping ("1,250.00").
const DECIMAL = /^[+-]?(\d+|\d{1,3}(,\d{3})+)(\.\d+)?([eE][+-]?\d+)?$/;

const NumericCell = z
  .union([z.number(), z.string()], { error: "is not a number" })
  .transform((v, ctx) => {
    if (typeof v === "number") return v;
    const s = v.trim();
    if (!DECIMAL.test(s)) {
      ctx.issues.push({ code: "custom", message: "is not a number", input: v });
      return z.NEVER;
    }
    return Number(s.replace(/,/g, ""));
  })
  .pipe(z.number({ error: "is not a number" }));

const UnitCostCell = NumericCell.pipe(z.number().min(0, "must not be negative"));

const QuantityCell = NumericCell.pipe(
  z.number().int("must be a whole number").min(0, "must not be negative")
);

export const DEFAULT_STOCK_COLUMNS: Record<keyof StockLevel, string[]> = {
  component_id: ["component_id", "TRIMcode"],
  stock_on_hand: ["stock_on_hand", "SOH"],
};

type RowContext = { file: string; row: number };

/* ------------------------------------------------------------------ */
/*                              Records                               */
/* ------------------------------------------------------------------ */

/**
 * Map raw uploaded rows onto BomRecord.
 *
 * - Files are processed in order; records keep first-appearance order.
 * - Repeated (product_id, component_id) lines collapse into one record across
 *   the whole batch: quantities add, unit_cost becomes the quantity-weighted
 *   mean, source_file stays the file the pair was first seen in.
 * - Any missing or malformed required cell aborts the whole batch.
 */
export function normalizeBomFiles(
  files: readonly RawBomFile[],
  columns: ColumnMapping = DEFAULT_COLUMNS
): BomRecord[] {
  const merged: Array<{ record: BomRecord; extended: number }> = [];
  const indexByPair = new Map<string, number>();

  for (const f of files) {
    f.rows.forEach((row, i) => {
      const ctx: RowContext = { file: f.name, row: i };

      const product_id = requireCell(IdCell, row, "product_id", columns, ctx);
      const component_id = requireCell(IdCell, row, "component_id", columns, ctx);
      const unit_cost = requireCell(UnitCostCell, row, "unit_cost", columns, ctx);
      const quantity = requireCell(QuantityCell, row, "quantity", columns, ctx);

      const rawName = lookup(row, columns.component_name);
      const component_name = isBlank(rawName) ? component_id : String(rawName).trim();

      const key = `${product_id}\u0000${component_id}`;
      const at = indexByPair.get(key);

      if (at === undefined) {
        indexByPair.set(key, merged.length);
        merged.push({
          record: { product_id, component_id, component_name, unit_cost, quantity, source_file: f.name },
          extended: unit_cost * quantity,
        });
        return;
      }

      const prev = merged[at];
      const nextQty = prev.record.quantity + quantity;
      const nextExt = prev.extended + unit_cost * quantity;
      merged[at] = {
        record: {
          ...prev.record,
          quantity: nextQty,
          unit_cost: nextQty > 0 ? nextExt / nextQty : prev.record.unit_cost,
        },
        extended: nextExt,
      };
    });
  }

  return merged.map((m) => m.record);
}

/**
 * Normalize rows and freeze them into a batch. `batch_id` depends only on
 * the resulting records, so identical uploads fingerprint identically.
 */
export function createBomBatch(
  files: readonly RawBomFile[],
  columns: ColumnMapping = DEFAULT_COLUMNS
): BomBatch {
  return freezeBatch(normalizeBomFiles(files, columns), files.map((f) => f.name));
}

export function freezeBatch(records: readonly BomRecord[], files: readonly string[]): BomBatch {
  const frozen = Object.freeze(records.map((r) => Object.freeze({ ...r })));
  return Object.freeze({
    batch_id: batchFingerprint(frozen),
    files: Object.freeze([...files]),
    records: frozen,
  });
}

/* ------------------------------------------------------------------ */
/*                               Stock                                */
/* ------------------------------------------------------------------ */

/** Stock-on-hand rows; several rows for one component are summed. */
export function normalizeStockRows(
  f: RawBomFile,
  columns: Record<keyof StockLevel, string[]> = DEFAULT_STOCK_COLUMNS
): StockLevel[] {
  const byComponent = new Map<string, number>();

  f.rows.forEach((row, i) => {
    const ctx: RowContext = { file: f.name, row: i };
    const component_id = requireValue(IdCell, lookup(row, columns.component_id), "component_id", ctx);
    const stock_on_hand = requireValue(UnitCostCell, lookup(row, columns.stock_on_hand), "stock_on_hand", ctx);
    byComponent.set(component_id, (byComponent.get(component_id) ?? 0) + stock_on_hand);
  });

  return [...byComponent.entries()].map(([component_id, stock_on_hand]) => ({
    component_id,
    stock_on_hand,
  }));
}

/* ------------------------- helpers (deterministic) ------------------------- */

function requireCell<T>(
  schema: z.ZodType<T>,
  row: Record<string, unknown>,
  field: CanonicalField,
  columns: ColumnMapping,
  ctx: RowContext
): T {
  return requireValue(schema, lookup(row, columns[field]), field, ctx);
}

function requireValue<T>(schema: z.ZodType<T>, value: unknown, field: string, ctx: RowContext): T {
  if (isBlank(value)) {
    throw new ValidationError({ file: ctx.file, row: ctx.row, field, reason: "is missing" });
  }

  const r = schema.safeParse(value);
  if (!r.success) {
    const reason = r.error.issues[0]?.message ?? "is invalid";
    throw new ValidationError({ file: ctx.file, row: ctx.row, field, reason });
  }
  return r.data;
}

// Headers are matched after trimming; the first alias present wins.
function lookup(row: Record<string, unknown>, aliases: readonly string[]): unknown {
  const keys = Object.keys(row);
  for (const alias of aliases) {
    const hit = keys.find((k) => k.trim() === alias);
    if (hit !== undefined) return row[hit];
  }
  return undefined;
}

function isBlank(v: unknown): boolean {
  return v === undefined || v === null || (typeof v === "string" && v.trim() === "");
}
