import type { BomRecord } from "./schema.js";

export type RecordViolationCode =
  | "NEGATIVE_COST"
  | "NEGATIVE_QUANTITY"
  | "NON_INTEGER_QUANTITY"
  | "NON_FINITE_VALUE"
  | "DUPLICATE_PAIR"
  | "EMPTY_ID";

export type RecordViolation = {
  code: RecordViolationCode;
  message: string;
  path: string; // JSON pointer-like path for debugging
};

/**
 * Re-check a record set against the guarantees the normalizer gives.
 * Returns every violation; an empty list means the set is usable.
 */
export function checkRecordInvariants(records: readonly BomRecord[]): RecordViolation[] {
  const v: RecordViolation[] = [];
  const seen = new Set<string>();

  records.forEach((r, i) => {
    const path = `/records/${i}`;

    // ---- Identity
    if (r.product_id.trim() === "") {
      v.push({ code: "EMPTY_ID", message: "Record has an empty product_id", path: `${path}/product_id` });
    }
    if (r.component_id.trim() === "") {
      v.push({ code: "EMPTY_ID", message: "Record has an empty component_id", path: `${path}/component_id` });
    }

    // ---- Numbers
    if (!Number.isFinite(r.unit_cost)) {
      v.push({ code: "NON_FINITE_VALUE", message: `unit_cost is ${r.unit_cost}`, path: `${path}/unit_cost` });
    } else if (r.unit_cost < 0) {
      v.push({ code: "NEGATIVE_COST", message: `unit_cost ${r.unit_cost} is negative`, path: `${path}/unit_cost` });
    }

    if (!Number.isFinite(r.quantity)) {
      v.push({ code: "NON_FINITE_VALUE", message: `quantity is ${r.quantity}`, path: `${path}/quantity` });
    } else if (!Number.isInteger(r.quantity)) {
      v.push({ code: "NON_INTEGER_QUANTITY", message: `quantity ${r.quantity} is not whole`, path: `${path}/quantity` });
    } else if (r.quantity < 0) {
      v.push({ code: "NEGATIVE_QUANTITY", message: `quantity ${r.quantity} is negative`, path: `${path}/quantity` });
    }

    // ---- Pair uniqueness across the batch
    const key = `${r.product_id}\u0000${r.component_id}`;
    if (seen.has(key)) {
      v.push({
        code: "DUPLICATE_PAIR",
        message: `Duplicate (${r.product_id}, ${r.component_id}) in '${r.source_file}'`,
        path,
      });
    } else {
      seen.add(key);
    }
  });

  return v;
}
