// packages/bom/src/fingerprint.ts
import { createHash } from "node:crypto";
import type { BomRecord } from "./schema.js";

/**
 * SHA-256 over the records as fixed-order tuples, one JSON line each.
 * Record order matters; the batch file list does not.
 */
export function batchFingerprint(records: readonly BomRecord[]): string {
  const h = createHash("sha256");
  for (const r of records) {
    const tuple = [r.product_id, r.component_id, r.component_name, r.unit_cost, r.quantity, r.source_file];
    h.update(JSON.stringify(tuple) + "\n", "utf8");
  }
  return h.digest("hex");
}
