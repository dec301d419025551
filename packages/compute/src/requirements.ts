import type { BomRecord, StockLevel } from "../../bom/src/schema.js";
import { EmptyProductError, ValidationError } from "../../bom/src/errors.js";
import { groupByComponent } from "./group.js";
import { sum } from "./stats.js";

export type RequirementRow = {
  component_id: string;
  component_name: string;
  quantity_per_unit: number;
  required_quantity: number;
  stock_on_hand: number;
  shortfall: number; // 0 when stock covers the requirement
  sufficient: boolean;
};

/**
 * Components needed to build `quantity_desired` units of one product,
 * checked against stock on hand. Rows are ordered by component_id.
 */
export function computeRequirements(
  records: readonly BomRecord[],
  product_id: string,
  quantity_desired: number,
  stock: readonly StockLevel[] = []
): RequirementRow[] {
  if (!Number.isInteger(quantity_desired) || quantity_desired < 0) {
    throw new ValidationError({
      file: "requirements",
      row: null,
      field: "quantity_desired",
      reason: `must be a whole number >= 0 (got ${quantity_desired})`,
    });
  }

  const own = records.filter((r) => r.product_id === product_id);
  if (own.length === 0) throw new EmptyProductError(product_id);

  const onHand = new Map<string, number>();
  for (const s of stock) onHand.set(s.component_id, (onHand.get(s.component_id) ?? 0) + s.stock_on_hand);

  return groupByComponent(own).map(([component_id, rs]) => {
    const quantity_per_unit = sum(rs.map((r) => r.quantity));
    const required_quantity = quantity_per_unit * quantity_desired;
    const stock_on_hand = onHand.get(component_id) ?? 0;

    return {
      component_id,
      component_name: rs[0].component_name,
      quantity_per_unit,
      required_quantity,
      stock_on_hand,
      shortfall: Math.max(0, required_quantity - stock_on_hand),
      sufficient: stock_on_hand >= required_quantity,
    };
  });
}
