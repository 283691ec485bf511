/**
 * lineItems.ts
 *
 * Part and sublet profit. Pure computation.
 *
 * The upstream system returns part cost/retail per unit on some endpoints and
 * as pre-multiplied line totals on others, under the same field names. When a
 * line total is present we use it to tell the two apart:
 *
 *   retail × qty ≈ total   → fields are per unit          (per_unit_validated)
 *   retail       ≈ total   → fields are line totals, ÷ qty (total_divided)
 *   neither / no total     → assume per unit               (assumed_per_unit)
 *
 * "≈" is a relative tolerance against total (default 1%).
 */

import type { CostFormatMethod, Part, PartProfit, Sublet, SubletProfit } from "@/types/gp";
import { marginPct, toCents } from "@/lib/gp/money";

export const DEFAULT_COST_FORMAT_TOLERANCE = 0.01;

export interface CostFormat {
  costPerUnit: number;
  retailPerUnit: number;
  method: CostFormatMethod;
}

function effectiveQuantity(quantity: number): number {
  return quantity > 0 ? quantity : 1;
}

function withinTolerance(value: number, target: number, tolerance: number): boolean {
  return Math.abs(value - target) / target < tolerance;
}

export function detectCostFormat(
  part: Pick<Part, "cost" | "retail" | "quantity" | "total">,
  tolerance: number = DEFAULT_COST_FORMAT_TOLERANCE
): CostFormat {
  const quantity = effectiveQuantity(part.quantity);
  const { cost, retail, total } = part;

  if (total > 0 && quantity > 1) {
    if (withinTolerance(retail * quantity, total, tolerance)) {
      return { costPerUnit: cost, retailPerUnit: retail, method: "per_unit_validated" };
    }
    if (withinTolerance(retail, total, tolerance)) {
      return {
        costPerUnit: toCents(cost / quantity),
        retailPerUnit: toCents(retail / quantity),
        method: "total_divided",
      };
    }
  }

  return { costPerUnit: cost, retailPerUnit: retail, method: "assumed_per_unit" };
}

export function calculatePartProfit(
  part: Part,
  tolerance: number = DEFAULT_COST_FORMAT_TOLERANCE
): PartProfit {
  const quantity = effectiveQuantity(part.quantity);
  const { costPerUnit, retailPerUnit, method } = detectCostFormat(part, tolerance);

  const totalCost = toCents(costPerUnit * quantity);
  const totalRetail = toCents(retailPerUnit * quantity);
  const profit = totalRetail - totalCost;

  return {
    partId: part.id,
    name: part.name,
    quantity,
    costPerUnit,
    retailPerUnit,
    totalCost,
    totalRetail,
    profit,
    marginPct: marginPct(profit, totalRetail),
    costFormat: method,
  };
}

/** Sublets come through as plain line totals; no normalization needed. */
export function calculateSubletProfit(sublet: Sublet): SubletProfit {
  const profit = sublet.retail - sublet.cost;
  return {
    subletId: sublet.id,
    name: sublet.name,
    vendor: sublet.vendor,
    cost: sublet.cost,
    retail: sublet.retail,
    profit,
    marginPct: marginPct(profit, sublet.retail),
  };
}
