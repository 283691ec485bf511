/**
 * fees.ts
 *
 * RO-level fee attribution. Fees have no cost, so profit always equals amount.
 *
 * Categories come from the fee name. The source data has no authoritative
 * category field, so classifyFee is a best-effort substring heuristic. A shop
 * can pass its own rules, which are checked (in order) before the defaults.
 */

import type { Fee, FeeBreakdown, FeeCategory, FeeDetail } from "@/types/gp";
import { toCents } from "@/lib/gp/money";

export interface FeeCategoryRule {
  /** Case-insensitive substring matched against the fee name. */
  match: string;
  category: FeeCategory;
}

export function classifyFee(feeName: string, rules: readonly FeeCategoryRule[] = []): FeeCategory {
  const name = feeName.toLowerCase();

  for (const rule of rules) {
    const needle = rule.match.trim().toLowerCase();
    if (needle && name.includes(needle)) return rule.category;
  }

  if (name.includes("shop") && name.includes("suppl")) return "shop_supplies";
  if (name.includes("environ")) return "environmental";
  if (name.includes("haz")) return "hazardous_waste";
  if (name.includes("dispos")) return "disposal";
  return "other";
}

/**
 * @param subtotal - pre-fee subtotal the percentage applies to
 */
export function calculateFeeDetail(
  fee: Fee,
  subtotal: number,
  rules: readonly FeeCategoryRule[] = []
): FeeDetail {
  let amount: number;
  if (fee.percentage > 0 && subtotal > 0) {
    const calculated = toCents((subtotal * fee.percentage) / 100);
    amount = fee.cap > 0 ? Math.min(calculated, fee.cap) : calculated;
  } else {
    amount = fee.amount;
  }

  return {
    feeName: fee.name,
    category: classifyFee(fee.name, rules),
    amount,
    profit: amount,
    percentage: fee.percentage,
    cap: fee.cap,
    taxable: fee.taxable,
  };
}

export function calculateFeeBreakdown(
  fees: readonly Fee[],
  subtotal: number,
  rules: readonly FeeCategoryRule[] = []
): FeeBreakdown {
  const details: FeeDetail[] = [];
  const byCategory: Partial<Record<FeeCategory, number>> = {};
  let totalFees = 0;
  let taxableFees = 0;

  for (const fee of fees) {
    const detail = calculateFeeDetail(fee, subtotal, rules);
    details.push(detail);
    totalFees += detail.amount;
    if (detail.taxable) taxableFees += detail.amount;
    byCategory[detail.category] = (byCategory[detail.category] ?? 0) + detail.amount;
  }

  return {
    fees: details,
    totalFees,
    totalFeeProfit: totalFees,
    taxableFees,
    byCategory,
  };
}
