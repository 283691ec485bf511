/**
 * tax.ts
 *
 * Attributes an RO's reported total tax to parts / labor / fees / sublet.
 *
 * Explicit: authorized jobs carry per-category tax totals → sum them, and the
 * remainder of the reported total goes to sublet.
 *
 * Proportional (approximation, not verified against the upstream tax engine):
 * split the total by each category's share of taxable retail, truncating, with
 * the rounding remainder going to sublet.
 *
 * Either way the four categories sum to totalTax exactly.
 */

import type { Job, TaxBreakdown } from "@/types/gp";
import { toCents } from "@/lib/gp/money";

export interface TaxableRetail {
  parts: number;
  labor: number;
  taxableFees: number;
  sublet: number;
}

export function calculateTaxBreakdown(
  totalTax: number,
  taxRate: number,
  jobs: readonly Pick<Job, "authorized" | "partsTaxTotal" | "laborTaxTotal" | "feesTaxTotal">[],
  retail: TaxableRetail
): TaxBreakdown {
  let partsTax = 0;
  let laborTax = 0;
  let feesTax = 0;

  for (const job of jobs) {
    if (!job.authorized) continue;
    partsTax += job.partsTaxTotal;
    laborTax += job.laborTaxTotal;
    feesTax += job.feesTaxTotal;
  }

  if (partsTax + laborTax + feesTax > 0) {
    return {
      partsTax,
      laborTax,
      feesTax,
      subletTax: totalTax - partsTax - laborTax - feesTax,
      totalTax,
      taxRate,
      method: "explicit",
    };
  }

  const taxableTotal = retail.parts + retail.labor + retail.taxableFees + retail.sublet;
  if (taxableTotal > 0 && totalTax > 0) {
    partsTax = toCents((totalTax * retail.parts) / taxableTotal);
    laborTax = toCents((totalTax * retail.labor) / taxableTotal);
    feesTax = toCents((totalTax * retail.taxableFees) / taxableTotal);
    return {
      partsTax,
      laborTax,
      feesTax,
      subletTax: totalTax - partsTax - laborTax - feesTax,
      totalTax,
      taxRate,
      method: "proportional",
    };
  }

  // Nothing to attribute against; park any reported tax on sublet so the sum holds.
  return {
    partsTax: 0,
    laborTax: 0,
    feesTax: 0,
    subletTax: totalTax,
    totalTax,
    taxRate,
    method: "none",
  };
}
