/**
 * gpCalculator.ts
 *
 * True GP for a repair order. Pure computation over the parsed RepairOrder and a
 * read-only ShopConfig; no I/O.
 *
 * Order of operations:
 *   1. per job: parts (normalized), labor (rate fallback chain), sublets
 *   2. job discount off the job subtotal
 *   3. sum authorized jobs (or all jobs when authorizedOnly = false)
 *   4. RO-level fees against the pre-fee subtotal (100% margin)
 *   5. RO-level discount
 *   6. tax attribution by category
 *
 *   totalRetail = Σ category retail + fees − (job discounts + RO discount)
 *   grossProfit = totalRetail − Σ category cost
 *
 * calculationNotes documents every fallback or inference taken. It is an audit
 * trail, not an error channel.
 */

import type { ComputedJobGP, ComputedROGP, Job, RepairOrder, ShopConfig } from "@/types/gp";
import { calculatePartProfit, calculateSubletProfit, DEFAULT_COST_FORMAT_TOLERANCE } from "@/lib/gp/lineItems";
import { calculateLaborProfit } from "@/lib/gp/rateResolver";
import { calculateFeeBreakdown, type FeeCategoryRule } from "@/lib/gp/fees";
import { calculateTaxBreakdown } from "@/lib/gp/tax";
import { formatDollars, marginPct } from "@/lib/gp/money";

export interface CalculationOptions {
  /** Only authorized jobs count toward totals. Default true. */
  authorizedOnly?: boolean;
  costFormatTolerance?: number;
  feeRules?: readonly FeeCategoryRule[];
}

export function calculateJobGp(
  job: Job,
  shopConfig: ShopConfig | null,
  options: CalculationOptions = {}
): ComputedJobGP {
  const tolerance = options.costFormatTolerance ?? DEFAULT_COST_FORMAT_TOLERANCE;

  const partsDetail = job.parts.map((p) => calculatePartProfit(p, tolerance));
  const laborDetail = job.labor.map((l) => calculateLaborProfit(l, shopConfig));
  const subletDetail = job.sublets.map(calculateSubletProfit);

  const partsRetail = partsDetail.reduce((sum, p) => sum + p.totalRetail, 0);
  const partsCost = partsDetail.reduce((sum, p) => sum + p.totalCost, 0);
  const laborRetail = laborDetail.reduce((sum, l) => sum + l.totalRetail, 0);
  const laborCost = laborDetail.reduce((sum, l) => sum + l.totalCost, 0);
  const subletRetail = subletDetail.reduce((sum, s) => sum + s.retail, 0);
  const subletCost = subletDetail.reduce((sum, s) => sum + s.cost, 0);

  const discountAmount = job.discount;
  const subtotal = partsRetail + laborRetail + subletRetail - discountAmount;
  const grossProfit = subtotal - (partsCost + laborCost + subletCost);

  return {
    jobId: job.id,
    jobName: job.name,
    authorized: job.authorized,
    authorizedDate: job.authorizedDate,
    partsRetail,
    partsCost,
    partsProfit: partsRetail - partsCost,
    laborRetail,
    laborCost,
    laborProfit: laborRetail - laborCost,
    subletRetail,
    subletCost,
    subletProfit: subletRetail - subletCost,
    discountAmount,
    subtotal,
    grossProfit,
    marginPct: marginPct(grossProfit, subtotal),
    partsDetail,
    laborDetail,
    subletDetail,
  };
}

function jobNotes(job: ComputedJobGP): string[] {
  const notes: string[] = [];
  for (const part of job.partsDetail) {
    if (part.costFormat === "total_divided") {
      notes.push(`Part '${part.name}': cost/retail read as line totals, divided by qty ${part.quantity}`);
    }
  }
  for (const labor of job.laborDetail) {
    if (labor.techRateSource === "shop_average") {
      notes.push(`Labor '${labor.name}': no technician rate, used shop average ${formatDollars(labor.techRate)}/hr`);
    } else if (labor.techRateSource === "default") {
      notes.push(`Labor '${labor.name}': no technician or shop rate, used default ${formatDollars(labor.techRate)}/hr`);
    }
  }
  return notes;
}

export function calculateRoTrueGp(
  ro: RepairOrder,
  shopConfig: ShopConfig | null,
  options: CalculationOptions = {}
): ComputedROGP {
  const authorizedOnly = options.authorizedOnly ?? true;
  const notes: string[] = ro.issues.map((issue) => `Data issue: ${issue}`);

  const jobs: ComputedJobGP[] = [];
  let partsRetail = 0;
  let partsCost = 0;
  let laborRetail = 0;
  let laborCost = 0;
  let subletRetail = 0;
  let subletCost = 0;
  let jobDiscounts = 0;

  for (const job of ro.jobs) {
    if (authorizedOnly && !job.authorized) continue;
    const jobGp = calculateJobGp(job, shopConfig, options);
    jobs.push(jobGp);
    notes.push(...jobNotes(jobGp));

    partsRetail += jobGp.partsRetail;
    partsCost += jobGp.partsCost;
    laborRetail += jobGp.laborRetail;
    laborCost += jobGp.laborCost;
    subletRetail += jobGp.subletRetail;
    subletCost += jobGp.subletCost;
    jobDiscounts += jobGp.discountAmount;
  }

  const subtotalBeforeFees = partsRetail + laborRetail + subletRetail - jobDiscounts;

  const feeBreakdown = calculateFeeBreakdown(ro.fees, subtotalBeforeFees, options.feeRules);
  for (const fee of feeBreakdown.fees) {
    if (fee.amount > 0) {
      notes.push(`Fee '${fee.feeName}' (${fee.category}): ${formatDollars(fee.amount)}`);
    }
  }

  const roDiscount = ro.discount;
  if (roDiscount > 0) notes.push(`RO-level discount: ${formatDollars(roDiscount)}`);

  const totalRetail = subtotalBeforeFees + feeBreakdown.totalFees - roDiscount;
  const totalCost = partsCost + laborCost + subletCost;
  const grossProfit = totalRetail - totalCost;

  const taxBreakdown = calculateTaxBreakdown(ro.tax, ro.taxRate, ro.jobs, {
    parts: partsRetail,
    labor: laborRetail,
    taxableFees: feeBreakdown.taxableFees,
    sublet: subletRetail,
  });
  if (taxBreakdown.method === "proportional") {
    notes.push("Tax split proportionally by category retail (estimate)");
  } else if (taxBreakdown.method === "none" && taxBreakdown.totalTax !== 0) {
    notes.push("Tax could not be attributed to a category; reported on sublet");
  }

  if (authorizedOnly) {
    notes.unshift(`Authorized jobs: ${jobs.length}/${ro.jobs.length}`);
  }

  return {
    roId: ro.id,
    roNumber: ro.repairOrderNumber,
    customerName: ro.customerName,
    vehicleDescription: ro.vehicleDescription,
    advisorId: ro.advisorId,
    advisorName: ro.advisorName,
    totalRetail,
    totalCost,
    grossProfit,
    marginPct: marginPct(grossProfit, totalRetail),
    partsRetail,
    partsCost,
    partsProfit: partsRetail - partsCost,
    laborRetail,
    laborCost,
    laborProfit: laborRetail - laborCost,
    subletRetail,
    subletCost,
    subletProfit: subletRetail - subletCost,
    feeBreakdown,
    feeProfit: feeBreakdown.totalFeeProfit,
    taxBreakdown,
    taxTotal: taxBreakdown.totalTax,
    jobDiscounts,
    roDiscount,
    discountTotal: jobDiscounts + roDiscount,
    balanceDue: ro.balanceDue,
    jobs,
    authorizedJobCount: ro.jobs.filter((j) => j.authorized).length,
    totalJobCount: ro.jobs.length,
    calculationNotes: notes,
  };
}
