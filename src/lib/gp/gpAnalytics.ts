/**
 * gpAnalytics.ts
 *
 * Roll-ups over a set of computed ROs: labor efficiency by rate source, parts
 * margins by quantity band, advisor and technician performance, and a
 * true-vs-reported variance summary.
 * Pure computation: the route fetches and calculates, this module aggregates.
 */

import type { ComputedROGP, TechRateSource } from "@/types/gp";
import { marginPct, round2, toCents, formatDollars } from "@/lib/gp/money";

// ─── Labor efficiency ─────────────────────────────────────────────────────────

export interface RateSourceBucket {
  count: number;
  hours: number;
  revenue: number;
  cost: number;
  marginPct: number;
}

export interface LaborEfficiency {
  totalHoursBilled: number;
  totalLaborRevenue: number;
  totalLaborCost: number;
  totalLaborProfit: number;
  overallMarginPct: number;
  /** Mean of line retail rates, cents/hr. */
  avgRetailRate: number;
  /** Mean of resolved tech cost rates, cents/hr. */
  avgTechCostRate: number;
  effectiveSpread: number;
  byRateSource: Record<TechRateSource, RateSourceBucket>;
  totalLaborItems: number;
}

function emptyBucket(): RateSourceBucket {
  return { count: 0, hours: 0, revenue: 0, cost: 0, marginPct: 0 };
}

export function aggregateLaborEfficiency(ros: readonly ComputedROGP[]): LaborEfficiency {
  const byRateSource: Record<TechRateSource, RateSourceBucket> = {
    assigned: emptyBucket(),
    shop_average: emptyBucket(),
    default: emptyBucket(),
  };
  let hours = 0;
  let revenue = 0;
  let cost = 0;
  let items = 0;
  let retailRateSum = 0;
  let costRateSum = 0;

  for (const ro of ros) {
    for (const job of ro.jobs) {
      for (const labor of job.laborDetail) {
        hours += labor.hours;
        revenue += labor.totalRetail;
        cost += labor.totalCost;
        items++;
        retailRateSum += labor.rate;
        costRateSum += labor.techRate;

        const bucket = byRateSource[labor.techRateSource];
        bucket.count++;
        bucket.hours += labor.hours;
        bucket.revenue += labor.totalRetail;
        bucket.cost += labor.totalCost;
      }
    }
  }

  for (const bucket of Object.values(byRateSource)) {
    bucket.hours = round2(bucket.hours);
    bucket.marginPct = marginPct(bucket.revenue - bucket.cost, bucket.revenue);
  }

  const avgRetailRate = items > 0 ? toCents(retailRateSum / items) : 0;
  const avgTechCostRate = items > 0 ? toCents(costRateSum / items) : 0;

  return {
    totalHoursBilled: round2(hours),
    totalLaborRevenue: revenue,
    totalLaborCost: cost,
    totalLaborProfit: revenue - cost,
    overallMarginPct: marginPct(revenue - cost, revenue),
    avgRetailRate,
    avgTechCostRate,
    effectiveSpread: avgRetailRate - avgTechCostRate,
    byRateSource,
    totalLaborItems: items,
  };
}

// ─── Parts margin ─────────────────────────────────────────────────────────────

export interface QuantityBand {
  count: number;
  retail: number;
  cost: number;
  profit: number;
  marginPct: number;
}

export interface PartMarginLine {
  name: string;
  quantity: number;
  cost: number;
  retail: number;
  profit: number;
  marginPct: number;
}

export interface PartsMarginAnalysis {
  totalPartsRetail: number;
  totalPartsCost: number;
  totalPartsProfit: number;
  overallMarginPct: number;
  singleItems: QuantityBand;
  multiItems: QuantityBand;
  /** Up to 5, best margin first. */
  highestMarginParts: PartMarginLine[];
  /** Up to 5, worst margin last. Empty under 5 parts (all already in highest). */
  lowestMarginParts: PartMarginLine[];
  avgQuantity: number;
  totalLineItems: number;
}

function band(count: number, retail: number, cost: number): QuantityBand {
  return { count, retail, cost, profit: retail - cost, marginPct: marginPct(retail - cost, retail) };
}

export function aggregatePartsMargin(ros: readonly ComputedROGP[]): PartsMarginAnalysis {
  const lines: PartMarginLine[] = [];
  const single = { count: 0, retail: 0, cost: 0 };
  const multi = { count: 0, retail: 0, cost: 0 };

  for (const ro of ros) {
    for (const job of ro.jobs) {
      for (const part of job.partsDetail) {
        lines.push({
          name: part.name,
          quantity: part.quantity,
          cost: part.totalCost,
          retail: part.totalRetail,
          profit: part.profit,
          marginPct: part.marginPct,
        });
        const target = part.quantity === 1 ? single : multi;
        target.count++;
        target.retail += part.totalRetail;
        target.cost += part.totalCost;
      }
    }
  }

  const totalRetail = single.retail + multi.retail;
  const totalCost = single.cost + multi.cost;
  const sorted = [...lines].sort((a, b) => b.marginPct - a.marginPct);
  const quantitySum = lines.reduce((sum, l) => sum + l.quantity, 0);

  return {
    totalPartsRetail: totalRetail,
    totalPartsCost: totalCost,
    totalPartsProfit: totalRetail - totalCost,
    overallMarginPct: marginPct(totalRetail - totalCost, totalRetail),
    singleItems: band(single.count, single.retail, single.cost),
    multiItems: band(multi.count, multi.retail, multi.cost),
    highestMarginParts: sorted.slice(0, 5),
    lowestMarginParts: sorted.length >= 5 ? sorted.slice(-5) : [],
    avgQuantity: lines.length > 0 ? round2(quantitySum / lines.length) : 1,
    totalLineItems: lines.length,
  };
}

// ─── Advisor performance ──────────────────────────────────────────────────────

export interface AdvisorPerformance {
  /** 0 = no advisor on the RO. */
  advisorId: number;
  advisorName: string;
  totalSales: number;
  totalCost: number;
  grossProfit: number;
  gpPercentage: number;
  roCount: number;
  jobCount: number;
  /** Average repair order, cents (floor). */
  aro: number;
  avgJobValue: number;
  partsSales: number;
  laborSales: number;
  subletSales: number;
  feeSales: number;
}

export function aggregateAdvisorPerformance(ros: readonly ComputedROGP[]): AdvisorPerformance[] {
  const byAdvisor = new Map<number, AdvisorPerformance>();

  for (const ro of ros) {
    const advisorId = ro.advisorId ?? 0;
    let entry = byAdvisor.get(advisorId);
    if (!entry) {
      entry = {
        advisorId,
        advisorName: ro.advisorName ?? "Unassigned",
        totalSales: 0,
        totalCost: 0,
        grossProfit: 0,
        gpPercentage: 0,
        roCount: 0,
        jobCount: 0,
        aro: 0,
        avgJobValue: 0,
        partsSales: 0,
        laborSales: 0,
        subletSales: 0,
        feeSales: 0,
      };
      byAdvisor.set(advisorId, entry);
    }

    entry.totalSales += ro.totalRetail;
    entry.totalCost += ro.totalCost;
    entry.grossProfit += ro.grossProfit;
    entry.roCount++;
    entry.jobCount += ro.authorizedJobCount;
    entry.partsSales += ro.partsRetail;
    entry.laborSales += ro.laborRetail;
    entry.subletSales += ro.subletRetail;
    entry.feeSales += ro.feeBreakdown.totalFees;
  }

  const result = [...byAdvisor.values()];
  for (const a of result) {
    a.gpPercentage = marginPct(a.grossProfit, a.totalSales);
    a.aro = a.roCount > 0 ? Math.floor(a.totalSales / a.roCount) : 0;
    a.avgJobValue = a.jobCount > 0 ? Math.floor(a.totalSales / a.jobCount) : 0;
  }
  // Highest sales first
  return result.sort((a, b) => b.totalSales - a.totalSales);
}

// ─── Technician performance ───────────────────────────────────────────────────

export interface TechPerformance {
  /** Tech name for assigned rates, else "Shop Average (<source>)". */
  techName: string;
  /** Cost rate of the first line seen for this bucket, cents/hr. */
  hourlyRate: number;
  hoursBilled: number;
  laborRevenue: number;
  laborCost: number;
  laborProfit: number;
  laborMarginPct: number;
  jobsWorked: number;
  rosWorked: number;
  /** Labor profit per billed hour, cents (truncated). */
  gpPerHour: number;
  rateSourceCounts: Partial<Record<TechRateSource, number>>;
}

export function aggregateTechPerformance(ros: readonly ComputedROGP[]): TechPerformance[] {
  const byTech = new Map<string, TechPerformance>();
  const rosByTech = new Map<string, Set<number>>();

  for (const ro of ros) {
    for (const job of ro.jobs) {
      for (const labor of job.laborDetail) {
        const techName =
          labor.techRateSource === "assigned" && labor.techName
            ? labor.techName
            : `Shop Average (${labor.techRateSource})`;

        let entry = byTech.get(techName);
        if (!entry) {
          entry = {
            techName,
            hourlyRate: labor.techRate,
            hoursBilled: 0,
            laborRevenue: 0,
            laborCost: 0,
            laborProfit: 0,
            laborMarginPct: 0,
            jobsWorked: 0,
            rosWorked: 0,
            gpPerHour: 0,
            rateSourceCounts: {},
          };
          byTech.set(techName, entry);
        }

        entry.hoursBilled += labor.hours;
        entry.laborRevenue += labor.totalRetail;
        entry.laborCost += labor.totalCost;
        entry.laborProfit += labor.profit;
        entry.jobsWorked++;
        entry.rateSourceCounts[labor.techRateSource] = (entry.rateSourceCounts[labor.techRateSource] ?? 0) + 1;

        const seen = rosByTech.get(techName) ?? new Set<number>();
        seen.add(ro.roId);
        rosByTech.set(techName, seen);
      }
    }
  }

  const result = [...byTech.values()];
  for (const t of result) {
    t.laborMarginPct = marginPct(t.laborProfit, t.laborRevenue);
    t.gpPerHour = t.hoursBilled > 0 ? toCents(t.laborProfit / t.hoursBilled) : 0;
    t.hoursBilled = round2(t.hoursBilled);
    t.rosWorked = rosByTech.get(t.techName)?.size ?? 0;
  }
  // Most labor profit first
  return result.sort((a, b) => b.laborProfit - a.laborProfit);
}

// ─── True vs reported ─────────────────────────────────────────────────────────

export interface TrueGpSummary {
  sales: number;
  cost: number;
  grossProfit: number;
  gpPercentage: number;
  carCount: number;
  /** Average repair order, cents (floor). */
  averageRo: number;
  feeProfit: number;
}

/** Aggregates as the source system's dashboard reports them, in cents. */
export interface ReportedAggregates {
  sales: number;
  carCount: number;
  averageRo: number;
}

export interface VarianceAnalysis {
  reported: ReportedAggregates;
  computed: TrueGpSummary;
  salesDelta: number;
  /** Percent of reported sales; 0 when reported sales is 0. */
  salesDeltaPct: number;
  carCountDelta: number;
  aroDelta: number;
  reasons: string[];
}

export function summarizeTrueGp(ros: readonly ComputedROGP[]): TrueGpSummary {
  let sales = 0;
  let cost = 0;
  let grossProfit = 0;
  let feeProfit = 0;
  for (const ro of ros) {
    sales += ro.totalRetail;
    cost += ro.totalCost;
    grossProfit += ro.grossProfit;
    feeProfit += ro.feeProfit;
  }
  return {
    sales,
    cost,
    grossProfit,
    gpPercentage: marginPct(grossProfit, sales),
    carCount: ros.length,
    averageRo: ros.length > 0 ? Math.floor(sales / ros.length) : 0,
    feeProfit,
  };
}

/** Sales gaps at or under this many cents are noise. */
const SALES_DELTA_THRESHOLD = 1000;

export function explainVariance(ros: readonly ComputedROGP[], reported: ReportedAggregates): VarianceAnalysis {
  const computed = summarizeTrueGp(ros);
  const salesDelta = computed.sales - reported.sales;
  const carCountDelta = computed.carCount - reported.carCount;
  const reasons: string[] = [];

  if (carCountDelta !== 0) {
    reasons.push(`Car count differs by ${carCountDelta}: check which date each side counts an RO on`);
  }
  if (Math.abs(salesDelta) > SALES_DELTA_THRESHOLD) {
    reasons.push(`Sales differ by ${formatDollars(Math.abs(salesDelta))}: check date filtering and RO inclusion`);
  }

  const labor = aggregateLaborEfficiency(ros);
  const fallback = labor.byRateSource.shop_average.count + labor.byRateSource.default.count;
  if (fallback > 0) {
    reasons.push(`Tech rate fallback used for ${fallback}/${labor.totalLaborItems} labor items`);
  }

  const parts = aggregatePartsMargin(ros);
  if (parts.multiItems.count > 0) {
    reasons.push(`${parts.multiItems.count} parts with qty > 1; cost format was inferred`);
  }

  if (computed.feeProfit > 0) {
    reasons.push(`Fee profit of ${formatDollars(computed.feeProfit)} included at 100% margin`);
  }

  return {
    reported,
    computed,
    salesDelta,
    salesDeltaPct: reported.sales > 0 ? round2((salesDelta / reported.sales) * 100) : 0,
    carCountDelta,
    aroDelta: computed.averageRo - reported.averageRo,
    reasons,
  };
}
