/**
 * rateResolver.ts
 *
 * Technician cost-rate fallback chain, strictly in this order:
 *   1. assigned      : inline technician rate, else the shop's rate for that tech
 *   2. shop_average  : ShopConfig.avgTechRate when positive
 *   3. default       : DEFAULT_TECH_RATE_CENTS
 *
 * A labor line must never resolve to a zero cost rate; that would report it
 * at 100% margin.
 */

import type { LaborEntry, LaborProfit, ShopConfig, TechRateSource } from "@/types/gp";
import { marginPct, toCents } from "@/lib/gp/money";

/** $25/hr. */
export const DEFAULT_TECH_RATE_CENTS = 2500;

export interface ResolvedTechRate {
  rate: number;
  source: TechRateSource;
  techName: string | null;
}

function fullName(first: string, last: string): string | null {
  const name = `${first} ${last}`.trim();
  return name.length > 0 ? name : null;
}

export function resolveTechRate(
  labor: Pick<LaborEntry, "technician">,
  shopConfig: ShopConfig | null
): ResolvedTechRate {
  const tech = labor.technician;

  if (tech) {
    if (tech.hourlyRate > 0) {
      return {
        rate: tech.hourlyRate,
        source: "assigned",
        techName: fullName(tech.firstName, tech.lastName),
      };
    }
    const cachedRate = tech.id != null ? shopConfig?.techRates.get(tech.id) : undefined;
    if (tech.id != null && cachedRate != null && cachedRate > 0) {
      return {
        rate: cachedRate,
        source: "assigned",
        techName: shopConfig?.techNames.get(tech.id) ?? fullName(tech.firstName, tech.lastName),
      };
    }
  }

  if (shopConfig && shopConfig.avgTechRate > 0) {
    return { rate: shopConfig.avgTechRate, source: "shop_average", techName: null };
  }

  return { rate: DEFAULT_TECH_RATE_CENTS, source: "default", techName: null };
}

export function calculateLaborProfit(labor: LaborEntry, shopConfig: ShopConfig | null): LaborProfit {
  const resolved = resolveTechRate(labor, shopConfig);

  const totalRetail = toCents(labor.hours * labor.rate);
  const totalCost = toCents(labor.hours * resolved.rate);
  const profit = totalRetail - totalCost;

  return {
    laborId: labor.id,
    name: labor.name,
    hours: labor.hours,
    rate: labor.rate,
    techRate: resolved.rate,
    techRateSource: resolved.source,
    techName: resolved.techName,
    totalRetail,
    totalCost,
    profit,
    marginPct: marginPct(profit, totalRetail),
  };
}
