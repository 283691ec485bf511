/**
 * snapshotBuilder.ts
 *
 * One ro_snapshots row per qualifying RO (posted or completed inside the
 * window), upserted on (shop, RO, date, trigger).
 *
 * Authorized revenue / cost / profit come from the RO row as already computed
 * upstream. Category splits are re-derived here from persisted line items,
 * restricted to authorized jobs:
 *   parts   → Line-Item Normalizer over quantity/cost/retail/total
 *   labor   → persisted total and labor_cost, hours summed
 *   sublet  → retail / cost
 *   fees    → total
 *
 * Failure in one RO is recorded and skipped. An unknown shop aborts the run.
 */

import pLimit from "p-limit";
import { calculatePartProfit, DEFAULT_COST_FORMAT_TOLERANCE } from "@/lib/gp/lineItems";
import { round2, toCents } from "@/lib/gp/money";
import { ShopNotFoundError, errorMessage } from "@/lib/errors";
import { resolveWindow, toDateOnly, type DateWindow } from "@/lib/date";
import type {
  RepairOrderRow,
  RoDisplayNames,
  RoLineItems,
  SnapshotRow,
  SnapshotTrigger,
  SnapshotWarehouse,
} from "@/lib/snapshots/warehouse";

/** Computed vs reported GP gaps above this many points get a variance_reason. */
export const VARIANCE_THRESHOLD_POINTS = 0.5;

const MAX_ERROR_DETAILS = 10;

function int(value: number | null | undefined): number {
  return value == null || !Number.isFinite(value) ? 0 : toCents(value);
}

// ─── Category breakdown ───────────────────────────────────────────────────────

export interface CategoryBreakdown {
  partsRevenue: number;
  partsCost: number;
  partsProfit: number;
  laborRevenue: number;
  laborCost: number;
  laborProfit: number;
  laborHours: number;
  subletRevenue: number;
  subletCost: number;
  feesTotal: number;
}

export function calculateCategoryBreakdown(
  lineItems: RoLineItems,
  tolerance: number = DEFAULT_COST_FORMAT_TOLERANCE
): CategoryBreakdown {
  const authorized = new Set(lineItems.jobs.filter((j) => j.authorized === true).map((j) => j.id));

  let partsRevenue = 0;
  let partsCost = 0;
  for (const row of lineItems.parts) {
    if (!authorized.has(row.job_id)) continue;
    const part = calculatePartProfit(
      {
        kind: "part",
        id: 0,
        name: "",
        quantity: row.quantity ?? 1,
        cost: int(row.cost),
        retail: int(row.retail),
        total: int(row.total),
      },
      tolerance
    );
    partsRevenue += part.totalRetail;
    partsCost += part.totalCost;
  }

  let laborRevenue = 0;
  let laborCost = 0;
  let laborHours = 0;
  for (const row of lineItems.labor) {
    if (!authorized.has(row.job_id)) continue;
    laborRevenue += int(row.total);
    laborCost += int(row.labor_cost);
    laborHours += row.hours ?? 0;
  }

  let subletRevenue = 0;
  let subletCost = 0;
  for (const row of lineItems.sublets) {
    if (!authorized.has(row.job_id)) continue;
    subletRevenue += int(row.retail);
    subletCost += int(row.cost);
  }

  let feesTotal = 0;
  for (const row of lineItems.fees) {
    if (authorized.has(row.job_id)) feesTotal += int(row.total);
  }

  return {
    partsRevenue,
    partsCost,
    partsProfit: partsRevenue - partsCost,
    laborRevenue,
    laborCost,
    laborProfit: laborRevenue - laborCost,
    laborHours: round2(laborHours),
    subletRevenue,
    subletCost,
    feesTotal,
  };
}

// ─── Snapshot identity ────────────────────────────────────────────────────────

export interface SnapshotKey {
  snapshotDate: string;
  trigger: SnapshotTrigger;
}

/**
 * The requested trigger wins when the RO has that date; otherwise posted,
 * then completed, then today under "manual".
 */
export function deriveSnapshotKey(
  ro: Pick<RepairOrderRow, "posted_date" | "completed_date">,
  requested: SnapshotTrigger,
  today: string
): SnapshotKey {
  if (requested === "posted" && ro.posted_date) return { snapshotDate: ro.posted_date, trigger: "posted" };
  if (requested === "completed" && ro.completed_date) {
    return { snapshotDate: ro.completed_date, trigger: "completed" };
  }
  if (ro.posted_date) return { snapshotDate: ro.posted_date, trigger: "posted" };
  if (ro.completed_date) return { snapshotDate: ro.completed_date, trigger: "completed" };
  return { snapshotDate: today, trigger: "manual" };
}

export function buildSnapshotRow(
  shopUuid: string,
  ro: RepairOrderRow,
  lineItems: RoLineItems,
  names: RoDisplayNames,
  requested: SnapshotTrigger,
  today: string,
  tolerance: number = DEFAULT_COST_FORMAT_TOLERANCE
): SnapshotRow {
  const key = deriveSnapshotKey(ro, requested, today);
  const breakdown = calculateCategoryBreakdown(lineItems, tolerance);

  const authorizedRevenue = int(ro.authorized_revenue);
  const authorizedProfit = int(ro.authorized_profit);
  const reportedGp = ro.authorized_gp_percent;

  const computedGp = authorizedRevenue > 0 ? round2((authorizedProfit / authorizedRevenue) * 100) : null;
  let variancePercent: number | null = null;
  let varianceReason: string | null = null;
  if (computedGp != null && reportedGp != null) {
    variancePercent = round2(computedGp - reportedGp);
    if (Math.abs(variancePercent) > VARIANCE_THRESHOLD_POINTS) {
      varianceReason = `Computed: ${computedGp}%, reported: ${reportedGp}%`;
    }
  }

  return {
    shop_id: shopUuid,
    repair_order_id: ro.id,
    tm_repair_order_id: ro.tm_id,
    snapshot_date: key.snapshotDate,
    snapshot_trigger: key.trigger,
    ro_status: ro.status || "UNKNOWN",
    ro_number: int(ro.ro_number),
    customer_name: names.customerName,
    vehicle_description: names.vehicleDescription,
    advisor_name: names.advisorName,

    authorized_revenue: authorizedRevenue,
    authorized_cost: int(ro.authorized_cost),
    authorized_profit: authorizedProfit,
    authorized_gp_percent: computedGp,
    authorized_job_count: int(ro.authorized_job_count),

    parts_revenue: breakdown.partsRevenue,
    parts_cost: breakdown.partsCost,
    parts_profit: breakdown.partsProfit,
    labor_revenue: breakdown.laborRevenue,
    labor_cost: breakdown.laborCost,
    labor_profit: breakdown.laborProfit,
    labor_hours: breakdown.laborHours,
    sublet_revenue: breakdown.subletRevenue,
    sublet_cost: breakdown.subletCost,
    fees_total: breakdown.feesTotal,
    tax_total: int(ro.authorized_tax),

    potential_revenue: int(ro.potential_total),
    potential_job_count: int(ro.potential_job_count),

    tm_reported_gp_percent: reportedGp,
    variance_percent: variancePercent,
    variance_reason: varianceReason,
    calculation_method: "TRUE_GP",
  };
}

// ─── Batch ────────────────────────────────────────────────────────────────────

export interface SnapshotBatchOptions {
  startDate?: string;
  endDate?: string;
  /** Trailing window when no explicit dates; default 3. */
  daysBack?: number;
  /** Forces a trigger for every RO. Default: posted when the RO has a posted date, else completed. */
  trigger?: SnapshotTrigger;
  concurrency?: number;
  costFormatTolerance?: number;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface SnapshotErrorDetail {
  roId: number;
  error: string;
}

export interface SnapshotBatchSummary {
  status: "completed" | "cancelled";
  shopId: number;
  dateRange: DateWindow;
  qualifyingRos: number;
  created: number;
  updated: number;
  /** ROs never started because the run was cancelled. */
  cancelled: number;
  errors: number;
  errorDetails: SnapshotErrorDetail[];
}

export async function buildSnapshotsForPeriod(
  warehouse: SnapshotWarehouse,
  shopId: number,
  options: SnapshotBatchOptions = {}
): Promise<SnapshotBatchSummary> {
  const now = options.now?.() ?? new Date();
  const today = toDateOnly(now);
  const window = resolveWindow(options, now);

  const shopUuid = await warehouse.findShopUuid(shopId);
  if (!shopUuid) throw new ShopNotFoundError(shopId);

  const ros = await warehouse.listQualifyingRepairOrders(shopUuid, window.start, window.end);
  const limit = pLimit(options.concurrency ?? 4);
  const { signal } = options;

  let created = 0;
  let updated = 0;
  let cancelled = 0;
  const errorDetails: SnapshotErrorDetail[] = [];

  await Promise.all(
    ros.map((ro) =>
      limit(async () => {
        if (signal?.aborted) {
          cancelled++;
          return;
        }
        try {
          const requested: SnapshotTrigger = options.trigger ?? (ro.posted_date ? "posted" : "completed");
          const [lineItems, names] = await Promise.all([
            warehouse.getLineItems(shopUuid, ro.id),
            warehouse.getDisplayNames(ro),
          ]);
          const row = buildSnapshotRow(shopUuid, ro, lineItems, names, requested, today, options.costFormatTolerance);
          // Once started, an RO's upsert runs to completion even if the signal fires.
          const outcome = await warehouse.upsertSnapshot(row);
          if (outcome === "created") created++;
          else updated++;
        } catch (err) {
          errorDetails.push({ roId: ro.tm_id, error: errorMessage(err) });
        }
      })
    )
  );

  if (errorDetails.length > 0) {
    console.warn(`[snapshotBuilder] shop ${shopId}: ${errorDetails.length} of ${ros.length} ROs failed.`);
  }

  return {
    status: cancelled > 0 ? "cancelled" : "completed",
    shopId,
    dateRange: window,
    qualifyingRos: ros.length,
    created,
    updated,
    cancelled,
    errors: errorDetails.length,
    errorDetails: errorDetails.slice(0, MAX_ERROR_DETAILS),
  };
}
