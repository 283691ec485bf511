/**
 * metricsAggregator.ts
 *
 * Folds one day's ro_snapshots into one daily_shop_metrics row.
 *
 * Reads snapshots only, never line items, so every reporting layer agrees with
 * the snapshot layer. Sums are plain integer sums; ratios guard against zero
 * denominators with null.
 *
 * Rebuild runs each calendar day independently. A day with no snapshots is
 * skipped: its existing row (if any) is left alone, not zeroed. An unknown
 * shop aborts the run.
 */

import pLimit from "p-limit";
import { round2, toCents } from "@/lib/gp/money";
import { ShopNotFoundError, errorMessage } from "@/lib/errors";
import { eachDay, type DateWindow } from "@/lib/date";
import type { DailyMetricRow, MetricsWarehouse, SnapshotRow } from "@/lib/snapshots/warehouse";

const MAX_ERROR_DETAILS = 10;
const MAX_SAMPLE_METRICS = 3;

function sum(rows: readonly SnapshotRow[], pick: (row: SnapshotRow) => number): number {
  return rows.reduce((total, row) => total + pick(row), 0);
}

export function aggregateDailyMetrics(
  shopUuid: string,
  snapshots: readonly SnapshotRow[],
  metricDate: string,
  now: Date = new Date()
): DailyMetricRow {
  const roCount = snapshots.length;

  const authorizedRevenue = sum(snapshots, (s) => s.authorized_revenue);
  const authorizedCost = sum(snapshots, (s) => s.authorized_cost);
  const authorizedProfit = sum(snapshots, (s) => s.authorized_profit);

  const laborRevenue = sum(snapshots, (s) => s.labor_revenue);
  const laborProfit = sum(snapshots, (s) => s.labor_profit);
  const laborHours = round2(sum(snapshots, (s) => s.labor_hours));

  const potentialRevenue = sum(snapshots, (s) => s.potential_revenue);

  return {
    shop_id: shopUuid,
    metric_date: metricDate,

    ro_count: roCount,
    ro_posted_count: snapshots.filter((s) => s.snapshot_trigger === "posted").length,
    ro_completed_count: snapshots.filter((s) => s.snapshot_trigger === "completed").length,

    authorized_revenue: authorizedRevenue,
    authorized_cost: authorizedCost,
    authorized_profit: authorizedProfit,
    authorized_gp_percent: authorizedRevenue > 0 ? round2((authorizedProfit / authorizedRevenue) * 100) : null,
    authorized_job_count: sum(snapshots, (s) => s.authorized_job_count),

    parts_revenue: sum(snapshots, (s) => s.parts_revenue),
    parts_cost: sum(snapshots, (s) => s.parts_cost),
    parts_profit: sum(snapshots, (s) => s.parts_profit),
    labor_revenue: laborRevenue,
    labor_cost: sum(snapshots, (s) => s.labor_cost),
    labor_profit: laborProfit,
    labor_hours: laborHours,
    sublet_revenue: sum(snapshots, (s) => s.sublet_revenue),
    sublet_cost: sum(snapshots, (s) => s.sublet_cost),
    fees_total: sum(snapshots, (s) => s.fees_total),
    tax_total: sum(snapshots, (s) => s.tax_total),

    avg_ro_value: roCount > 0 ? Math.floor(authorizedRevenue / roCount) : null,
    avg_ro_profit: roCount > 0 ? Math.floor(authorizedProfit / roCount) : null,
    avg_labor_rate: laborHours > 0 ? toCents(laborRevenue / laborHours) : null,
    gp_per_labor_hour: laborHours > 0 ? toCents(laborProfit / laborHours) : null,

    potential_revenue: potentialRevenue,
    potential_job_count: sum(snapshots, (s) => s.potential_job_count),
    authorization_rate: potentialRevenue > 0 ? round2((authorizedRevenue / potentialRevenue) * 100) : null,

    calculation_method: "FROM_RO_SNAPSHOTS",
    source_snapshot_count: roCount,
    updated_at: now.toISOString(),
  };
}

// ─── Rebuild ──────────────────────────────────────────────────────────────────

export interface MetricsRebuildOptions {
  startDate: string;
  endDate: string;
  concurrency?: number;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface MetricsErrorDetail {
  date: string;
  error: string;
}

export interface SampleMetric {
  metricDate: string;
  roCount: number;
  authorizedRevenue: number;
  authorizedProfit: number;
  authorizedGpPercent: number | null;
}

export interface MetricsRebuildSummary {
  status: "completed" | "cancelled";
  shopId: number;
  dateRange: DateWindow;
  daysProcessed: number;
  created: number;
  updated: number;
  skippedDays: number;
  /** Days never started because the run was cancelled. */
  cancelled: number;
  errors: number;
  errorDetails: MetricsErrorDetail[];
  sampleMetrics: SampleMetric[];
}

export async function rebuildDailyMetrics(
  warehouse: MetricsWarehouse,
  shopId: number,
  options: MetricsRebuildOptions
): Promise<MetricsRebuildSummary> {
  const dateRange = { start: options.startDate, end: options.endDate };
  const days = eachDay(options.startDate, options.endDate);

  const shopUuid = await warehouse.findShopUuid(shopId);
  if (!shopUuid) throw new ShopNotFoundError(shopId);

  const limit = pLimit(options.concurrency ?? 4);
  const { signal } = options;
  let created = 0;
  let updated = 0;
  let skippedDays = 0;
  let cancelled = 0;
  const errorDetails: MetricsErrorDetail[] = [];
  const samples: SampleMetric[] = [];

  await Promise.all(
    days.map((date) =>
      limit(async () => {
        if (signal?.aborted) {
          cancelled++;
          return;
        }
        try {
          const snapshots = await warehouse.listSnapshotsForDate(shopUuid, date);
          if (snapshots.length === 0) {
            skippedDays++;
            return;
          }
          const row = aggregateDailyMetrics(shopUuid, snapshots, date, options.now?.() ?? new Date());
          const outcome = await warehouse.upsertDailyMetric(row);
          if (outcome === "created") created++;
          else updated++;
          samples.push({
            metricDate: date,
            roCount: row.ro_count,
            authorizedRevenue: row.authorized_revenue,
            authorizedProfit: row.authorized_profit,
            authorizedGpPercent: row.authorized_gp_percent,
          });
        } catch (err) {
          errorDetails.push({ date, error: errorMessage(err) });
        }
      })
    )
  );

  // Days finish in any order; report the earliest.
  errorDetails.sort((a, b) => a.date.localeCompare(b.date));
  samples.sort((a, b) => a.metricDate.localeCompare(b.metricDate));

  if (errorDetails.length > 0) {
    console.warn(`[metricsAggregator] shop ${shopId}: ${errorDetails.length} of ${days.length} days failed.`);
  }

  return {
    status: cancelled > 0 ? "cancelled" : "completed",
    shopId,
    dateRange,
    daysProcessed: days.length,
    created,
    updated,
    skippedDays,
    cancelled,
    errors: errorDetails.length,
    errorDetails: errorDetails.slice(0, MAX_ERROR_DETAILS),
    sampleMetrics: samples.slice(0, MAX_SAMPLE_METRICS),
  };
}

/** Newest first. Unknown shop → empty list. */
export async function getDailyMetrics(
  warehouse: MetricsWarehouse,
  shopId: number,
  range: DateWindow
): Promise<DailyMetricRow[]> {
  const shopUuid = await warehouse.findShopUuid(shopId);
  if (!shopUuid) return [];
  return warehouse.listDailyMetrics(shopUuid, range.start, range.end);
}
