/**
 * warehouse.ts
 *
 * Row shapes for the persisted tables and the repository interfaces the
 * snapshot builder and metrics aggregator run against. Supabase implements
 * both in lib/warehouse/supabaseWarehouse.ts; tests use in-memory fakes.
 *
 * Row types mirror the DB columns (snake_case). Money columns are integer cents.
 */

// ─── Source rows (read) ───────────────────────────────────────────────────────

export interface RepairOrderRow {
  id: string;
  tm_id: number;
  ro_number: number | null;
  status: string | null;
  posted_date: string | null;
  completed_date: string | null;
  customer_id: string | null;
  vehicle_id: string | null;
  service_advisor_id: string | null;
  /** Authorized totals as computed upstream; carried through, not recomputed. */
  authorized_revenue: number | null;
  authorized_cost: number | null;
  authorized_profit: number | null;
  /** GP% as the source system reports it. */
  authorized_gp_percent: number | null;
  authorized_job_count: number | null;
  authorized_tax: number | null;
  potential_total: number | null;
  potential_job_count: number | null;
}

export interface JobRow {
  id: string;
  authorized: boolean | null;
}

export interface PartLineRow {
  job_id: string;
  quantity: number | null;
  cost: number | null;
  retail: number | null;
  total: number | null;
}

export interface LaborLineRow {
  job_id: string;
  hours: number | null;
  total: number | null;
  labor_cost: number | null;
}

export interface SubletLineRow {
  job_id: string;
  retail: number | null;
  cost: number | null;
}

export interface FeeLineRow {
  job_id: string;
  total: number | null;
}

export interface RoLineItems {
  jobs: JobRow[];
  parts: PartLineRow[];
  labor: LaborLineRow[];
  sublets: SubletLineRow[];
  fees: FeeLineRow[];
}

export interface RoDisplayNames {
  customerName: string;
  vehicleDescription: string;
  advisorName: string;
}

// ─── Derived rows (written) ───────────────────────────────────────────────────

export type SnapshotTrigger = "posted" | "completed" | "manual";

export interface SnapshotRow {
  shop_id: string;
  repair_order_id: string;
  tm_repair_order_id: number;
  snapshot_date: string;
  snapshot_trigger: SnapshotTrigger;
  ro_status: string;
  ro_number: number;
  customer_name: string;
  vehicle_description: string;
  advisor_name: string;

  authorized_revenue: number;
  authorized_cost: number;
  authorized_profit: number;
  authorized_gp_percent: number | null;
  authorized_job_count: number;

  parts_revenue: number;
  parts_cost: number;
  parts_profit: number;
  labor_revenue: number;
  labor_cost: number;
  labor_profit: number;
  labor_hours: number;
  sublet_revenue: number;
  sublet_cost: number;
  fees_total: number;
  tax_total: number;

  potential_revenue: number;
  potential_job_count: number;

  tm_reported_gp_percent: number | null;
  variance_percent: number | null;
  variance_reason: string | null;
  calculation_method: "TRUE_GP";
}

export interface DailyMetricRow {
  shop_id: string;
  metric_date: string;

  ro_count: number;
  ro_posted_count: number;
  ro_completed_count: number;

  authorized_revenue: number;
  authorized_cost: number;
  authorized_profit: number;
  authorized_gp_percent: number | null;
  authorized_job_count: number;

  parts_revenue: number;
  parts_cost: number;
  parts_profit: number;
  labor_revenue: number;
  labor_cost: number;
  labor_profit: number;
  labor_hours: number;
  sublet_revenue: number;
  sublet_cost: number;
  fees_total: number;
  tax_total: number;

  avg_ro_value: number | null;
  avg_ro_profit: number | null;
  avg_labor_rate: number | null;
  gp_per_labor_hour: number | null;

  potential_revenue: number;
  potential_job_count: number;
  authorization_rate: number | null;

  calculation_method: "FROM_RO_SNAPSHOTS";
  source_snapshot_count: number;
  updated_at: string;
}

export type UpsertOutcome = "created" | "updated";

// ─── Repositories ─────────────────────────────────────────────────────────────

export interface ShopLookup {
  /** Warehouse uuid for a source-system shop id, or null when unknown. */
  findShopUuid(tmShopId: number): Promise<string | null>;
}

export interface SnapshotWarehouse extends ShopLookup {
  /** ROs whose posted_date OR completed_date falls in [start, end], deduplicated. */
  listQualifyingRepairOrders(shopUuid: string, start: string, end: string): Promise<RepairOrderRow[]>;
  getLineItems(shopUuid: string, roUuid: string): Promise<RoLineItems>;
  getDisplayNames(ro: RepairOrderRow): Promise<RoDisplayNames>;
  /** Keyed on (shop_id, repair_order_id, snapshot_date, snapshot_trigger). */
  upsertSnapshot(row: SnapshotRow): Promise<UpsertOutcome>;
}

export interface MetricsWarehouse extends ShopLookup {
  listSnapshotsForDate(shopUuid: string, date: string): Promise<SnapshotRow[]>;
  /** Keyed on (shop_id, metric_date). */
  upsertDailyMetric(row: DailyMetricRow): Promise<UpsertOutcome>;
  /** Newest first. */
  listDailyMetrics(shopUuid: string, start: string, end: string): Promise<DailyMetricRow[]>;
}
