/**
 * supabaseWarehouse.ts
 *
 * Supabase implementation of SnapshotWarehouse and MetricsWarehouse.
 * Takes the client as an argument so route handlers pass `supabaseServer`
 * and nothing here reads env.
 *
 * Every query error surfaces as PersistenceError.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { PersistenceError } from "@/lib/errors";
import type {
  DailyMetricRow,
  FeeLineRow,
  JobRow,
  LaborLineRow,
  MetricsWarehouse,
  PartLineRow,
  RepairOrderRow,
  RoDisplayNames,
  RoLineItems,
  SnapshotRow,
  SnapshotWarehouse,
  SubletLineRow,
  UpsertOutcome,
} from "@/lib/snapshots/warehouse";

const RO_COLUMNS =
  "id, tm_id, ro_number, status, posted_date, completed_date, " +
  "customer_id, vehicle_id, service_advisor_id, " +
  "authorized_revenue, authorized_cost, authorized_profit, authorized_gp_percent, " +
  "authorized_job_count, authorized_tax, potential_total, potential_job_count";

type NameRow = { first_name: string | null; last_name: string | null };
type VehicleRow = { year: number | string | null; make: string | null; model: string | null };

function joined(...parts: Array<string | number | null>): string {
  return parts
    .map((p) => (p == null ? "" : String(p)))
    .filter((p) => p.length > 0)
    .join(" ")
    .trim();
}

export function createSupabaseWarehouse(db: SupabaseClient): SnapshotWarehouse & MetricsWarehouse {
  async function findShopUuid(tmShopId: number): Promise<string | null> {
    const { data, error } = await db
      .from("shops")
      .select("id")
      .eq("tm_id", tmShopId)
      .limit(1)
      .returns<{ id: string }[]>();
    if (error) throw new PersistenceError("shops", "select", error.message);
    return data?.[0]?.id ?? null;
  }

  async function listQualifyingRepairOrders(shopUuid: string, start: string, end: string) {
    // No OR across two ranges in one PostgREST filter here; query both and merge.
    const [posted, completed] = await Promise.all([
      db
        .from("repair_orders")
        .select(RO_COLUMNS)
        .eq("shop_id", shopUuid)
        .gte("posted_date", start)
        .lte("posted_date", end)
        .returns<RepairOrderRow[]>(),
      db
        .from("repair_orders")
        .select(RO_COLUMNS)
        .eq("shop_id", shopUuid)
        .gte("completed_date", start)
        .lte("completed_date", end)
        .returns<RepairOrderRow[]>(),
    ]);
    if (posted.error) throw new PersistenceError("repair_orders", "select", posted.error.message);
    if (completed.error) throw new PersistenceError("repair_orders", "select", completed.error.message);

    const byId = new Map<string, RepairOrderRow>();
    for (const ro of [...(posted.data ?? []), ...(completed.data ?? [])]) byId.set(ro.id, ro);
    return [...byId.values()];
  }

  async function selectForRo<T>(table: string, columns: string, shopUuid: string, roUuid: string): Promise<T[]> {
    const { data, error } = await db
      .from(table)
      .select(columns)
      .eq("shop_id", shopUuid)
      .eq("repair_order_id", roUuid)
      .returns<T[]>();
    if (error) throw new PersistenceError(table, "select", error.message);
    return data ?? [];
  }

  async function getLineItems(shopUuid: string, roUuid: string): Promise<RoLineItems> {
    const [jobs, parts, labor, sublets, fees] = await Promise.all([
      selectForRo<JobRow>("jobs", "id, authorized", shopUuid, roUuid),
      selectForRo<PartLineRow>("job_parts", "job_id, quantity, cost, retail, total", shopUuid, roUuid),
      selectForRo<LaborLineRow>("job_labor", "job_id, hours, total, labor_cost", shopUuid, roUuid),
      selectForRo<SubletLineRow>("job_sublets", "job_id, retail, cost", shopUuid, roUuid),
      selectForRo<FeeLineRow>("job_fees", "job_id, total", shopUuid, roUuid),
    ]);
    return { jobs, parts, labor, sublets, fees };
  }

  async function selectById<T>(table: string, columns: string, id: string | null): Promise<T | null> {
    if (!id) return null;
    const { data, error } = await db.from(table).select(columns).eq("id", id).maybeSingle<T>();
    if (error) throw new PersistenceError(table, "select", error.message);
    return data;
  }

  async function getDisplayNames(ro: RepairOrderRow): Promise<RoDisplayNames> {
    const [customer, vehicle, advisor] = await Promise.all([
      selectById<NameRow>("customers", "first_name, last_name", ro.customer_id),
      selectById<VehicleRow>("vehicles", "year, make, model", ro.vehicle_id),
      selectById<NameRow>("employees", "first_name, last_name", ro.service_advisor_id),
    ]);
    return {
      customerName: (customer && joined(customer.first_name, customer.last_name)) || "Unknown",
      vehicleDescription: (vehicle && joined(vehicle.year, vehicle.make, vehicle.model)) || "Unknown",
      advisorName: (advisor && joined(advisor.first_name, advisor.last_name)) || "Unknown",
    };
  }

  /**
   * Probe then upsert. The probe decides created vs updated; the upsert's
   * onConflict keeps a concurrent writer from producing a duplicate.
   */
  async function upsertByKey(
    table: string,
    key: Record<string, string>,
    row: SnapshotRow | DailyMetricRow
  ): Promise<UpsertOutcome> {
    let probe = db.from(table).select("id");
    for (const [column, value] of Object.entries(key)) probe = probe.eq(column, value);
    const existing = await probe.limit(1).returns<{ id: string }[]>();
    if (existing.error) throw new PersistenceError(table, "select", existing.error.message);

    const { error } = await db.from(table).upsert(row, { onConflict: Object.keys(key).join(",") });
    if (error) throw new PersistenceError(table, "upsert", error.message);

    return (existing.data ?? []).length > 0 ? "updated" : "created";
  }

  return {
    findShopUuid,
    listQualifyingRepairOrders,
    getLineItems,
    getDisplayNames,

    upsertSnapshot(row) {
      return upsertByKey(
        "ro_snapshots",
        {
          shop_id: row.shop_id,
          repair_order_id: row.repair_order_id,
          snapshot_date: row.snapshot_date,
          snapshot_trigger: row.snapshot_trigger,
        },
        row
      );
    },

    async listSnapshotsForDate(shopUuid, date) {
      const { data, error } = await db
        .from("ro_snapshots")
        .select("*")
        .eq("shop_id", shopUuid)
        .eq("snapshot_date", date)
        .returns<SnapshotRow[]>();
      if (error) throw new PersistenceError("ro_snapshots", "select", error.message);
      return data ?? [];
    },

    upsertDailyMetric(row) {
      return upsertByKey("daily_shop_metrics", { shop_id: row.shop_id, metric_date: row.metric_date }, row);
    },

    async listDailyMetrics(shopUuid, start, end) {
      const { data, error } = await db
        .from("daily_shop_metrics")
        .select("*")
        .eq("shop_id", shopUuid)
        .gte("metric_date", start)
        .lte("metric_date", end)
        .order("metric_date", { ascending: false })
        .returns<DailyMetricRow[]>();
      if (error) throw new PersistenceError("daily_shop_metrics", "select", error.message);
      return data ?? [];
    },
  };
}
