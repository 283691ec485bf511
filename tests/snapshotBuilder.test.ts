import test from "node:test";
import assert from "node:assert/strict";
import {
  buildSnapshotRow,
  buildSnapshotsForPeriod,
  calculateCategoryBreakdown,
  deriveSnapshotKey,
} from "../src/lib/snapshots/snapshotBuilder";
import { ShopNotFoundError } from "../src/lib/errors";
import type { RoDisplayNames, RoLineItems } from "../src/lib/snapshots/warehouse";
import { MemoryWarehouse, repairOrderRow } from "./helpers/memoryWarehouse";

const names: RoDisplayNames = {
  customerName: "Dana Cole",
  vehicleDescription: "2019 Honda Civic",
  advisorName: "Sam Park",
};

const lineItems: RoLineItems = {
  jobs: [
    { id: "j1", authorized: true },
    { id: "j2", authorized: false },
    { id: "j3", authorized: null },
  ],
  parts: [
    { job_id: "j1", quantity: 2, cost: 2100, retail: 3500, total: 7000 },
    { job_id: "j2", quantity: 1, cost: 2000, retail: 5000, total: 5000 },
  ],
  labor: [
    { job_id: "j1", hours: 1.25, total: 15000, labor_cost: 4500 },
    { job_id: "j1", hours: 0.5, total: 6000, labor_cost: 2250 },
    { job_id: "j3", hours: 3, total: 36000, labor_cost: 13500 },
  ],
  sublets: [{ job_id: "j1", retail: 8000, cost: 6000 }],
  fees: [
    { job_id: "j1", total: 350 },
    { job_id: "j2", total: 999 },
  ],
};

// 2026-10-10 local noon; the trailing 3-day window is 2026-10-07..2026-10-10.
const now = () => new Date(2026, 9, 10, 12);

function seededWarehouse(): MemoryWarehouse {
  const warehouse = new MemoryWarehouse();
  warehouse.shops.set(1001, "shop-a");
  warehouse.repairOrders.push(
    repairOrderRow({ id: "ro-1", tm_id: 1001, posted_date: "2026-10-08" }),
    repairOrderRow({ id: "ro-2", tm_id: 1002, posted_date: null, completed_date: "2026-10-09" }),
    repairOrderRow({ id: "ro-3", tm_id: 1003, posted_date: "2026-09-01" })
  );
  warehouse.lineItems.set("ro-1", lineItems);
  return warehouse;
}

test("category breakdown counts authorized jobs only", () => {
  assert.deepEqual(calculateCategoryBreakdown(lineItems), {
    partsRevenue: 7000,
    partsCost: 4200,
    partsProfit: 2800,
    laborRevenue: 21000,
    laborCost: 6750,
    laborProfit: 14250,
    laborHours: 1.75,
    subletRevenue: 8000,
    subletCost: 6000,
    feesTotal: 350,
  });
});

test("part line totals are divided by quantity", () => {
  const breakdown = calculateCategoryBreakdown({
    ...lineItems,
    parts: [{ job_id: "j1", quantity: 4, cost: 2400, retail: 4000, total: 4000 }],
  });
  assert.equal(breakdown.partsRevenue, 4000);
  assert.equal(breakdown.partsCost, 2400);
});

test("snapshot key follows the requested trigger, then posted, then completed", () => {
  const both = { posted_date: "2026-10-08", completed_date: "2026-10-09" };
  const postedOnly = { posted_date: "2026-10-08", completed_date: null };
  const completedOnly = { posted_date: null, completed_date: "2026-10-09" };
  const neither = { posted_date: null, completed_date: null };
  const today = "2026-10-10";

  assert.deepEqual(deriveSnapshotKey(both, "posted", today), { snapshotDate: "2026-10-08", trigger: "posted" });
  assert.deepEqual(deriveSnapshotKey(both, "completed", today), { snapshotDate: "2026-10-09", trigger: "completed" });
  assert.deepEqual(deriveSnapshotKey(postedOnly, "completed", today), {
    snapshotDate: "2026-10-08",
    trigger: "posted",
  });
  assert.deepEqual(deriveSnapshotKey(completedOnly, "posted", today), {
    snapshotDate: "2026-10-09",
    trigger: "completed",
  });
  assert.deepEqual(deriveSnapshotKey(neither, "posted", today), { snapshotDate: today, trigger: "manual" });
});

test("snapshot row records computed and reported GP with the variance", () => {
  const row = buildSnapshotRow("shop-a", repairOrderRow(), lineItems, names, "posted", "2026-10-10");
  assert.equal(row.shop_id, "shop-a");
  assert.equal(row.tm_repair_order_id, 1001);
  assert.equal(row.snapshot_date, "2026-10-08");
  assert.equal(row.snapshot_trigger, "posted");
  assert.equal(row.authorized_revenue, 30000);
  assert.equal(row.authorized_profit, 13000);
  assert.equal(row.authorized_gp_percent, 43.33);
  assert.equal(row.tm_reported_gp_percent, 40);
  assert.equal(row.variance_percent, 3.33);
  assert.equal(row.variance_reason, "Computed: 43.33%, reported: 40%");
  assert.equal(row.parts_revenue, 7000);
  assert.equal(row.labor_hours, 1.75);
  assert.equal(row.tax_total, 1500);
  assert.equal(row.potential_revenue, 40000);
  assert.equal(row.advisor_name, "Sam Park");
  assert.equal(row.calculation_method, "TRUE_GP");
});

test("small variance carries no reason", () => {
  const row = buildSnapshotRow(
    "shop-a",
    repairOrderRow({ authorized_gp_percent: 43.1 }),
    lineItems,
    names,
    "posted",
    "2026-10-10"
  );
  assert.equal(row.variance_percent, 0.23);
  assert.equal(row.variance_reason, null);
});

test("zero revenue leaves GP and variance null", () => {
  const row = buildSnapshotRow(
    "shop-a",
    repairOrderRow({ authorized_revenue: 0, authorized_profit: 0, status: null }),
    lineItems,
    names,
    "posted",
    "2026-10-10"
  );
  assert.equal(row.authorized_gp_percent, null);
  assert.equal(row.variance_percent, null);
  assert.equal(row.ro_status, "UNKNOWN");
});

test("batch snapshots the trailing window and reruns as updates", async () => {
  const warehouse = seededWarehouse();

  const first = await buildSnapshotsForPeriod(warehouse, 1001, { now });
  assert.equal(first.status, "completed");
  assert.deepEqual(first.dateRange, { start: "2026-10-07", end: "2026-10-10" });
  assert.equal(first.qualifyingRos, 2);
  assert.equal(first.created, 2);
  assert.equal(first.updated, 0);
  assert.deepEqual(
    [...warehouse.snapshots.keys()].sort(),
    ["shop-a|ro-1|2026-10-08|posted", "shop-a|ro-2|2026-10-09|completed"]
  );

  assert.equal(warehouse.snapshots.get("shop-a|ro-1|2026-10-08|posted")?.authorized_revenue, 30000);

  warehouse.repairOrders[0] = repairOrderRow({
    id: "ro-1",
    tm_id: 1001,
    posted_date: "2026-10-08",
    authorized_revenue: 50000,
  });
  const second = await buildSnapshotsForPeriod(warehouse, 1001, { now });
  assert.equal(second.created, 0);
  assert.equal(second.updated, 2);
  assert.equal(warehouse.snapshots.size, 2);
  assert.equal(warehouse.snapshots.get("shop-a|ro-1|2026-10-08|posted")?.authorized_revenue, 50000);
});

test("explicit dates override the trailing window", async () => {
  const warehouse = seededWarehouse();
  const summary = await buildSnapshotsForPeriod(warehouse, 1001, {
    startDate: "2026-09-01",
    endDate: "2026-09-30",
    now,
  });
  assert.equal(summary.qualifyingRos, 1);
  assert.deepEqual([...warehouse.snapshots.keys()], ["shop-a|ro-3|2026-09-01|posted"]);
});

test("one failing RO is recorded and the rest continue", async (t) => {
  const warn = t.mock.method(console, "warn", () => {});
  const warehouse = seededWarehouse();
  warehouse.failingLineItems.add("ro-2");

  const summary = await buildSnapshotsForPeriod(warehouse, 1001, { now });
  assert.equal(summary.created, 1);
  assert.equal(summary.errors, 1);
  assert.deepEqual(summary.errorDetails, [{ roId: 1002, error: "job_parts select failed: boom" }]);
  assert.deepEqual(warn.mock.calls[0].arguments, ["[snapshotBuilder] shop 1001: 1 of 2 ROs failed."]);
});

test("a cancelled run starts no ROs", async () => {
  const warehouse = seededWarehouse();
  const controller = new AbortController();
  controller.abort();

  const summary = await buildSnapshotsForPeriod(warehouse, 1001, { now, signal: controller.signal });
  assert.equal(summary.status, "cancelled");
  assert.equal(summary.cancelled, 2);
  assert.equal(summary.created, 0);
  assert.equal(warehouse.snapshots.size, 0);
});

test("concurrency bounds in-flight ROs", async () => {
  const warehouse = new MemoryWarehouse();
  warehouse.shops.set(1001, "shop-a");
  warehouse.delayMs = 5;
  for (let i = 1; i <= 6; i++) {
    warehouse.repairOrders.push(repairOrderRow({ id: `ro-${i}`, tm_id: 1000 + i, posted_date: "2026-10-08" }));
  }

  const summary = await buildSnapshotsForPeriod(warehouse, 1001, { now, concurrency: 2 });
  assert.equal(summary.created, 6);
  assert.equal(warehouse.maxInFlight, 2);
});

test("an unknown shop aborts the run", async () => {
  await assert.rejects(buildSnapshotsForPeriod(new MemoryWarehouse(), 9999, { now }), (err: unknown) => {
    assert.ok(err instanceof ShopNotFoundError);
    assert.equal(err.message, "Shop 9999 not found");
    return true;
  });
});
