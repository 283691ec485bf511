import test from "node:test";
import assert from "node:assert/strict";
import { buildShopConfig, ShopConfigCache } from "../src/lib/gp/shopConfigCache";
import type { EmployeeLite } from "../src/lib/tmClient";

const staff: EmployeeLite[] = [
  { id: 7, firstName: "Ana", lastName: "Ruiz", role: 3, hourlyRate: 3000 },
  { id: 8, firstName: "Ben", lastName: "Ode", role: 3, hourlyRate: 4001 },
  { id: 9, firstName: "Sam", lastName: "Park", role: 1, hourlyRate: 9000 },
  { id: 10, firstName: "Lee", lastName: "Fox", role: 3, hourlyRate: 0 },
];

test("shop config keeps paid technicians only", () => {
  const config = buildShopConfig("1001", staff, 1234);
  assert.equal(config.avgTechRate, 3500);
  assert.deepEqual([...config.techRates.entries()], [
    [7, 3000],
    [8, 4001],
  ]);
  assert.equal(config.techNames.get(7), "Ana Ruiz");
  assert.equal(config.cachedAt, 1234);
  assert.equal(config.degraded, false);
});

test("no technicians uses the default average", () => {
  assert.equal(buildShopConfig("1001", [], 0).avgTechRate, 2500);
});

test("entries expire after the TTL", async () => {
  let clock = 0;
  let calls = 0;
  const cache = new ShopConfigCache({
    ttlSeconds: 300,
    now: () => clock,
    source: async () => {
      calls++;
      return staff;
    },
  });

  await cache.get("1001");
  clock = 299_999;
  await cache.get("1001");
  assert.equal(calls, 1);

  clock = 300_000;
  const refreshed = await cache.get("1001");
  assert.equal(calls, 2);
  assert.equal(refreshed.cachedAt, 300_000);
});

test("forceRefresh bypasses a fresh entry", async () => {
  let calls = 0;
  const cache = new ShopConfigCache({
    source: async () => {
      calls++;
      return staff;
    },
  });
  await cache.get("1001");
  await cache.get("1001", { forceRefresh: true });
  assert.equal(calls, 2);
});

test("concurrent misses share one fetch", async () => {
  let calls = 0;
  let release: (employees: EmployeeLite[]) => void = () => {};
  const cache = new ShopConfigCache({
    source: () => {
      calls++;
      return new Promise<EmployeeLite[]>((resolve) => {
        release = resolve;
      });
    },
  });

  const first = cache.get("1001");
  const second = cache.get("1001");
  release(staff);
  const [a, b] = await Promise.all([first, second]);

  assert.equal(calls, 1);
  assert.equal(a, b);
  assert.equal(cache.size, 1);
});

test("a failed fetch yields a cached degraded config", async (t) => {
  const warn = t.mock.method(console, "warn", () => {});
  let calls = 0;
  const cache = new ShopConfigCache({
    source: async () => {
      calls++;
      throw new Error("boom");
    },
  });

  const config = await cache.get("1001");
  assert.equal(config.degraded, true);
  assert.equal(config.avgTechRate, 2500);
  assert.equal(config.techRates.size, 0);

  await cache.get("1001");
  assert.equal(calls, 1);
  assert.equal(warn.mock.callCount(), 1);
  assert.deepEqual(warn.mock.calls[0].arguments, [
    "[shopConfigCache] Technician fetch failed for shop 1001; using default rates. boom",
  ]);
});

test("clear drops one shop or all", async () => {
  const cache = new ShopConfigCache({ source: async () => staff });
  await cache.get("1001");
  await cache.get("1002");
  cache.clear("1001");
  assert.equal(cache.size, 1);
  cache.clear();
  assert.equal(cache.size, 0);
});

test("clear during a fetch keeps the finished load out of the cache", async () => {
  const releases: Array<(employees: EmployeeLite[]) => void> = [];
  const cache = new ShopConfigCache({
    source: () =>
      new Promise<EmployeeLite[]>((resolve) => {
        releases.push(resolve);
      }),
  });

  const stale = cache.get("1001");
  cache.clear("1001");
  const fresh = cache.get("1001");
  assert.equal(releases.length, 2);

  releases[0](staff);
  const staleConfig = await stale;
  assert.equal(staleConfig.avgTechRate, 3500);
  assert.equal(cache.size, 0);

  releases[1]([staff[0]]);
  const freshConfig = await fresh;
  assert.equal(freshConfig.avgTechRate, 3000);
  assert.equal(cache.size, 1);
  assert.equal(await cache.get("1001"), freshConfig);
});
