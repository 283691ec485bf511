import test from "node:test";
import assert from "node:assert/strict";
import { calculateLaborProfit, DEFAULT_TECH_RATE_CENTS, resolveTechRate } from "../src/lib/gp/rateResolver";
import { labor, shopConfig } from "./helpers/gpFixtures";

test("no technician falls back to the shop average", () => {
  const result = calculateLaborProfit(labor({ hours: 2, rate: 12000 }), shopConfig({ avgTechRate: 4500 }));
  assert.equal(result.techRateSource, "shop_average");
  assert.equal(result.techRate, 4500);
  assert.equal(result.totalRetail, 24000);
  assert.equal(result.totalCost, 9000);
  assert.equal(result.profit, 15000);
  assert.equal(result.marginPct, 62.5);
});

test("inline technician rate is used first", () => {
  const resolved = resolveTechRate(
    labor({ technician: { id: 7, hourlyRate: 3000, firstName: "Ana", lastName: "Ruiz" } }),
    shopConfig({ techRates: new Map([[7, 3900]]) })
  );
  assert.deepEqual(resolved, { rate: 3000, source: "assigned", techName: "Ana Ruiz" });
});

test("technician without an inline rate uses the shop's rate for that tech", () => {
  const resolved = resolveTechRate(
    labor({ technician: { id: 7, hourlyRate: 0, firstName: "", lastName: "" } }),
    shopConfig({ techRates: new Map([[7, 3200]]), techNames: new Map([[7, "Ana Ruiz"]]) })
  );
  assert.deepEqual(resolved, { rate: 3200, source: "assigned", techName: "Ana Ruiz" });
});

test("unknown technician id falls through to the shop average", () => {
  const resolved = resolveTechRate(
    labor({ technician: { id: 99, hourlyRate: 0, firstName: "Ben", lastName: "Ode" } }),
    shopConfig({ avgTechRate: 4100, techRates: new Map([[7, 3200]]) })
  );
  assert.deepEqual(resolved, { rate: 4100, source: "shop_average", techName: null });
});

test("no shop config uses the default rate", () => {
  const resolved = resolveTechRate(labor(), null);
  assert.deepEqual(resolved, { rate: DEFAULT_TECH_RATE_CENTS, source: "default", techName: null });
});

test("a zero shop average is skipped for the default", () => {
  const resolved = resolveTechRate(labor(), shopConfig({ avgTechRate: 0 }));
  assert.equal(resolved.source, "default");
  assert.equal(resolved.rate, 2500);
});

test("fractional hours truncate to whole cents", () => {
  const result = calculateLaborProfit(labor({ hours: 1.5, rate: 9999 }), null);
  assert.equal(result.totalRetail, 14998);
  assert.equal(result.totalCost, 3750);
});

test("hours times rate that lands a float hair under a whole cent keeps that cent", () => {
  const result = calculateLaborProfit(labor({ hours: 1.13, rate: 10000 }), null);
  assert.equal(result.totalRetail, 11300);
  assert.equal(result.totalCost, 2825);
  assert.equal(result.profit, 8475);

  assert.equal(calculateLaborProfit(labor({ hours: 2.3, rate: 11900 }), null).totalRetail, 27370);
});

test("resolved rate is never zero", () => {
  const configs = [null, shopConfig({ avgTechRate: 0 }), shopConfig({ avgTechRate: 4500 })];
  for (const config of configs) {
    assert.ok(resolveTechRate(labor(), config).rate > 0);
  }
});
