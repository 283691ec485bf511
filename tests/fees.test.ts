import test from "node:test";
import assert from "node:assert/strict";
import { calculateFeeBreakdown, calculateFeeDetail, classifyFee } from "../src/lib/gp/fees";
import { fee } from "./helpers/gpFixtures";

test("percentage fee is capped", () => {
  const detail = calculateFeeDetail(fee({ name: "Shop Supplies", percentage: 5, cap: 500 }), 100000);
  assert.equal(detail.amount, 500);
  assert.equal(detail.profit, 500);
  assert.equal(detail.category, "shop_supplies");
});

test("uncapped percentage fee truncates", () => {
  assert.equal(calculateFeeDetail(fee({ percentage: 5 }), 12345).amount, 617);
});

test("flat fee uses its amount", () => {
  assert.equal(calculateFeeDetail(fee({ amount: 350 }), 100000).amount, 350);
});

test("percentage fee on a zero subtotal uses the flat amount", () => {
  assert.equal(calculateFeeDetail(fee({ percentage: 5, amount: 200 }), 0).amount, 200);
});

test("fee profit always equals amount", () => {
  const fees = [fee({ amount: 300 }), fee({ percentage: 4, cap: 1000 }), fee({ percentage: 10 })];
  for (const f of fees) {
    const detail = calculateFeeDetail(f, 54321);
    assert.equal(detail.profit, detail.amount);
  }
});

test("classifyFee default heuristics", () => {
  assert.equal(classifyFee("Shop Supplies"), "shop_supplies");
  assert.equal(classifyFee("Environmental Fee"), "environmental");
  assert.equal(classifyFee("HazMat Handling"), "hazardous_waste");
  assert.equal(classifyFee("Tire Disposal"), "disposal");
  assert.equal(classifyFee("Shop Fee"), "other");
  assert.equal(classifyFee("Card Surcharge"), "other");
});

test("shop rules are checked before the defaults", () => {
  const rules = [
    { match: "  ", category: "hazardous_waste" as const },
    { match: "TIRE", category: "environmental" as const },
  ];
  assert.equal(classifyFee("Tire Disposal", rules), "environmental");
  assert.equal(classifyFee("Oil Disposal", rules), "disposal");
});

test("breakdown totals and categories", () => {
  const breakdown = calculateFeeBreakdown(
    [
      fee({ name: "Shop Supplies", percentage: 5, cap: 500, taxable: true }),
      fee({ name: "Environmental", amount: 300 }),
      fee({ name: "Battery Disposal", amount: 200, taxable: true }),
    ],
    100000
  );
  assert.equal(breakdown.totalFees, 1000);
  assert.equal(breakdown.totalFeeProfit, 1000);
  assert.equal(breakdown.taxableFees, 700);
  assert.deepEqual(breakdown.byCategory, { shop_supplies: 500, environmental: 300, disposal: 200 });
});
