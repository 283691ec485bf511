import test from "node:test";
import assert from "node:assert/strict";
import { calculateTaxBreakdown } from "../src/lib/gp/tax";
import { job } from "./helpers/gpFixtures";

const noRetail = { parts: 0, labor: 0, taxableFees: 0, sublet: 0 };

test("explicit per-job tax from authorized jobs, remainder to sublet", () => {
  const tax = calculateTaxBreakdown(
    1200,
    0.075,
    [
      job({ partsTaxTotal: 700, laborTaxTotal: 300, feesTaxTotal: 50 }),
      job({ authorized: false, partsTaxTotal: 999, laborTaxTotal: 999, feesTaxTotal: 999 }),
    ],
    { parts: 10000, labor: 4000, taxableFees: 500, sublet: 2000 }
  );
  assert.deepEqual(tax, {
    partsTax: 700,
    laborTax: 300,
    feesTax: 50,
    subletTax: 150,
    totalTax: 1200,
    taxRate: 0.075,
    method: "explicit",
  });
});

test("proportional split by category retail", () => {
  const tax = calculateTaxBreakdown(1000, 0.075, [job()], {
    parts: 5000,
    labor: 3000,
    taxableFees: 500,
    sublet: 1500,
  });
  assert.equal(tax.method, "proportional");
  assert.equal(tax.partsTax, 500);
  assert.equal(tax.laborTax, 300);
  assert.equal(tax.feesTax, 50);
  assert.equal(tax.subletTax, 150);
});

test("proportional truncation remainder lands on sublet", () => {
  const tax = calculateTaxBreakdown(100, 0.075, [], { parts: 1, labor: 1, taxableFees: 1, sublet: 0 });
  assert.equal(tax.partsTax, 33);
  assert.equal(tax.laborTax, 33);
  assert.equal(tax.feesTax, 33);
  assert.equal(tax.subletTax, 1);
});

test("tax with nothing to attribute against is reported on sublet", () => {
  const tax = calculateTaxBreakdown(250, 0.075, [], noRetail);
  assert.equal(tax.method, "none");
  assert.equal(tax.subletTax, 250);
  assert.equal(tax.partsTax + tax.laborTax + tax.feesTax, 0);
});

test("zero tax is all zeros", () => {
  const tax = calculateTaxBreakdown(0, 0.075, [], { parts: 5000, labor: 0, taxableFees: 0, sublet: 0 });
  assert.equal(tax.method, "none");
  assert.equal(tax.subletTax, 0);
});

test("categories always sum to the reported total", () => {
  const cases = [
    calculateTaxBreakdown(987, 0.08, [], { parts: 3333, labor: 7777, taxableFees: 11, sublet: 0 }),
    calculateTaxBreakdown(500, 0.08, [job({ laborTaxTotal: 420 })], noRetail),
    calculateTaxBreakdown(1, 0.08, [], { parts: 2, labor: 2, taxableFees: 2, sublet: 2 }),
    calculateTaxBreakdown(321, 0.08, [], noRetail),
  ];
  for (const tax of cases) {
    assert.equal(tax.partsTax + tax.laborTax + tax.feesTax + tax.subletTax, tax.totalTax);
  }
});
