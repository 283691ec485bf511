import test from "node:test";
import assert from "node:assert/strict";
import { centsToDollars, formatDollars, marginPct, round2, toCents } from "../src/lib/gp/money";

test("toCents truncates toward zero", () => {
  assert.equal(toCents(617.25), 617);
  assert.equal(toCents(-617.75), -617);
  assert.ok(Object.is(toCents(-0.4), 0));
});

test("toCents snaps float products sitting next to a whole cent", () => {
  assert.equal(toCents(1.13 * 10000), 11300);
  assert.equal(toCents(-(1.13 * 10000)), -11300);
  assert.equal(toCents(11299.5), 11299);
});

test("marginPct is 0 without positive retail", () => {
  assert.equal(marginPct(1200, 3000), 40);
  assert.equal(marginPct(500, 0), 0);
  assert.equal(marginPct(-500, -100), 0);
});

test("round2 keeps two decimals", () => {
  assert.equal(round2(43.333), 43.33);
  assert.equal(round2(62.5), 62.5);
});

test("dollar display helpers", () => {
  assert.equal(centsToDollars(12345), 123.45);
  assert.equal(formatDollars(500), "$5.00");
  assert.equal(formatDollars(-3300), "-$33.00");
});
