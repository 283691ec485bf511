/**
 * money.ts
 *
 * Integer-cents helpers shared by the GP engine and the snapshot pipeline.
 */

/** Rounds to 2 decimal places (percentages, hours). */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/** profit / retail × 100, rounded to 2 dp. 0 when retail is not positive. */
export function marginPct(profit: number, retail: number): number {
  if (retail <= 0) return 0;
  return round2((profit / retail) * 100);
}

/** Float products this close to a whole cent are that cent (1.13 × 10000 is 11299.999…). */
const CENT_EPSILON = 1e-9;

/** Truncates toward zero so derived amounts never exceed the source cents. */
export function toCents(value: number): number {
  const nearest = Math.round(value);
  const t = Math.abs(value - nearest) < CENT_EPSILON ? nearest : Math.trunc(value);
  return Object.is(t, -0) ? 0 : t;
}

/** Display conversion only. Never feed the result back into calculations. */
export function centsToDollars(cents: number): number {
  return round2(cents / 100);
}

export function formatDollars(cents: number): string {
  const sign = cents < 0 ? "-" : "";
  return `${sign}$${(Math.abs(cents) / 100).toFixed(2)}`;
}
