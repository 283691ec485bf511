/**
 * gp.ts
 *
 * Domain types for the true-GP engine. All monetary values are integer CENTS.
 * Convert to dollars only at the response / display layer.
 */

// ─── Line items (tagged variants) ─────────────────────────────────────────────

export interface TechnicianRef {
  id: number | null;
  /** Inline hourly cost rate in cents, 0 when the source did not send one. */
  hourlyRate: number;
  firstName: string;
  lastName: string;
}

export interface Part {
  kind: "part";
  id: number;
  name: string;
  quantity: number;
  /** Ambiguous upstream: per-unit on some endpoints, line total on others. */
  cost: number;
  retail: number;
  /** Upstream-reported line total, 0 when absent. */
  total: number;
}

export interface LaborEntry {
  kind: "labor";
  id: number;
  name: string;
  hours: number;
  /** Retail rate, cents per hour. */
  rate: number;
  technician: TechnicianRef | null;
}

export interface Sublet {
  kind: "sublet";
  id: number;
  name: string;
  vendor: string | null;
  cost: number;
  retail: number;
}

export interface Fee {
  kind: "fee";
  name: string;
  /** Flat amount, used when no percentage applies. */
  amount: number;
  /** Whole-number percent, e.g. 5 for 5%. */
  percentage: number;
  /** Cap in cents; 0 = uncapped. */
  cap: number;
  taxable: boolean;
}

export type LineItem = Part | LaborEntry | Sublet | Fee;

// ─── Transaction documents ────────────────────────────────────────────────────

export interface Job {
  id: number;
  name: string;
  authorized: boolean;
  authorizedDate: string | null;
  discount: number;
  parts: Part[];
  labor: LaborEntry[];
  sublets: Sublet[];
  /** Per-category tax totals when the source broke them out; 0 otherwise. */
  partsTaxTotal: number;
  laborTaxTotal: number;
  feesTaxTotal: number;
}

export interface RepairOrder {
  id: number;
  repairOrderNumber: number;
  customerName: string;
  vehicleDescription: string | null;
  advisorId: number | null;
  advisorName: string | null;
  jobs: Job[];
  fees: Fee[];
  discount: number;
  /** Reported total tax for the RO. */
  tax: number;
  /** Decimal fraction, e.g. 0.075. */
  taxRate: number;
  balanceDue: number;
  /** Ingestion problems recovered with a zero/default substitution. */
  issues: string[];
}

// ─── Shop configuration ───────────────────────────────────────────────────────

export interface ShopConfig {
  shopId: string;
  shopName: string | null;
  /** Mean technician cost rate, cents per hour. */
  avgTechRate: number;
  techRates: ReadonlyMap<number, number>;
  techNames: ReadonlyMap<number, string>;
  taxRate: number;
  /** Epoch ms when the entry was built. */
  cachedAt: number;
  /** true when built from defaults after an upstream failure. */
  degraded: boolean;
}

// ─── Calculation output ───────────────────────────────────────────────────────

export type CostFormatMethod = "per_unit_validated" | "total_divided" | "assumed_per_unit";
export type TechRateSource = "assigned" | "shop_average" | "default";
export type FeeCategory =
  | "shop_supplies"
  | "environmental"
  | "hazardous_waste"
  | "disposal"
  | "other";

export interface PartProfit {
  partId: number;
  name: string;
  quantity: number;
  costPerUnit: number;
  retailPerUnit: number;
  totalCost: number;
  totalRetail: number;
  profit: number;
  marginPct: number;
  costFormat: CostFormatMethod;
}

export interface LaborProfit {
  laborId: number;
  name: string;
  hours: number;
  rate: number;
  techRate: number;
  techRateSource: TechRateSource;
  techName: string | null;
  totalRetail: number;
  totalCost: number;
  profit: number;
  marginPct: number;
}

export interface SubletProfit {
  subletId: number;
  name: string;
  vendor: string | null;
  cost: number;
  retail: number;
  profit: number;
  marginPct: number;
}

export interface FeeDetail {
  feeName: string;
  category: FeeCategory;
  amount: number;
  /** Always equal to amount: fees carry no cost. */
  profit: number;
  percentage: number;
  cap: number;
  taxable: boolean;
}

export interface FeeBreakdown {
  fees: FeeDetail[];
  totalFees: number;
  totalFeeProfit: number;
  taxableFees: number;
  byCategory: Partial<Record<FeeCategory, number>>;
}

export interface TaxBreakdown {
  partsTax: number;
  laborTax: number;
  feesTax: number;
  subletTax: number;
  totalTax: number;
  taxRate: number;
  method: "explicit" | "proportional" | "none";
}

export interface ComputedJobGP {
  jobId: number;
  jobName: string;
  authorized: boolean;
  authorizedDate: string | null;
  partsRetail: number;
  partsCost: number;
  partsProfit: number;
  laborRetail: number;
  laborCost: number;
  laborProfit: number;
  subletRetail: number;
  subletCost: number;
  subletProfit: number;
  discountAmount: number;
  subtotal: number;
  grossProfit: number;
  marginPct: number;
  partsDetail: PartProfit[];
  laborDetail: LaborProfit[];
  subletDetail: SubletProfit[];
}

export interface ComputedROGP {
  roId: number;
  roNumber: number;
  customerName: string;
  vehicleDescription: string | null;
  advisorId: number | null;
  advisorName: string | null;

  totalRetail: number;
  totalCost: number;
  grossProfit: number;
  marginPct: number;

  partsRetail: number;
  partsCost: number;
  partsProfit: number;
  laborRetail: number;
  laborCost: number;
  laborProfit: number;
  subletRetail: number;
  subletCost: number;
  subletProfit: number;

  feeBreakdown: FeeBreakdown;
  feeProfit: number;
  taxBreakdown: TaxBreakdown;
  taxTotal: number;

  jobDiscounts: number;
  roDiscount: number;
  discountTotal: number;
  balanceDue: number;

  jobs: ComputedJobGP[];
  authorizedJobCount: number;
  totalJobCount: number;

  calculationNotes: string[];
}
