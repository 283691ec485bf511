/**
 * estimate.ts
 *
 * Ingestion boundary for upstream estimate documents (GET /api/repair-order/:id/estimate).
 *
 * The upstream API is loosely shaped: fields go missing, arrive as null, or as
 * numeric strings. Everything is validated once here and turned into the tagged
 * RepairOrder model, so the calculator never has to re-check a field.
 *
 *   - absent / null          → 0, false, "" or [] (silently)
 *   - present but unreadable → default, plus an entry in `issues`
 *
 * Parsing never throws.
 */

import { z } from "zod";
import type { Fee, Job, LaborEntry, Part, RepairOrder, Sublet, TechnicianRef } from "@/types/gp";
import { toCents } from "@/lib/gp/money";

export const DEFAULT_TAX_RATE = 0.075;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describe(value: unknown): string {
  const text = JSON.stringify(value) ?? String(value);
  return text.length > 40 ? `${text.slice(0, 37)}...` : text;
}

function joinName(...parts: string[]): string {
  return parts.filter((p) => p.length > 0).join(" ").trim();
}

/**
 * Schemas are built per parse so each call gets its own issue list.
 */
function createEstimateSchema(issues: string[]) {
  const num = (label: string, fallback = 0) =>
    z.unknown().transform((value): number => {
      if (value == null || value === "") return fallback;
      const n =
        typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : Number.NaN;
      if (Number.isFinite(n)) return n;
      issues.push(`${label}: expected a number, got ${describe(value)}; using ${fallback}`);
      return fallback;
    });

  const cents = (label: string) => num(label).transform(toCents);

  const optionalId = (label: string) =>
    z.unknown().transform((value): number | null => {
      if (value == null || value === "") return null;
      const n = typeof value === "number" ? value : typeof value === "string" ? Number(value) : Number.NaN;
      if (Number.isFinite(n)) return n;
      issues.push(`${label}: unreadable id ${describe(value)}; ignored`);
      return null;
    });

  const flag = (label: string) =>
    z.unknown().transform((value): boolean => {
      if (value == null) return false;
      if (typeof value === "boolean") return value;
      if (value === "true") return true;
      if (value === "false") return false;
      issues.push(`${label}: expected a boolean, got ${describe(value)}; using false`);
      return false;
    });

  const text = (fallback = "") =>
    z.unknown().transform((value): string => {
      if (typeof value === "string") return value;
      if (typeof value === "number") return String(value);
      return fallback;
    });

  const nullableText = z.unknown().transform((value): string | null =>
    typeof value === "string" && value.length > 0 ? value : null
  );

  const list = <T extends z.ZodTypeAny>(item: T, label: string) =>
    z.unknown().transform((value): z.output<T>[] => {
      if (value == null) return [];
      if (!Array.isArray(value)) {
        issues.push(`${label}: expected a list, got ${describe(value)}; ignored`);
        return [];
      }
      const out: z.output<T>[] = [];
      for (const entry of value) {
        const parsed = item.safeParse(entry);
        if (parsed.success) out.push(parsed.data);
        else issues.push(`${label}: skipped malformed entry ${describe(entry)}`);
      }
      return out;
    });

  const person = z
    .object({ id: optionalId("person.id"), firstName: text(), lastName: text() })
    .nullish()
    .catch(null);

  const technician = z
    .object({
      id: optionalId("labor.technician.id"),
      hourlyRate: cents("labor.technician.hourlyRate"),
      firstName: text(),
      lastName: text(),
    })
    .nullish()
    .catch(null)
    .transform((t): TechnicianRef | null => t ?? null);

  const part = z
    .object({
      id: num("part.id"),
      name: text("Unknown Part"),
      quantity: num("part.quantity", 1),
      cost: cents("part.cost"),
      retail: cents("part.retail"),
      total: cents("part.total"),
    })
    .transform((p): Part => ({ kind: "part", ...p }));

  const labor = z
    .object({
      id: num("labor.id"),
      name: text("Labor"),
      hours: num("labor.hours"),
      rate: cents("labor.rate"),
      technician,
    })
    .transform((l): LaborEntry => ({ kind: "labor", ...l }));

  const sublet = z
    .object({
      id: num("sublet.id"),
      name: text("Sublet"),
      vendor: z
        .object({ name: nullableText })
        .nullish()
        .catch(null),
      cost: cents("sublet.cost"),
      retail: cents("sublet.retail"),
    })
    .transform(
      (s): Sublet => ({
        kind: "sublet",
        id: s.id,
        name: s.name,
        vendor: s.vendor?.name ?? null,
        cost: s.cost,
        retail: s.retail,
      })
    );

  const fee = z
    .object({
      name: text("Fee"),
      amount: cents("fee.amount"),
      total: cents("fee.total"),
      percentage: num("fee.percentage"),
      cap: cents("fee.cap"),
      taxable: flag("fee.taxable"),
    })
    .transform(
      (f): Fee => ({
        kind: "fee",
        name: f.name,
        amount: f.amount || f.total,
        percentage: f.percentage,
        cap: f.cap,
        taxable: f.taxable,
      })
    );

  const job = z
    .object({
      id: num("job.id"),
      name: text("Unknown Job"),
      authorized: flag("job.authorized"),
      authorizedDate: nullableText,
      discount: cents("job.discount"),
      parts: list(part, "job.parts"),
      labor: list(labor, "job.labor"),
      sublets: list(sublet, "job.sublets"),
      partsTaxTotal: cents("job.partsTaxTotal"),
      laborTaxTotal: cents("job.laborTaxTotal"),
      feesTaxTotal: cents("job.feesTaxTotal"),
    })
    .transform((j): Job => j);

  // RO-level fees normally arrive as { data: [...] }; accept a bare list too.
  const fees = z
    .unknown()
    .transform((value) => (isRecord(value) ? value.data : value))
    .pipe(list(fee, "fees"));

  return z.object({
    id: num("id"),
    repairOrderNumber: num("repairOrderNumber"),
    customer: person,
    vehicle: z
      .object({ year: text(), make: text(), model: text() })
      .nullish()
      .catch(null),
    serviceWriter: person,
    jobs: list(job, "jobs"),
    fees,
    discount: cents("discount"),
    tax: cents("tax"),
    taxes: cents("taxes"),
    taxRate: num("taxRate", DEFAULT_TAX_RATE),
    balanceDue: cents("balanceDue"),
  });
}

export function emptyRepairOrder(issues: string[] = []): RepairOrder {
  return {
    id: 0,
    repairOrderNumber: 0,
    customerName: "Unknown",
    vehicleDescription: null,
    advisorId: null,
    advisorName: null,
    jobs: [],
    fees: [],
    discount: 0,
    tax: 0,
    taxRate: DEFAULT_TAX_RATE,
    balanceDue: 0,
    issues,
  };
}

export function parseEstimate(raw: unknown): RepairOrder {
  const issues: string[] = [];
  if (!isRecord(raw)) {
    return emptyRepairOrder([`estimate: expected an object, got ${describe(raw)}`]);
  }

  const parsed = createEstimateSchema(issues).safeParse(raw);
  if (!parsed.success) {
    // Every field schema recovers on its own; reaching here means zod itself rejected the shape.
    return emptyRepairOrder([...issues, `estimate: ${parsed.error.issues[0]?.message ?? "unreadable"}`]);
  }

  const e = parsed.data;
  const customerName = e.customer ? joinName(e.customer.firstName, e.customer.lastName) : "";
  const vehicleDescription = e.vehicle ? joinName(e.vehicle.year, e.vehicle.make, e.vehicle.model) : "";
  const advisorName = e.serviceWriter ? joinName(e.serviceWriter.firstName, e.serviceWriter.lastName) : "";

  return {
    id: e.id,
    repairOrderNumber: e.repairOrderNumber,
    customerName: customerName || "Unknown",
    vehicleDescription: vehicleDescription || null,
    advisorId: e.serviceWriter?.id ?? null,
    advisorName: advisorName || null,
    jobs: e.jobs,
    fees: e.fees,
    discount: e.discount,
    tax: e.tax || e.taxes,
    taxRate: e.taxRate,
    balanceDue: e.balanceDue,
    issues,
  };
}
