/**
 * shopConfigCache.ts
 *
 * Per-shop technician rates with a TTL. One instance is shared by every
 * concurrent RO worker for a run (or by the whole process in route handlers).
 *
 * Concurrent misses for the same shop share a single upstream fetch: the first
 * caller registers its promise in `inFlight`, later callers await that promise
 * instead of starting their own.
 *
 * A failed fetch never propagates. The caller gets a defaults-only config
 * (degraded: true) which is cached like any other entry, so a down upstream is
 * retried once per TTL rather than once per RO.
 */

import type { ShopConfig } from "@/types/gp";
import type { EmployeeLite } from "@/lib/tmClient";
import { DEFAULT_TECH_RATE_CENTS } from "@/lib/gp/rateResolver";
import { DEFAULT_TAX_RATE } from "@/schemas/estimate";
import { errorMessage } from "@/lib/errors";
import { toCents } from "@/lib/gp/money";

export const DEFAULT_SHOP_CONFIG_TTL_SECONDS = 300;

const TECHNICIAN_ROLE = 3;

export type TechnicianSource = (shopId: string) => Promise<EmployeeLite[]>;

export interface ShopConfigCacheOptions {
  source: TechnicianSource;
  ttlSeconds?: number;
  /** Epoch ms clock, injectable for tests. */
  now?: () => number;
}

export function buildShopConfig(shopId: string, employees: readonly EmployeeLite[], cachedAt: number): ShopConfig {
  const techRates = new Map<number, number>();
  const techNames = new Map<number, string>();

  for (const emp of employees) {
    if (emp.role !== TECHNICIAN_ROLE || emp.hourlyRate <= 0) continue;
    techRates.set(emp.id, emp.hourlyRate);
    techNames.set(emp.id, `${emp.firstName} ${emp.lastName}`.trim());
  }

  const rates = [...techRates.values()];
  const avgTechRate =
    rates.length > 0 ? toCents(rates.reduce((sum, r) => sum + r, 0) / rates.length) : DEFAULT_TECH_RATE_CENTS;

  return {
    shopId,
    shopName: null,
    avgTechRate,
    techRates,
    techNames,
    taxRate: DEFAULT_TAX_RATE,
    cachedAt,
    degraded: false,
  };
}

export function defaultShopConfig(shopId: string, cachedAt: number): ShopConfig {
  return {
    shopId,
    shopName: null,
    avgTechRate: DEFAULT_TECH_RATE_CENTS,
    techRates: new Map(),
    techNames: new Map(),
    taxRate: DEFAULT_TAX_RATE,
    cachedAt,
    degraded: true,
  };
}

export class ShopConfigCache {
  private readonly entries = new Map<string, ShopConfig>();
  private readonly inFlight = new Map<string, Promise<ShopConfig>>();
  private readonly source: TechnicianSource;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: ShopConfigCacheOptions) {
    this.source = options.source;
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_SHOP_CONFIG_TTL_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
  }

  private isFresh(entry: ShopConfig): boolean {
    return this.now() - entry.cachedAt < this.ttlMs;
  }

  async get(shopId: string, options: { forceRefresh?: boolean } = {}): Promise<ShopConfig> {
    if (!options.forceRefresh) {
      const cached = this.entries.get(shopId);
      if (cached && this.isFresh(cached)) return cached;
    }

    const pending = this.inFlight.get(shopId);
    if (pending) return pending;

    // A load only stores its result while it is still the registered one; clear() unregisters it.
    const load: Promise<ShopConfig> = this.load(shopId)
      .then((config) => {
        if (this.inFlight.get(shopId) === load) this.entries.set(shopId, config);
        return config;
      })
      .finally(() => {
        if (this.inFlight.get(shopId) === load) this.inFlight.delete(shopId);
      });
    this.inFlight.set(shopId, load);
    return load;
  }

  private async load(shopId: string): Promise<ShopConfig> {
    try {
      const employees = await this.source(shopId);
      return buildShopConfig(shopId, employees, this.now());
    } catch (err) {
      console.warn(
        `[shopConfigCache] Technician fetch failed for shop ${shopId}; using default rates. ${errorMessage(err)}`
      );
      return defaultShopConfig(shopId, this.now());
    }
  }

  clear(shopId?: string): void {
    if (shopId) {
      this.entries.delete(shopId);
      this.inFlight.delete(shopId);
    } else {
      this.entries.clear();
      this.inFlight.clear();
    }
  }

  get size(): number {
    return this.entries.size;
  }
}
