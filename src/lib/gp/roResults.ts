/**
 * roResults.ts
 *
 * On-demand true GP for a list of RO ids: fetch each estimate, compute, collect.
 * Nothing is persisted. ROs run on a bounded pool and share one ShopConfig
 * lookup through the cache.
 */

import pLimit from "p-limit";
import type { ComputedROGP } from "@/types/gp";
import { fetchEstimate, type TmClient } from "@/lib/tmClient";
import type { ShopConfigCache } from "@/lib/gp/shopConfigCache";
import { calculateRoTrueGp, type CalculationOptions } from "@/lib/gp/gpCalculator";
import { errorMessage } from "@/lib/errors";

export interface RoBatchOptions extends CalculationOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

export interface RoBatchError {
  roId: number;
  error: string;
}

export interface RoBatchResult {
  shopId: string;
  results: ComputedROGP[];
  errors: RoBatchError[];
  /** ROs never started because the signal fired first. */
  cancelled: number;
}

export async function calculateTrueGpForRos(
  client: TmClient,
  cache: ShopConfigCache,
  shopId: string,
  roIds: readonly number[],
  options: RoBatchOptions = {}
): Promise<RoBatchResult> {
  const { concurrency = 4, signal, ...calculation } = options;
  const limit = pLimit(concurrency);

  const results: ComputedROGP[] = [];
  const errors: RoBatchError[] = [];
  let cancelled = 0;

  await Promise.all(
    roIds.map((roId) =>
      limit(async () => {
        if (signal?.aborted) {
          cancelled++;
          return;
        }
        try {
          const shopConfig = await cache.get(shopId);
          const ro = await fetchEstimate(client, roId, signal);
          results.push(calculateRoTrueGp(ro, shopConfig, calculation));
        } catch (err) {
          errors.push({ roId, error: errorMessage(err) });
        }
      })
    )
  );

  // Completion order is arbitrary; report in request order.
  const order = new Map(roIds.map((id, i) => [id, i]));
  results.sort((a, b) => (order.get(a.roId) ?? 0) - (order.get(b.roId) ?? 0));
  errors.sort((a, b) => (order.get(a.roId) ?? 0) - (order.get(b.roId) ?? 0));

  return { shopId, results, errors, cancelled };
}
