/**
 * Process-wide source-system client and ShopConfig cache for route handlers.
 * Built on first use so a missing TM_AUTH_TOKEN fails the request that needs
 * it rather than the module import.
 */

import { fetchActiveEmployees, tmClientFromEnv, type TmClient } from "@/lib/tmClient";
import { ShopConfigCache } from "@/lib/gp/shopConfigCache";
import { loadTunables } from "@/lib/config";

let client: TmClient | null = null;
let cache: ShopConfigCache | null = null;

export function getTmClient(): TmClient {
  client ??= tmClientFromEnv();
  return client;
}

export function getShopConfigCache(): ShopConfigCache {
  if (!cache) {
    const tm = getTmClient();
    cache = new ShopConfigCache({
      source: (shopId) => fetchActiveEmployees(tm, shopId),
      ttlSeconds: loadTunables().shopConfigTtlSeconds,
    });
  }
  return cache;
}
