import { NextResponse } from "next/server";
import { warehouse } from "@/lib/supabaseServer";
import { isAuthorized } from "@/lib/adminAuth";
import { gpSyncSchema } from "@/schemas/requests";
import { buildSnapshotsForPeriod, type SnapshotBatchSummary } from "@/lib/snapshots/snapshotBuilder";
import { rebuildDailyMetrics, type MetricsRebuildSummary } from "@/lib/snapshots/metricsAggregator";
import { resolveWindow } from "@/lib/date";
import { loadTunables } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import { validationErrorResponse } from "@/lib/apiErrors";

type ShopSyncResult =
  | { shopId: number; ok: true; snapshots: SnapshotBatchSummary; metrics: MetricsRebuildSummary }
  | { shopId: number; ok: false; error: string };

function shopIdsFromEnv(): number[] {
  return (process.env.TM_SHOP_ID ?? "")
    .split(",")
    .map((s) => Number(s.trim()))
    .filter((n) => Number.isInteger(n) && n > 0);
}

/**
 * POST /api/cron/gp-sync
 * Body (optional): { shopIds?, daysBack? }. Shops default to TM_SHOP_ID (comma list).
 * Scheduled run: snapshots for the trailing window, then daily metrics for the
 * same window. Shops run one after another; one shop failing does not stop the rest.
 */
export async function POST(req: Request) {
  if (!isAuthorized(req)) {
    return NextResponse.json({ error: "Unauthorized" }, { status: 401 });
  }

  const body: unknown = await req.json().catch(() => ({}));
  const parsed = gpSyncSchema.safeParse(body ?? {});
  if (!parsed.success) return validationErrorResponse(parsed.error);

  const shopIds = parsed.data.shopIds ?? shopIdsFromEnv();
  if (shopIds.length === 0) {
    return NextResponse.json({ error: "No shops to sync. Pass shopIds or set TM_SHOP_ID." }, { status: 400 });
  }

  const tunables = loadTunables();
  const window = resolveWindow({ daysBack: parsed.data.daysBack });
  const results: ShopSyncResult[] = [];

  for (const shopId of shopIds) {
    if (req.signal.aborted) break;
    try {
      const snapshots = await buildSnapshotsForPeriod(warehouse, shopId, {
        startDate: window.start,
        endDate: window.end,
        concurrency: tunables.snapshotConcurrency,
        costFormatTolerance: tunables.costFormatTolerance,
        signal: req.signal,
      });
      const metrics = await rebuildDailyMetrics(warehouse, shopId, {
        startDate: window.start,
        endDate: window.end,
        concurrency: tunables.metricsConcurrency,
        signal: req.signal,
      });
      results.push({ shopId, ok: true, snapshots, metrics });
    } catch (err) {
      console.error(`[cron/gp-sync] shop ${shopId} failed:`, err);
      results.push({ shopId, ok: false, error: errorMessage(err) });
    }
  }

  return NextResponse.json({ dateRange: window, results });
}
