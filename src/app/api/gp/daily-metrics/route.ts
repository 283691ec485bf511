import { NextResponse } from "next/server";
import { warehouse } from "@/lib/supabaseServer";
import { isAuthorized } from "@/lib/adminAuth";
import { listMetricsQuerySchema, rebuildMetricsSchema } from "@/schemas/requests";
import { getDailyMetrics, rebuildDailyMetrics } from "@/lib/snapshots/metricsAggregator";
import { loadTunables } from "@/lib/config";
import { errorResponse, validationErrorResponse } from "@/lib/apiErrors";

/**
 * GET /api/gp/daily-metrics?shopId=&startDate=&endDate=
 * Stored daily_shop_metrics rows, newest first. Unknown shop → empty list.
 */
export async function GET(req: Request) {
  if (!isAuthorized(req)) {
    return NextResponse.json({ error: "Unauthorized" }, { status: 401 });
  }

  const params = new URL(req.url).searchParams;
  const parsed = listMetricsQuerySchema.safeParse({
    shopId: params.get("shopId"),
    startDate: params.get("startDate"),
    endDate: params.get("endDate"),
  });
  if (!parsed.success) return validationErrorResponse(parsed.error);

  try {
    const { shopId, startDate, endDate } = parsed.data;
    const rows = await getDailyMetrics(warehouse, shopId, { start: startDate, end: endDate });
    return NextResponse.json({ rows });
  } catch (err) {
    return errorResponse("gp/daily-metrics", err);
  }
}

/**
 * POST /api/gp/daily-metrics
 * Body: { shopId, startDate, endDate }
 * Rebuilds one daily_shop_metrics row per day from that day's snapshots.
 */
export async function POST(req: Request) {
  if (!isAuthorized(req)) {
    return NextResponse.json({ error: "Unauthorized" }, { status: 401 });
  }

  const body: unknown = await req.json().catch(() => null);
  const parsed = rebuildMetricsSchema.safeParse(body);
  if (!parsed.success) return validationErrorResponse(parsed.error);

  try {
    const { shopId, startDate, endDate } = parsed.data;
    const summary = await rebuildDailyMetrics(warehouse, shopId, {
      startDate,
      endDate,
      concurrency: loadTunables().metricsConcurrency,
      signal: req.signal,
    });
    return NextResponse.json(summary);
  } catch (err) {
    return errorResponse("gp/daily-metrics", err);
  }
}
