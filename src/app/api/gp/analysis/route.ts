import { NextResponse } from "next/server";
import { isAuthorized } from "@/lib/adminAuth";
import { gpAnalysisSchema } from "@/schemas/requests";
import { getShopConfigCache, getTmClient } from "@/lib/tmServer";
import { calculateTrueGpForRos } from "@/lib/gp/roResults";
import {
  aggregateAdvisorPerformance,
  aggregateLaborEfficiency,
  aggregatePartsMargin,
  aggregateTechPerformance,
  explainVariance,
  summarizeTrueGp,
} from "@/lib/gp/gpAnalytics";
import { loadTunables } from "@/lib/config";
import { errorResponse, validationErrorResponse } from "@/lib/apiErrors";

/**
 * POST /api/gp/analysis
 * Body: { shopId, roIds[], authorizedOnly?, reported? }
 * On-demand true GP for a set of ROs with labor / parts / advisor / tech roll-ups.
 * When `reported` dashboard figures are given, adds a variance explanation.
 */
export async function POST(req: Request) {
  if (!isAuthorized(req)) {
    return NextResponse.json({ error: "Unauthorized" }, { status: 401 });
  }

  const body: unknown = await req.json().catch(() => null);
  const parsed = gpAnalysisSchema.safeParse(body);
  if (!parsed.success) return validationErrorResponse(parsed.error);

  const { shopId, roIds, authorizedOnly, reported } = parsed.data;
  const tunables = loadTunables();

  try {
    const batch = await calculateTrueGpForRos(getTmClient(), getShopConfigCache(), shopId, roIds, {
      authorizedOnly,
      concurrency: tunables.snapshotConcurrency,
      costFormatTolerance: tunables.costFormatTolerance,
      signal: req.signal,
    });

    return NextResponse.json({
      shopId,
      summary: summarizeTrueGp(batch.results),
      laborEfficiency: aggregateLaborEfficiency(batch.results),
      partsMargin: aggregatePartsMargin(batch.results),
      advisors: aggregateAdvisorPerformance(batch.results),
      techPerformance: aggregateTechPerformance(batch.results),
      variance: reported ? explainVariance(batch.results, reported) : null,
      repairOrders: batch.results,
      errors: batch.errors,
      cancelled: batch.cancelled,
      calculatedAt: new Date().toISOString(),
    });
  } catch (err) {
    return errorResponse("gp/analysis", err);
  }
}
