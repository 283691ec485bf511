import { NextResponse } from "next/server";
import { warehouse } from "@/lib/supabaseServer";
import { isAuthorized } from "@/lib/adminAuth";
import { buildSnapshotsSchema } from "@/schemas/requests";
import { buildSnapshotsForPeriod } from "@/lib/snapshots/snapshotBuilder";
import { loadTunables } from "@/lib/config";
import { errorResponse, validationErrorResponse } from "@/lib/apiErrors";

/**
 * POST /api/gp/snapshots
 * Body: { shopId, startDate?, endDate?, daysBack?, trigger? }
 * Builds/updates ro_snapshots for the window; returns the run summary.
 */
export async function POST(req: Request) {
  if (!isAuthorized(req)) {
    return NextResponse.json({ error: "Unauthorized" }, { status: 401 });
  }

  const body: unknown = await req.json().catch(() => null);
  const parsed = buildSnapshotsSchema.safeParse(body);
  if (!parsed.success) return validationErrorResponse(parsed.error);

  const { shopId, ...window } = parsed.data;
  const tunables = loadTunables();

  try {
    const summary = await buildSnapshotsForPeriod(warehouse, shopId, {
      ...window,
      concurrency: tunables.snapshotConcurrency,
      costFormatTolerance: tunables.costFormatTolerance,
      signal: req.signal,
    });
    return NextResponse.json(summary);
  } catch (err) {
    return errorResponse("gp/snapshots", err);
  }
}
