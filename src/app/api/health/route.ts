// src/app/api/health/route.ts
import { NextResponse } from "next/server";

export async function GET() {
  return NextResponse.json({
    ok: true,
    hasPublicUrl: Boolean(process.env.NEXT_PUBLIC_SUPABASE_URL),
    hasServiceRole: Boolean(process.env.SUPABASE_SERVICE_ROLE_KEY),
    hasTmAuthToken: Boolean(process.env.TM_AUTH_TOKEN),
    hasCronSecret: Boolean(process.env.CRON_SECRET),
    tmBaseUrl: process.env.TM_BASE_URL || "default",
    nodeEnv: process.env.NODE_ENV,
  });
}
