/**
 * Supabase Server Client
 *
 * Server-side Supabase instance using the service role key, plus the GP
 * warehouse built on it. BYPASSES Row-Level Security - use only in API routes.
 * Session persistence disabled since this runs in stateless API contexts.
 *
 * Pipeline modules never import this file; they take a warehouse argument.
 *
 * Security: Never expose SUPABASE_SERVICE_ROLE_KEY to the client.
 */

// src/lib/supabaseServer.ts
import { createClient } from "@supabase/supabase-js";
import { createSupabaseWarehouse } from "@/lib/warehouse/supabaseWarehouse";

const url = process.env.NEXT_PUBLIC_SUPABASE_URL;
const serviceKey = process.env.SUPABASE_SERVICE_ROLE_KEY;

if (!url) throw new Error("Missing NEXT_PUBLIC_SUPABASE_URL.");
if (!serviceKey) throw new Error("Missing SUPABASE_SERVICE_ROLE_KEY.");

export const supabaseServer = createClient(url, serviceKey, {
  auth: { persistSession: false, autoRefreshToken: false },
});

export const warehouse = createSupabaseWarehouse(supabaseServer);
