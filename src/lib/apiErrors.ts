/**
 * Maps pipeline errors to route responses. Partial failures never reach here:
 * batch operations return them in their summary with a 200.
 */
import { NextResponse } from "next/server";
import type { ZodError } from "zod";
import { ConfigurationError, PersistenceError, ShopNotFoundError, UpstreamFetchError } from "@/lib/errors";

export function validationErrorResponse(error: ZodError) {
  return NextResponse.json(
    { error: error.issues[0]?.message ?? "Invalid request.", issues: error.flatten().fieldErrors },
    { status: 400 }
  );
}

export function errorResponse(tag: string, err: unknown) {
  if (err instanceof ShopNotFoundError) {
    return NextResponse.json({ error: err.message }, { status: 404 });
  }
  if (err instanceof UpstreamFetchError) {
    console.warn(`[${tag}] upstream ${err.path} failed (${err.status ?? "network"}).`);
    return NextResponse.json({ error: err.message }, { status: 502 });
  }
  if (err instanceof ConfigurationError || err instanceof PersistenceError) {
    console.error(`[${tag}] ${err.name}: ${err.message}`);
    return NextResponse.json({ error: err.message }, { status: 500 });
  }
  console.error(`[${tag}] Unexpected error:`, err);
  return NextResponse.json({ error: "Internal error." }, { status: 500 });
}
