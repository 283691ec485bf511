/**
 * Admin Authentication Helpers
 *
 * Every GP endpoint is an operator/cron surface guarded by CRON_SECRET.
 * Accepted carriers: `x-cron-secret` header, `Authorization: Bearer <secret>`,
 * or `?secret=` (for schedulers that cannot set headers).
 */

/**
 * Extract Bearer token from Authorization header.
 * @returns The token string, or null if header is missing/invalid
 */
export function getBearerToken(req: Request): string | null {
  const auth = req.headers.get("authorization") || "";
  if (!auth.toLowerCase().startsWith("bearer ")) return null;
  return auth.slice(7);
}

export function isAuthorized(req: Request, secret: string | undefined = process.env.CRON_SECRET): boolean {
  if (!secret) {
    console.error("[adminAuth] CRON_SECRET is not set. Rejecting GP request.");
    return false;
  }
  const header = req.headers.get("x-cron-secret");
  const query = new URL(req.url).searchParams.get("secret");
  return header === secret || getBearerToken(req) === secret || query === secret;
}
