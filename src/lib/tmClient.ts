/**
 * tmClient.ts
 *
 * Server-side client for the shop-management source system.
 *
 * Usage:
 *   import { tmClientFromEnv, fetchEstimate } from "@/lib/tmClient";
 *   const client = tmClientFromEnv();
 *   const ro = await fetchEstimate(client, 12345);
 *
 * Every failure THROWS an UpstreamFetchError so the batch runner can record it
 * against the RO and move on. Response bodies are parsed by the callers' zod
 * schemas.
 *
 * Server-side only. Uses TM_AUTH_TOKEN (no NEXT_PUBLIC_ prefix).
 */

import { z } from "zod";
import type { RepairOrder } from "@/types/gp";
import { parseEstimate } from "@/schemas/estimate";
import { ConfigurationError, UpstreamFetchError, errorMessage } from "@/lib/errors";
import { loadTunables } from "@/lib/config";
import { toCents } from "@/lib/gp/money";

export const DEFAULT_TM_BASE_URL = "https://shop.tekmetric.com";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface TmClientOptions {
  baseUrl?: string;
  authToken: string;
  timeoutMs?: number;
  /** Injected in tests; defaults to global fetch. */
  fetchImpl?: FetchLike;
}

export interface TmClient {
  get(path: string, params?: QueryParams, signal?: AbortSignal): Promise<unknown>;
}

function buildUrl(baseUrl: string, path: string, params?: QueryParams): string {
  const url = new URL(path, baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`);
  for (const [key, value] of Object.entries(params ?? {})) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

export function createTmClient(options: TmClientOptions): TmClient {
  const baseUrl = options.baseUrl ?? DEFAULT_TM_BASE_URL;
  const timeoutMs = options.timeoutMs ?? 30_000;
  const fetchImpl = options.fetchImpl ?? fetch;

  return {
    async get(path, params, signal) {
      const url = buildUrl(baseUrl, path, params);
      const timeout = AbortSignal.timeout(timeoutMs);

      let res: Response;
      try {
        res = await fetchImpl(url, {
          method: "GET",
          headers: {
            "x-auth-token": options.authToken,
            accept: "application/json",
          },
          signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
          cache: "no-store",
        });
      } catch (err) {
        // AbortError (timeout / caller cancel) or network failure
        throw new UpstreamFetchError(path, null, `GET ${path} failed: ${errorMessage(err)}`);
      }

      if (!res.ok) {
        throw new UpstreamFetchError(path, res.status, `GET ${path} responded ${res.status}`);
      }

      try {
        return await res.json();
      } catch (err) {
        throw new UpstreamFetchError(path, res.status, `GET ${path} returned invalid JSON: ${errorMessage(err)}`);
      }
    },
  };
}

/**
 * Env-configured client for route handlers. A missing token is a deployment
 * problem, not a per-RO one, so it raises ConfigurationError.
 */
export function tmClientFromEnv(env: NodeJS.ProcessEnv = process.env): TmClient {
  const authToken = env.TM_AUTH_TOKEN;
  if (!authToken) throw new ConfigurationError("Missing TM_AUTH_TOKEN.");
  return createTmClient({
    baseUrl: env.TM_BASE_URL || DEFAULT_TM_BASE_URL,
    authToken,
    timeoutMs: loadTunables(env).tmTimeoutMs,
  });
}

// ─── Endpoints ────────────────────────────────────────────────────────────────

export async function fetchEstimate(
  client: TmClient,
  roId: number,
  signal?: AbortSignal
): Promise<RepairOrder> {
  const raw = await client.get(`/api/repair-order/${roId}/estimate`, undefined, signal);
  return parseEstimate(raw);
}

export interface EmployeeLite {
  id: number;
  firstName: string;
  lastName: string;
  /** 3 = technician. */
  role: number | null;
  /** Cost rate, cents per hour. 0 when unset. */
  hourlyRate: number;
}

const employeeSchema = z.object({
  id: z.coerce.number(),
  firstName: z.string().nullish().transform((v) => v ?? ""),
  lastName: z.string().nullish().transform((v) => v ?? ""),
  role: z.coerce.number().nullish().catch(null).transform((v) => v ?? null),
  hourlyRate: z.coerce.number().nullish().catch(0).transform((v) => (v ? toCents(v) : 0)),
});

// Either a bare array or a page envelope.
const employeesResponseSchema = z.union([
  z.array(z.unknown()),
  z.object({ content: z.array(z.unknown()) }).transform((page) => page.content),
]);

export async function fetchActiveEmployees(
  client: TmClient,
  shopId: string,
  signal?: AbortSignal
): Promise<EmployeeLite[]> {
  const path = `/api/shop/${shopId}/employees-lite`;
  const raw = await client.get(path, { size: 500, status: "ACTIVE" }, signal);

  const parsed = employeesResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UpstreamFetchError(path, null, `Unexpected employees-lite response for shop ${shopId}`);
  }

  const employees: EmployeeLite[] = [];
  for (const entry of parsed.data) {
    const employee = employeeSchema.safeParse(entry);
    if (employee.success) employees.push(employee.data);
  }
  return employees;
}
