/**
 * Pipeline tunables from the environment.
 *
 * Secrets and URLs are read where they are used (supabaseServer, tmClient) and
 * fail loudly there. Tunables here never throw: a bad value logs and falls back
 * to its default.
 */
import { z } from "zod";

const tunablesSchema = z.object({
  costFormatTolerance: z.coerce.number().gt(0).lt(1).default(0.01),
  snapshotConcurrency: z.coerce.number().int().min(1).max(32).default(4),
  metricsConcurrency: z.coerce.number().int().min(1).max(32).default(4),
  shopConfigTtlSeconds: z.coerce.number().int().positive().default(300),
  tmTimeoutMs: z.coerce.number().int().positive().default(30_000),
});

export type PipelineTunables = z.infer<typeof tunablesSchema>;

const ENV_KEYS: Record<keyof PipelineTunables, string> = {
  costFormatTolerance: "GP_COST_FORMAT_TOLERANCE",
  snapshotConcurrency: "SNAPSHOT_CONCURRENCY",
  metricsConcurrency: "METRICS_CONCURRENCY",
  shopConfigTtlSeconds: "SHOP_CONFIG_TTL_SECONDS",
  tmTimeoutMs: "TM_TIMEOUT_MS",
};

const TUNABLE_KEYS = [
  "costFormatTolerance",
  "snapshotConcurrency",
  "metricsConcurrency",
  "shopConfigTtlSeconds",
  "tmTimeoutMs",
] as const satisfies readonly (keyof PipelineTunables)[];

export function loadTunables(env: NodeJS.ProcessEnv = process.env): PipelineTunables {
  const defaults = tunablesSchema.parse({});
  const raw: Partial<Record<keyof PipelineTunables, string>> = {};
  for (const key of TUNABLE_KEYS) {
    const value = env[ENV_KEYS[key]];
    if (value != null && value.trim() !== "") raw[key] = value.trim();
  }

  const parsed = tunablesSchema.safeParse(raw);
  if (parsed.success) return parsed.data;

  // Keep the fields that did parse; drop the rest back to defaults.
  const result: PipelineTunables = { ...defaults };
  for (const key of TUNABLE_KEYS) {
    const field = tunablesSchema.shape[key].safeParse(raw[key]);
    if (field.success) {
      Object.assign(result, { [key]: field.data });
    } else {
      console.warn(`[config] Ignoring invalid ${ENV_KEYS[key]}=${raw[key]}; using ${defaults[key]}.`);
    }
  }
  return result;
}
