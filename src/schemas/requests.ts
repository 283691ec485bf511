import { z } from "zod";
import { isDateOnly } from "@/lib/date";

const dateOnly = z.string().refine(isDateOnly, { message: "Expected a YYYY-MM-DD date." });

/** Source-system shop id. Arrives as a number in JSON bodies, a string in query params. */
const tmShopId = z.coerce.number().int().positive();

const snapshotTrigger = z.enum(["posted", "completed", "manual"]);

export const buildSnapshotsSchema = z
  .object({
    shopId: tmShopId,
    startDate: dateOnly.optional(),
    endDate: dateOnly.optional(),
    daysBack: z.number().int().min(0).max(90).optional(),
    trigger: snapshotTrigger.optional(),
  })
  .superRefine((value, ctx) => {
    if (Boolean(value.startDate) !== Boolean(value.endDate)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "startDate and endDate must be given together.",
        path: ["endDate"],
      });
    }
    if (value.startDate && value.endDate && value.startDate > value.endDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "startDate must be on or before endDate.",
        path: ["startDate"],
      });
    }
  });

const dateRange = z
  .object({
    shopId: tmShopId,
    startDate: dateOnly,
    endDate: dateOnly,
  })
  .superRefine((value, ctx) => {
    if (value.startDate > value.endDate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "startDate must be on or before endDate.",
        path: ["startDate"],
      });
    }
  });

export const rebuildMetricsSchema = dateRange;
export const listMetricsQuerySchema = dateRange;

export const roGpQuerySchema = z.object({
  shopId: z.string().regex(/^\d+$/, "shopId must be numeric."),
  authorizedOnly: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => v !== "false"),
});

export const roIdParamSchema = z.coerce.number().int().positive();

export const gpAnalysisSchema = z.object({
  shopId: z.coerce.string().regex(/^\d+$/, "shopId must be numeric."),
  roIds: z.array(z.number().int().positive()).min(1).max(200),
  authorizedOnly: z.boolean().optional(),
  /** Dashboard aggregates to compare against, in cents. */
  reported: z
    .object({
      sales: z.number().int(),
      carCount: z.number().int().nonnegative(),
      averageRo: z.number().int(),
    })
    .optional(),
});

export const gpSyncSchema = z.object({
  shopIds: z.array(tmShopId).min(1).optional(),
  daysBack: z.number().int().min(0).max(90).optional(),
});
