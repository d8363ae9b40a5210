/**
 * Report parameters for the derived-count queries.
 */
import { z } from "zod";
import { LinkedRecordKindEnum } from "./primitives";

export const MinimumThresholdSchema = z.object({
  kind: LinkedRecordKindEnum,
  threshold: z.coerce.number().int("validation.threshold").min(1, "validation.threshold"),
});

export type MinimumThresholdInput = z.input<typeof MinimumThresholdSchema>;

export const MaxCombinedSchema = z
  .object({
    kinds: z.tuple([LinkedRecordKindEnum, LinkedRecordKindEnum]),
    single: z.boolean().default(false),
  })
  .refine((value) => value.kinds[0] !== value.kinds[1], {
    message: "validation.distinct_kinds",
  });

export type MaxCombinedInput = z.input<typeof MaxCombinedSchema>;

export const MAX_AUDIT_PAGE = 100;

export const RecentAuditSchema = z.object({
  limit: z.coerce
    .number()
    .int("validation.limit")
    .min(1, "validation.limit")
    .transform((limit) => Math.min(limit, MAX_AUDIT_PAGE))
    .default(MAX_AUDIT_PAGE),
});
