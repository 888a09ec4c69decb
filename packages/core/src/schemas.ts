import { z } from "zod";
import { BankId, RateType, Term } from "./enums.js";

export const BankIdSchema = z.nativeEnum(BankId);
export const TermSchema = z.nativeEnum(Term);
export const RateTypeSchema = z.nativeEnum(RateType);

export const AvgMonthSchema = z
  .object({
    year: z.number().int().min(1940).max(2100),
    month: z.number().int().min(1).max(12),
  })
  .strict();

export const RatioDiscountBoundariesSchema = z
  .object({
    min_ratio: z.number().min(0).max(100),
    max_ratio: z.number().min(0).max(100),
  })
  .strict()
  .refine((b) => b.min_ratio < b.max_ratio, {
    message: "min_ratio must be below max_ratio",
  });

const baseShape = {
  bank: z.string().min(1),
  term: TermSchema,
  nominal_rate: z.number().positive().finite(),
  last_crawled_at: z.string().datetime({ offset: true }),
};

// .strict() rejects fields that belong to another rate type
export const ListRateSetSchema = z
  .object({
    ...baseShape,
    type: z.literal(RateType.LIST),
    changed_on: z.string().date().optional(),
    union_discount: z.literal(false),
  })
  .strict();

export const AverageRateSetSchema = z
  .object({
    ...baseShape,
    type: z.literal(RateType.AVERAGE),
    average_reference_month: AvgMonthSchema,
    union_discount: z.literal(false),
  })
  .strict();

export const RatioDiscountedRateSetSchema = z
  .object({
    ...baseShape,
    type: z.literal(RateType.RATIO_DISCOUNTED),
    ratio_discount_boundaries: RatioDiscountBoundariesSchema,
    union_discount: z.literal(false),
  })
  .strict();

export const UnionDiscountedRateSetSchema = z
  .object({
    ...baseShape,
    type: z.literal(RateType.UNION_DISCOUNTED),
    union_discount: z.literal(true),
  })
  .strict();

export const InterestSetSchema = z.discriminatedUnion("type", [
  ListRateSetSchema,
  AverageRateSetSchema,
  RatioDiscountedRateSetSchema,
  UnionDiscountedRateSetSchema,
]);

export const InterestSetsDatasetSchema = z.object({
  generated_at: z.string().datetime({ offset: true }),
  interest_sets: z.array(InterestSetSchema),
});
