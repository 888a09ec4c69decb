import { RateType, type Term } from "./enums.js";
import {
  AverageRateSetSchema,
  ListRateSetSchema,
  RatioDiscountedRateSetSchema,
  UnionDiscountedRateSetSchema,
} from "./schemas.js";
import type {
  AverageRateSet,
  AvgMonth,
  InterestSet,
  ListRateSet,
  RatioDiscountBoundaries,
  RatioDiscountedRateSet,
  UnionDiscountedRateSet,
} from "./types.js";

type CommonInput = {
  bank: string;
  term: Term;
  nominalRate: number;
  crawledAt: Date;
};

function common(input: CommonInput) {
  return {
    bank: input.bank,
    term: input.term,
    nominal_rate: input.nominalRate,
    last_crawled_at: input.crawledAt.toISOString(),
  };
}

/*
 * The factories validate with zod and freeze the result, so an InterestSet
 * that exists is always well-formed. A ZodError is thrown otherwise.
 */

export function createListRate(input: CommonInput & { changedOn?: string }): ListRateSet {
  const set = ListRateSetSchema.parse({
    ...common(input),
    type: RateType.LIST,
    ...(input.changedOn !== undefined ? { changed_on: input.changedOn } : {}),
    union_discount: false,
  });
  return Object.freeze(set);
}

export function createAverageRate(input: CommonInput & { month: AvgMonth }): AverageRateSet {
  const set = AverageRateSetSchema.parse({
    ...common(input),
    type: RateType.AVERAGE,
    average_reference_month: { year: input.month.year, month: input.month.month },
    union_discount: false,
  });
  return Object.freeze(set);
}

export function createRatioDiscountedRate(
  input: CommonInput & { boundaries: RatioDiscountBoundaries }
): RatioDiscountedRateSet {
  const set = RatioDiscountedRateSetSchema.parse({
    ...common(input),
    type: RateType.RATIO_DISCOUNTED,
    ratio_discount_boundaries: {
      min_ratio: input.boundaries.min_ratio,
      max_ratio: input.boundaries.max_ratio,
    },
    union_discount: false,
  });
  return Object.freeze(set);
}

export function createUnionDiscountedRate(input: CommonInput): UnionDiscountedRateSet {
  const set = UnionDiscountedRateSetSchema.parse({
    ...common(input),
    type: RateType.UNION_DISCOUNTED,
    union_discount: true,
  });
  return Object.freeze(set);
}

/**
 * Natural key used for idempotent upserts
 */
export function interestSetKey(set: InterestSet): string {
  const base = `${set.bank}|${set.type}|${set.term}`;
  switch (set.type) {
    case RateType.LIST:
      return `${base}|${set.changed_on ?? "-"}`;
    case RateType.AVERAGE:
      return `${base}|${set.average_reference_month.year}-${set.average_reference_month.month}`;
    case RateType.RATIO_DISCOUNTED:
      return `${base}|${set.ratio_discount_boundaries.min_ratio}-${set.ratio_discount_boundaries.max_ratio}`;
    case RateType.UNION_DISCOUNTED:
      return base;
  }
}
