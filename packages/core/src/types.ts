import type { RateType, Term } from "./enums.js";

/**
 * A calendar month, not a specific day
 */
export type AvgMonth = {
  year: number;
  month: number; // 1-12
};

/**
 * Loan-to-value bracket in percent, e.g. 60-75
 */
export type RatioDiscountBoundaries = {
  min_ratio: number;
  max_ratio: number;
};

type InterestSetBase = {
  bank: string;
  term: Term;
  nominal_rate: number;
  last_crawled_at: string; // ISO 8601
};

export type ListRateSet = InterestSetBase & {
  type: RateType.LIST;
  changed_on?: string; // YYYY-MM-DD
  union_discount: false;
};

export type AverageRateSet = InterestSetBase & {
  type: RateType.AVERAGE;
  average_reference_month: AvgMonth;
  union_discount: false;
};

export type RatioDiscountedRateSet = InterestSetBase & {
  type: RateType.RATIO_DISCOUNTED;
  ratio_discount_boundaries: RatioDiscountBoundaries;
  union_discount: false;
};

export type UnionDiscountedRateSet = InterestSetBase & {
  type: RateType.UNION_DISCOUNTED;
  union_discount: true;
};

/**
 * One observed rate. Optional fields are gated by `type`.
 */
export type InterestSet =
  | ListRateSet
  | AverageRateSet
  | RatioDiscountedRateSet
  | UnionDiscountedRateSet;

export type InterestSetsDataset = {
  generated_at: string;
  interest_sets: InterestSet[];
};
