// Enums
export { BankId, BankNames, BankUrls, Term, RateType } from "./enums.js";

// Types
export type {
  AvgMonth,
  RatioDiscountBoundaries,
  ListRateSet,
  AverageRateSet,
  RatioDiscountedRateSet,
  UnionDiscountedRateSet,
  InterestSet,
  InterestSetsDataset,
} from "./types.js";

// Zod Schemas
export {
  BankIdSchema,
  TermSchema,
  RateTypeSchema,
  AvgMonthSchema,
  RatioDiscountBoundariesSchema,
  ListRateSetSchema,
  AverageRateSetSchema,
  RatioDiscountedRateSetSchema,
  UnionDiscountedRateSetSchema,
  InterestSetSchema,
  InterestSetsDatasetSchema,
} from "./schemas.js";

// Factories
export {
  createListRate,
  createAverageRate,
  createRatioDiscountedRate,
  createUnionDiscountedRate,
  interestSetKey,
} from "./factories.js";
