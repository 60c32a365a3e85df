// search/types.ts
import { PriceRangeBucketDto } from "../../price-range/dto/price-range-bucket.dto";

export const PRICE_RANGE_STRATEGIES = [
  "static",
  "collapsed",
  "percentiles",
] as const;

export type PriceRangeStrategy = (typeof PRICE_RANGE_STRATEGIES)[number];

export type ProductFilters = {
  q?: string;
  category?: string;
};

export type PriceRangeRequest = ProductFilters & {
  strategy: PriceRangeStrategy;
  /** wanted number of buckets (collapsed / percentiles) */
  buckets: number;
  /** inner edges for the static strategy */
  edges?: number[];
};

export type PriceRangesResponse = {
  strategy: PriceRangeStrategy;
  total: number;
  buckets: PriceRangeBucketDto[];
};
