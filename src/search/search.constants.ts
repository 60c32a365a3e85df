// search/search.constants.ts
import defaultPriceEdges from "../price-range/default-price-edges.json";

export const PRICE_RANGES_AGG = "price_ranges";
export const PRICE_PERCENTILES_AGG = "price_percentiles";

/** Granular edges (40 buckets) used before collapsing and as static fallback. */
export const DEFAULT_PRICE_EDGES: readonly number[] = defaultPriceEdges.edges;

/** Below this many distinct percentile edges a price facet is not worth showing. */
export const MIN_PERCENTILE_EDGES = 2;
