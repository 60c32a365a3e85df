// search/price-range-search.service.ts
import { Inject, Injectable, Logger } from "@nestjs/common";
import { Client } from "@opensearch-project/opensearch";
import { OPENSEARCH_CLIENT, PRODUCTS_INDEX } from "./opensearch.module";
import {
  DEFAULT_PRICE_EDGES,
  MIN_PERCENTILE_EDGES,
  PRICE_PERCENTILES_AGG,
  PRICE_RANGES_AGG,
} from "./search.constants";
import {
  PriceRangeRequest,
  PriceRangesResponse,
  ProductFilters,
} from "./types/types";
import { buildProductQuery } from "./helper/search-helper";
import {
  fromOpenSearchRangeBuckets,
  readPercentiles,
  readRangeBuckets,
  readTotalHits,
  toOpenSearchRanges,
} from "./helper/opensearch-range.adapter";
import { collapsePriceRangeBuckets } from "../price-range/price-range-collapser";
import { PriceRangeBucket } from "../price-range/price-range-bucket";
import {
  percentileEdges,
  percentilesFor,
} from "../price-range/percentile-edges";
import { toPriceRangeBucketDto } from "../price-range/dto/price-range-bucket.dto";
import { InvalidPriceRangeArgumentException } from "../price-range/price-range.errors";

type RangeAggregationResult = { total: number; buckets: PriceRangeBucket[] };

@Injectable()
export class PriceRangeSearchService {
  private readonly logger = new Logger(PriceRangeSearchService.name);

  constructor(
    @Inject(OPENSEARCH_CLIENT) private readonly os: Client,
    @Inject(PRODUCTS_INDEX) private readonly index: string,
  ) {}

  async priceRanges(req: PriceRangeRequest): Promise<PriceRangesResponse> {
    switch (req.strategy) {
      case "static":
        return this.staticRanges(
          req,
          req.edges?.length ? req.edges : DEFAULT_PRICE_EDGES,
        );
      case "collapsed":
        return this.collapsedRanges(req, req.buckets);
      case "percentiles":
        return this.percentileRanges(req, req.buckets);
    }
  }

  /** Buckets exactly as requested; zero-count ranges included. */
  async staticRanges(
    filters: ProductFilters,
    edges: readonly number[],
  ): Promise<PriceRangesResponse> {
    const { total, buckets } = await this.rangeAggregation(filters, edges);
    return {
      strategy: "static",
      total,
      buckets: buckets.map(toPriceRangeBucketDto),
    };
  }

  /**
   * Aggregates over the granular default edges, then collapses the histogram
   * down to `targetCount` buckets.
   */
  async collapsedRanges(
    filters: ProductFilters,
    targetCount: number,
  ): Promise<PriceRangesResponse> {
    const { total, buckets } = await this.rangeAggregation(
      filters,
      DEFAULT_PRICE_EDGES,
    );
    const collapsed = collapsePriceRangeBuckets(buckets, targetCount);
    this.logger.debug(
      `Collapsed ${buckets.length} price buckets into ${collapsed.length} (total=${total})`,
    );
    return {
      strategy: "collapsed",
      total,
      buckets: collapsed.map(toPriceRangeBucketDto),
    };
  }

  /**
   * Two round trips: a percentiles aggregation picks the edges so that each
   * bucket holds a similar share of the result set, then a range aggregation
   * counts the documents per edge interval.
   */
  async percentileRanges(
    filters: ProductFilters,
    targetCount: number,
  ): Promise<PriceRangesResponse> {
    const percents = percentilesFor(targetCount);
    if (percents.length < MIN_PERCENTILE_EDGES) {
      throw new InvalidPriceRangeArgumentException(
        `Percentile price ranges need at least ${MIN_PERCENTILE_EDGES + 1} buckets, got ${targetCount}`,
      );
    }

    const res = await this.os.search({
      index: this.index,
      body: {
        size: 0, // hits are not needed, only the distribution
        track_total_hits: true,
        query: buildProductQuery(filters),
        aggs: {
          [PRICE_PERCENTILES_AGG]: {
            percentiles: { field: "price", percents },
          },
        },
      },
    });

    const edges = percentileEdges(readPercentiles(res.body, PRICE_PERCENTILES_AGG));
    if (edges.length < MIN_PERCENTILE_EDGES) {
      this.logger.debug(
        `Only ${edges.length} distinct percentile edges, skipping price ranges`,
      );
      return {
        strategy: "percentiles",
        total: readTotalHits(res.body),
        buckets: [],
      };
    }

    const { total, buckets } = await this.rangeAggregation(filters, edges);
    return {
      strategy: "percentiles",
      total,
      buckets: buckets.map(toPriceRangeBucketDto),
    };
  }

  private async rangeAggregation(
    filters: ProductFilters,
    edges: readonly number[],
  ): Promise<RangeAggregationResult> {
    const body = {
      size: 0,
      track_total_hits: true,
      query: buildProductQuery(filters),
      aggs: {
        [PRICE_RANGES_AGG]: {
          range: { field: "price", ranges: toOpenSearchRanges(edges) },
        },
      },
    };

    const res = await this.os.search({ index: this.index, body });
    const raw = readRangeBuckets(res.body, PRICE_RANGES_AGG);
    if (raw.length === 0) {
      this.logger.warn(
        `Search on ${this.index} returned no "${PRICE_RANGES_AGG}" buckets`,
      );
    }
    return {
      total: readTotalHits(res.body),
      buckets: fromOpenSearchRangeBuckets(raw),
    };
  }
}
