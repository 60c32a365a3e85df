// search/helper/opensearch-range.adapter.ts
import { Logger } from "@nestjs/common";
import {
  PriceRangeBucket,
  priceRangeBucket,
  toPrice,
} from "../../price-range/price-range-bucket";
import { InvalidPriceRangeArgumentException } from "../../price-range/price-range.errors";
import { RangeAggRange, RangeBucket } from "../types/os-types";

const logger = new Logger("OpenSearchRangeAdapter");

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function optionalNumber(v: unknown): number | null | undefined {
  if (v === undefined || v === null) return v;
  return typeof v === "number" ? v : Number(v);
}

/**
 * Pulls the buckets of a (non-keyed) range aggregation out of a raw search
 * response body. Anything that does not look like a bucket is skipped with a
 * warning.
 */
export function readRangeBuckets(body: unknown, aggName: string): RangeBucket[] {
  if (!isRecord(body) || !isRecord(body.aggregations)) return [];
  const agg = body.aggregations[aggName];
  if (!isRecord(agg) || !Array.isArray(agg.buckets)) return [];

  const items: unknown[] = agg.buckets;
  const buckets: RangeBucket[] = [];
  items.forEach((raw, i) => {
    if (!isRecord(raw) || typeof raw.doc_count !== "number") {
      logger.warn(`Skipping ${aggName} bucket ${i}: no numeric doc_count`);
      return;
    }
    buckets.push({
      key: typeof raw.key === "string" ? raw.key : undefined,
      from: optionalNumber(raw.from),
      to: optionalNumber(raw.to),
      doc_count: raw.doc_count,
    });
  });
  return buckets;
}

/** percentile -> value map of a keyed percentiles aggregation */
export function readPercentiles(
  body: unknown,
  aggName: string,
): Record<string, number | null> {
  if (!isRecord(body) || !isRecord(body.aggregations)) return {};
  const agg = body.aggregations[aggName];
  if (!isRecord(agg) || !isRecord(agg.values)) return {};

  const values: Record<string, number | null> = {};
  for (const [percent, value] of Object.entries(agg.values)) {
    values[percent] = typeof value === "number" ? value : null;
  }
  return values;
}

export function readTotalHits(body: unknown): number {
  if (!isRecord(body) || !isRecord(body.hits)) return 0;
  const total = body.hits.total;
  if (typeof total === "number") return total;
  return isRecord(total) && typeof total.value === "number" ? total.value : 0;
}

// unbounded edges come back missing in JSON, or as +/-Infinity from some clients
function toBound(v: number | null | undefined) {
  return v == null || !Number.isFinite(v) ? undefined : toPrice(v);
}

export function fromOpenSearchRangeBuckets(
  buckets: readonly RangeBucket[],
): PriceRangeBucket[] {
  return buckets.map((b) =>
    priceRangeBucket(toBound(b.from), toBound(b.to), b.doc_count),
  );
}

/** `[10, 20]` -> `[{ to: 10 }, { from: 10, to: 20 }, { from: 20 }]` */
export function toOpenSearchRanges(edges: readonly number[]): RangeAggRange[] {
  if (edges.length === 0)
    throw new InvalidPriceRangeArgumentException(
      "At least one price edge is required",
    );
  edges.forEach((e, i) => {
    if (!Number.isFinite(e))
      throw new InvalidPriceRangeArgumentException(`Price edge ${e} is not finite`);
    if (i > 0 && e <= edges[i - 1])
      throw new InvalidPriceRangeArgumentException(
        "Price edges must be strictly ascending",
      );
  });

  const ranges: RangeAggRange[] = [{ to: edges[0] }];
  for (let i = 1; i < edges.length; i++) {
    ranges.push({ from: edges[i - 1], to: edges[i] });
  }
  ranges.push({ from: edges[edges.length - 1] });
  return ranges;
}
