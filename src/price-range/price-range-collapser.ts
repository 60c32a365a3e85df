// price-range/price-range-collapser.ts
import {
  comparePrices,
  PriceRangeBucket,
  priceRangeBucket,
  samePrice,
} from "./price-range-bucket";
import {
  EmptyPriceDistributionException,
  InvalidPriceRangeArgumentException,
} from "./price-range.errors";

/**
 * Collapses a granular, contiguous price histogram into at most `targetCount`
 * buckets.
 *
 * Empty buckets are dropped first. Each pass then walks the sequence in
 * triples `(lower, middle, upper)` and folds `middle` into whichever
 * neighbour gives the smaller combined count, preferring `upper` on a tie.
 * The scan stops as soon as the target is reached. Finally the outer bounds
 * are opened and every inner `from` is realigned to the previous `to`.
 *
 * The input is never modified.
 */
export function collapsePriceRangeBuckets(
  buckets: readonly PriceRangeBucket[],
  targetCount: number,
): PriceRangeBucket[] {
  if (!Number.isInteger(targetCount) || targetCount < 1) {
    throw new InvalidPriceRangeArgumentException(
      `Target bucket count must be a positive integer, got ${targetCount}`,
    );
  }
  assertContiguous(buckets);

  let collapsed = buckets.filter((b) => b.docCount > 0);
  if (collapsed.length === 0) throw new EmptyPriceDistributionException();

  while (collapsed.length > targetCount) {
    collapsed = collapsePass(collapsed, targetCount);
  }

  return openOuterBounds(collapsed);
}

function collapsePass(
  buckets: readonly PriceRangeBucket[],
  targetCount: number,
): PriceRangeBucket[] {
  // no triple to scan: only reachable with two buckets and a target of one
  if (buckets.length < 3) return [mergeBuckets(buckets[0], buckets[1])];

  const next: PriceRangeBucket[] = [];
  let cursor = 0;
  while (
    cursor + 2 < buckets.length &&
    next.length + (buckets.length - cursor) > targetCount
  ) {
    const lower = buckets[cursor];
    const middle = buckets[cursor + 1];
    const upper = buckets[cursor + 2];

    if (lower.docCount + middle.docCount < middle.docCount + upper.docCount) {
      next.push(mergeBuckets(lower, middle), upper);
    } else {
      next.push(lower, mergeBuckets(middle, upper));
    }
    cursor += 3;
  }

  return [...next, ...buckets.slice(cursor)];
}

function mergeBuckets(
  lower: PriceRangeBucket,
  upper: PriceRangeBucket,
): PriceRangeBucket {
  return priceRangeBucket(
    lower.from,
    upper.to,
    lower.docCount + upper.docCount,
  );
}

function openOuterBounds(
  buckets: readonly PriceRangeBucket[],
): PriceRangeBucket[] {
  const last = buckets.length - 1;
  return buckets.map((b, i) =>
    priceRangeBucket(
      i === 0 ? undefined : buckets[i - 1].to,
      i === last ? undefined : b.to,
      b.docCount,
    ),
  );
}

function assertContiguous(buckets: readonly PriceRangeBucket[]) {
  buckets.forEach((b, i) => {
    if (!Number.isInteger(b.docCount) || b.docCount < 0) {
      throw new InvalidPriceRangeArgumentException(
        `Bucket ${i} has an invalid document count ${b.docCount}`,
      );
    }
    if (b.from && b.to && comparePrices(b.from, b.to) > 0) {
      throw new InvalidPriceRangeArgumentException(
        `Bucket ${i} starts at ${b.from.toString()} after its end ${b.to.toString()}`,
      );
    }
    const prev = i > 0 ? buckets[i - 1] : undefined;
    if (prev?.to && b.from && !samePrice(prev.to, b.from)) {
      throw new InvalidPriceRangeArgumentException(
        `Bucket ${i} starts at ${b.from.toString()} but bucket ${i - 1} ends at ${prev.to.toString()}`,
      );
    }
  });
}
