// price-range/percentile-edges.ts

/** Percents that split a distribution into `targetCount` equally sized slices. */
export function percentilesFor(targetCount: number): number[] {
  const percents: number[] = [];
  for (let i = 1; i < targetCount; i++) {
    percents.push(Math.round((i * 10_000) / targetCount) / 100);
  }
  return percents;
}

/**
 * Turns the values of a percentiles aggregation into range edges: each price
 * is rounded to the nearest `roundTo`, then duplicates are dropped.
 * OpenSearch reports `null` for a percentile of an empty result set.
 */
export function percentileEdges(
  values: Record<string, number | null>,
  roundTo = 10,
): number[] {
  const rounded = Object.entries(values)
    .sort(([a], [b]) => Number(a) - Number(b))
    .map(([, v]) => v)
    .filter((v): v is number => v != null && Number.isFinite(v))
    .map((v) => Math.round(v / roundTo) * roundTo);

  return Array.from(new Set(rounded)).sort((a, b) => a - b);
}
