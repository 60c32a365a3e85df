// price-range/price-range-bucket.ts
import { Types } from "mongoose";
import { InvalidPriceRangeArgumentException } from "./price-range.errors";

/** Fraction digits kept for prices (the index stores them as scaled_float x100). */
export const PRICE_SCALE = 2;

export type Price = Types.Decimal128;

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d*))?(?:E([+-]?\d+))?$/i;

/**
 * One price range `[from, to)` and the number of documents inside it.
 * A missing `from` means unbounded below, a missing `to` unbounded above.
 */
export interface PriceRangeBucket {
  readonly from?: Price;
  readonly to?: Price;
  readonly docCount: number;
}

export function priceRangeBucket(
  from: Price | undefined,
  to: Price | undefined,
  docCount: number,
): PriceRangeBucket {
  return {
    ...(from !== undefined ? { from } : {}),
    ...(to !== undefined ? { to } : {}),
    docCount,
  };
}

export function toPrice(value: number | string): Price {
  if (typeof value === "number") {
    if (!Number.isFinite(value))
      throw new InvalidPriceRangeArgumentException(
        `Price must be finite, got ${value}`,
      );
    return Types.Decimal128.fromString(value.toFixed(PRICE_SCALE));
  }
  if (!DECIMAL_PATTERN.test(value.trim()))
    throw new InvalidPriceRangeArgumentException(`Malformed price "${value}"`);
  return Types.Decimal128.fromString(value.trim());
}

type ScaledDecimal = { digits: bigint; exponent: number };

function toScaled(price: Price): ScaledDecimal {
  const text = price.toString();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match)
    throw new InvalidPriceRangeArgumentException(`Unsupported price ${text}`);
  const [, sign, whole, fraction = "", exponent = "0"] = match;
  const digits = BigInt(`${whole}${fraction}`);
  return {
    digits: sign === "-" ? -digits : digits,
    exponent: Number(exponent) - fraction.length,
  };
}

/** Exact comparison, independent of how many fraction digits each side carries. */
export function comparePrices(a: Price, b: Price): number {
  const left = toScaled(a);
  const right = toScaled(b);
  const exponent = Math.min(left.exponent, right.exponent);
  const l = left.digits * 10n ** BigInt(left.exponent - exponent);
  const r = right.digits * 10n ** BigInt(right.exponent - exponent);
  return l < r ? -1 : l > r ? 1 : 0;
}

export function samePrice(a: Price | undefined, b: Price | undefined) {
  if (a === undefined || b === undefined) return a === b;
  return comparePrices(a, b) === 0;
}
