import {
  comparePrices,
  priceRangeBucket,
  samePrice,
  toPrice,
} from "./price-range-bucket";
import { InvalidPriceRangeArgumentException } from "./price-range.errors";

describe("price helpers", () => {
  it("stores numbers with two fraction digits", () => {
    expect(toPrice(80).toString()).toBe("80.00");
    expect(toPrice(0.1 + 0.2).toString()).toBe("0.30");
    expect(toPrice(-5).toString()).toBe("-5.00");
  });

  it("keeps decimal strings as written", () => {
    expect(toPrice("12.5").toString()).toBe("12.5");
    expect(toPrice(" 78.60 ").toString()).toBe("78.60");
  });

  it("rejects non-finite numbers and malformed strings", () => {
    expect(() => toPrice(Number.POSITIVE_INFINITY)).toThrow(
      InvalidPriceRangeArgumentException,
    );
    expect(() => toPrice(Number.NaN)).toThrow(InvalidPriceRangeArgumentException);
    expect(() => toPrice("12,50")).toThrow('Malformed price "12,50"');
  });

  it("compares prices exactly whatever their scale", () => {
    expect(comparePrices(toPrice("80.0"), toPrice(80))).toBe(0);
    expect(comparePrices(toPrice("79.99"), toPrice("80"))).toBe(-1);
    expect(comparePrices(toPrice("100"), toPrice("99.999"))).toBe(1);
    expect(comparePrices(toPrice(-1), toPrice("0.5"))).toBe(-1);
  });

  it("treats two missing bounds as the same", () => {
    expect(samePrice(undefined, undefined)).toBe(true);
    expect(samePrice(toPrice(1), undefined)).toBe(false);
    expect(samePrice(toPrice("1.0"), toPrice("1"))).toBe(true);
  });

  it("leaves unbounded edges out of the bucket", () => {
    const b = priceRangeBucket(undefined, toPrice(10), 3);
    expect("from" in b).toBe(false);
    expect(b.to?.toString()).toBe("10.00");
    expect(b.docCount).toBe(3);
  });
});
