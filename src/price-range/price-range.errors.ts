// price-range/price-range.errors.ts
import {
  BadRequestException,
  UnprocessableEntityException,
} from "@nestjs/common";

/** Bad target count, malformed price or a bucket sequence that is not contiguous. */
export class InvalidPriceRangeArgumentException extends BadRequestException {
  constructor(message: string) {
    super(message);
    this.name = "InvalidPriceRangeArgumentException";
  }
}

/** Every bucket had a zero count, so there is no price distribution to show. */
export class EmptyPriceDistributionException extends UnprocessableEntityException {
  constructor(message = "No price range bucket holds any document") {
    super(message);
    this.name = "EmptyPriceDistributionException";
  }
}
