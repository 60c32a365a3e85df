// price-range/dto/price-range-bucket.dto.ts
import { ApiProperty } from "@nestjs/swagger";
import { Expose } from "class-transformer";
import { PriceRangeBucket } from "../price-range-bucket";

export class PriceRangeBucketDto {
  @ApiProperty({ type: String, nullable: true, example: "80.00" })
  @Expose()
  from!: string | null;

  @ApiProperty({ type: String, nullable: true, example: "250.00" })
  @Expose()
  to!: string | null;

  @ApiProperty() @Expose() docCount!: number;
}

export function toPriceRangeBucketDto(b: PriceRangeBucket): PriceRangeBucketDto {
  return {
    from: b.from ? b.from.toString() : null,
    to: b.to ? b.to.toString() : null,
    docCount: b.docCount,
  };
}
