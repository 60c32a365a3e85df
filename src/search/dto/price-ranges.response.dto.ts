// src/search/dto/price-ranges.response.dto.ts
import { ApiProperty } from "@nestjs/swagger";
import { Expose } from "class-transformer";
import { PriceRangeBucketDto } from "../../price-range/dto/price-range-bucket.dto";
import { PRICE_RANGE_STRATEGIES, PriceRangeStrategy } from "../types/types";

export class PriceRangesResponseDto {
  @ApiProperty({ enum: PRICE_RANGE_STRATEGIES })
  @Expose()
  strategy!: PriceRangeStrategy;

  @ApiProperty() @Expose() total!: number;

  @ApiProperty({ type: [PriceRangeBucketDto] })
  @Expose()
  buckets!: PriceRangeBucketDto[];
}
