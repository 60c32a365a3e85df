// src/search/dto/price-range.query.dto.ts
import {
  IsArray,
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
} from "class-validator";
import { Transform, Type } from "class-transformer";
import { PRICE_RANGE_STRATEGIES, PriceRangeStrategy } from "../types/types";

export class PriceRangeQueryDto {
  @IsOptional() @IsString() q?: string;
  @IsOptional() @IsString() category?: string;

  @IsOptional()
  @IsIn(PRICE_RANGE_STRATEGIES)
  strategy?: PriceRangeStrategy = "collapsed";

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(20)
  buckets?: number = 3;

  // "100,200,500"
  @IsOptional()
  @Transform(({ value }: { value: unknown }) =>
    typeof value === "string"
      ? value
          .split(",")
          .filter((v) => v.trim() !== "")
          .map(Number)
      : value,
  )
  @IsArray()
  @IsNumber({ allowNaN: false, allowInfinity: false }, { each: true })
  edges?: number[];
}
