// search.controller.ts
import {
  Controller,
  Get,
  Query,
  UsePipes,
  ValidationPipe,
} from "@nestjs/common";
import { PriceRangeSearchService } from "./price-range-search.service";
import { PriceRangeQueryDto } from "./dto/price-range.query.dto";
import { PriceRangesResponseDto } from "./dto/price-ranges.response.dto";

@Controller("search")
@UsePipes(new ValidationPipe({ whitelist: true, transform: true }))
export class SearchController {
  constructor(private readonly search: PriceRangeSearchService) {}

  @Get("price-ranges")
  async priceRanges(
    @Query() query: PriceRangeQueryDto,
  ): Promise<PriceRangesResponseDto> {
    return this.search.priceRanges({
      q: query.q,
      category: query.category,
      strategy: query.strategy ?? "collapsed",
      buckets: query.buckets ?? 3,
      edges: query.edges,
    });
  }
}
