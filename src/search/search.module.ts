// search/search.module.ts
import { Module } from "@nestjs/common";
import { OpenSearchModule } from "./opensearch.module";
import { PriceRangeSearchService } from "./price-range-search.service";
import { SearchIndexService } from "./search-index.service";
import { SearchController } from "./search.controller";

@Module({
  imports: [OpenSearchModule],
  providers: [PriceRangeSearchService, SearchIndexService],
  controllers: [SearchController],
  exports: [PriceRangeSearchService, SearchIndexService],
})
export class SearchModule {}
