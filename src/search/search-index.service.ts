// search/search-index.service.ts
import { Inject, Injectable, Logger } from "@nestjs/common";
import { Client } from "@opensearch-project/opensearch";
import { OPENSEARCH_CLIENT, PRODUCTS_INDEX } from "./opensearch.module";
import { ProductIndexDoc, PRODUCTS_MAPPING } from "./types/index-mapper";

@Injectable()
export class SearchIndexService {
  private readonly logger = new Logger(SearchIndexService.name);

  constructor(
    @Inject(OPENSEARCH_CLIENT) private readonly os: Client,
    @Inject(PRODUCTS_INDEX) private readonly index: string,
  ) {}

  /** Drops the products index (if any) and creates it again with a fresh mapping. */
  async recreateProductsIndex(): Promise<void> {
    const exists = await this.os.indices.exists({ index: this.index });
    if (exists.body) {
      this.logger.log(`Deleting index ${this.index}`);
      await this.os.indices.delete({ index: this.index });
    }

    this.logger.log(`Creating index ${this.index}`);
    await this.os.indices.create({
      index: this.index,
      body: { mappings: PRODUCTS_MAPPING },
    });
  }

  async indexProduct(doc: ProductIndexDoc): Promise<void> {
    await this.os.index({
      index: this.index,
      id: doc.productId,
      body: doc,
      refresh: true, // price facets must see the product right away
    });
  }
}
