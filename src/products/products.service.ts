// products.service.ts
import { Injectable, Logger } from "@nestjs/common";
import { InjectModel } from "@nestjs/mongoose";
import { Model, Types } from "mongoose";
import { Product, ProductDocument } from "./schemas/product.schema";
import { CreateProductDto } from "./dto/create-product.dto";
import {
  ProductResponseDto,
  ReindexResponseDto,
} from "./dto/product.response.dto";
import { toPrice } from "../price-range/price-range-bucket";
import { SearchIndexService } from "../search/search-index.service";
import { mapProductForIndex } from "../search/types/index-mapper";

type ProductLean = {
  _id: Types.ObjectId;
  name: string;
  category: string;
  price: Types.Decimal128;
};

@Injectable()
export class ProductsService {
  private readonly logger = new Logger(ProductsService.name);

  constructor(
    @InjectModel(Product.name)
    private readonly productModel: Model<ProductDocument>,
    private readonly searchIndex: SearchIndexService,
  ) {}

  async create(dto: CreateProductDto): Promise<ProductResponseDto> {
    const doc = await this.productModel.create({
      name: dto.name,
      category: dto.category,
      price: toPrice(dto.price),
    });

    await this.searchIndex.indexProduct(mapProductForIndex(doc));
    return toProductResponse(doc);
  }

  /** Deletes every stored product. The search index is left to `reindexAll`. */
  async clear(): Promise<number> {
    const { deletedCount } = await this.productModel.deleteMany({}).exec();
    this.logger.log(`Deleted ${deletedCount} products`);
    return deletedCount;
  }

  /** Rebuilds the products index from MongoDB. */
  async reindexAll(): Promise<ReindexResponseDto> {
    await this.searchIndex.recreateProductsIndex();

    const rows = await this.productModel
      .find({})
      .select("_id name category price")
      .lean<ProductLean[]>()
      .exec();

    for (const p of rows) {
      await this.searchIndex.indexProduct(mapProductForIndex(p));
    }

    this.logger.log(`Reindexed ${rows.length} products`);
    return { indexed: rows.length };
  }
}

function toProductResponse(p: ProductLean | ProductDocument): ProductResponseDto {
  return {
    _id: String(p._id),
    name: p.name,
    category: p.category,
    price: p.price.toString(),
  };
}
