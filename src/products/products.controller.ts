// products.controller.ts
import {
  Body,
  Controller,
  HttpCode,
  Post,
  UsePipes,
  ValidationPipe,
} from "@nestjs/common";
import { ProductsService } from "./products.service";
import { CreateProductDto } from "./dto/create-product.dto";
import {
  ProductResponseDto,
  ReindexResponseDto,
} from "./dto/product.response.dto";

@Controller("products")
@UsePipes(new ValidationPipe({ whitelist: true, transform: true }))
export class ProductsController {
  constructor(private readonly svc: ProductsService) {}

  @Post()
  async create(@Body() dto: CreateProductDto): Promise<ProductResponseDto> {
    return this.svc.create(dto);
  }

  @Post("reindex")
  @HttpCode(200)
  async reindex(): Promise<ReindexResponseDto> {
    return this.svc.reindexAll();
  }
}
