// scripts/seed-products.ts
import "reflect-metadata";
import { readFileSync } from "fs";
import { join } from "path";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { plainToInstance } from "class-transformer";
import { validateOrReject } from "class-validator";
import { AppModule } from "../src/app.module";
import { ProductsService } from "../src/products/products.service";
import { CreateProductDto } from "../src/products/dto/create-product.dto";

/** Replaces the stored catalog with the sample one and rebuilds the products index. */
async function main() {
  const app = await NestFactory.createApplicationContext(AppModule);
  const logger = new Logger("SeedProducts");

  try {
    const raw: unknown = JSON.parse(
      readFileSync(join(__dirname, "sample-products.json"), "utf8"),
    );
    if (!Array.isArray(raw))
      throw new Error("sample-products.json must hold an array");
    const items: unknown[] = raw;

    const dtos: CreateProductDto[] = [];
    for (const item of items) {
      const dto = plainToInstance(CreateProductDto, item);
      await validateOrReject(dto, { whitelist: true });
      dtos.push(dto);
    }

    // reruns replace the catalog instead of duplicating it
    const products = app.get(ProductsService);
    await products.clear();
    for (const dto of dtos) await products.create(dto);
    logger.log(`Created ${items.length} products`);

    const { indexed } = await products.reindexAll();
    logger.log(`Done. ${indexed} products indexed`);
  } finally {
    await app.close();
  }
}

main().catch((err: unknown) => {
  Logger.error(err instanceof Error ? err.stack : String(err), "SeedProducts");
  process.exit(1);
});
