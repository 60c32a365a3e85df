import { Test, TestingModule } from "@nestjs/testing";
import { getModelToken } from "@nestjs/mongoose";
import { Types } from "mongoose";
import { ProductsService } from "./products.service";
import { Product } from "./schemas/product.schema";
import { SearchIndexService } from "../search/search-index.service";
import { CreateProductDto } from "./dto/create-product.dto";

describe("ProductsService", () => {
  let service: ProductsService;

  const id = new Types.ObjectId("64b7f0c2a1b2c3d4e5f60718");
  const query = { select: jest.fn(), lean: jest.fn(), exec: jest.fn() };
  const productModel = {
    create: jest.fn(),
    find: jest.fn(),
    deleteMany: jest.fn(),
  };
  const searchIndex = {
    indexProduct: jest.fn(),
    recreateProductsIndex: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    query.select.mockReturnValue(query);
    query.lean.mockReturnValue(query);
    productModel.find.mockReturnValue(query);
    productModel.deleteMany.mockReturnValue(query);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ProductsService,
        { provide: getModelToken(Product.name), useValue: productModel },
        { provide: SearchIndexService, useValue: searchIndex },
      ],
    }).compile();

    service = module.get<ProductsService>(ProductsService);
  });

  it("stores the price as an exact decimal and indexes the product", async () => {
    productModel.create.mockImplementation((doc: object) =>
      Promise.resolve({ _id: id, ...doc }),
    );
    const dto = Object.assign(new CreateProductDto(), {
      name: "Trail Hydration Pack",
      category: "Luggage",
      price: "74.90",
    });

    const res = await service.create(dto);

    const [stored] = productModel.create.mock.calls[0];
    expect(stored.price).toBeInstanceOf(Types.Decimal128);
    expect(stored.price.toString()).toBe("74.90");
    expect(searchIndex.indexProduct).toHaveBeenCalledWith({
      productId: "64b7f0c2a1b2c3d4e5f60718",
      name: "Trail Hydration Pack",
      category: "Luggage",
      price: 74.9,
    });
    expect(res).toEqual({
      _id: "64b7f0c2a1b2c3d4e5f60718",
      name: "Trail Hydration Pack",
      category: "Luggage",
      price: "74.90",
    });
  });

  it("recreates the index before reindexing every stored product", async () => {
    const other = new Types.ObjectId("64b7f0c2a1b2c3d4e5f60719");
    query.exec.mockResolvedValueOnce([
      { _id: id, name: "Day Pack", category: "Luggage", price: Types.Decimal128.fromString("24.90") },
      { _id: other, name: "Weekender", category: "Luggage", price: Types.Decimal128.fromString("389.00") },
    ]);

    await expect(service.reindexAll()).resolves.toEqual({ indexed: 2 });

    expect(productModel.find).toHaveBeenCalledWith({});
    expect(searchIndex.indexProduct).toHaveBeenNthCalledWith(2, {
      productId: "64b7f0c2a1b2c3d4e5f60719",
      name: "Weekender",
      category: "Luggage",
      price: 389,
    });
    expect(
      searchIndex.recreateProductsIndex.mock.invocationCallOrder[0],
    ).toBeLessThan(searchIndex.indexProduct.mock.invocationCallOrder[0]);
  });

  it("deletes every stored product and reports how many went", async () => {
    query.exec.mockResolvedValueOnce({ acknowledged: true, deletedCount: 9 });

    await expect(service.clear()).resolves.toBe(9);

    expect(productModel.deleteMany).toHaveBeenCalledWith({});
    expect(searchIndex.indexProduct).not.toHaveBeenCalled();
  });
});
