import { ProductDocument } from "../../products/schemas/product.schema";
import { ProductIndexMapping } from "./os-types";

// search/index-mapper.ts
export type ProductIndexDoc = {
  productId: string;
  name: string;
  category: string;
  /** scaled_float in the index; the decimal is sent as its JSON number */
  price: number;
};

export const PRODUCTS_MAPPING: ProductIndexMapping = {
  properties: {
    name: { type: "text" },
    price: { type: "scaled_float", scaling_factor: 100 },
    category: { type: "keyword" },
  },
};

type ProductLike = Pick<ProductDocument, "name" | "category" | "price"> & {
  _id: unknown;
};

export function mapProductForIndex(p: ProductLike): ProductIndexDoc {
  return {
    productId: String(p._id),
    name: p.name,
    category: p.category,
    price: Number(p.price.toString()),
  };
}
