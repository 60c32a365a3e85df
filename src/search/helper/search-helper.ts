import { ProductFilters } from "../types/types";

/** Product query shared by every price range strategy. */
export function buildProductQuery(filters: ProductFilters): object {
  const filter: object[] = [];
  if (filters.category) filter.push({ term: { category: filters.category } });

  const q = (filters.q ?? "").trim();
  const must: object[] = q
    ? [
        {
          multi_match: {
            query: q,
            fields: ["name^3", "category"],
            type: "best_fields",
            fuzziness: "AUTO",
          },
        },
      ]
    : [{ match_all: {} }];

  return { bool: { must, filter } };
}
