// search/os-types.ts
export interface RangeBucket {
  key?: string;
  /** missing when unbounded below */
  from?: number | null;
  /** missing when unbounded above */
  to?: number | null;
  doc_count: number;
}

export interface RangeAggRange {
  from?: number;
  to?: number;
}

export interface ProductIndexMapping {
  properties: {
    name: { type: "text" };
    price: { type: "scaled_float"; scaling_factor: number };
    category: { type: "keyword" };
  };
}
