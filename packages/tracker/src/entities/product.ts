// packages/tracker/src/entities/product.ts
import { z } from "zod";
import {
  readInteger,
  readNullableText,
  type EntityDefinition,
  type ListQuery,
  type TemporalRecord,
} from "@company-tracker/temporal";

import { LabelSchema, nullish, PageSchema, parseWith, ProductClassIdSchema } from "./fields.js";

export const ProductKeySchema = z.object({
  product_class_3_id: ProductClassIdSchema,
});

export const ProductDataSchema = z.object({
  class_level_1: nullish(LabelSchema),
  class_level_2: nullish(LabelSchema),
  class_level_3: nullish(LabelSchema),
});

export const ProductFiltersSchema = PageSchema.extend({
  class_level_1: LabelSchema.optional(),
  class_level_2: LabelSchema.optional(),
  name_contains: z.string().optional(),
});

export type ProductKey = z.infer<typeof ProductKeySchema>;
export type ProductData = z.infer<typeof ProductDataSchema>;
export type ProductRecord = TemporalRecord<ProductKey, ProductData>;

// classification tree: level 1 > level 2 > level 3 (the leaf carries the id)
export const productEntity: EntityDefinition<ProductKey, ProductData> = {
  kind: "product",
  table: "product_hierarchy_history",
  currentView: "product_hierarchy_current",
  indexPrefix: "idx_product",

  key: [{ name: "product_class_3_id", kind: "integer", nullable: false }],
  data: [
    { name: "class_level_1", kind: "text", nullable: true },
    { name: "class_level_2", kind: "text", nullable: true },
    { name: "class_level_3", kind: "text", nullable: true },
  ],

  orderBy: "class_level_1 ASC, class_level_2 ASC, class_level_3 ASC",
  searchColumn: "class_level_3",

  readKey: (row) => ({ product_class_3_id: readInteger(row, "product_class_3_id") }),
  readData: (row) => ({
    class_level_1: readNullableText(row, "class_level_1"),
    class_level_2: readNullableText(row, "class_level_2"),
    class_level_3: readNullableText(row, "class_level_3"),
  }),
};

export const parseProductKey = parseWith(ProductKeySchema, "product key");
export const parseProductData = parseWith(ProductDataSchema, "product data");

export function parseProductFilters(input: unknown): ListQuery<ProductKey, ProductData> {
  const f = parseWith(ProductFiltersSchema, "product filters")(input);
  return {
    limit: f.limit,
    offset: f.offset,
    equals: { class_level_1: f.class_level_1, class_level_2: f.class_level_2 },
    search: f.name_contains,
  };
}
