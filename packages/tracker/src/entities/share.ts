// packages/tracker/src/entities/share.ts
import { z } from "zod";
import {
  readInteger,
  readNullableText,
  readText,
  type EntityDefinition,
  type ListQuery,
  type TemporalRecord,
} from "@company-tracker/temporal";

import {
  CompanyIdSchema,
  CountryCodeSchema,
  nullish,
  PageSchema,
  parseWith,
  PercentageSchema,
  ProductClassIdSchema,
} from "./fields.js";

export const ShareKeySchema = z.object({
  company_id: CompanyIdSchema,
  country_code: CountryCodeSchema,
  product_class_3_id: ProductClassIdSchema,
});

export const ShareDataSchema = z.object({
  share_percentage: nullish(PercentageSchema),
});

export const ShareFiltersSchema = PageSchema.extend({
  company_id: CompanyIdSchema.optional(),
  country_code: CountryCodeSchema.optional(),
  product_class_3_id: ProductClassIdSchema.optional(),
});

export const MarketShareFiltersSchema = z.object({
  country_code: CountryCodeSchema.optional(),
  product_class_3_id: ProductClassIdSchema.optional(),
});

export type ShareKey = z.infer<typeof ShareKeySchema>;
export type ShareData = z.infer<typeof ShareDataSchema>;
export type ShareRecord = TemporalRecord<ShareKey, ShareData>;
export type MarketShareFilters = z.infer<typeof MarketShareFiltersSchema>;

export const shareEntity: EntityDefinition<ShareKey, ShareData> = {
  kind: "share",
  table: "product_shares_history",
  currentView: "product_shares_current",
  indexPrefix: "idx_shares",

  key: [
    { name: "company_id", kind: "integer", nullable: false },
    { name: "country_code", kind: "text", nullable: false },
    { name: "product_class_3_id", kind: "integer", nullable: false },
  ],
  data: [{ name: "share_percentage", kind: "decimal", nullable: true, scale: 4 }],

  orderBy: "company_id ASC, country_code ASC, product_class_3_id ASC",

  readKey: (row) => ({
    company_id: readInteger(row, "company_id"),
    country_code: readText(row, "country_code"),
    product_class_3_id: readInteger(row, "product_class_3_id"),
  }),
  readData: (row) => ({
    share_percentage: readNullableText(row, "share_percentage"),
  }),
};

export const parseShareKey = parseWith(ShareKeySchema, "share key");
export const parseShareData = parseWith(ShareDataSchema, "share data");
export const parseMarketShareFilters = parseWith(MarketShareFiltersSchema, "report filters");

export function parseShareFilters(input: unknown): ListQuery<ShareKey, ShareData> {
  const f = parseWith(ShareFiltersSchema, "share filters")(input);
  return {
    limit: f.limit,
    offset: f.offset,
    equals: {
      company_id: f.company_id,
      country_code: f.country_code,
      product_class_3_id: f.product_class_3_id,
    },
  };
}
