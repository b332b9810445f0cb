// packages/tracker/src/entities/company.ts
import { z } from "zod";
import {
  readInteger,
  readNullableText,
  readText,
  type EntityDefinition,
  type ListQuery,
  type TemporalRecord,
} from "@company-tracker/temporal";

import { CompanyIdSchema, nullish, PageSchema, parseWith, PercentageSchema } from "./fields.js";

export const CompanyKeySchema = z.object({
  company_id: CompanyIdSchema,
});

export const CompanyDataSchema = z.object({
  company_name: z.string().trim().min(1).max(255),
  percentage_a: nullish(PercentageSchema),
  percentage_b: nullish(PercentageSchema),
  percentage_c: nullish(PercentageSchema),
});

export const CompanyFiltersSchema = PageSchema.extend({
  name_contains: z.string().optional(),
});

export type CompanyKey = z.infer<typeof CompanyKeySchema>;
export type CompanyData = z.infer<typeof CompanyDataSchema>;
export type CompanyRecord = TemporalRecord<CompanyKey, CompanyData>;

export const companyEntity: EntityDefinition<CompanyKey, CompanyData> = {
  kind: "company",
  table: "companies_history",
  currentView: "companies_current",
  indexPrefix: "idx_companies",

  key: [{ name: "company_id", kind: "integer", nullable: false }],
  data: [
    { name: "company_name", kind: "text", nullable: false },
    { name: "percentage_a", kind: "decimal", nullable: true, scale: 4 },
    { name: "percentage_b", kind: "decimal", nullable: true, scale: 4 },
    { name: "percentage_c", kind: "decimal", nullable: true, scale: 4 },
  ],

  orderBy: "company_name ASC",
  searchColumn: "company_name",

  readKey: (row) => ({ company_id: readInteger(row, "company_id") }),
  readData: (row) => ({
    company_name: readText(row, "company_name"),
    percentage_a: readNullableText(row, "percentage_a"),
    percentage_b: readNullableText(row, "percentage_b"),
    percentage_c: readNullableText(row, "percentage_c"),
  }),
};

export const parseCompanyKey = parseWith(CompanyKeySchema, "company key");
export const parseCompanyData = parseWith(CompanyDataSchema, "company data");

export function parseCompanyFilters(input: unknown): ListQuery<CompanyKey, CompanyData> {
  const f = parseWith(CompanyFiltersSchema, "company filters")(input);
  return { limit: f.limit, offset: f.offset, search: f.name_contains };
}
