// packages/tracker/src/entities/metric.ts
import { z } from "zod";
import {
  readInteger,
  readNullableInteger,
  readNullableText,
  readText,
  type EntityDefinition,
  type ListQuery,
  type TemporalRecord,
} from "@company-tracker/temporal";

import {
  CompanyIdSchema,
  CountryCodeSchema,
  MoneySchema,
  nullish,
  PageSchema,
  parseWith,
  YearSchema,
  decimalSchema,
} from "./fields.js";

export const MetricKeySchema = z.object({
  company_id: CompanyIdSchema,
  country_code: CountryCodeSchema,
  year: YearSchema,
});

export const MetricDataSchema = z.object({
  revenue: nullish(decimalSchema({ scale: 2, min: "0" })),
  gross_profit: nullish(MoneySchema),
  headcount: nullish(z.number().int().min(0)),
});

export const MetricFiltersSchema = PageSchema.extend({
  company_id: CompanyIdSchema.optional(),
  country_code: CountryCodeSchema.optional(),
  year: YearSchema.optional(),
});

export type MetricKey = z.infer<typeof MetricKeySchema>;
export type MetricData = z.infer<typeof MetricDataSchema>;
export type MetricRecord = TemporalRecord<MetricKey, MetricData>;

export const metricEntity: EntityDefinition<MetricKey, MetricData> = {
  kind: "metric",
  table: "company_country_metrics_history",
  currentView: "company_country_metrics_current",
  indexPrefix: "idx_metrics",

  key: [
    { name: "company_id", kind: "integer", nullable: false },
    { name: "country_code", kind: "text", nullable: false },
    { name: "year", kind: "integer", nullable: false },
  ],
  data: [
    { name: "revenue", kind: "decimal", nullable: true, scale: 2 },
    { name: "gross_profit", kind: "decimal", nullable: true, scale: 2 },
    { name: "headcount", kind: "integer", nullable: true },
  ],

  orderBy: "company_id ASC, year DESC, country_code ASC",

  readKey: (row) => ({
    company_id: readInteger(row, "company_id"),
    country_code: readText(row, "country_code"),
    year: readInteger(row, "year"),
  }),
  readData: (row) => ({
    revenue: readNullableText(row, "revenue"),
    gross_profit: readNullableText(row, "gross_profit"),
    headcount: readNullableInteger(row, "headcount"),
  }),
};

export const parseMetricKey = parseWith(MetricKeySchema, "metric key");
export const parseMetricData = parseWith(MetricDataSchema, "metric data");

export function parseMetricFilters(input: unknown): ListQuery<MetricKey, MetricData> {
  const f = parseWith(MetricFiltersSchema, "metric filters")(input);
  return {
    limit: f.limit,
    offset: f.offset,
    equals: { company_id: f.company_id, country_code: f.country_code, year: f.year },
  };
}
