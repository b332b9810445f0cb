// packages/tracker/src/reports.ts
import {
  addDecimal,
  compareDecimal,
  decimalToNumber,
  ZERO,
  type Decimal,
} from "@company-tracker/temporal";

import type { MarketShareFilters, ShareRecord } from "./entities/share.js";

export type MarketShareRow = {
  company_id: number;
  country_code: string;
  total_share: number;
  product_count: number;
};

type Group = {
  company_id: number;
  country_code: string;
  total: Decimal;
  products: Set<number>;
};

/**
 * Grouped totals over current share rows: SUM(share_percentage) and
 * COUNT(DISTINCT product) per (company, country), largest total first.
 * Accumulates exactly; converts to number only for the output row.
 */
export function buildMarketShareReport(
  currentShares: readonly ShareRecord[],
  filters: MarketShareFilters = {}
): MarketShareRow[] {
  const groups = new Map<string, Group>();

  for (const s of currentShares) {
    if (!s.is_current) continue;
    if (filters.country_code !== undefined && s.country_code !== filters.country_code) continue;
    if (
      filters.product_class_3_id !== undefined &&
      s.product_class_3_id !== filters.product_class_3_id
    ) {
      continue;
    }

    const id = JSON.stringify([s.company_id, s.country_code]);
    let g = groups.get(id);
    if (!g) {
      g = { company_id: s.company_id, country_code: s.country_code, total: ZERO, products: new Set() };
      groups.set(id, g);
    }
    // NULL shares count as products but add nothing, like SQL SUM
    if (s.share_percentage !== null) g.total = addDecimal(g.total, s.share_percentage);
    g.products.add(s.product_class_3_id);
  }

  return [...groups.values()]
    .sort(
      (a, b) =>
        compareDecimal(b.total, a.total) ||
        a.company_id - b.company_id ||
        a.country_code.localeCompare(b.country_code)
    )
    .map((g) => ({
      company_id: g.company_id,
      country_code: g.country_code,
      total_share: decimalToNumber(g.total),
      product_count: g.products.size,
    }));
}
