import { compareItemNames, type ConsolidatedList } from "../../aggregate/src/merge.js";
import type { PriceCatalog } from "../../catalog/src/price-catalog.js";

export const UNPRICED = "UNPRICED" as const;

export type BreakdownLine = {
  item: string;
  quantity: number;
  unit_price: number | typeof UNPRICED;
  line_cost: number; // 0 when unpriced
};

export type ComparisonResult = {
  catalog_name: string;
  total: number;
  breakdown: BreakdownLine[];

  // items with no price in this catalog; they add nothing to `total`
  unpriced_items: string[];
  complete: boolean;
};

/**
 * Prices a consolidated list against one catalog.
 *
 * Items the catalog does not price are kept in the breakdown with
 * `unit_price: "UNPRICED"` and a zero line cost. They never abort the
 * evaluation, so a catalog that is missing items can still come out cheapest.
 */
export function evaluateCatalog(consolidated: ConsolidatedList, catalog: PriceCatalog): ComparisonResult {
  const lines = [...consolidated].sort((a, b) => compareItemNames(a.item, b.item));

  const breakdown: BreakdownLine[] = [];
  const unpriced_items: string[] = [];
  let total = 0;

  for (const { item, quantity } of lines) {
    const p = catalog.priceOf(item);
    if (!p.priced) {
      unpriced_items.push(item);
      breakdown.push({ item, quantity, unit_price: UNPRICED, line_cost: 0 });
      continue;
    }

    const line_cost = quantity * p.unit_price;
    total += line_cost;
    breakdown.push({ item, quantity, unit_price: p.unit_price, line_cost });
  }

  return {
    catalog_name: catalog.name,
    total,
    breakdown,
    unpriced_items,
    complete: unpriced_items.length === 0,
  };
}
