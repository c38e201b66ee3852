import type { CheapestResult, Comparison } from "../../evaluate/src/compare.js";

export type Savings = {
  amount: number;
  percent: number; // 0..100
  versus: string; // most expensive complete catalog
};

/**
 * Saving of the winner against the most expensive catalog that prices every
 * item. Catalogs with unpriced items have no comparable total and are left out.
 */
export function computeSavings(cheapest: CheapestResult, comparison: Comparison): Savings | null {
  const complete = [...comparison.values()].filter((r) => r.complete);
  if (complete.length < 2) return null;

  let worst = complete[0];
  for (const r of complete) if (r.total > worst.total) worst = r;

  const amount = worst.total - cheapest.total;
  if (!(amount > 0)) return null;

  return {
    amount,
    percent: (amount / worst.total) * 100,
    versus: worst.catalog_name,
  };
}
