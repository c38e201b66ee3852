import type { ConsolidatedList } from "../../aggregate/src/merge.js";
import type { PriceCatalog } from "../../catalog/src/price-catalog.js";
import { PlannerError } from "../../schema/src/errors.js";
import { evaluateCatalog, type ComparisonResult } from "./evaluate.js";

export type Comparison = Map<string, ComparisonResult>;

export type CheapestPolicy =
  // unpriced items count as 0 and the catalog stays eligible
  | "UNPRICED_AS_ZERO"
  // only catalogs that price every item are eligible
  | "REQUIRE_COMPLETE";

export type CheapestOptions = {
  policy?: CheapestPolicy;
};

export type CheapestResult = ComparisonResult & {
  catalog: PriceCatalog;
};

/**
 * One result per catalog, keyed by catalog name, in input order.
 * NOTE: two catalogs with the same name collide; the later one replaces the
 * earlier result but keeps the earlier key position.
 */
export function compareCatalogs(
  consolidated: ConsolidatedList,
  catalogs: ReadonlyArray<PriceCatalog>
): Comparison {
  const out: Comparison = new Map();
  for (const c of catalogs) out.set(c.name, evaluateCatalog(consolidated, c));
  return out;
}

export function findCheapestCatalog(
  consolidated: ConsolidatedList,
  catalogs: ReadonlyArray<PriceCatalog>,
  opts: CheapestOptions = {}
): CheapestResult {
  if (catalogs.length === 0) {
    throw new PlannerError("NO_CATALOGS", "no price catalogs registered to compare", {
      catalogs: [],
    });
  }

  const policy = opts.policy ?? "UNPRICED_AS_ZERO";
  const comparison = compareCatalogs(consolidated, catalogs);

  // same collision rule as the comparison map: last catalog with a name wins
  const catalogByName = new Map(catalogs.map((c) => [c.name, c]));

  let best: CheapestResult | null = null;
  for (const [name, result] of comparison) {
    if (policy === "REQUIRE_COMPLETE" && !result.complete) continue;

    // strict `<` keeps the earliest catalog on equal totals
    if (best == null || result.total < best.total) {
      const catalog = catalogByName.get(name);
      if (catalog) best = { ...result, catalog };
    }
  }

  if (best == null) {
    throw new PlannerError(
      "NO_COMPLETE_CATALOG",
      "no catalog prices every item on the consolidated list",
      { catalogs: catalogs.map((c) => c.name), policy }
    );
  }

  return best;
}
