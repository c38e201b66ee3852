// ---------- Evaluation (stable public API) ----------
export { evaluateCatalog, UNPRICED } from "./evaluate.js";

export type { BreakdownLine, ComparisonResult } from "./evaluate.js";

// ---------- Comparison ----------
export { compareCatalogs, findCheapestCatalog } from "./compare.js";

export type { Comparison, CheapestPolicy, CheapestOptions, CheapestResult } from "./compare.js";
