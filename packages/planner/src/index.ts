export { SupplyPlanner } from "./planner.js";
export { buildPlannerFromRequestSet } from "./from-request-set.js";

export { DemandSource } from "../../demand/src/index.js";
export { PriceCatalog } from "../../catalog/src/index.js";
export { PlannerError, isPlannerError } from "../../schema/src/errors.js";

export type { ConsolidatedList, ConsolidatedLine } from "../../aggregate/src/index.js";
export type {
  BreakdownLine,
  ComparisonResult,
  Comparison,
  CheapestOptions,
  CheapestPolicy,
  CheapestResult,
} from "../../evaluate/src/index.js";
