export { mergeDemandSources, consolidatedToRecord, compareItemNames } from "./merge.js";
export type { ConsolidatedLine, ConsolidatedList } from "./merge.js";
