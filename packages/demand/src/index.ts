export { DemandSource } from "./demand-source.js";
export type { ItemQuantities } from "./demand-source.js";
