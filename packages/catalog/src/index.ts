export { PriceCatalog } from "./price-catalog.js";
export type { PriceLookup, ItemPrices } from "./price-catalog.js";
