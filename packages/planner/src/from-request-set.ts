import type { ParsedRequestSet } from "../../schema/src/validate.js";
import { DemandSource } from "../../demand/src/demand-source.js";
import { PriceCatalog } from "../../catalog/src/price-catalog.js";
import { SupplyPlanner } from "./planner.js";

export function buildPlannerFromRequestSet(d: ParsedRequestSet): SupplyPlanner {
  const planner = new SupplyPlanner();

  for (const o of d.offices) {
    const source = new DemandSource(o.name);
    for (const line of o.items) source.addItem(line.item, line.quantity);
    planner.registerDemandSource(source);
  }

  for (const s of d.stores) {
    const catalog = new PriceCatalog(s.name);
    for (const line of s.prices) catalog.setPrice(line.item, line.unit_price);
    planner.registerPriceCatalog(catalog);
  }

  return planner;
}
