// packages/planner/__tests__/_helpers/fixtures.ts
import { DemandSource } from "../../../demand/src/demand-source.js";
import { PriceCatalog } from "../../../catalog/src/price-catalog.js";

export function office(name: string, items: Record<string, number>): DemandSource {
  const s = new DemandSource(name);
  for (const [item, q] of Object.entries(items)) s.addItem(item, q);
  return s;
}

export function store(name: string, prices: Record<string, number>): PriceCatalog {
  const c = new PriceCatalog(name);
  for (const [item, p] of Object.entries(prices)) c.setPrice(item, p);
  return c;
}

// Office A / Office B / Depot / Staples / Amazon scenario
export function officeA() {
  return office("Office A", { Pens: 10, "Paper Reams": 5 });
}

export function officeB() {
  return office("Office B", { Pens: 15, Folders: 20 });
}

export function depot() {
  return store("Depot", { Pens: 1.5, "Paper Reams": 8.0, Folders: 0.5 });
}

export function staples() {
  return store("Staples", { Pens: 1.25, "Paper Reams": 8.5, Folders: 0.6 });
}

export function amazonPensOnly() {
  return store("Amazon", { Pens: 1.0 });
}
