import { DemandSource, PriceCatalog, SupplyPlanner } from "../packages/planner/src/index.js";
import { computeSavings, linesToText, renderCheapest, renderComparison } from "../packages/report/src/index.js";

// Office A / Office B against a complete and a partial catalog
const a = new DemandSource("Office A");
a.addItem("Pens", 10);
a.addItem("Paper Reams", 5);

const b = new DemandSource("Office B");
b.addItem("Pens", 15);
b.addItem("Folders", 20);

const depot = new PriceCatalog("Depot");
depot.setPrice("Pens", 1.5);
depot.setPrice("Paper Reams", 8.0);
depot.setPrice("Folders", 0.5);

const staples = new PriceCatalog("Staples");
staples.setPrice("Pens", 1.25);
staples.setPrice("Paper Reams", 8.5);
staples.setPrice("Folders", 0.6);

const amazon = new PriceCatalog("Amazon");
amazon.setPrice("Pens", 1.0);

const planner = new SupplyPlanner();
planner.registerDemandSource(a);
planner.registerDemandSource(b);
planner.registerPriceCatalog(depot);
planner.registerPriceCatalog(staples);
planner.registerPriceCatalog(amazon);

const comparison = planner.getComparison();
const loose = planner.getCheapest();
const strict = planner.getCheapest({ policy: "REQUIRE_COMPLETE" });

console.log(linesToText(renderComparison(comparison)));
console.log(linesToText(renderCheapest(loose, computeSavings(loose, comparison))));
console.log(linesToText(renderCheapest(strict, computeSavings(strict, comparison))));
