import { readFileSync } from "node:fs";
import { parseRequestSet, checkRequestSetInvariants } from "../packages/schema/src/index.js";
import { buildPlannerFromRequestSet } from "../packages/planner/src/index.js";

const raw = JSON.parse(
  readFileSync("examples/requests/sample-offices.json", "utf-8")
);

const parsed = parseRequestSet(raw);
const violations = checkRequestSetInvariants(parsed);
for (const v of violations) console.error(`- ${v.code} ${v.path}: ${v.message}`);

const planner = buildPlannerFromRequestSet(parsed);
const { catalog: _catalog, ...cheapest } = planner.getCheapest();
console.log(JSON.stringify(cheapest, null, 2));
