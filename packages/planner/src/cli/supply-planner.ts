#!/usr/bin/env node
// packages/planner/src/cli/supply-planner.ts
/* eslint-disable no-console */

import * as fs from "node:fs";
import * as path from "node:path";

import { ZodError } from "zod";

import { parseRequestSet, type ParsedRequestSet } from "../../../schema/src/validate.js";
import { checkRequestSetInvariants } from "../../../schema/src/invariants.js";
import { isPlannerError } from "../../../schema/src/errors.js";
import type { CheapestResult, Comparison } from "../../../evaluate/src/compare.js";
import {
  computeSavings,
  renderCheapest,
  renderComparison,
  renderConsolidatedList,
} from "../../../report/src/index.js";
import { linesToText } from "../../../report/src/lines.js";
import { buildPlannerFromRequestSet } from "../from-request-set.js";

const TAG = "[supply-planner]";

export type CliIO = {
  out: (s: string) => void;
  err: (s: string) => void;
};

const consoleIO: CliIO = {
  out: (s) => console.log(s),
  err: (s) => console.error(s),
};

function usage(): string {
  return `supply-planner - consolidate office supply requests and find the cheapest store

Usage:
  supply-planner --help
  supply-planner version

  supply-planner merge <requests.json> [--json]
  supply-planner compare <requests.json> [--json]
  supply-planner report <requests.json> [--json] [--require-complete]

Examples:
  supply-planner merge examples/requests/sample-offices.json
  supply-planner report examples/requests/sample-offices.json --require-complete
`;
}

// -------------------- file helpers --------------------

class CliInputError extends Error {}

function readRequestSet(filePath: string, io: CliIO): ParsedRequestSet {
  const abs = path.resolve(process.cwd(), filePath);

  let raw: string;
  try {
    raw = fs.readFileSync(abs, "utf8");
  } catch {
    throw new CliInputError(`file not found: ${filePath}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new CliInputError(`"${filePath}" is not valid JSON. First 120 chars: ${raw.slice(0, 120)}`);
  }

  const parsed = parseRequestSet(json);
  for (const v of checkRequestSetInvariants(parsed)) {
    io.err(`${TAG} warning ${v.code} ${v.path}: ${v.message}`);
  }
  return parsed;
}

function comparisonToJson(c: Comparison) {
  return Object.fromEntries(c);
}

function cheapestToJson(r: CheapestResult) {
  const { catalog: _catalog, ...rest } = r;
  return rest;
}

// -------------------- commands --------------------

function cmdMerge(file: string, asJson: boolean, io: CliIO): void {
  const planner = buildPlannerFromRequestSet(readRequestSet(file, io));
  const list = planner.getConsolidatedList();
  io.out(asJson ? JSON.stringify(list, null, 2) : linesToText(renderConsolidatedList(list)));
}

function cmdCompare(file: string, asJson: boolean, io: CliIO): void {
  const planner = buildPlannerFromRequestSet(readRequestSet(file, io));
  const comparison = planner.getComparison();
  io.out(
    asJson
      ? JSON.stringify(comparisonToJson(comparison), null, 2)
      : linesToText(renderComparison(comparison))
  );
}

function cmdReport(file: string, asJson: boolean, requireComplete: boolean, io: CliIO): void {
  const planner = buildPlannerFromRequestSet(readRequestSet(file, io));

  const list = planner.getConsolidatedList();
  const comparison = planner.getComparison();
  const cheapest = planner.getCheapest({
    policy: requireComplete ? "REQUIRE_COMPLETE" : "UNPRICED_AS_ZERO",
  });
  const savings = computeSavings(cheapest, comparison);

  if (asJson) {
    io.out(
      JSON.stringify(
        {
          consolidated: list,
          comparison: comparisonToJson(comparison),
          cheapest: cheapestToJson(cheapest),
          savings,
        },
        null,
        2
      )
    );
    return;
  }

  io.out(
    linesToText([
      ...renderConsolidatedList(list),
      ...renderComparison(comparison),
      ...renderCheapest(cheapest, savings),
    ])
  );
}

// -------------------- argv parsing --------------------

function reportFailure(e: unknown, io: CliIO): number {
  if (e instanceof CliInputError) {
    io.err(`${TAG} ${e.message}`);
  } else if (e instanceof ZodError) {
    io.err(`${TAG} request set is invalid:`);
    for (const issue of e.issues) io.err(`${TAG} - /${issue.path.map(String).join("/")}: ${issue.message}`);
  } else if (isPlannerError(e)) {
    io.err(`${TAG} ${e.message}`);
    io.err(`${TAG} input: ${JSON.stringify(e.input)}`);
  } else {
    throw e;
  }
  return 1;
}

/** Returns the process exit code. */
export function run(argv: string[] = process.argv, io: CliIO = consoleIO): number {
  const args = argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.out(usage());
    return 0;
  }

  const cmd = args[0];

  if (cmd === "version") {
    io.out("supply-planner cli v1");
    return 0;
  }

  if (cmd !== "merge" && cmd !== "compare" && cmd !== "report") {
    io.err(`Unknown command: ${cmd}\n`);
    io.err(usage());
    return 1;
  }

  const file = args[1];
  if (!file || file.startsWith("--")) {
    io.err("Missing file.\n");
    io.err(usage());
    return 1;
  }

  const asJson = args.includes("--json");

  try {
    if (cmd === "merge") cmdMerge(file, asJson, io);
    else if (cmd === "compare") cmdCompare(file, asJson, io);
    else cmdReport(file, asJson, args.includes("--require-complete"), io);
  } catch (e) {
    return reportFailure(e, io);
  }
  return 0;
}

// ESM / tsx path: execute when this file is the invoked script
const argv1 = process.argv[1] ?? "";
const entry = path.basename(argv1);
if (entry === "supply-planner" || entry === "supply-planner.ts" || entry === "supply-planner.js") {
  process.exitCode = run(process.argv);
}
