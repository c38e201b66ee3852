import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";

import { run, type CliIO } from "../src/cli/supply-planner.js";

const SAMPLE = fileURLToPath(new URL("../../../examples/requests/sample-offices.json", import.meta.url));

function capture(): CliIO & { stdout: string[]; stderr: string[] } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (s) => stdout.push(s),
    err: (s) => stderr.push(s),
  };
}

function cli(...args: string[]) {
  const io = capture();
  const code = run(["node", "supply-planner", ...args], io);
  return { code, stdout: io.stdout.join("\n"), stderr: io.stderr };
}

let tmp = "";

function writeTmp(name: string, content: string): string {
  const p = path.join(tmp, name);
  fs.writeFileSync(p, content, "utf8");
  return p;
}

beforeAll(() => {
  tmp = fs.mkdtempSync(path.join(os.tmpdir(), "supply-planner-"));
});

afterAll(() => {
  fs.rmSync(tmp, { recursive: true, force: true });
});

describe("supply-planner cli", () => {
  it("prints usage for --help", () => {
    const r = cli("--help");
    expect(r.code).toBe(0);
    expect(r.stdout.startsWith("supply-planner - consolidate office supply requests")).toBe(true);
  });

  it("merges the sample offices", () => {
    const r = cli("merge", SAMPLE);
    expect(r.code).toBe(0);
    expect(r.stdout).toBe(
      [
        "",
        "CONSOLIDATED SHOPPING LIST",
        "==========================",
        "  - Folders: 30",
        "  - Markers: 20",
        "  - Paper Reams: 15",
        "  - Pens: 30",
        "  - Staplers: 5",
      ].join("\n")
    );
  });

  it("emits the merged list as JSON", () => {
    const r = cli("merge", SAMPLE, "--json");
    expect(JSON.parse(r.stdout)).toEqual([
      { item: "Folders", quantity: 30 },
      { item: "Markers", quantity: 20 },
      { item: "Paper Reams", quantity: 15 },
      { item: "Pens", quantity: 30 },
      { item: "Staplers", quantity: 5 },
    ]);
  });

  it("compares the sample stores", () => {
    const lines = cli("compare", SAMPLE).stdout.split("\n");
    expect(lines.slice(-3)).toEqual([
      "  - Amazon: $212.00",
      "  - Office Depot: $245.00",
      "  - Staples: $240.50",
    ]);
  });

  it("reports the cheapest store with savings", () => {
    const r = cli("report", SAMPLE);
    const lines = r.stdout.split("\n");

    expect(r.code).toBe(0);
    expect(lines).toContain("Best choice: Amazon");
    expect(lines).toContain("Total cost: $212.00");
    expect(lines).toContain("  - Pens: 30 x $1.00 = $30.00");
    expect(lines[lines.length - 1]).toBe("You save $33.00 (13.5%) vs. Office Depot.");
  });

  it("reports as JSON without the catalog object", () => {
    const out = JSON.parse(cli("report", SAMPLE, "--json").stdout);
    expect(out.cheapest.catalog_name).toBe("Amazon");
    expect(out.cheapest.total).toBe(212);
    expect(out.cheapest.catalog).toBeUndefined();
    expect(Object.keys(out.comparison)).toEqual(["Office Depot", "Staples", "Amazon"]);
    expect(out.savings).toEqual({ amount: 33, percent: (33 / 245) * 100, versus: "Office Depot" });
  });

  it("fails with NO_CATALOGS when the document has no stores", () => {
    const file = writeTmp(
      "no-stores.json",
      JSON.stringify({ offices: [{ name: "HQ", items: [{ item: "Pens", quantity: 1 }] }] })
    );
    const r = cli("report", file);
    expect(r.code).toBe(1);
    expect(r.stderr).toEqual([
      "[supply-planner] NO_CATALOGS: no price catalogs registered to compare",
      '[supply-planner] input: {"catalogs":[]}',
    ]);
  });

  it("fails under --require-complete when no store prices everything", () => {
    const file = writeTmp(
      "partial.json",
      JSON.stringify({
        offices: [{ name: "HQ", items: [{ item: "Pens", quantity: 1 }, { item: "Paper", quantity: 1 }] }],
        stores: [{ name: "Corner Shop", prices: [{ item: "Pens", unit_price: 1 }] }],
      })
    );
    const r = cli("report", file, "--require-complete");
    expect(r.code).toBe(1);
    expect(r.stderr[0]).toBe(
      "[supply-planner] NO_COMPLETE_CATALOG: no catalog prices every item on the consolidated list"
    );
  });

  it("echoes schema problems with their paths", () => {
    const file = writeTmp(
      "bad-quantity.json",
      JSON.stringify({ offices: [{ name: "HQ", items: [{ item: "Pens", quantity: -2 }] }] })
    );
    const r = cli("merge", file);
    expect(r.code).toBe(1);
    expect(r.stderr).toEqual([
      "[supply-planner] request set is invalid:",
      "[supply-planner] - /offices/0/items/0/quantity: Quantity must be positive",
    ]);
  });

  it("warns about duplicate store names but still runs", () => {
    const file = writeTmp(
      "dupes.json",
      JSON.stringify({
        offices: [{ name: "HQ", items: [{ item: "Pens", quantity: 2 }] }],
        stores: [
          { name: "Depot", prices: [{ item: "Pens", unit_price: 1 }] },
          { name: "Depot", prices: [{ item: "Pens", unit_price: 3 }] },
        ],
      })
    );
    const r = cli("compare", file);
    expect(r.code).toBe(0);
    expect(r.stderr).toEqual([
      "[supply-planner] warning DUPLICATE_STORE_NAME /stores/1/name: Store name 'Depot' already used at /stores/0; its comparison entry will be replaced",
    ]);
    expect(r.stdout.split("\n").slice(-1)).toEqual(["  - Depot: $6.00"]);
  });

  it("rejects malformed JSON", () => {
    const file = writeTmp("broken.json", "{ offices: ");
    const r = cli("merge", file);
    expect(r.code).toBe(1);
    expect(r.stderr).toEqual([
      `[supply-planner] "${file}" is not valid JSON. First 120 chars: { offices: `,
    ]);
  });

  it("rejects a missing file", () => {
    const r = cli("merge", path.join(tmp, "nope.json"));
    expect(r.code).toBe(1);
    expect(r.stderr).toEqual([`[supply-planner] file not found: ${path.join(tmp, "nope.json")}`]);
  });

  it("rejects unknown commands", () => {
    const r = cli("frobnicate");
    expect(r.code).toBe(1);
    expect(r.stderr[0]).toBe("Unknown command: frobnicate\n");
  });
});
