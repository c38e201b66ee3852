import { compareItemNames, type ConsolidatedList } from "../../aggregate/src/merge.js";
import type { CheapestResult, Comparison } from "../../evaluate/src/compare.js";
import { UNPRICED } from "../../evaluate/src/evaluate.js";
import { money, qty, type ReportLine } from "./lines.js";
import type { Savings } from "./savings.js";

export function renderConsolidatedList(list: ConsolidatedList): ReportLine[] {
  const lines: ReportLine[] = [{ kind: "HEADER", text: "CONSOLIDATED SHOPPING LIST" }];
  if (list.length === 0) {
    lines.push({ kind: "NOTE", text: "No supplies requested yet." });
    return lines;
  }
  for (const l of list) lines.push({ kind: "ITEM", text: `${l.item}: ${qty(l.quantity)}` });
  return lines;
}

export function renderComparison(comparison: Comparison): ReportLine[] {
  const lines: ReportLine[] = [{ kind: "HEADER", text: "PRICE COMPARISON" }];
  if (comparison.size === 0) {
    lines.push({ kind: "NOTE", text: "No stores added yet." });
    return lines;
  }

  // deterministic order by catalog name
  const names = [...comparison.keys()].sort(compareItemNames);
  for (const name of names) {
    const r = comparison.get(name);
    if (!r) continue;
    const missing = r.unpriced_items.length ? ` (unpriced: ${r.unpriced_items.join(", ")})` : "";
    lines.push({ kind: "ITEM", text: `${name}: ${money(r.total)}${missing}` });
  }
  return lines;
}

export function renderCheapest(result: CheapestResult, savings: Savings | null = null): ReportLine[] {
  const lines: ReportLine[] = [
    { kind: "HEADER", text: "CHEAPEST OPTION" },
    { kind: "TOTAL", text: `Best choice: ${result.catalog_name}` },
    { kind: "TOTAL", text: `Total cost: ${money(result.total)}` },
  ];

  for (const b of result.breakdown) {
    const price = b.unit_price === UNPRICED ? "unpriced" : money(b.unit_price);
    lines.push({
      kind: "ITEM",
      text: `${b.item}: ${qty(b.quantity)} x ${price} = ${money(b.line_cost)}`,
    });
  }

  if (!result.complete) {
    lines.push({
      kind: "NOTE",
      text: `Warning: ${result.catalog_name} has no price for ${result.unpriced_items.join(", ")}; those items are not in the total.`,
    });
  }

  if (savings) {
    lines.push({
      kind: "NOTE",
      text: `You save ${money(savings.amount)} (${savings.percent.toFixed(1)}%) vs. ${savings.versus}.`,
    });
  }

  return lines;
}
