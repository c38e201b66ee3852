import type { DemandSource } from "../../demand/src/demand-source.js";
import { PlannerError } from "../../schema/src/errors.js";

export type ConsolidatedLine = {
  item: string;
  quantity: number;
};

// Ordered by item name. Fresh on every merge; nothing holds on to it.
export type ConsolidatedList = ReadonlyArray<ConsolidatedLine>;

/**
 * Alphabetical by `localeCompare`, then by code units, so names that collate
 * equal (NFC vs. NFD "é") still get a fixed order.
 */
export function compareItemNames(a: string, b: string): number {
  return a.localeCompare(b) || (a < b ? -1 : a > b ? 1 : 0);
}

export function mergeDemandSources(sources: ReadonlyArray<DemandSource>): ConsolidatedList {
  const quantitiesByItem = new Map<string, number[]>();

  for (const source of sources) {
    const snapshot = source.itemsSnapshot();
    for (const item of Object.keys(snapshot)) {
      const qs = quantitiesByItem.get(item);
      if (qs) qs.push(snapshot[item]);
      else quantitiesByItem.set(item, [snapshot[item]]);
    }
  }

  const items = [...quantitiesByItem.keys()].sort(compareItemNames);

  // Summed in ascending value order: the total must not depend on source order.
  return Object.freeze(
    items.map((item) => {
      const qs = [...(quantitiesByItem.get(item) ?? [])].sort((a, b) => a - b);
      const quantity = qs.reduce((s, q) => s + q, 0);
      if (!Number.isFinite(quantity)) {
        throw new PlannerError(
          "INVALID_QUANTITY",
          `consolidated quantity for '${item}' is not a finite number`,
          { item, quantities: qs }
        );
      }
      return Object.freeze({ item, quantity });
    })
  );
}

export function consolidatedToRecord(list: ConsolidatedList): Record<string, number> {
  return Object.fromEntries(list.map((line) => [line.item, line.quantity]));
}
