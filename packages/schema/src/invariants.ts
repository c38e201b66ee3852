import type { ParsedRequestSet } from "./validate.js";

export type RequestSetViolationCode =
  | "DUPLICATE_STORE_NAME"
  | "DUPLICATE_PRICE_LINE"
  | "DUPLICATE_ITEM_LINE";

export type RequestSetViolation = {
  code: RequestSetViolationCode;
  message: string;
  path: string; // JSON pointer-like path for debugging
};

/**
 * Warn-level checks. None of these stop planning:
 * - duplicate store names overwrite each other in a comparison
 * - a repeated price line is last-write-wins
 * - a repeated item line within one office accumulates
 */
export function checkRequestSetInvariants(d: ParsedRequestSet): RequestSetViolation[] {
  const v: RequestSetViolation[] = [];

  const seenStores = new Map<string, number>();
  d.stores.forEach((s, i) => {
    const first = seenStores.get(s.name);
    if (first != null) {
      v.push({
        code: "DUPLICATE_STORE_NAME",
        message: `Store name '${s.name}' already used at /stores/${first}; its comparison entry will be replaced`,
        path: `/stores/${i}/name`,
      });
    } else {
      seenStores.set(s.name, i);
    }

    v.push(
      ...checkRepeated(
        s.prices.map((p) => p.item),
        `/stores/${i}/prices`,
        "DUPLICATE_PRICE_LINE",
        (item) => `Price for '${item}' set more than once in store '${s.name}'; last one wins`
      )
    );
  });

  d.offices.forEach((o, i) => {
    v.push(
      ...checkRepeated(
        o.items.map((x) => x.item),
        `/offices/${i}/items`,
        "DUPLICATE_ITEM_LINE",
        (item) => `Item '${item}' listed more than once in office '${o.name}'; quantities are added`
      )
    );
  });

  return v;
}

function checkRepeated(
  items: string[],
  basePath: string,
  code: RequestSetViolationCode,
  message: (item: string) => string
): RequestSetViolation[] {
  const seen = new Set<string>();
  const out: RequestSetViolation[] = [];
  items.forEach((item, i) => {
    if (seen.has(item)) {
      out.push({ code, message: message(item), path: `${basePath}/${i}/item` });
    }
    seen.add(item);
  });
  return out;
}
