import { PlannerError } from "../../schema/src/errors.js";

export type PriceLookup =
  | { priced: true; unit_price: number }
  | { priced: false };

export type ItemPrices = Readonly<Record<string, number>>;

/**
 * A store's unit prices. A price of 0 means "free";
 * an item with no entry is NOT priced (see `priceOf`).
 */
export class PriceCatalog {
  readonly name: string;
  private readonly prices = new Map<string, number>();

  constructor(name: string) {
    this.name = name;
  }

  /** Last write wins. */
  setPrice(item: string, unitPrice: number): void {
    if (typeof unitPrice !== "number" || !Number.isFinite(unitPrice) || unitPrice < 0) {
      throw new PlannerError(
        "INVALID_PRICE",
        `price for '${item}' in '${this.name}' cannot be negative or non-numeric, got ${String(unitPrice)}`,
        { catalog: this.name, item, unit_price: unitPrice }
      );
    }
    this.prices.set(item, unitPrice);
  }

  priceOf(item: string): PriceLookup {
    const unit_price = this.prices.get(item);
    return unit_price == null ? { priced: false } : { priced: true, unit_price };
  }

  pricesSnapshot(): ItemPrices {
    const out: Record<string, number> = Object.create(null);
    for (const [item, price] of this.prices) out[item] = price;
    return Object.freeze(out);
  }
}
