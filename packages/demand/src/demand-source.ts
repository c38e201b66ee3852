import { PlannerError } from "../../schema/src/errors.js";

export type ItemQuantities = Readonly<Record<string, number>>;

/**
 * An office (or any requester) asking for quantities of named items.
 * Item names are matched exactly; "Pens" and "pens" are different items.
 */
export class DemandSource {
  readonly name: string;
  private readonly items = new Map<string, number>();

  constructor(name: string) {
    this.name = name;
  }

  /** Adds `quantity` to whatever is already requested for `item`. */
  addItem(item: string, quantity: number): void {
    if (typeof quantity !== "number" || !Number.isFinite(quantity) || quantity <= 0) {
      throw new PlannerError(
        "INVALID_QUANTITY",
        `quantity for '${item}' in '${this.name}' must be a positive number, got ${String(quantity)}`,
        { source: this.name, item, quantity }
      );
    }
    const next = (this.items.get(item) ?? 0) + quantity;
    if (!Number.isFinite(next)) {
      throw new PlannerError(
        "INVALID_QUANTITY",
        `quantity for '${item}' in '${this.name}' would overflow, got ${String(quantity)}`,
        { source: this.name, item, quantity }
      );
    }
    this.items.set(item, next);
  }

  quantityOf(item: string): number {
    return this.items.get(item) ?? 0;
  }

  itemsSnapshot(): ItemQuantities {
    const out: Record<string, number> = Object.create(null);
    for (const [item, quantity] of this.items) out[item] = quantity;
    return Object.freeze(out);
  }
}
