import { z } from "zod";

/* ------------------------------------------------------------------ */
/*                              Primitives                            */
/* ------------------------------------------------------------------ */

const Name = z.string().trim().min(1, "Name cannot be empty");

const ItemName = z.string().min(1, "Item name cannot be empty");

const FiniteNumber = z
  .number()
  .refine(Number.isFinite, "Must be a finite number");

/* ------------------------------------------------------------------ */
/*                               Offices                              */
/* ------------------------------------------------------------------ */

const ItemLineSchema = z.object({
  item: ItemName,
  quantity: FiniteNumber.refine((n) => n > 0, "Quantity must be positive"),
});

const OfficeRequestSchema = z.object({
  name: Name,
  items: z.array(ItemLineSchema),
});

/* ------------------------------------------------------------------ */
/*                                Stores                              */
/* ------------------------------------------------------------------ */

const PriceLineSchema = z.object({
  item: ItemName,
  unit_price: FiniteNumber.refine((n) => n >= 0, "Price cannot be negative"),
});

const StorePriceListSchema = z.object({
  name: Name,
  prices: z.array(PriceLineSchema),
});

/* ------------------------------------------------------------------ */
/*                             Request Set                            */
/* ------------------------------------------------------------------ */

export const RequestSetSchema = z.object({
  offices: z.array(OfficeRequestSchema),
  stores: z.array(StorePriceListSchema).default([]),
});

export type ParsedRequestSet = z.infer<typeof RequestSetSchema>;

export function parseRequestSet(input: unknown): ParsedRequestSet {
  return RequestSetSchema.parse(input);
}

export function safeParseRequestSet(input: unknown) {
  return RequestSetSchema.safeParse(input);
}
