// Request Set v1
// Types only. No functions.

/* ------------------------------ Offices ------------------------------ */

export interface OfficeRequest {
  name: string;
  items: ItemLine[];
}

export interface ItemLine {
  item: string;
  quantity: number; // > 0, integer or decimal
}

/* ------------------------------- Stores ------------------------------ */

export interface StorePriceList {
  name: string;
  prices: PriceLine[];
}

export interface PriceLine {
  item: string;
  unit_price: number; // >= 0
}

/* ---------------------------- Request Set ---------------------------- */

export interface RequestSet {
  offices: OfficeRequest[];
  stores: StorePriceList[];
}
