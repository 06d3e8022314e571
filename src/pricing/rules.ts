/**
 * Pricing rules - bulk discount tiers and quote totals
 */

import { getConfiguration, type DiscountTier } from '../config.js';
import { InvalidQuantityError } from '../errors.js';
import { roundMoney } from '../utils/money.js';
import type { InventoryItem } from '../ledger/types.js';

export interface QuoteLineInput {
  item: InventoryItem;
  quantity: number;
}

export interface QuoteLine {
  itemName: string;
  quantity: number;
  unitPrice: number;
  /** Undiscounted price of the line */
  lineTotal: number;
  /** Line price after the request's discount */
  netTotal: number;
}

export interface Quote {
  lines: QuoteLine[];
  totalUnits: number;
  subtotal: number;
  discountRate: number;
  discountAmount: number;
  total: number;
}

function assertUnits(units: number, field = 'quantity'): void {
  if (!Number.isInteger(units) || units < 0) {
    throw new InvalidQuantityError(units, field);
  }
}

/**
 * Discount rate for a number of units. The rate covers the whole quantity
 * once a tier is reached: 0–500 → 0%, 501–1000 → 10%, 1001+ → 15% by default.
 */
export function discountRate(
  units: number,
  tiers: readonly DiscountTier[] = getConfiguration().discountTiers
): number {
  assertUnits(units, 'units');

  let rate = 0;
  let reached = -1;
  for (const tier of tiers) {
    if (units >= tier.minUnits && tier.minUnits > reached) {
      rate = tier.rate;
      reached = tier.minUnits;
    }
  }
  return rate;
}

/**
 * Price a set of lines. The tier is picked from the total units of the
 * request and applied to every line.
 */
export function calculateQuote(
  lines: readonly QuoteLineInput[],
  tiers?: readonly DiscountTier[]
): Quote {
  for (const line of lines) {
    assertUnits(line.quantity);
  }

  const totalUnits = lines.reduce((sum, line) => sum + line.quantity, 0);
  const rate = discountRate(totalUnits, tiers);

  const priced: QuoteLine[] = lines.map(({ item, quantity }) => {
    const lineTotal = roundMoney(item.unitPrice * quantity);
    return {
      itemName: item.name,
      quantity,
      unitPrice: item.unitPrice,
      lineTotal,
      netTotal: roundMoney(lineTotal * (1 - rate)),
    };
  });

  return summarize(priced, rate);
}

/**
 * Totals for already-priced lines, e.g. the subset of an order that shipped
 */
export function summarize(lines: readonly QuoteLine[], rate: number): Quote {
  const subtotal = roundMoney(lines.reduce((sum, line) => sum + line.lineTotal, 0));
  const total = roundMoney(lines.reduce((sum, line) => sum + line.netTotal, 0));

  return {
    lines: [...lines],
    totalUnits: lines.reduce((sum, line) => sum + line.quantity, 0),
    subtotal,
    discountRate: rate,
    discountAmount: roundMoney(subtotal - total),
    total,
  };
}

/**
 * Price of `quantity` units of a single item
 */
export function quotePrice(item: InventoryItem, quantity: number): number {
  return calculateQuote([{ item, quantity }]).total;
}
