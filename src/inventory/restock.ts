/**
 * Restock policy: reorder below the minimum, back up to a multiple of it
 */

import { roundMoney } from '../utils/money.js';
import type { InventoryItem } from '../ledger/types.js';

export interface RestockPlan {
  itemName: string;
  currentStock: number;
  minStockLevel: number;
  needsRestock: boolean;
  reorderQuantity: number;
  estimatedCost: number;
}

export function evaluateRestock(
  item: InventoryItem,
  currentStock: number = item.stock,
  multiplier = 2
): RestockPlan {
  const reorderQuantity =
    currentStock < item.minStockLevel
      ? Math.max(0, Math.ceil(multiplier * item.minStockLevel) - currentStock)
      : 0;
  // a multiplier below 1 can leave nothing to order even under the minimum
  const needsRestock = reorderQuantity > 0;

  return {
    itemName: item.name,
    currentStock,
    minStockLevel: item.minStockLevel,
    needsRestock,
    reorderQuantity,
    estimatedCost: roundMoney(reorderQuantity * item.unitPrice),
  };
}
