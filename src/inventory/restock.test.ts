/**
 * Restock policy Tests
 */

import { describe, it, expect } from 'vitest';
import { evaluateRestock } from './restock.js';
import type { InventoryItem } from '../ledger/types.js';

const item: InventoryItem = {
  name: 'A4 paper',
  category: 'paper',
  unitPrice: 0.05,
  stock: 70,
  minStockLevel: 50,
};

describe('evaluateRestock', () => {
  it('should not restock above the minimum', () => {
    expect(evaluateRestock(item)).toEqual({
      itemName: 'A4 paper',
      currentStock: 70,
      minStockLevel: 50,
      needsRestock: false,
      reorderQuantity: 0,
      estimatedCost: 0,
    });
  });

  it('should not restock at exactly the minimum', () => {
    expect(evaluateRestock(item, 50).needsRestock).toBe(false);
  });

  it('should reorder back up to twice the minimum', () => {
    const plan = evaluateRestock(item, 40);

    expect(plan.needsRestock).toBe(true);
    expect(plan.reorderQuantity).toBe(60);
    expect(plan.estimatedCost).toBe(3);
  });

  it('should honor a different multiplier', () => {
    const plan = evaluateRestock(item, 40, 3);

    expect(plan.reorderQuantity).toBe(110);
    expect(plan.estimatedCost).toBe(5.5);
  });

  it('should not plan an empty order when the multiplier is below one', () => {
    const plan = evaluateRestock(item, 40, 0.5);

    expect(plan.needsRestock).toBe(false);
    expect(plan.reorderQuantity).toBe(0);
    expect(plan.estimatedCost).toBe(0);
  });

  it('should reorder from empty', () => {
    expect(evaluateRestock({ ...item, stock: 0 }).reorderQuantity).toBe(100);
  });
});
