/**
 * InventoryLookup Tests
 */

import { describe, it, expect } from 'vitest';
import { InventoryLookup } from './lookup.js';
import { NotFoundError } from '../errors.js';
import { createStore } from '../testing/fixtures.js';

function setup() {
  const store = createStore();
  return { store, lookup: new InventoryLookup(store) };
}

describe('InventoryLookup', () => {
  describe('getStockLevel', () => {
    it('should return the current stock', () => {
      const { lookup } = setup();

      expect(lookup.getStockLevel('A4 paper')).toBe(100);
    });

    it('should throw NotFoundError for an unknown item', () => {
      const { lookup } = setup();

      expect(() => lookup.getStockLevel('Banner vinyl')).toThrow(NotFoundError);
    });

    it('should rebuild the stock as of a date from the log', () => {
      const { store, lookup } = setup();
      store.appendTransaction({
        type: 'sale', itemName: 'A4 paper', quantity: 30, unitPrice: 0.05, total: 1.5, date: '2025-02-01',
      });
      store.appendTransaction({
        type: 'stock_order', itemName: 'A4 paper', quantity: 60, unitPrice: 0.05, total: 3, date: '2025-03-01',
      });

      expect(lookup.getStockLevel('A4 paper', '2025-01-15')).toBe(100);
      expect(lookup.getStockLevel('A4 paper', '2025-02-15')).toBe(70);
      expect(lookup.getStockLevel('A4 paper', '2025-03-01')).toBe(130);
      expect(lookup.getStockLevel('A4 paper', '2024-12-31')).toBe(0);
    });
  });

  describe('getSnapshot', () => {
    it('should list only items in stock', () => {
      const { lookup } = setup();

      expect(lookup.getSnapshot()).toEqual({
        'A4 paper': 100,
        Cardstock: 600,
        'Glossy paper': 2000,
        'Poster paper': 300,
      });
    });

    it('should be empty before the ledger opened', () => {
      const { lookup } = setup();

      expect(lookup.getSnapshot('2024-12-31')).toEqual({});
    });
  });

  it('should list the catalog', () => {
    const { lookup } = setup();

    expect(lookup.listCatalog()[0]).toEqual({ name: 'A4 paper', category: 'paper', unitPrice: 0.05 });
    expect(lookup.getItemPrice('Cardstock')).toBe(0.15);
    expect(() => lookup.getItem('Banner vinyl')).toThrow("Item 'Banner vinyl' not found in inventory catalog");
  });

  it('should find items by category ignoring case', () => {
    const { lookup } = setup();

    expect(lookup.findByCategory('PAPER').map((item) => item.name)).toEqual([
      'A4 paper',
      'Cardstock',
      'Glossy paper',
    ]);
    expect(lookup.findByCategory('large_format').map((item) => item.name)).toEqual(['Poster paper']);
  });

  describe('findSimilar', () => {
    it('should prefer substring matches', () => {
      const { lookup } = setup();

      expect(lookup.findSimilar('Paper').map((item) => item.name)).toEqual([
        'A4 paper',
        'Glossy paper',
        'Paper plates',
        'Poster paper',
      ]);
    });

    it('should fall back to shared words, most shared first', () => {
      const { lookup } = setup();

      expect(lookup.findSimilar('glossy sheets').map((item) => item.name)).toEqual(['Glossy paper']);
      expect(lookup.findSimilar('paper poster large').map((item) => item.name)).toEqual([
        'Poster paper',
        'A4 paper',
        'Glossy paper',
        'Paper plates',
      ]);
    });

    it('should return nothing for a blank term', () => {
      const { lookup } = setup();

      expect(lookup.findSimilar('  ')).toEqual([]);
    });
  });

  describe('resolveItem', () => {
    it('should resolve exact, case-insensitive and fuzzy names', () => {
      const { lookup } = setup();

      expect(lookup.resolveItem('Cardstock').name).toBe('Cardstock');
      expect(lookup.resolveItem('a4 PAPER').name).toBe('A4 paper');
      expect(lookup.resolveItem('glossy').name).toBe('Glossy paper');
    });

    it('should throw NotFoundError when nothing matches', () => {
      const { lookup } = setup();

      expect(() => lookup.resolveItem('banner vinyl')).toThrow(NotFoundError);
    });

    it('should refuse a name that matches several items equally well', () => {
      const { lookup } = setup();

      expect(() => lookup.resolveItem('paper')).toThrow(
        "Item 'paper' is ambiguous, it matches A4 paper, Glossy paper, Paper plates, Poster paper"
      );
      expect(() => lookup.resolveItem('glossy poster')).toThrow(
        "Item 'glossy poster' is ambiguous, it matches Glossy paper, Poster paper"
      );
      expect(lookup.resolveItem('paper poster large').name).toBe('Poster paper');
    });
  });
});
