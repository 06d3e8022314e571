/**
 * InventoryLookup - read-only stock and catalog queries against the ledger
 */

import { NotFoundError } from '../errors.js';
import { isOnOrBefore } from '../utils/dates.js';
import type { InventoryItem, ItemCategory, LedgerStore } from '../ledger/types.js';

export interface CatalogEntry {
  name: string;
  category: ItemCategory;
  unitPrice: number;
}

const WORD = /[a-z0-9]+/g;

function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().match(WORD) ?? []);
}

export class InventoryLookup {
  constructor(private readonly store: LedgerStore) {}

  /**
   * Stock level for an item. Without `asOf` this is the live stock; with it,
   * the level is rebuilt from the opening balance and the transaction log.
   */
  getStockLevel(itemName: string, asOf?: string): number {
    const item = this.getItem(itemName);
    if (asOf === undefined) {
      return item.stock;
    }

    const opening = this.store.getOpening();
    let stock = isOnOrBefore(opening.openedAt, asOf) ? (opening.stock[item.name] ?? 0) : 0;

    for (const t of this.store.listTransactions({ itemName: item.name, asOf })) {
      stock += t.type === 'stock_order' ? t.quantity : -t.quantity;
    }
    return stock;
  }

  /**
   * Stock of every item that has any, keyed by name
   */
  getSnapshot(asOf?: string): Record<string, number> {
    const snapshot: Record<string, number> = {};
    for (const item of this.store.listItems()) {
      const stock = asOf === undefined ? item.stock : this.getStockLevel(item.name, asOf);
      if (stock > 0) {
        snapshot[item.name] = stock;
      }
    }
    return snapshot;
  }

  listCatalog(): CatalogEntry[] {
    return this.store.listItems().map(({ name, category, unitPrice }) => ({ name, category, unitPrice }));
  }

  getItem(itemName: string): InventoryItem {
    const item = this.store.getItem(itemName);
    if (!item) {
      throw new NotFoundError(itemName);
    }
    return item;
  }

  getItemPrice(itemName: string): number {
    return this.getItem(itemName).unitPrice;
  }

  findByCategory(category: string): InventoryItem[] {
    const wanted = category.toLowerCase();
    return this.store.listItems().filter((item) => item.category === wanted);
  }

  /**
   * Fuzzy match against catalog names: substring hits first; failing that,
   * items sharing word tokens with the term, most shared tokens first.
   */
  findSimilar(term: string): InventoryItem[] {
    return this.rankSimilar(term).map(({ item }) => item);
  }

  /**
   * Map a customer's wording to an exact catalog item. A fuzzy match must
   * have a single best hit; ties are reported, not guessed.
   */
  resolveItem(term: string): InventoryItem {
    const exact = this.store.getItem(term);
    if (exact) return exact;

    const lowered = term.trim().toLowerCase();
    const items = this.store.listItems();
    const caseInsensitive = items.find((item) => item.name.toLowerCase() === lowered);
    if (caseInsensitive) return caseInsensitive;

    const ranked = this.rankSimilar(term);
    const [best, runnerUp] = ranked;
    if (!best) {
      throw new NotFoundError(term);
    }
    if (runnerUp && runnerUp.score === best.score) {
      const tied = ranked.filter(({ score }) => score === best.score).map(({ item }) => item.name);
      throw new NotFoundError(term, `Item '${term}' is ambiguous, it matches ${tied.join(', ')}`);
    }
    return best.item;
  }

  private rankSimilar(term: string): { item: InventoryItem; score: number }[] {
    const needle = term.trim().toLowerCase();
    if (needle === '') return [];

    const items = this.store.listItems();
    const substring = items.filter((item) => item.name.toLowerCase().includes(needle));
    if (substring.length > 0) {
      return substring.map((item) => ({ item, score: Number.POSITIVE_INFINITY }));
    }

    const wanted = tokenize(needle);
    return items
      .map((item) => {
        let score = 0;
        for (const token of tokenize(item.name)) {
          if (wanted.has(token)) score++;
        }
        return { item, score };
      })
      .filter(({ score }) => score > 0)
      .sort((a, b) => b.score - a.score || a.item.name.localeCompare(b.item.name));
  }
}
