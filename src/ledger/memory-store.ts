/**
 * InMemoryLedgerStore - In-memory implementation of LedgerStore.
 *
 * Suitable for development, testing, and examples.
 * All data is lost when the process exits.
 *
 * @example
 * ```typescript
 * const store = new InMemoryLedgerStore({
 *   openedAt: '2025-01-01',
 *   cash: 50000,
 *   items: [{ name: 'A4 paper', category: 'paper', unitPrice: 0.05, stock: 800, minStockLevel: 200 }],
 * });
 * ```
 */

import { roundMoney } from '../utils/money.js';
import { isOnOrBefore } from '../utils/dates.js';
import { parseLedgerSeed, type LedgerSeedInput } from './schema.js';
import type {
  InventoryItem,
  LedgerOpening,
  LedgerStore,
  NewTransaction,
  QuoteHistoryEntry,
  Transaction,
  TransactionFilter,
} from './types.js';

interface Snapshot {
  items: Map<string, InventoryItem>;
  cash: number;
  transactionCount: number;
  nextId: number;
}

export class InMemoryLedgerStore implements LedgerStore {
  private _items = new Map<string, InventoryItem>();
  private _cash: number;
  private readonly _transactions: Transaction[] = [];
  private readonly _quoteHistory: QuoteHistoryEntry[];
  private readonly _opening: LedgerOpening;
  private _nextId = 1;

  /** Depth of nested transaction() calls */
  private _depth = 0;

  constructor(seed: LedgerSeedInput) {
    const parsed = parseLedgerSeed(seed);

    for (const item of parsed.items) {
      this._items.set(item.name, { ...item });
    }
    this._cash = roundMoney(parsed.cash);
    this._quoteHistory = parsed.quoteHistory.map((entry) => ({ ...entry }));
    this._opening = {
      openedAt: parsed.openedAt,
      cash: this._cash,
      stock: Object.fromEntries(parsed.items.map((item) => [item.name, item.stock])),
    };
  }

  getItem(name: string): InventoryItem | undefined {
    const item = this._items.get(name);
    return item ? { ...item } : undefined;
  }

  listItems(): InventoryItem[] {
    return [...this._items.values()]
      .map((item) => ({ ...item }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  setStock(name: string, quantity: number): void {
    const item = this._items.get(name);
    if (!item) {
      throw new Error(`Unknown item '${name}'`);
    }
    if (quantity < 0) {
      throw new Error(`Stock for '${name}' cannot go negative (${quantity})`);
    }
    this._items.set(name, { ...item, stock: quantity });
  }

  getCashBalance(): number {
    return this._cash;
  }

  setCashBalance(amount: number): void {
    this._cash = roundMoney(amount);
  }

  appendTransaction(input: NewTransaction): Transaction {
    const transaction: Transaction = Object.freeze({ ...input, id: this._nextId++ });
    this._transactions.push(transaction);
    return transaction;
  }

  listTransactions(filter: TransactionFilter = {}): Transaction[] {
    const { itemName, type, asOf } = filter;
    return this._transactions.filter(
      (t) =>
        (itemName === undefined || t.itemName === itemName) &&
        (type === undefined || t.type === type) &&
        (asOf === undefined || isOnOrBefore(t.date, asOf))
    );
  }

  getOpening(): LedgerOpening {
    return this._opening;
  }

  searchQuoteHistory(terms: string[], limit = 5): QuoteHistoryEntry[] {
    const needles = terms.map((term) => term.toLowerCase());
    return this._quoteHistory
      .filter((entry) => {
        const haystack = `${entry.requestText}\n${entry.explanation}`.toLowerCase();
        return needles.every((needle) => haystack.includes(needle));
      })
      .sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0))
      .slice(0, limit)
      .map((entry) => ({ ...entry }));
  }

  transaction<T>(fn: () => T): T {
    if (this._depth > 0) {
      return this.nested(fn);
    }

    const snapshot = this.takeSnapshot();
    try {
      return this.nested(fn);
    } catch (err) {
      this.restore(snapshot);
      throw err;
    }
  }

  // ============================================
  // Utility methods (not part of the interface)
  // ============================================

  get transactionCount(): number {
    return this._transactions.length;
  }

  private nested<T>(fn: () => T): T {
    this._depth++;
    try {
      return fn();
    } finally {
      this._depth--;
    }
  }

  private takeSnapshot(): Snapshot {
    return {
      items: new Map(this._items),
      cash: this._cash,
      transactionCount: this._transactions.length,
      nextId: this._nextId,
    };
  }

  private restore(snapshot: Snapshot): void {
    this._items = snapshot.items;
    this._cash = snapshot.cash;
    this._transactions.length = snapshot.transactionCount;
    this._nextId = snapshot.nextId;
  }
}
