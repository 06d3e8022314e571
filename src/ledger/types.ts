/**
 * Ledger types - items, transactions, quote history and the store contract
 */

export type ItemCategory = 'paper' | 'product' | 'large_format' | 'specialty';

export interface InventoryItem {
  name: string;
  category: ItemCategory;
  unitPrice: number;
  /** Current stock; never negative */
  stock: number;
  /** Below this level a reorder is recommended */
  minStockLevel: number;
}

export type TransactionType = 'sale' | 'stock_order';

/**
 * Append-only ledger entry. `total` is what the customer paid for a sale,
 * or what the supplier was paid for a stock order.
 */
export interface Transaction {
  readonly id: number;
  readonly type: TransactionType;
  readonly itemName: string;
  readonly quantity: number;
  readonly unitPrice: number;
  readonly total: number;
  readonly date: string;
}

export type NewTransaction = Omit<Transaction, 'id'>;

export interface TransactionFilter {
  itemName?: string;
  type?: TransactionType;
  /** Inclusive upper bound on the transaction date */
  asOf?: string;
}

export interface QuoteHistoryEntry {
  requestText: string;
  totalAmount: number;
  explanation: string;
  jobType?: string;
  orderSize?: string;
  eventType?: string;
  date: string;
}

/**
 * Balances at the moment the ledger was seeded
 */
export interface LedgerOpening {
  openedAt: string;
  cash: number;
  stock: Readonly<Record<string, number>>;
}

/**
 * Shared store for inventory, cash and the transaction log.
 *
 * Mutations made inside `transaction(fn)` are all-or-nothing: if `fn`
 * throws, the store is left exactly as it was and the error is re-thrown.
 * Nested calls join the outermost transaction.
 */
export interface LedgerStore {
  getItem(name: string): InventoryItem | undefined;
  listItems(): InventoryItem[];
  setStock(name: string, quantity: number): void;

  getCashBalance(): number;
  setCashBalance(amount: number): void;

  appendTransaction(input: NewTransaction): Transaction;
  listTransactions(filter?: TransactionFilter): Transaction[];

  getOpening(): LedgerOpening;

  /** Entries matching every term, newest first */
  searchQuoteHistory(terms: string[], limit?: number): QuoteHistoryEntry[];

  transaction<T>(fn: () => T): T;
}
