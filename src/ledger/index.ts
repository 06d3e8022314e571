/**
 * Ledger store - items, cash balance, transaction log and quote history
 */

export type {
  InventoryItem,
  ItemCategory,
  Transaction,
  TransactionType,
  NewTransaction,
  TransactionFilter,
  QuoteHistoryEntry,
  LedgerOpening,
  LedgerStore,
} from './types.js';

export {
  LedgerSeedSchema,
  SeedItemSchema,
  ItemCategorySchema,
  QuoteHistoryEntrySchema,
  parseLedgerSeed,
  type LedgerSeed,
  type LedgerSeedInput,
} from './schema.js';

export { InMemoryLedgerStore } from './memory-store.js';

export {
  SqliteLedgerStore,
  openDatabase,
  withTransaction,
  resolveDbPath,
  type SqliteLedgerStoreOptions,
} from './sqlite-store.js';
