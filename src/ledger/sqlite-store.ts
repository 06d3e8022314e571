/**
 * SqliteLedgerStore - LedgerStore backed by a SQLite file via better-sqlite3
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { roundMoney } from '../utils/money.js';
import { endOfDay } from '../utils/dates.js';
import { parseLedgerSeed, type LedgerSeedInput } from './schema.js';
import type {
  InventoryItem,
  ItemCategory,
  LedgerOpening,
  LedgerStore,
  NewTransaction,
  QuoteHistoryEntry,
  Transaction,
  TransactionFilter,
  TransactionType,
} from './types.js';

type SqliteDatabase = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS inventory (
    name            TEXT PRIMARY KEY,
    category        TEXT NOT NULL,
    unit_price      REAL NOT NULL,
    stock           INTEGER NOT NULL CHECK (stock >= 0),
    min_stock_level INTEGER NOT NULL,
    opening_stock   INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS ledger (
    id           INTEGER PRIMARY KEY CHECK (id = 1),
    opened_at    TEXT NOT NULL,
    opening_cash REAL NOT NULL,
    cash_balance REAL NOT NULL CHECK (cash_balance >= 0)
  );

  CREATE TABLE IF NOT EXISTS transactions (
    id          INTEGER PRIMARY KEY AUTOINCREMENT,
    type        TEXT NOT NULL CHECK (type IN ('sale', 'stock_order')),
    item_name   TEXT NOT NULL REFERENCES inventory(name),
    quantity    INTEGER NOT NULL,
    unit_price  REAL NOT NULL,
    total       REAL NOT NULL,
    date        TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS quote_history (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    request_text TEXT NOT NULL,
    total_amount REAL NOT NULL,
    explanation  TEXT NOT NULL,
    job_type     TEXT,
    order_size   TEXT,
    event_type   TEXT,
    date         TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_transactions_item_date ON transactions(item_name, date);
  CREATE INDEX IF NOT EXISTS idx_quote_history_date ON quote_history(date);
`;

interface ItemRow {
  name: string;
  category: ItemCategory;
  unit_price: number;
  stock: number;
  min_stock_level: number;
}

interface LedgerRow {
  opened_at: string;
  opening_cash: number;
  cash_balance: number;
}

interface TransactionRow {
  id: number;
  type: TransactionType;
  item_name: string;
  quantity: number;
  unit_price: number;
  total: number;
  date: string;
}

interface QuoteRow {
  request_text: string;
  total_amount: number;
  explanation: string;
  job_type: string | null;
  order_size: string | null;
  event_type: string | null;
  date: string;
}

export interface SqliteLedgerStoreOptions {
  /** Database file, or `:memory:` */
  path: string;
  /** Seed applied only when the database has never been seeded */
  seed?: LedgerSeedInput;
}

/**
 * Open (or create) a SQLite database at the given path.
 * Enables WAL mode for better concurrent read performance.
 */
export function openDatabase(dbPath: string): SqliteDatabase {
  if (dbPath !== ':memory:') {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  return db;
}

/**
 * Execute `fn` inside a BEGIN/COMMIT/ROLLBACK transaction.
 * When a transaction is already open, `fn` joins it.
 */
export function withTransaction<T>(db: SqliteDatabase, fn: () => T): T {
  if (db.inTransaction) {
    return fn();
  }

  db.exec('BEGIN');
  try {
    const result = fn();
    db.exec('COMMIT');
    return result;
  } catch (err) {
    db.exec('ROLLBACK');
    throw err;
  }
}

/**
 * Resolve the database path from env or default.
 */
export function resolveDbPath(filename: string): string {
  const dataDir = process.env['ORDER_DESK_DATA_DIR'] ?? './data';
  return `${dataDir}/${filename}`;
}

export class SqliteLedgerStore implements LedgerStore {
  private readonly db: SqliteDatabase;

  constructor(options: SqliteLedgerStoreOptions) {
    this.db = openDatabase(options.path);
    this.db.exec(SCHEMA);
    if (options.seed) {
      this.seed(options.seed);
    }
  }

  /**
   * Seed items, cash and quote history. Does nothing if the ledger was already seeded.
   * @returns whether the seed was applied
   */
  seed(input: LedgerSeedInput): boolean {
    const existing = this.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM ledger')
      .get();
    if (existing && existing.count > 0) return false;

    const seed = parseLedgerSeed(input);

    withTransaction(this.db, () => {
      const insertItem = this.db.prepare(
        `INSERT INTO inventory (name, category, unit_price, stock, min_stock_level, opening_stock)
         VALUES (?, ?, ?, ?, ?, ?)`
      );
      for (const item of seed.items) {
        insertItem.run(item.name, item.category, item.unitPrice, item.stock, item.minStockLevel, item.stock);
      }

      const cash = roundMoney(seed.cash);
      this.db
        .prepare('INSERT INTO ledger (id, opened_at, opening_cash, cash_balance) VALUES (1, ?, ?, ?)')
        .run(seed.openedAt, cash, cash);

      const insertQuote = this.db.prepare(
        `INSERT INTO quote_history (request_text, total_amount, explanation, job_type, order_size, event_type, date)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      );
      for (const q of seed.quoteHistory) {
        insertQuote.run(
          q.requestText,
          q.totalAmount,
          q.explanation,
          q.jobType ?? null,
          q.orderSize ?? null,
          q.eventType ?? null,
          q.date
        );
      }
    });

    return true;
  }

  getItem(name: string): InventoryItem | undefined {
    const row = this.db
      .prepare<[string], ItemRow>(
        'SELECT name, category, unit_price, stock, min_stock_level FROM inventory WHERE name = ?'
      )
      .get(name);
    return row ? toItem(row) : undefined;
  }

  listItems(): InventoryItem[] {
    return this.db
      .prepare<[], ItemRow>(
        'SELECT name, category, unit_price, stock, min_stock_level FROM inventory ORDER BY name'
      )
      .all()
      .map(toItem);
  }

  setStock(name: string, quantity: number): void {
    const info = this.db.prepare('UPDATE inventory SET stock = ? WHERE name = ?').run(quantity, name);
    if (info.changes === 0) {
      throw new Error(`Unknown item '${name}'`);
    }
  }

  getCashBalance(): number {
    return this.ledgerRow().cash_balance;
  }

  setCashBalance(amount: number): void {
    this.db.prepare('UPDATE ledger SET cash_balance = ? WHERE id = 1').run(roundMoney(amount));
  }

  appendTransaction(input: NewTransaction): Transaction {
    const info = this.db
      .prepare(
        `INSERT INTO transactions (type, item_name, quantity, unit_price, total, date)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(input.type, input.itemName, input.quantity, input.unitPrice, input.total, input.date);

    return Object.freeze({ ...input, id: Number(info.lastInsertRowid) });
  }

  listTransactions(filter: TransactionFilter = {}): Transaction[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    if (filter.itemName !== undefined) {
      conditions.push('item_name = ?');
      params.push(filter.itemName);
    }
    if (filter.type !== undefined) {
      conditions.push('type = ?');
      params.push(filter.type);
    }
    if (filter.asOf !== undefined) {
      conditions.push('date <= ?');
      params.push(endOfDay(filter.asOf));
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    return this.db
      .prepare<(string | number)[], TransactionRow>(
        `SELECT id, type, item_name, quantity, unit_price, total, date FROM transactions ${where} ORDER BY id`
      )
      .all(...params)
      .map(toTransaction);
  }

  getOpening(): LedgerOpening {
    const ledger = this.ledgerRow();
    const rows = this.db
      .prepare<[], { name: string; opening_stock: number }>('SELECT name, opening_stock FROM inventory')
      .all();

    return {
      openedAt: ledger.opened_at,
      cash: ledger.opening_cash,
      stock: Object.fromEntries(rows.map((row) => [row.name, row.opening_stock])),
    };
  }

  searchQuoteHistory(terms: string[], limit = 5): QuoteHistoryEntry[] {
    const conditions: string[] = [];
    const params: (string | number)[] = [];

    for (const term of terms) {
      // instr() takes the term literally, LIKE would treat % and _ as wildcards
      conditions.push('(instr(LOWER(request_text), ?) > 0 OR instr(LOWER(explanation), ?) > 0)');
      const needle = term.toLowerCase();
      params.push(needle, needle);
    }

    const where = conditions.length > 0 ? conditions.join(' AND ') : '1=1';
    params.push(limit);

    return this.db
      .prepare<(string | number)[], QuoteRow>(
        `SELECT request_text, total_amount, explanation, job_type, order_size, event_type, date
         FROM quote_history
         WHERE ${where}
         ORDER BY date DESC, id ASC
         LIMIT ?`
      )
      .all(...params)
      .map(toQuote);
  }

  transaction<T>(fn: () => T): T {
    return withTransaction(this.db, fn);
  }

  close(): void {
    this.db.close();
  }

  private ledgerRow(): LedgerRow {
    const row = this.db
      .prepare<[], LedgerRow>('SELECT opened_at, opening_cash, cash_balance FROM ledger WHERE id = 1')
      .get();
    if (!row) {
      throw new Error('Ledger not seeded, call seed() first');
    }
    return row;
  }
}

function toItem(row: ItemRow): InventoryItem {
  return {
    name: row.name,
    category: row.category,
    unitPrice: row.unit_price,
    stock: row.stock,
    minStockLevel: row.min_stock_level,
  };
}

function toTransaction(row: TransactionRow): Transaction {
  return Object.freeze({
    id: row.id,
    type: row.type,
    itemName: row.item_name,
    quantity: row.quantity,
    unitPrice: row.unit_price,
    total: row.total,
    date: row.date,
  });
}

function toQuote(row: QuoteRow): QuoteHistoryEntry {
  return {
    requestText: row.request_text,
    totalAmount: row.total_amount,
    explanation: row.explanation,
    jobType: row.job_type ?? undefined,
    orderSize: row.order_size ?? undefined,
    eventType: row.event_type ?? undefined,
    date: row.date,
  };
}
