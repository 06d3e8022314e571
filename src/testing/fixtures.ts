/**
 * Shared test fixtures
 */

import { Writable } from 'node:stream';
import { createDefaultConfiguration, type OrderDeskConfiguration } from '../config.js';
import { FinancialGuard } from '../finance/guard.js';
import { InventoryLookup } from '../inventory/lookup.js';
import { InMemoryLedgerStore } from '../ledger/memory-store.js';
import { TransactionRecorder } from '../transactions/recorder.js';
import { Logger } from '../logging/logger.js';
import { JsonFormatter } from '../logging/formatters/json.js';
import type { LedgerSeedInput } from '../ledger/schema.js';
import type { LedgerStore } from '../ledger/types.js';
import type { StepServices } from '../workflow/types.js';

export function createSeed(overrides: Partial<LedgerSeedInput> = {}): LedgerSeedInput {
  return {
    openedAt: '2025-01-01',
    cash: 1000,
    items: [
      { name: 'A4 paper', category: 'paper', unitPrice: 0.05, stock: 100, minStockLevel: 50 },
      { name: 'Glossy paper', category: 'paper', unitPrice: 0.2, stock: 2000, minStockLevel: 100 },
      { name: 'Cardstock', category: 'paper', unitPrice: 0.15, stock: 600, minStockLevel: 200 },
      { name: 'Paper plates', category: 'product', unitPrice: 0.1, stock: 0, minStockLevel: 100 },
      { name: 'Poster paper', category: 'large_format', unitPrice: 0.25, stock: 300, minStockLevel: 50 },
    ],
    quoteHistory: [
      {
        requestText: 'Glossy paper for a school fair',
        totalAmount: 40,
        explanation: 'Bulk glossy paper at the standard rate',
        jobType: 'school staff',
        orderSize: 'small',
        eventType: 'fair',
        date: '2024-11-02',
      },
      {
        requestText: 'Cardstock and glossy paper for a wedding',
        totalAmount: 120,
        explanation: 'Mixed order with a 10% bulk discount',
        date: '2024-12-15',
      },
      {
        requestText: 'Poster paper for a concert',
        totalAmount: 75,
        explanation: 'Large format order',
        date: '2024-10-20',
      },
    ],
    ...overrides,
  };
}

export function createStore(overrides: Partial<LedgerSeedInput> = {}): InMemoryLedgerStore {
  return new InMemoryLedgerStore(createSeed(overrides));
}

/**
 * Writable that keeps every line written to it
 */
export class MemoryStream extends Writable {
  readonly lines: string[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    for (const line of chunk.toString().split('\n')) {
      if (line !== '') this.lines.push(line);
    }
    callback();
  }
}

export function createTestLogger(): { logger: Logger; output: MemoryStream } {
  const output = new MemoryStream();
  return { logger: new Logger({ output, formatter: new JsonFormatter(), level: 'debug' }), output };
}

export function createServices(
  store: LedgerStore = createStore(),
  config: OrderDeskConfiguration = createDefaultConfiguration()
): StepServices {
  const guard = new FinancialGuard(store, { safetyMargin: config.safetyMargin });
  return {
    store,
    lookup: new InventoryLookup(store),
    recorder: new TransactionRecorder(store, guard),
    guard,
    config,
  };
}
