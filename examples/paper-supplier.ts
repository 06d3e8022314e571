/**
 * Paper Supplier Example
 *
 * Runs a handful of requests through an order desk backed by a SQLite ledger:
 * - an inquiry for the stock snapshot
 * - a multi-line quote at the bulk tier
 * - an order that drives an item below its minimum and triggers a restock
 * - an order for something the catalog does not carry
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  OrderDesk,
  RuntimeMiddleware,
  SqliteLedgerStore,
  applyEnv,
  configurationFromEnv,
  configure,
  formatMoney,
  getConfiguration,
  parseLedgerSeed,
} from '../src/index.js';

const seedPath = fileURLToPath(new URL('./data/seed.json', import.meta.url));
const seed = parseLedgerSeed(JSON.parse(readFileSync(seedPath, 'utf8')));

configure((config) => {
  applyEnv(config, configurationFromEnv());
  config.middlewares.register(RuntimeMiddleware);
});

const store = new SqliteLedgerStore({ path: ':memory:', seed });
const desk = new OrderDesk({ store, config: getConfiguration() });

const responses = await desk.processAll([
  { type: 'inquiry', date: '2025-04-01' },
  {
    type: 'quote',
    date: '2025-04-01',
    items: [
      { name: 'glossy paper', quantity: 400 },
      { name: 'Cardstock', quantity: 300 },
    ],
  },
  {
    type: 'order',
    date: '2025-04-02',
    items: [
      { name: 'Kraft paper', quantity: 300 },
      { name: 'paper cups', quantity: 200 },
    ],
  },
  { type: 'order', date: '2025-04-03', items: [{ name: 'Balloons', quantity: 50 }] },
]);

for (const response of responses) {
  console.log(
    `${response.type.padEnd(8)} ${response.status.padEnd(9)} ${formatMoney(response.totalPrice).padStart(10)}  ${response.history.join(' > ')}`
  );
  for (const restock of response.restocks) {
    console.log(`  restock ${restock.itemName}: ${restock.quantity} units, ${restock.approved ? 'approved' : 'declined'}`);
  }
  for (const failure of response.failures) {
    console.log(`  ${failure.code}: ${failure.reason}`);
  }
}

const report = desk.financialReport('2025-04-03');
console.log(`cash ${formatMoney(report.cashBalance)}, inventory ${formatMoney(report.inventoryValue)}`);
console.log(`health ${desk.financialHealth('2025-04-03').status}`);

store.close();
