/**
 * OrderDesk Tests
 */

import { describe, it, expect } from 'vitest';
import { OrderDesk } from './desk.js';
import { createDefaultConfiguration } from './config.js';
import { createStore, createTestLogger } from './testing/fixtures.js';

function setup() {
  const store = createStore();
  const { logger, output } = createTestLogger();
  const desk = new OrderDesk({ store, logger, config: createDefaultConfiguration() });
  return { store, desk, output };
}

const order = (quantity: number) => ({
  type: 'order',
  date: '2025-04-01',
  items: [{ name: 'A4 paper', quantity }],
});

describe('OrderDesk', () => {
  it('should process a valid request', async () => {
    const { desk } = setup();
    const response = await desk.process(order(30));

    expect(response.status).toBe('fulfilled');
    expect(response.totalPrice).toBe(1.5);
    expect(response.requestId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should turn an invalid request into a rejected response', async () => {
    const { store, desk, output } = setup();
    const response = await desk.process({
      id: 'req-3',
      type: 'order',
      date: '2025-04-01',
      items: [{ name: 'A4 paper', quantity: -3 }],
    });

    expect(response).toMatchObject({
      requestId: 'req-3',
      type: 'order',
      date: '2025-04-01',
      status: 'rejected',
      failureReason: 'Invalid items.0.quantity: -3',
      history: ['received', 'responded'],
    });
    expect(store.listTransactions()).toEqual([]);
    expect(JSON.parse(output.lines[0] ?? '')).toMatchObject({
      level: 'warn',
      msg: 'Request rejected',
      requestId: 'req-3',
      code: 'INVALID_QUANTITY',
    });
  });

  it('should fall back to defaults for an unreadable request', async () => {
    const { desk } = setup();
    const response = await desk.process('not a request');

    expect(response.status).toBe('rejected');
    expect(response.type).toBe('inquiry');
    expect(response.date).toBe('');
    expect(response.failureReason).toMatch(/^Invalid request: request /);
  });

  it('should run concurrent requests one after another', async () => {
    const { store, desk } = setup();
    const [first, second] = await Promise.all([desk.process(order(60)), desk.process(order(60))]);

    expect(first?.restocks.map((r) => r.approved)).toEqual([true]);
    expect(second?.restocks.map((r) => r.approved)).toEqual([true]);
    expect(store.listTransactions().map((t) => t.type)).toEqual(['sale', 'stock_order', 'sale', 'stock_order']);
    expect(store.getItem('A4 paper')?.stock).toBe(100);
  });

  it('should process a batch in order', async () => {
    const { desk } = setup();
    const responses = await desk.processAll([
      { id: 'a', ...order(30) },
      { id: 'b', type: 'inquiry', date: '2025-04-01', items: [{ name: 'A4 paper' }] },
    ]);

    expect(responses.map((r) => r.requestId)).toEqual(['a', 'b']);
    expect(responses[1]?.availability).toEqual({ 'A4 paper': 70 });
  });

  it('should report finances and find similar quotes', async () => {
    const { desk } = setup();
    await desk.process(order(30));

    const report = desk.financialReport('2025-04-01');
    expect(report.cashBalance).toBe(1001.5);
    expect(report.topSellingProducts).toEqual([{ itemName: 'A4 paper', totalUnits: 30, totalRevenue: 1.5 }]);
    expect(desk.financialHealth('2025-04-01').status).toBe('EXCELLENT');
    expect(desk.similarQuotes('wedding cardstock').map((q) => q.date)).toEqual(['2024-12-15']);
  });
});
