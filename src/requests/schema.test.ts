/**
 * Request schema Tests
 */

import { describe, it, expect } from 'vitest';
import { parseRequest } from './schema.js';
import { InvalidQuantityError, InvalidRequestError } from '../errors.js';

function requestErrors(input: unknown): Record<string, string[]> {
  try {
    parseRequest(input);
  } catch (error) {
    if (error instanceof InvalidRequestError) return error.errors.messages;
    throw error;
  }
  throw new Error('expected the request to be rejected');
}

describe('parseRequest', () => {
  it('should accept an order', () => {
    expect(
      parseRequest({ id: 'req-1', type: 'order', date: '2025-04-01', items: [{ name: ' A4 paper ', quantity: 30 }] })
    ).toEqual({ id: 'req-1', type: 'order', date: '2025-04-01', items: [{ name: 'A4 paper', quantity: 30 }] });
  });

  it('should let an inquiry omit items and quantities', () => {
    expect(parseRequest({ type: 'inquiry', date: '2025-04-01' }).items).toEqual([]);
    expect(parseRequest({ type: 'inquiry', date: '2025-04-01', items: [{ name: 'Cardstock' }] }).items).toEqual([
      { name: 'Cardstock' },
    ]);
  });

  it('should raise InvalidQuantityError for quantities that are not positive integers', () => {
    const base = { type: 'order', date: '2025-04-01' };

    expect(() => parseRequest({ ...base, items: [{ name: 'A4 paper', quantity: 0 }] })).toThrow(InvalidQuantityError);
    expect(() => parseRequest({ ...base, items: [{ name: 'A4 paper', quantity: 2.5 }] })).toThrow(
      InvalidQuantityError
    );
    expect(() => parseRequest({ ...base, items: [{ name: 'A4 paper', quantity: 'ten' }] })).toThrow(
      'Invalid items.0.quantity: ten'
    );
  });

  it('should require quantities on quotes and orders', () => {
    expect(requestErrors({ type: 'quote', date: '2025-04-01', items: [{ name: 'A4 paper' }] })).toEqual({
      'items.0.quantity': ['Quantity is required'],
    });
  });

  it('should require items on quotes and orders', () => {
    expect(requestErrors({ type: 'order', date: '2025-04-01', items: [] })).toEqual({
      items: ['Items are required for order requests'],
    });
  });

  it('should reject a malformed date', () => {
    expect(requestErrors({ type: 'inquiry', date: '04/01/2025' })).toEqual({
      date: ['Expected an ISO date (YYYY-MM-DD)'],
    });
  });

  it('should reject an impossible day or a zoned date-time', () => {
    expect(requestErrors({ type: 'quote', date: '2025-02-30', items: [{ name: 'A4 paper', quantity: 10 }] })).toEqual({
      date: ['Expected an ISO date (YYYY-MM-DD)'],
    });
    expect(requestErrors({ type: 'inquiry', date: '2025-02-01T23:30:00-05:00' })).toEqual({
      date: ['Expected an ISO date (YYYY-MM-DD)'],
    });
  });

  it('should report problems with the request itself', () => {
    expect(Object.keys(requestErrors(null))).toEqual(['request']);
    expect(Object.keys(requestErrors({ type: 'refund', date: '2025-04-01' }))).toEqual(['type']);
  });
});
