/**
 * Delivery estimate Tests
 */

import { describe, it, expect } from 'vitest';
import { estimateDelivery, leadTimeDays } from './delivery.js';
import { InvalidQuantityError, InvalidRequestError } from '../errors.js';

describe('leadTimeDays', () => {
  it('should grow with the order size', () => {
    expect(leadTimeDays(1)).toBe(0);
    expect(leadTimeDays(10)).toBe(0);
    expect(leadTimeDays(11)).toBe(1);
    expect(leadTimeDays(100)).toBe(1);
    expect(leadTimeDays(101)).toBe(4);
    expect(leadTimeDays(1000)).toBe(4);
    expect(leadTimeDays(1001)).toBe(7);
  });

  it('should reject a negative unit count', () => {
    expect(() => leadTimeDays(-1)).toThrow(InvalidQuantityError);
  });
});

describe('estimateDelivery', () => {
  it('should add the lead time to the order date', () => {
    expect(estimateDelivery('2025-04-01', 500)).toEqual({
      orderDate: '2025-04-01',
      deliveryDate: '2025-04-05',
      leadTimeDays: 4,
    });
  });

  it('should cross month ends and drop the time of day', () => {
    expect(estimateDelivery('2025-04-28T10:00:00', 2000).deliveryDate).toBe('2025-05-05');
  });

  it('should reject an unparseable date', () => {
    expect(() => estimateDelivery('next tuesday', 5)).toThrow(InvalidRequestError);
  });
});
