/**
 * Money helper Tests
 */

import { describe, it, expect } from 'vitest';
import { formatMoney, roundMoney, toCents } from './money.js';

describe('money', () => {
  it('should round to cents', () => {
    expect(roundMoney(0.1 + 0.2)).toBe(0.3);
    expect(roundMoney(60 * 0.05)).toBe(3);
    expect(toCents(800.01)).toBe(80001);
  });

  it('should format dollars with separators', () => {
    expect(formatMoney(1234.5)).toBe('$1,234.50');
    expect(formatMoney(0)).toBe('$0.00');
  });
});
