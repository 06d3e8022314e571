/**
 * FinancialGuard - keeps a safety margin of cash in reserve
 */

import { getConfiguration } from '../config.js';
import { InvalidQuantityError } from '../errors.js';
import { isOnOrBefore } from '../utils/dates.js';
import { roundMoney, toCents } from '../utils/money.js';
import type { LedgerStore } from '../ledger/types.js';

const RESERVE_EPSILON = 1e-9;

export interface PurchaseDecision {
  approved: boolean;
  purchaseAmount: number;
  currentBalance: number;
  /** Cash that must remain after the purchase */
  minimumBalance: number;
  projectedBalance: number;
  /** Largest purchase the guard would approve */
  availableForPurchase: number;
  safetyMargin: number;
}

export interface FinancialGuardOptions {
  safetyMargin?: number;
}

export class FinancialGuard {
  constructor(
    private readonly store: LedgerStore,
    private readonly options: FinancialGuardOptions = {}
  ) {}

  get safetyMargin(): number {
    return this.options.safetyMargin ?? getConfiguration().safetyMargin;
  }

  /**
   * Cash balance now, or rebuilt from the opening balance and the log as of a date
   */
  cashBalance(asOf?: string): number {
    if (asOf === undefined) {
      return this.store.getCashBalance();
    }

    const opening = this.store.getOpening();
    let cash = isOnOrBefore(opening.openedAt, asOf) ? opening.cash : 0;
    for (const t of this.store.listTransactions({ asOf })) {
      cash += t.type === 'sale' ? t.total : -t.total;
    }
    return roundMoney(cash);
  }

  /**
   * Approve a purchase only if the projected balance keeps the safety margin.
   * A rejection is returned, never thrown.
   */
  approve(cost: number, asOf?: string): PurchaseDecision {
    if (!Number.isFinite(cost) || cost < 0) {
      throw new InvalidQuantityError(cost, 'purchase cost');
    }

    const margin = this.safetyMargin;
    const currentBalance = this.cashBalance(asOf);
    const projectedBalance = roundMoney(currentBalance - cost);
    // the reserve is rounded up to a whole cent; the epsilon absorbs float noise
    const reserveCents = Math.ceil(toCents(currentBalance) * margin - RESERVE_EPSILON);

    return {
      approved: toCents(projectedBalance) >= reserveCents,
      purchaseAmount: roundMoney(cost),
      currentBalance,
      minimumBalance: reserveCents / 100,
      projectedBalance,
      availableForPurchase: roundMoney(currentBalance - reserveCents / 100),
      safetyMargin: margin,
    };
  }
}
