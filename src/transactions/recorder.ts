/**
 * TransactionRecorder - the only writer of stock, cash and the transaction log
 */

import {
  InsufficientFundsError,
  InsufficientStockError,
  InvalidQuantityError,
  NotFoundError,
} from '../errors.js';
import { quotePrice } from '../pricing/rules.js';
import { roundMoney } from '../utils/money.js';
import type { FinancialGuard } from '../finance/guard.js';
import type { InventoryItem, LedgerStore, Transaction } from '../ledger/types.js';

export class TransactionRecorder {
  constructor(
    private readonly store: LedgerStore,
    private readonly guard: FinancialGuard
  ) {}

  /**
   * Sell `quantity` units. Cash rises by `price`, or by the quoted price
   * when none is given. Fails without touching the ledger when stock is short.
   */
  recordSale(itemName: string, quantity: number, date: string, price?: number): Transaction {
    assertQuantity(quantity);
    if (price !== undefined && (!Number.isFinite(price) || price < 0)) {
      throw new InvalidQuantityError(price, 'price');
    }

    return this.store.transaction(() => {
      const item = this.requireItem(itemName);
      if (item.stock < quantity) {
        throw new InsufficientStockError(item.name, item.stock, quantity);
      }

      const total = roundMoney(price ?? quotePrice(item, quantity));
      this.store.setStock(item.name, item.stock - quantity);
      this.store.setCashBalance(this.store.getCashBalance() + total);

      return this.store.appendTransaction({
        type: 'sale',
        itemName: item.name,
        quantity,
        unitPrice: item.unitPrice,
        total,
        date,
      });
    });
  }

  /**
   * Buy `quantity` units from the supplier at the catalog price,
   * subject to the financial guard.
   */
  recordRestock(itemName: string, quantity: number, date: string): Transaction {
    assertQuantity(quantity);

    return this.store.transaction(() => {
      const item = this.requireItem(itemName);
      const cost = roundMoney(quantity * item.unitPrice);

      const decision = this.guard.approve(cost);
      if (!decision.approved) {
        throw new InsufficientFundsError(decision);
      }

      this.store.setStock(item.name, item.stock + quantity);
      this.store.setCashBalance(this.store.getCashBalance() - cost);

      return this.store.appendTransaction({
        type: 'stock_order',
        itemName: item.name,
        quantity,
        unitPrice: item.unitPrice,
        total: cost,
        date,
      });
    });
  }

  private requireItem(itemName: string): InventoryItem {
    const item = this.store.getItem(itemName);
    if (!item) {
      throw new NotFoundError(itemName);
    }
    return item;
  }
}

function assertQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new InvalidQuantityError(quantity);
  }
}
