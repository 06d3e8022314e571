/**
 * The steps of the request workflow, in the order they run
 */

import { InsufficientFundsError, isOrderDeskError, type OrderDeskError } from '../errors.js';
import { evaluateRestock, type RestockPlan } from '../inventory/restock.js';
import { calculateQuote } from '../pricing/rules.js';
import { Step } from './step.js';
import type { LineFailure, ResolvedLine, RestockOutcome, SoldLine } from './types.js';

function toFailure(itemName: string, error: OrderDeskError): LineFailure {
  return { itemName, code: error.code, reason: error.message };
}

/**
 * Match each requested name to a catalog item. Inquiries also read the
 * stock on the request date; an inquiry without items gets the full snapshot.
 */
export class ResolveItemsStep extends Step {
  override work(): void {
    const request = this.context.require('request');
    const { lookup } = this.services;
    const failures = this.context.get('failures') ?? [];
    this.context.set('failures', failures);

    if (request.items.length === 0) {
      if (request.type !== 'inquiry') {
        this.fail('No items requested', { code: 'INVALID_REQUEST' });
      }
      this.context.set('resolved', []);
      this.context.set('availability', lookup.getSnapshot(request.date));
      return;
    }

    const resolved: ResolvedLine[] = [];
    for (const requested of request.items) {
      try {
        const item = lookup.resolveItem(requested.name);
        resolved.push({ requestedName: requested.name, item, quantity: requested.quantity ?? 0 });
      } catch (error) {
        if (!isOrderDeskError(error)) throw error;
        failures.push(toFailure(requested.name, error));
      }
    }
    this.context.set('resolved', resolved);

    if (resolved.length === 0) {
      this.fail('None of the requested items are in the catalog', { code: 'NOT_FOUND' });
    }

    if (request.type === 'inquiry') {
      const availability: Record<string, number> = {};
      for (const { item } of resolved) {
        availability[item.name] = lookup.getStockLevel(item.name, request.date);
      }
      this.context.set('availability', availability);
    }
  }
}

/**
 * Price the resolved lines at the tier of the whole request
 */
export class PriceRequestStep extends Step {
  override work(): void {
    const resolved = this.context.require('resolved');
    const quote = calculateQuote(
      resolved.map(({ item, quantity }) => ({ item, quantity })),
      this.services.config.discountTiers
    );
    this.context.set('quote', quote);
  }
}

/**
 * Sell each priced line at its discounted price. Lines short of stock are
 * reported and left out; the step fails only when nothing could be sold.
 */
export class RecordSalesStep extends Step {
  override work(): void {
    const request = this.context.require('request');
    const quote = this.context.require('quote');
    const failures = this.context.require('failures');

    const sold: SoldLine[] = [];
    for (const line of quote.lines) {
      try {
        const transaction = this.services.recorder.recordSale(
          line.itemName,
          line.quantity,
          request.date,
          line.netTotal
        );
        sold.push({ line, transaction });
      } catch (error) {
        if (!isOrderDeskError(error)) throw error;
        failures.push(toFailure(line.itemName, error));
      }
    }
    this.context.set('sold', sold);

    if (sold.length === 0) {
      this.fail('No requested line could be fulfilled', { code: 'INSUFFICIENT_STOCK' });
    }
  }
}

/**
 * Check every sold item against its minimum stock level
 */
export class EvaluateRestockStep extends Step {
  override work(): void {
    const sold = this.context.require('sold');
    const { store, config } = this.services;

    const names = [...new Set(sold.map(({ line }) => line.itemName))];
    const plans: RestockPlan[] = [];
    for (const name of names) {
      const item = store.getItem(name);
      if (!item) continue;
      const plan = evaluateRestock(item, item.stock, config.restockMultiplier);
      if (plan.needsRestock) plans.push(plan);
    }
    this.context.set('restockPlans', plans);
  }
}

/**
 * Place a supplier order for each item below its minimum, as far as cash allows
 */
export class ProcessRestockStep extends Step {
  override work(): void {
    const request = this.context.require('request');
    const plans = this.context.require('restockPlans');
    const failures = this.context.require('failures');

    if (plans.length === 0) {
      this.skip('All items at or above minimum stock');
    }

    const restocks: RestockOutcome[] = [];
    for (const plan of plans) {
      try {
        const transaction = this.services.recorder.recordRestock(
          plan.itemName,
          plan.reorderQuantity,
          request.date
        );
        restocks.push({
          itemName: plan.itemName,
          quantity: plan.reorderQuantity,
          cost: transaction.total,
          approved: true,
          transactionId: transaction.id,
        });
      } catch (error) {
        if (!(error instanceof InsufficientFundsError)) throw error;
        restocks.push({
          itemName: plan.itemName,
          quantity: plan.reorderQuantity,
          cost: plan.estimatedCost,
          approved: false,
        });
        failures.push(toFailure(plan.itemName, error));
      }
    }
    this.context.set('restocks', restocks);
  }
}
