/**
 * Shared shapes for the request workflow
 */

import type { OrderDeskConfiguration } from '../config.js';
import type { ErrorCode } from '../errors.js';
import type { FinancialGuard } from '../finance/guard.js';
import type { InventoryLookup } from '../inventory/lookup.js';
import type { RestockPlan } from '../inventory/restock.js';
import type { InventoryItem, LedgerStore, Transaction } from '../ledger/types.js';
import type { DeliveryEstimate } from '../pricing/delivery.js';
import type { Quote, QuoteLine } from '../pricing/rules.js';
import type { OrderRequest, RequestType } from '../requests/schema.js';
import type { TransactionRecorder } from '../transactions/recorder.js';
import type { RequestState } from './states.js';

/**
 * A requested line matched to a catalog item
 */
export interface ResolvedLine {
  requestedName: string;
  item: InventoryItem;
  quantity: number;
}

export interface SoldLine {
  line: QuoteLine;
  transaction: Transaction;
}

/**
 * A requested line that could not be served
 */
export interface LineFailure {
  itemName: string;
  code: ErrorCode;
  reason: string;
}

export interface RestockOutcome {
  itemName: string;
  quantity: number;
  cost: number;
  approved: boolean;
  transactionId?: number;
}

/**
 * Values the steps of one request hand to each other
 */
export interface RequestContext {
  request: OrderRequest;
  resolved: ResolvedLine[];
  /** Stock on the request date, for inquiries */
  availability: Record<string, number>;
  quote: Quote;
  sold: SoldLine[];
  restockPlans: RestockPlan[];
  restocks: RestockOutcome[];
  failures: LineFailure[];
}

/**
 * Collaborators every step can reach
 */
export interface StepServices {
  store: LedgerStore;
  lookup: InventoryLookup;
  recorder: TransactionRecorder;
  guard: FinancialGuard;
  config: OrderDeskConfiguration;
}

export type ResponseStatus = 'fulfilled' | 'partial' | 'rejected';

export interface OrderResponse {
  requestId: string;
  type: RequestType;
  date: string;
  status: ResponseStatus;
  lineItems: QuoteLine[];
  subtotal: number;
  discountRate: number;
  discountAmount: number;
  totalPrice: number;
  deliveryEstimate?: DeliveryEstimate;
  availability?: Record<string, number>;
  restocks: RestockOutcome[];
  failures: LineFailure[];
  failureReason?: string;
  history: RequestState[];
  /** `Step:status` of every step that ran */
  steps: string[];
}
