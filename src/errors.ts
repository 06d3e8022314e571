/**
 * Error classes for order-desk
 */

import type { PurchaseDecision } from './finance/guard.js';

/**
 * Machine-readable error codes carried into step results and responses
 */
export type ErrorCode =
  | 'NOT_FOUND'
  | 'INVALID_QUANTITY'
  | 'INVALID_REQUEST'
  | 'INSUFFICIENT_STOCK'
  | 'INSUFFICIENT_FUNDS'
  | 'ILLEGAL_TRANSITION';

/**
 * Base error class for all order-desk errors
 */
export class OrderDeskError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = 'OrderDeskError';
    this.code = code;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Raised when an item name does not exist in the catalog
 */
export class NotFoundError extends OrderDeskError {
  readonly itemName: string;

  constructor(itemName: string, message?: string) {
    super('NOT_FOUND', message ?? `Item '${itemName}' not found in inventory catalog`);
    this.name = 'NotFoundError';
    this.itemName = itemName;
  }
}

/**
 * Raised for a quantity or amount that is not a usable number
 */
export class InvalidQuantityError extends OrderDeskError {
  readonly value: unknown;
  readonly field: string;

  constructor(value: unknown, field = 'quantity', message?: string) {
    super('INVALID_QUANTITY', message ?? `Invalid ${field}: ${String(value)}`);
    this.name = 'InvalidQuantityError';
    this.value = value;
    this.field = field;
  }
}

/**
 * Raised when an incoming request does not have the expected shape
 */
export class InvalidRequestError extends OrderDeskError {
  readonly errors: ErrorCollection;

  constructor(errors: ErrorCollection, message?: string) {
    super('INVALID_REQUEST', message ?? `Invalid request: ${errors.fullMessage}`);
    this.name = 'InvalidRequestError';
    this.errors = errors;
  }
}

export class InsufficientStockError extends OrderDeskError {
  readonly itemName: string;
  readonly available: number;
  readonly requested: number;

  constructor(itemName: string, available: number, requested: number) {
    super(
      'INSUFFICIENT_STOCK',
      `Insufficient stock for '${itemName}': available ${available}, requested ${requested}`
    );
    this.name = 'InsufficientStockError';
    this.itemName = itemName;
    this.available = available;
    this.requested = requested;
  }
}

export class InsufficientFundsError extends OrderDeskError {
  readonly decision: PurchaseDecision;

  constructor(decision: PurchaseDecision, message?: string) {
    super(
      'INSUFFICIENT_FUNDS',
      message ??
        `Purchase of $${decision.purchaseAmount.toFixed(2)} would leave $${decision.projectedBalance.toFixed(2)}, ` +
          `below the reserve of $${decision.minimumBalance.toFixed(2)}`
    );
    this.name = 'InsufficientFundsError';
    this.decision = decision;
  }
}

/**
 * Raised when the request lifecycle is asked to move along an edge it does not have
 */
export class IllegalTransitionError extends OrderDeskError {
  readonly from: string;
  readonly to: string;

  constructor(from: string, to: string) {
    super('ILLEGAL_TRANSITION', `Cannot transition from '${from}' to '${to}'`);
    this.name = 'IllegalTransitionError';
    this.from = from;
    this.to = to;
  }
}

export function isOrderDeskError(value: unknown): value is OrderDeskError {
  return value instanceof OrderDeskError;
}

/**
 * Error collection for per-field validation messages
 */
export class ErrorCollection {
  private readonly errors: Map<string, string[]> = new Map();

  add(field: string, message: string): void {
    const existing = this.errors.get(field) ?? [];
    existing.push(message);
    this.errors.set(field, existing);
  }

  has(field: string): boolean {
    return this.errors.has(field);
  }

  get(field: string): string[] {
    return this.errors.get(field) ?? [];
  }

  get isEmpty(): boolean {
    return this.errors.size === 0;
  }

  get size(): number {
    return this.errors.size;
  }

  get messages(): Record<string, string[]> {
    return Object.fromEntries(this.errors);
  }

  get fullMessage(): string {
    const parts: string[] = [];
    for (const [field, msgs] of this.errors) {
      for (const msg of msgs) {
        parts.push(`${field} ${msg}`);
      }
    }
    return parts.join('. ') + (parts.length > 0 ? '.' : '');
  }

  [Symbol.iterator](): IterableIterator<[string, string[]]> {
    return this.errors[Symbol.iterator]();
  }
}
