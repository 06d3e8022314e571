/**
 * order-desk - Rules engine for a paper supplier's order desk
 *
 * @example
 * ```typescript
 * import { OrderDesk, InMemoryLedgerStore } from 'order-desk';
 *
 * const desk = new OrderDesk({ store: new InMemoryLedgerStore(seed) });
 * const response = await desk.process({
 *   type: 'quote',
 *   date: '2025-04-01',
 *   items: [{ name: 'Glossy paper', quantity: 200 }],
 * });
 * ```
 */

// Facade
export { OrderDesk, type OrderDeskOptions } from './desk.js';

// Core
export { Context, createContext } from './context.js';

export {
  StepResult,
  type State,
  type Status,
  type Outcome,
  type ResultMetadata,
  type ResultOptions,
  type ResultJSON,
} from './result.js';

export { Chain, createChain } from './chain.js';

// Errors
export {
  OrderDeskError,
  NotFoundError,
  InvalidQuantityError,
  InvalidRequestError,
  InsufficientStockError,
  InsufficientFundsError,
  IllegalTransitionError,
  ErrorCollection,
  isOrderDeskError,
  type ErrorCode,
} from './errors.js';

// Configuration
export {
  configure,
  getConfiguration,
  resetConfiguration,
  createDefaultConfiguration,
  configurationFromEnv,
  applyEnv,
  MiddlewareRegistry,
  DEFAULT_DISCOUNT_TIERS,
  DEFAULT_LEAD_TIMES,
  type OrderDeskConfiguration,
  type OrderDeskEnv,
  type DiscountTier,
  type LeadTime,
} from './config.js';

// Ledger
export * from './ledger/index.js';

// Rules
export { InventoryLookup, type CatalogEntry } from './inventory/lookup.js';
export { evaluateRestock, type RestockPlan } from './inventory/restock.js';
export * from './pricing/index.js';
export { FinancialGuard, type PurchaseDecision, type FinancialGuardOptions } from './finance/guard.js';
export {
  generateFinancialReport,
  assessFinancialHealth,
  type FinancialReport,
  type FinancialHealth,
  type HealthStatus,
  type InventoryValuation,
  type TopSeller,
} from './finance/report.js';
export { TransactionRecorder } from './transactions/recorder.js';

// Requests
export {
  OrderRequestSchema,
  RequestItemSchema,
  RequestTypeSchema,
  parseRequest,
  type OrderRequest,
  type OrderRequestInput,
  type RequestType,
} from './requests/schema.js';

// Workflow
export * from './workflow/index.js';

// Middleware
export * from './middleware/index.js';

// Utilities
export { roundMoney, toCents, formatMoney } from './utils/money.js';
export { isIsoDate, endOfDay, addDays } from './utils/dates.js';

// Logging
export { Logger, createLogger, type LogLevel, type LoggerOptions } from './logging/logger.js';
