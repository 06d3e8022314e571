/**
 * OrderDesk - entry point that wires the ledger, rules and workflow together
 */

import { v4 as uuidv4 } from 'uuid';
import { getConfiguration, type OrderDeskConfiguration } from './config.js';
import { isOrderDeskError } from './errors.js';
import { FinancialGuard } from './finance/guard.js';
import {
  assessFinancialHealth,
  generateFinancialReport,
  type FinancialHealth,
  type FinancialReport,
} from './finance/report.js';
import { InventoryLookup } from './inventory/lookup.js';
import { createLogger, type Logger } from './logging/logger.js';
import { findSimilarQuotes } from './pricing/history.js';
import {
  parseRequest,
  RequestTypeSchema,
  type OrderRequest,
  type RequestType,
} from './requests/schema.js';
import { TransactionRecorder } from './transactions/recorder.js';
import { WorkflowSequencer, rejectedResponse } from './workflow/sequencer.js';
import type { LedgerStore, QuoteHistoryEntry } from './ledger/types.js';
import type { StepMiddleware } from './workflow/step.js';
import type { OrderResponse } from './workflow/types.js';

export interface OrderDeskOptions {
  store: LedgerStore;
  /** Defaults to the global configuration */
  config?: OrderDeskConfiguration;
  /** Defaults to a logger built from `config.logger` */
  logger?: Logger;
  /** Defaults to `config.middlewares` */
  middlewares?: readonly StepMiddleware[];
}

/**
 * Processes customer requests one at a time against a shared ledger.
 *
 * @example
 * ```typescript
 * const desk = new OrderDesk({ store: new InMemoryLedgerStore(seed) });
 * const response = await desk.process({
 *   type: 'order',
 *   date: '2025-04-01',
 *   items: [{ name: 'A4 paper', quantity: 500 }],
 * });
 * ```
 */
export class OrderDesk {
  readonly store: LedgerStore;
  readonly config: OrderDeskConfiguration;
  readonly logger: Logger;
  readonly lookup: InventoryLookup;
  readonly guard: FinancialGuard;
  readonly recorder: TransactionRecorder;

  private readonly sequencer: WorkflowSequencer;

  /** Tail of the request queue */
  private pending: Promise<unknown> = Promise.resolve();

  constructor(options: OrderDeskOptions) {
    this.store = options.store;
    this.config = options.config ?? getConfiguration();
    this.logger = options.logger ?? createLogger(this.config.logger);
    this.lookup = new InventoryLookup(this.store);
    this.guard = new FinancialGuard(this.store, { safetyMargin: this.config.safetyMargin });
    this.recorder = new TransactionRecorder(this.store, this.guard);
    this.sequencer = new WorkflowSequencer({
      services: {
        store: this.store,
        lookup: this.lookup,
        recorder: this.recorder,
        guard: this.guard,
        config: this.config,
      },
      logger: this.logger,
      middlewares: options.middlewares,
    });
  }

  /**
   * Validate and run one request. Requests are serialized: a call made
   * while another is running starts only after it finishes.
   */
  process(raw: unknown): Promise<OrderResponse> {
    const run = this.pending.then(() => this.handle(raw));
    // The caller sees failures through `run`; the queue only needs to advance.
    this.pending = run.catch(() => undefined);
    return run;
  }

  async processAll(requests: readonly unknown[]): Promise<OrderResponse[]> {
    const responses: OrderResponse[] = [];
    for (const request of requests) {
      responses.push(await this.process(request));
    }
    return responses;
  }

  financialReport(asOf: string): FinancialReport {
    return generateFinancialReport(this.store, this.lookup, this.guard, asOf);
  }

  financialHealth(asOf: string): FinancialHealth {
    return assessFinancialHealth(this.financialReport(asOf));
  }

  similarQuotes(text: string, limit?: number): QuoteHistoryEntry[] {
    return findSimilarQuotes(this.store, text, limit);
  }

  private async handle(raw: unknown): Promise<OrderResponse> {
    let request: OrderRequest;
    try {
      request = parseRequest(raw);
    } catch (error) {
      if (!isOrderDeskError(error)) throw error;

      const fields = describeRaw(raw);
      this.logger.warn('Request rejected', { requestId: fields.id, code: error.code, reason: error.message });
      return rejectedResponse(fields.id, fields.type, fields.date, error.message);
    }

    return this.sequencer.run(request);
  }
}

/**
 * Best-effort id, type and date of a request that failed validation
 */
function describeRaw(raw: unknown): { id: string; type: RequestType; date: string } {
  const field = (key: string): unknown =>
    typeof raw === 'object' && raw !== null ? Reflect.get(raw, key) : undefined;

  const id = field('id');
  const type = RequestTypeSchema.safeParse(field('type'));
  const date = field('date');

  return {
    id: typeof id === 'string' && id !== '' ? id : uuidv4(),
    type: type.success ? type.data : 'inquiry',
    date: typeof date === 'string' ? date : '',
  };
}
