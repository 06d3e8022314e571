/**
 * Step - Base class for one stage of the request workflow
 */

import { v4 as uuidv4 } from 'uuid';
import { getConfiguration } from '../config.js';
import { isOrderDeskError } from '../errors.js';
import { StepResult, type ResultMetadata, type State, type Status } from '../result.js';
import type { Chain } from '../chain.js';
import type { Context } from '../context.js';
import type { RequestContext, StepServices } from './types.js';

/**
 * Middleware wraps a step's execution. Call `next` to run the step
 * (and any inner middleware) and return its result, or a replacement.
 */
export type StepMiddleware = (step: Step, next: () => Promise<StepResult>) => Promise<StepResult>;

export type StepClass = new (
  context: Context<RequestContext>,
  chain: Chain,
  services: StepServices
) => Step;

/**
 * Internal halt signal for skip/fail
 */
class HaltSignal extends Error {
  readonly status: 'skipped' | 'failed';
  readonly reason: string;
  readonly metadata: ResultMetadata;

  constructor(status: 'skipped' | 'failed', reason: string, metadata: ResultMetadata = {}) {
    super(reason);
    this.status = status;
    this.reason = reason;
    this.metadata = metadata;
  }
}

/**
 * Base step. Subclasses put their logic in `work()` and end early with
 * `skip()` or `fail()`. Errors thrown from `work()` never escape `execute()`;
 * they become a failed result.
 *
 * @example
 * ```typescript
 * class CheckCredit extends Step {
 *   work() {
 *     const quote = this.context.require('quote');
 *     if (quote.total === 0) this.skip('Nothing to charge');
 *   }
 * }
 * ```
 */
export abstract class Step {
  readonly id: string;

  readonly context: Context<RequestContext>;

  readonly chain: Chain;

  protected readonly services: StepServices;

  private _state: State = 'initialized';
  private _status: Status = 'success';
  private _reason?: string;
  private _cause?: Error;
  private _metadata: ResultMetadata = {};
  private _index = 0;

  constructor(context: Context<RequestContext>, chain: Chain, services: StepServices) {
    this.id = uuidv4();
    this.context = context;
    this.chain = chain;
    this.services = services;
  }

  abstract work(): void | Promise<void>;

  get name(): string {
    return this.constructor.name;
  }

  /**
   * @throws HaltSignal (caught internally)
   */
  protected skip(reason?: string, metadata?: ResultMetadata): never {
    throw new HaltSignal('skipped', reason ?? 'Unspecified', metadata);
  }

  /**
   * @throws HaltSignal (caught internally)
   */
  protected fail(reason?: string, metadata?: ResultMetadata): never {
    throw new HaltSignal('failed', reason ?? 'Unspecified', metadata);
  }

  /**
   * Run the step through the middleware stack and add its result to the chain.
   * The first middleware is the outermost.
   */
  async execute(
    middlewares: readonly StepMiddleware[] = getConfiguration().middlewares.registry
  ): Promise<StepResult> {
    this._index = this.chain.nextIndex();

    let next = (): Promise<StepResult> => this.executeCore();
    for (const middleware of [...middlewares].reverse()) {
      const inner = next;
      next = () => middleware(this, inner);
    }

    const result = await next();
    this.chain.addResult(result);
    return result;
  }

  private async executeCore(): Promise<StepResult> {
    try {
      this._state = 'executing';
      await this.work();
      this._state = 'complete';
      this._status = 'success';
    } catch (error) {
      this._state = 'interrupted';

      if (error instanceof HaltSignal) {
        this._status = error.status;
        this._reason = error.reason;
        this._metadata = { ...this._metadata, ...error.metadata };
      } else if (isOrderDeskError(error)) {
        this._status = 'failed';
        this._reason = error.message;
        this._cause = error;
        this._metadata = { ...this._metadata, code: error.code };
      } else if (error instanceof Error) {
        this._status = 'failed';
        this._reason = `[${error.name}] ${error.message}`;
        this._cause = error;
      } else {
        this._status = 'failed';
        this._reason = String(error);
      }
    }

    return new StepResult({
      step: this.name,
      stepId: this.id,
      requestId: this.chain.id,
      index: this._index,
      state: this._state,
      status: this._status,
      reason: this._reason,
      cause: this._cause,
      metadata: this._metadata,
    });
  }
}
