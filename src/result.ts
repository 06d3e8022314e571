/**
 * StepResult - Immutable outcome of one workflow step
 */

import type { ErrorCode } from './errors.js';

/**
 * Execution states
 */
export type State = 'initialized' | 'executing' | 'complete' | 'interrupted';

/**
 * Execution statuses
 */
export type Status = 'success' | 'skipped' | 'failed';

/**
 * Outcome combines state and status
 */
export type Outcome = 'success' | 'skipped' | 'failed' | 'interrupted';

/**
 * Result metadata
 */
export interface ResultMetadata {
  [key: string]: unknown;
  code?: ErrorCode;
  runtime?: number;
}

/**
 * Options for creating a result
 */
export interface ResultOptions {
  step: string;
  stepId: string;
  requestId: string;
  index: number;
  state?: State;
  status?: Status;
  reason?: string;
  cause?: Error;
  metadata?: ResultMetadata;
}

/**
 * Immutable result object representing the outcome of a step.
 */
export class StepResult {
  /** Step class name */
  readonly step: string;

  readonly stepId: string;

  /** Id of the request whose chain holds this result */
  readonly requestId: string;

  /** Position in the request's chain */
  readonly index: number;

  readonly state: State;
  readonly status: Status;

  /** Reason for interruption (skip/fail) */
  readonly reason?: string;

  /** The exception that caused the interruption */
  readonly cause?: Error;

  readonly metadata: ResultMetadata;

  constructor(options: ResultOptions) {
    this.step = options.step;
    this.stepId = options.stepId;
    this.requestId = options.requestId;
    this.index = options.index;
    this.state = options.state ?? 'initialized';
    this.status = options.status ?? 'success';
    this.reason = options.reason;
    this.cause = options.cause;
    this.metadata = options.metadata ?? {};

    Object.freeze(this);
    Object.freeze(this.metadata);
  }

  get success(): boolean {
    return this.status === 'success';
  }

  get skipped(): boolean {
    return this.status === 'skipped';
  }

  get failed(): boolean {
    return this.status === 'failed';
  }

  get outcome(): Outcome {
    if (this.state === 'interrupted') {
      return this.status === 'skipped' ? 'skipped' : 'interrupted';
    }
    return this.status;
  }

  /**
   * Copy this result with extra metadata merged in
   */
  withMetadata(metadata: ResultMetadata): StepResult {
    return new StepResult({
      step: this.step,
      stepId: this.stepId,
      requestId: this.requestId,
      index: this.index,
      state: this.state,
      status: this.status,
      reason: this.reason,
      cause: this.cause,
      metadata: { ...this.metadata, ...metadata },
    });
  }

  toJSON(): ResultJSON {
    return {
      index: this.index,
      requestId: this.requestId,
      step: this.step,
      stepId: this.stepId,
      state: this.state,
      status: this.status,
      outcome: this.outcome,
      reason: this.reason,
      metadata: this.metadata,
    };
  }

  [Symbol.toStringTag] = 'StepResult';
}

/**
 * JSON representation of a result
 */
export interface ResultJSON {
  index: number;
  requestId: string;
  step: string;
  stepId: string;
  state: State;
  status: Status;
  outcome: Outcome;
  reason?: string;
  metadata: ResultMetadata;
}
