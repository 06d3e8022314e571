/**
 * Chain - Ordered record of the step results produced for one request
 */

import { v4 as uuidv4 } from 'uuid';
import type { StepResult } from './result.js';

export class Chain {
  /** Request id; shared by every result in the chain */
  readonly id: string;

  private readonly _results: StepResult[] = [];

  private _index = 0;

  constructor(options?: { id?: string }) {
    this.id = options?.id ?? uuidv4();
  }

  addResult(result: StepResult): void {
    this._results.push(result);
  }

  /**
   * Get the next index and increment
   */
  nextIndex(): number {
    return this._index++;
  }

  /**
   * `Step:status` for every result, in execution order
   */
  get steps(): string[] {
    return this._results.map((r) => `${r.step}:${r.status}`);
  }

  [Symbol.toStringTag] = 'Chain';
}

export function createChain(options?: { id?: string }): Chain {
  return new Chain(options);
}
