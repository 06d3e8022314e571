/**
 * Request lifecycle - the states a request moves through and the edges between them
 */

import { IllegalTransitionError } from '../errors.js';

export type RequestState =
  | 'received'
  | 'items_resolved'
  | 'priced'
  | 'transacted'
  | 'restock_evaluated'
  | 'restock_approved'
  | 'restock_declined'
  | 'responded';

/**
 * Allowed transitions. Every state may end the request early by responding.
 */
export const TRANSITIONS: Readonly<Record<RequestState, readonly RequestState[]>> = {
  received: ['items_resolved', 'responded'],
  items_resolved: ['priced', 'responded'],
  priced: ['transacted', 'responded'],
  transacted: ['restock_evaluated', 'responded'],
  restock_evaluated: ['restock_approved', 'restock_declined', 'responded'],
  restock_approved: ['responded'],
  restock_declined: ['responded'],
  responded: [],
};

export class RequestLifecycle {
  private _state: RequestState = 'received';
  private readonly _history: RequestState[] = ['received'];

  get state(): RequestState {
    return this._state;
  }

  /** Every state visited, in order */
  get history(): readonly RequestState[] {
    return this._history;
  }

  get done(): boolean {
    return this._state === 'responded';
  }

  canTransition(to: RequestState): boolean {
    return TRANSITIONS[this._state].includes(to);
  }

  /**
   * @throws IllegalTransitionError when `to` is not reachable from the current state
   */
  transition(to: RequestState): void {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this._state, to);
    }
    this._state = to;
    this._history.push(to);
  }
}
