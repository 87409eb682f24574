/**
 * Actions.ts
 * Player actions and their classification
 */

// ============================================================================
// Action
// ============================================================================

/**
 * Closed set of betting actions. `raise.amount` is the increment above the
 * current bet to call; with nothing to call it is the size of the bet.
 */
export type Action =
  | { readonly type: 'fold' }
  | { readonly type: 'check' }
  | { readonly type: 'call' }
  | { readonly type: 'raise'; readonly amount: number }
  | { readonly type: 'all-in' };

export type ActionType = Action['type'];

export const Actions = {
  fold: (): Action => ({ type: 'fold' }),
  check: (): Action => ({ type: 'check' }),
  call: (): Action => ({ type: 'call' }),
  raise: (amount: number): Action => ({ type: 'raise', amount }),
  allIn: (): Action => ({ type: 'all-in' }),
};

// ============================================================================
// Results
// ============================================================================

/**
 * What an accepted action amounted to once chips moved
 */
export type ActionEffect =
  | 'fold'
  | 'check'
  | 'call'
  | 'partial-call'   // all-in for less than the bet to call
  | 'raise'          // full raise, reopens betting
  | 'incomplete-raise'; // all-in raise below the minimum increment

export interface ActionRecord {
  readonly seat: number;
  readonly action: Action;
  readonly effect: ActionEffect;
  /** Chips moved from the stack by this action */
  readonly committed: number;
  readonly betToCall: number;
  readonly isAllIn: boolean;
}

/**
 * Inclusive range for a raise increment
 */
export interface RaiseRange {
  readonly min: number;
  readonly max: number;
}

export interface LegalActions {
  readonly seat: number;
  readonly actions: readonly ActionType[];
  readonly callAmount: number;
  readonly raiseRange: RaiseRange | null;
  readonly allInAmount: number;
}

export function noLegalActions(seat: number): LegalActions {
  return {
    seat,
    actions: [],
    callAmount: 0,
    raiseRange: null,
    allInAmount: 0,
  };
}
