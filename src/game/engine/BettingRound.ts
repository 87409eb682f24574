/**
 * BettingRound.ts
 * Betting state machine for one street
 *
 * Validates every action against the player and round state before any
 * chips move, so a rejected action leaves the round untouched.
 */

import { Player } from './Player';
import {
  Action,
  ActionRecord,
  ActionType,
  LegalActions,
  noLegalActions,
} from './Actions';
import { GameErrors, invariant } from './GameErrors';

// ============================================================================
// Types
// ============================================================================

export type Street = 'preflop' | 'flop' | 'turn' | 'river';

export type BettingRoundState =
  | { readonly kind: 'awaiting'; readonly seat: number }
  | { readonly kind: 'complete' };

/**
 * Seat-indexed table; empty seats are null
 */
export type Seats = readonly (Player | null)[];

export interface BettingRoundInit {
  readonly street: Street;
  readonly seats: Seats;
  /** First seat considered for action (left of the big blind preflop, left of the dealer after) */
  readonly startSeat: number;
  readonly betToCall: number;
  readonly minRaise: number;
}

// ============================================================================
// Turn Order
// ============================================================================

/**
 * Next occupied seat clockwise from `fromSeat` whose player satisfies
 * `predicate`. `fromSeat` itself is considered only when `inclusive`.
 */
export function findNextSeat(
  seats: Seats,
  fromSeat: number,
  predicate: (player: Player) => boolean,
  inclusive = false
): number | null {
  const count = seats.length;
  const start = inclusive ? 0 : 1;
  const end = count - 1;

  for (let offset = start; offset <= end; offset++) {
    const seat = (((fromSeat + offset) % count) + count) % count;
    const player = seats[seat];
    if (player && predicate(player)) {
      return seat;
    }
  }
  return null;
}

// ============================================================================
// Betting Round
// ============================================================================

export class BettingRound {
  readonly street: Street;
  private readonly seats: Seats;
  private _betToCall: number;
  private _minRaise: number;
  private _state: BettingRoundState;
  /** Seats that have acted since the last full raise */
  private readonly acted = new Set<number>();

  constructor(init: BettingRoundInit) {
    invariant(init.minRaise > 0, 'minimum raise must be positive');
    this.street = init.street;
    this.seats = init.seats;
    this._betToCall = init.betToCall;
    this._minRaise = init.minRaise;
    this._state = this.nextState(init.startSeat, true);
  }

  get state(): BettingRoundState {
    return this._state;
  }

  get isComplete(): boolean {
    return this._state.kind === 'complete';
  }

  get awaitingSeat(): number | null {
    return this._state.kind === 'awaiting' ? this._state.seat : null;
  }

  get betToCall(): number {
    return this._betToCall;
  }

  get minRaise(): number {
    return this._minRaise;
  }

  // ==========================================================================
  // Actions
  // ==========================================================================

  /**
   * Apply an action for `seat`
   *
   * @throws OutOfTurnError, InvalidActionError, InvalidRaiseAmountError,
   *         InsufficientChipsError. State is unchanged when thrown.
   */
  apply(seat: number, action: Action): ActionRecord {
    if (this._state.kind === 'complete') {
      throw GameErrors.invalidAction(`The ${this.street} betting round is complete`, { seat });
    }
    if (seat !== this._state.seat) {
      throw GameErrors.outOfTurn(seat, this._state.seat);
    }

    const player = this.seats[seat];
    invariant(player !== null && player.status === 'active', `seat ${seat} is awaited but cannot act`);

    const record = this.resolve(player, action);
    this.acted.add(seat);
    this._state = this.nextState(seat, false);
    return record;
  }

  legalActions(seat: number): LegalActions {
    const player = this.seats[seat];
    if (this.awaitingSeat !== seat || !player) {
      return noLegalActions(seat);
    }

    const toCall = this.toCall(player);
    const chips = player.chips;
    const canRaise = this.mayRaise(player) && chips > toCall;

    const actions: ActionType[] = ['fold', toCall === 0 ? 'check' : 'call'];
    if (canRaise) actions.push('raise');
    if (chips <= toCall || canRaise) actions.push('all-in');

    return {
      seat,
      actions,
      callAmount: Math.min(toCall, chips),
      raiseRange: canRaise
        ? { min: Math.min(this._minRaise, chips - toCall), max: chips - toCall }
        : null,
      allInAmount: chips,
    };
  }

  private resolve(player: Player, action: Action): ActionRecord {
    const toCall = this.toCall(player);

    switch (action.type) {
      case 'fold':
        player.fold();
        return this.record(player, action, 'fold', 0);

      case 'check':
        if (toCall > 0) {
          throw GameErrors.invalidAction('Cannot check when a bet is pending', {
            seat: player.seat,
            toCall,
          });
        }
        return this.record(player, action, 'check', 0);

      case 'call': {
        if (toCall === 0) {
          throw GameErrors.invalidAction('Nothing to call, check instead', { seat: player.seat });
        }
        const amount = Math.min(toCall, player.chips);
        player.commit(amount);
        return this.record(player, action, amount < toCall ? 'partial-call' : 'call', amount);
      }

      case 'raise': {
        this.assertRaise(player, toCall, action.amount);
        return this.commitBeyondCall(player, action, toCall + action.amount);
      }

      case 'all-in': {
        if (player.chips > toCall && !this.mayRaise(player)) {
          throw GameErrors.invalidAction(
            `Betting has not been reopened for seat ${player.seat}, call or fold`,
            { seat: player.seat }
          );
        }
        return this.commitBeyondCall(player, action, player.chips);
      }
    }
  }

  private assertRaise(player: Player, toCall: number, amount: number): void {
    if (!this.mayRaise(player)) {
      throw GameErrors.invalidAction(
        `Betting has not been reopened for seat ${player.seat}, call or fold`,
        { seat: player.seat }
      );
    }

    const max = player.chips - toCall;
    if (!Number.isInteger(amount) || amount <= 0) {
      throw GameErrors.invalidRaiseAmount(amount, Math.min(this._minRaise, Math.max(max, 0)), Math.max(max, 0));
    }
    if (amount > max) {
      throw GameErrors.insufficientChips(player.seat, toCall + amount, player.chips);
    }
    // All-in for less than a full raise is allowed
    if (amount < this._minRaise && amount !== max) {
      throw GameErrors.invalidRaiseAmount(amount, this._minRaise, max);
    }
  }

  /**
   * Commit `total` chips and classify the result against the bet to call
   */
  private commitBeyondCall(player: Player, action: Action, total: number): ActionRecord {
    const previousBet = this._betToCall;
    player.commit(total);
    const contribution = player.streetContribution;

    if (contribution <= previousBet) {
      return this.record(player, action, contribution < previousBet ? 'partial-call' : 'call', total);
    }

    const raiseSize = contribution - previousBet;
    this._betToCall = contribution;

    if (raiseSize >= this._minRaise) {
      this._minRaise = raiseSize;
      this.acted.clear();
      return this.record(player, action, 'raise', total);
    }

    return this.record(player, action, 'incomplete-raise', total);
  }

  private record(
    player: Player,
    action: Action,
    effect: ActionRecord['effect'],
    committed: number
  ): ActionRecord {
    return {
      seat: player.seat,
      action,
      effect,
      committed,
      betToCall: this._betToCall,
      isAllIn: player.status === 'all-in',
    };
  }

  // ==========================================================================
  // Progress
  // ==========================================================================

  private toCall(player: Player): number {
    return Math.max(0, this._betToCall - player.streetContribution);
  }

  private mayRaise(player: Player): boolean {
    return !this.acted.has(player.seat);
  }

  private needsAction(player: Player): boolean {
    return (
      player.status === 'active' &&
      (!this.acted.has(player.seat) || player.streetContribution < this._betToCall)
    );
  }

  private nextState(fromSeat: number, inclusive: boolean): BettingRoundState {
    const present = this.seats.filter((p): p is Player => p !== null);
    const contenders = present.filter(p => p.inHand);
    if (contenders.length <= 1) {
      return { kind: 'complete' };
    }

    // A lone active player with nothing to call has nobody left to bet against
    const active = present.filter(p => p.status === 'active');
    if (active.length <= 1 && active.every(p => p.streetContribution >= this._betToCall)) {
      return { kind: 'complete' };
    }

    const seat = findNextSeat(this.seats, fromSeat, p => this.needsAction(p), inclusive);
    return seat === null ? { kind: 'complete' } : { kind: 'awaiting', seat };
  }
}
