/**
 * Player.ts
 * Per-seat player state
 *
 * Players have no behaviour of their own; BettingRound and GameEngine
 * drive every mutation.
 */

import { Card } from './Card';
import { GameErrors, invariant } from './GameErrors';

// ============================================================================
// Types
// ============================================================================

export type PlayerId = string;

export type PlayerStatus = 'active' | 'folded' | 'all-in' | 'sitting-out';

export interface PlayerInit {
  readonly id: PlayerId;
  readonly name: string;
  readonly seat: number;
  readonly chips: number;
}

// ============================================================================
// Player
// ============================================================================

export class Player {
  readonly id: PlayerId;
  readonly name: string;
  readonly seat: number;

  private _chips: number;
  private _streetContribution = 0;
  private _handContribution = 0;
  private _holeCards: Card[] = [];
  private _status: PlayerStatus = 'sitting-out';

  constructor(init: PlayerInit) {
    invariant(Number.isInteger(init.chips) && init.chips >= 0, `invalid starting stack ${init.chips}`);
    this.id = init.id;
    this.name = init.name;
    this.seat = init.seat;
    this._chips = init.chips;
  }

  get chips(): number {
    return this._chips;
  }

  /** Chips committed on the current street */
  get streetContribution(): number {
    return this._streetContribution;
  }

  /** Chips committed across all streets of the hand */
  get handContribution(): number {
    return this._handContribution;
  }

  get status(): PlayerStatus {
    return this._status;
  }

  get holeCards(): readonly Card[] {
    return this._holeCards;
  }

  /** Still contesting the pot (active or all-in) */
  get inHand(): boolean {
    return this._status === 'active' || this._status === 'all-in';
  }

  /**
   * Hole cards as seen by `viewerSeat`; null when hidden
   */
  holeCardsFor(viewerSeat: number | null, revealed: boolean): readonly Card[] | null {
    if (this._holeCards.length === 0) return null;
    if (revealed || viewerSeat === this.seat) return [...this._holeCards];
    return null;
  }

  // ==========================================================================
  // Mutations
  // ==========================================================================

  /**
   * Move chips from the stack into the pot. Committing the last chip puts
   * the player all-in.
   *
   * @throws InsufficientChipsError when amount exceeds the stack
   */
  commit(amount: number): void {
    invariant(Number.isInteger(amount) && amount >= 0, `cannot commit ${amount} chips`);
    if (amount > this._chips) {
      throw GameErrors.insufficientChips(this.seat, amount, this._chips);
    }

    this._chips -= amount;
    this._streetContribution += amount;
    this._handContribution += amount;

    if (this._chips === 0 && this._status === 'active') {
      this._status = 'all-in';
    }
  }

  fold(): void {
    invariant(this._status === 'active', `seat ${this.seat} cannot fold while ${this._status}`);
    this._status = 'folded';
  }

  receiveCards(cards: readonly Card[]): void {
    invariant(this._holeCards.length + cards.length <= 2, `seat ${this.seat} would hold more than 2 cards`);
    this._holeCards.push(...cards);
  }

  award(amount: number): void {
    invariant(Number.isInteger(amount) && amount >= 0, `cannot award ${amount} chips`);
    this._chips += amount;
  }

  /**
   * Clear per-hand state. Players below `minChips` sit the hand out.
   */
  resetForHand(minChips: number): void {
    this._holeCards = [];
    this._streetContribution = 0;
    this._handContribution = 0;
    this._status = this._chips >= minChips && this._chips > 0 ? 'active' : 'sitting-out';
  }

  resetStreet(): void {
    this._streetContribution = 0;
  }
}
