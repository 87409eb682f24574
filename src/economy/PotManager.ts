/**
 * PotManager.ts
 * Pot accounting for a single hand
 *
 * Contributions are collected once the hand reaches showdown or ends by
 * folds. Layers come from SidePotCalculator; every chip collected is paid
 * out exactly once.
 */

import type { Card } from '../game/engine/Card';
import type { PlayerId } from '../game/engine/Player';
import { invariant } from '../game/engine/GameErrors';
import { EvaluatedHand, evaluateHoldem, determineWinners } from '../core/game/hand';
import {
  PlayerContributionInfo,
  PotLayer,
  SidePotCalculator,
  SidePotResult,
  orderFromDealer,
} from './SidePot';

// ============================================================================
// Types
// ============================================================================

export interface ShowdownEntrant {
  readonly playerId: PlayerId;
  readonly seat: number;
  readonly holeCards: readonly Card[];
}

export interface LayerAward {
  readonly layerIndex: number;
  readonly total: number;
  readonly eligiblePlayers: readonly PlayerId[];
  /** Winners in payout order */
  readonly winnerIds: readonly PlayerId[];
  /** Null when the layer was won without a showdown */
  readonly winningHand: EvaluatedHand | null;
  readonly payouts: ReadonlyMap<PlayerId, number>;
}

export interface PotSettlement {
  readonly uncontested: boolean;
  readonly awards: readonly LayerAward[];
  /** Total won per player across all layers */
  readonly payouts: ReadonlyMap<PlayerId, number>;
  readonly totalAwarded: number;
  readonly hands: ReadonlyMap<PlayerId, EvaluatedHand>;
}

const EMPTY_POT: SidePotResult = { layers: [], totalAmount: 0 };

// ============================================================================
// Pot Manager
// ============================================================================

export class PotManager {
  private result: SidePotResult = EMPTY_POT;
  private settled = false;

  /**
   * Layer the hand's contributions. Replaces any previous collection.
   */
  collect(contributions: readonly PlayerContributionInfo[]): SidePotResult {
    invariant(!this.settled, 'pot already settled');
    this.result = SidePotCalculator.calculate(contributions);
    return this.result;
  }

  get layers(): readonly PotLayer[] {
    return this.result.layers;
  }

  get total(): number {
    return this.result.totalAmount;
  }

  get isSettled(): boolean {
    return this.settled;
  }

  /**
   * Award each layer to the best eligible hand. `board` must hold all five
   * community cards.
   */
  resolveShowdown(
    entrants: readonly ShowdownEntrant[],
    board: readonly Card[],
    dealerSeat: number,
    seatCount: number
  ): PotSettlement {
    this.assertSettleable();

    const hands = new Map<PlayerId, EvaluatedHand>();
    for (const entrant of entrants) {
      hands.set(entrant.playerId, evaluateHoldem(entrant.holeCards, board));
    }

    const awards = this.result.layers.map(layer => {
      const contenders = orderFromDealer(
        entrants.filter(e => layer.eligiblePlayers.includes(e.playerId)),
        dealerSeat,
        seatCount
      );
      invariant(
        contenders.length === layer.eligiblePlayers.length,
        `layer ${layer.index} has an eligible player missing from the showdown`
      );

      const winners = determineWinners(
        contenders.map(e => ({ playerId: e.playerId, hand: handOf(hands, e.playerId) }))
      );
      invariant(winners !== null, `layer ${layer.index} has no contenders`);

      return createAward(layer, winners.winnerIds, winners.bestHand);
    });

    return this.settle(awards, false, hands);
  }

  /**
   * Everyone else folded: the remaining player takes every layer
   */
  awardUncontested(winnerId: PlayerId): PotSettlement {
    this.assertSettleable();
    const awards = this.result.layers.map(layer => createAward(layer, [winnerId], null));
    return this.settle(awards, true, new Map());
  }

  reset(): void {
    this.result = EMPTY_POT;
    this.settled = false;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private assertSettleable(): void {
    invariant(!this.settled, 'pot already settled');
    invariant(this.result.layers.length > 0, 'no contributions collected');
  }

  private settle(
    awards: readonly LayerAward[],
    uncontested: boolean,
    hands: ReadonlyMap<PlayerId, EvaluatedHand>
  ): PotSettlement {
    const payouts = new Map<PlayerId, number>();
    for (const award of awards) {
      for (const [playerId, amount] of award.payouts) {
        payouts.set(playerId, (payouts.get(playerId) ?? 0) + amount);
      }
    }

    const totalAwarded = [...payouts.values()].reduce((sum, amount) => sum + amount, 0);
    invariant(
      totalAwarded === this.result.totalAmount,
      `awarded ${totalAwarded} of a ${this.result.totalAmount} pot`
    );

    this.settled = true;
    return { uncontested, awards, payouts, totalAwarded, hands };
  }
}

// ============================================================================
// Helpers
// ============================================================================

function handOf(hands: ReadonlyMap<PlayerId, EvaluatedHand>, playerId: PlayerId): EvaluatedHand {
  const hand = hands.get(playerId);
  invariant(hand !== undefined, `no hand evaluated for ${playerId}`);
  return hand;
}

function createAward(
  layer: PotLayer,
  winnerIds: readonly PlayerId[],
  winningHand: EvaluatedHand | null
): LayerAward {
  return {
    layerIndex: layer.index,
    total: layer.total,
    eligiblePlayers: layer.eligiblePlayers,
    winnerIds,
    winningHand,
    payouts: SidePotCalculator.splitPot(layer.total, winnerIds),
  };
}
