/**
 * SidePot.ts
 * Side pot calculation for all-in scenarios
 *
 * Algorithm:
 * 1. Collect the distinct non-zero contribution levels, ascending
 * 2. Sweep consecutive levels; each step is one pot layer funded by every
 *    player who contributed at least that level
 * 3. Only players still in the hand are eligible to win a layer
 *
 * Example:
 * Player A: 100 (all-in)
 * Player B: 300 (all-in)
 * Player C: 1000
 *
 * Results in:
 * - Main pot: 300 (100 * 3) - A, B, C eligible
 * - Side pot 1: 400 ((300-100) * 2) - B, C eligible
 * - Side pot 2: 700 (1000-300) - C only
 */

import type { PlayerId } from '../game/engine/Player';
import { invariant } from '../game/engine/GameErrors';

// ============================================================================
// Types
// ============================================================================

export interface PlayerContributionInfo {
  readonly playerId: PlayerId;
  readonly seat: number;
  readonly totalContribution: number;
  readonly isFolded: boolean;
}

export interface PotLayer {
  readonly index: number;
  /** Contribution threshold that closes this layer */
  readonly level: number;
  /** Chips taken from each contributor for this layer */
  readonly increment: number;
  readonly contributorCount: number;
  readonly total: number;
  readonly eligiblePlayers: readonly PlayerId[];
}

export interface SidePotResult {
  readonly layers: readonly PotLayer[];
  readonly totalAmount: number;
}

// ============================================================================
// Side Pot Calculator
// ============================================================================

export class SidePotCalculator {
  /**
   * Layer player contributions into a main pot and side pots
   */
  static calculate(contributions: readonly PlayerContributionInfo[]): SidePotResult {
    const valid = contributions.filter(c => c.totalContribution > 0);
    const levels = [...new Set(valid.map(c => c.totalContribution))].sort((a, b) => a - b);

    const layers: PotLayer[] = [];
    let previousLevel = 0;

    for (const level of levels) {
      const increment = level - previousLevel;
      const contributors = valid.filter(c => c.totalContribution >= level);
      const eligiblePlayers = contributors.filter(c => !c.isFolded).map(c => c.playerId);
      const total = increment * contributors.length;

      if (eligiblePlayers.length === 0) {
        // Chips nobody left in the hand can win ride with the layer below
        const below = layers.pop();
        invariant(below !== undefined, `no eligible player for contribution level ${level}`);
        layers.push({ ...below, total: below.total + total });
      } else {
        layers.push({
          index: layers.length,
          level,
          increment,
          contributorCount: contributors.length,
          total,
          eligiblePlayers,
        });
      }

      previousLevel = level;
    }

    const result: SidePotResult = {
      layers,
      totalAmount: layers.reduce((sum, layer) => sum + layer.total, 0),
    };

    invariant(
      SidePotCalculator.verifyConservation(contributions, result),
      'pot layers do not sum to the chips contributed'
    );

    return result;
  }

  /**
   * Split an amount among winners listed in payout order. Odd chips go one
   * each to the first winners in that order.
   */
  static splitPot(amount: number, winnerIds: readonly PlayerId[]): Map<PlayerId, number> {
    const payouts = new Map<PlayerId, number>();
    if (winnerIds.length === 0) {
      return payouts;
    }

    const share = Math.floor(amount / winnerIds.length);
    const remainder = amount - share * winnerIds.length;

    winnerIds.forEach((winnerId, i) => {
      payouts.set(winnerId, share + (i < remainder ? 1 : 0));
    });

    return payouts;
  }

  /**
   * Verify layer totals match total contributions
   */
  static verifyConservation(
    contributions: readonly PlayerContributionInfo[],
    result: SidePotResult
  ): boolean {
    const totalContributions = contributions.reduce((sum, c) => sum + c.totalContribution, 0);
    return totalContributions === result.totalAmount;
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Order seats clockwise starting from the seat left of the dealer
 */
export function orderFromDealer<T extends { readonly seat: number }>(
  entries: readonly T[],
  dealerSeat: number,
  seatCount: number
): T[] {
  const distance = (seat: number): number =>
    (((seat - dealerSeat - 1) % seatCount) + seatCount) % seatCount;
  return [...entries].sort((a, b) => distance(a.seat) - distance(b.seat));
}
