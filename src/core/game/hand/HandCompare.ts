/**
 * HandCompare.ts
 * Hand comparison and winner selection
 *
 * Exact ties are reported so pots can be split.
 */

import {
  Card,
  EvaluatedHand,
  ComparisonResult,
} from './HandTypes';
import { evaluateHand, compareHandRanks } from './HandEvaluator';

// ============================================================================
// Types
// ============================================================================

export interface HandForComparison<TId = string> {
  readonly playerId: TId;
  readonly hand: EvaluatedHand;
}

export interface WinnerResult<TId = string> {
  readonly winnerIds: readonly TId[];
  readonly bestHand: EvaluatedHand;
  readonly isTie: boolean;
}

// ============================================================================
// Core Comparison Functions
// ============================================================================

/**
 * Compare two pre-evaluated hands
 */
export function compareEvaluatedHands(a: EvaluatedHand, b: EvaluatedHand): ComparisonResult {
  const result = compareHandRanks(a, b);
  if (result < 0) return -1;
  if (result > 0) return 1;
  return 0;
}

/**
 * Compare two sets of 5-7 cards
 */
export function compareHands(a: readonly Card[], b: readonly Card[]): ComparisonResult {
  return compareEvaluatedHands(evaluateHand(a), evaluateHand(b));
}

// ============================================================================
// Winner Determination
// ============================================================================

/**
 * All hands tied for best, in input order. Returns null for no hands.
 */
export function determineWinners<TId>(
  hands: readonly HandForComparison<TId>[]
): WinnerResult<TId> | null {
  if (hands.length === 0) return null;

  let best = hands[0].hand;
  let winners: TId[] = [hands[0].playerId];

  for (let i = 1; i < hands.length; i++) {
    const comparison = compareHandRanks(hands[i].hand, best);
    if (comparison > 0) {
      best = hands[i].hand;
      winners = [hands[i].playerId];
    } else if (comparison === 0) {
      winners.push(hands[i].playerId);
    }
  }

  return {
    winnerIds: winners,
    bestHand: best,
    isTie: winners.length > 1,
  };
}
