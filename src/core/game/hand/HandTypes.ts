/**
 * HandTypes.ts
 * Type definitions for hand evaluation
 *
 * All types are immutable and shared across the hand evaluation module.
 */

import type { Card, Rank } from '../../../game/engine/Card';

export type { Card, Rank, Suit } from '../../../game/engine/Card';

// ============================================================================
// Hand Category
// ============================================================================

/**
 * Hand category, ascending strength
 */
export enum HandCategory {
  HighCard = 1,
  Pair = 2,
  TwoPair = 3,
  ThreeOfAKind = 4,
  Straight = 5,
  Flush = 6,
  FullHouse = 7,
  FourOfAKind = 8,
  StraightFlush = 9,
  RoyalFlush = 10,
}

export const HAND_CATEGORY_NAMES: Record<HandCategory, string> = {
  [HandCategory.HighCard]: 'High Card',
  [HandCategory.Pair]: 'Pair',
  [HandCategory.TwoPair]: 'Two Pair',
  [HandCategory.ThreeOfAKind]: 'Three of a Kind',
  [HandCategory.Straight]: 'Straight',
  [HandCategory.Flush]: 'Flush',
  [HandCategory.FullHouse]: 'Full House',
  [HandCategory.FourOfAKind]: 'Four of a Kind',
  [HandCategory.StraightFlush]: 'Straight Flush',
  [HandCategory.RoyalFlush]: 'Royal Flush',
};

// ============================================================================
// Hand Evaluation Result
// ============================================================================

export interface EvaluatedHand {
  readonly category: HandCategory;
  /** Ranks compared after the category, most significant first */
  readonly tieBreak: readonly Rank[];
  /** e.g. "Full House, Kings full of Twos" */
  readonly description: string;
  /** The 5 cards that make up the hand */
  readonly bestFive: readonly Card[];
}

/**
 * -1: first hand loses, 0: tie, 1: first hand wins
 */
export type ComparisonResult = -1 | 0 | 1;
