/**
 * HandRank.ts
 * Hand ranking utilities
 *
 * Naming helpers and the factory for evaluation results.
 */

import {
  Card,
  Rank,
  HandCategory,
  EvaluatedHand,
  HAND_CATEGORY_NAMES,
} from './HandTypes';

// ============================================================================
// Factory Functions
// ============================================================================

export function createEvaluatedHand(
  category: HandCategory,
  tieBreak: readonly Rank[],
  bestFive: readonly Card[]
): EvaluatedHand {
  return {
    category,
    tieBreak,
    description: describeHand(category, tieBreak),
    bestFive,
  };
}

// ============================================================================
// Display Helpers
// ============================================================================

export function getCategoryName(category: HandCategory): string {
  return HAND_CATEGORY_NAMES[category];
}

/**
 * Get rank name for display (singular)
 */
export function getRankName(rank: Rank): string {
  switch (rank) {
    case 14: return 'Ace';
    case 13: return 'King';
    case 12: return 'Queen';
    case 11: return 'Jack';
    case 10: return 'Ten';
    default: return rank.toString();
  }
}

/**
 * Get rank name for display (plural)
 */
export function getRankNamePlural(rank: Rank): string {
  switch (rank) {
    case 14: return 'Aces';
    case 13: return 'Kings';
    case 12: return 'Queens';
    case 11: return 'Jacks';
    case 10: return 'Tens';
    case 9: return 'Nines';
    case 8: return 'Eights';
    case 7: return 'Sevens';
    case 6: return 'Sixes';
    case 5: return 'Fives';
    case 4: return 'Fours';
    case 3: return 'Threes';
    case 2: return 'Twos';
  }
}

function describeHand(category: HandCategory, tieBreak: readonly Rank[]): string {
  const [first, second] = tieBreak;

  switch (category) {
    case HandCategory.RoyalFlush:
      return 'Royal Flush';
    case HandCategory.StraightFlush:
      return `Straight Flush, ${getRankName(first)} high`;
    case HandCategory.FourOfAKind:
      return `Four of a Kind, ${getRankNamePlural(first)}`;
    case HandCategory.FullHouse:
      return `Full House, ${getRankNamePlural(first)} full of ${getRankNamePlural(second)}`;
    case HandCategory.Flush:
      return `Flush, ${getRankName(first)} high`;
    case HandCategory.Straight:
      return `Straight, ${getRankName(first)} high`;
    case HandCategory.ThreeOfAKind:
      return `Three of a Kind, ${getRankNamePlural(first)}`;
    case HandCategory.TwoPair:
      return `Two Pair, ${getRankNamePlural(first)} and ${getRankNamePlural(second)}`;
    case HandCategory.Pair:
      return `Pair of ${getRankNamePlural(first)}`;
    case HandCategory.HighCard:
      return `High Card, ${getRankName(first)}`;
  }
}
