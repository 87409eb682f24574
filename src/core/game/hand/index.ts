/**
 * Hand Evaluation Module
 *
 * Texas Hold'em hand evaluation and comparison.
 */

// Types
export type {
  Suit,
  Rank,
  Card,
  EvaluatedHand,
  ComparisonResult,
} from './HandTypes';
export { HandCategory, HAND_CATEGORY_NAMES } from './HandTypes';

// Hand Rank utilities
export {
  createEvaluatedHand,
  getCategoryName,
  getRankName,
  getRankNamePlural,
} from './HandRank';

// Hand Evaluator
export {
  evaluateHand,
  evaluateHandExhaustive,
  evaluateHoldem,
  compareHandRanks,
} from './HandEvaluator';

// Hand Comparison
export type { HandForComparison, WinnerResult } from './HandCompare';
export {
  compareHands,
  compareEvaluatedHands,
  determineWinners,
} from './HandCompare';
