/**
 * Hold'em Engine
 *
 * In-process Texas Hold'em (no-limit) engine: cards and decks, hand
 * evaluation, betting rounds, side pots and one-hand orchestration.
 */

export * from './game';

export {
  HandCategory,
  HAND_CATEGORY_NAMES,
  getCategoryName,
  getRankName,
  evaluateHand,
  evaluateHandExhaustive,
  evaluateHoldem,
  compareHands,
  compareEvaluatedHands,
  determineWinners,
} from './core/game/hand';
export type {
  EvaluatedHand,
  ComparisonResult,
  HandForComparison,
  WinnerResult,
} from './core/game/hand';

export {
  SidePotCalculator,
  PotManager,
} from './economy';
export type {
  PlayerContributionInfo,
  PotLayer,
  SidePotResult,
  ShowdownEntrant,
  LayerAward,
  PotSettlement,
} from './economy';
