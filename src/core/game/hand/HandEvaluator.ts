/**
 * HandEvaluator.ts
 * Hand evaluation for Texas Hold'em
 *
 * Evaluates the best 5-card hand from 5 to 7 cards by counting ranks and
 * suits. evaluateHandExhaustive walks every 5-card subset instead and must
 * agree with evaluateHand on every input.
 */

import {
  Card,
  Rank,
  Suit,
  HandCategory,
  EvaluatedHand,
} from './HandTypes';
import { createEvaluatedHand } from './HandRank';
import { allDistinct } from '../../../game/engine/Card';
import { GameErrors } from '../../../game/engine/GameErrors';

const MIN_CARDS = 5;
const MAX_CARDS = 7;

// ============================================================================
// Internal Helpers
// ============================================================================

/**
 * Generate all k-combinations of an array
 */
function combinations<T>(arr: readonly T[], k: number): T[][] {
  if (k === 0) return [[]];
  if (arr.length < k) return [];

  const result: T[][] = [];
  const first = arr[0];
  const rest = arr.slice(1);

  for (const combo of combinations(rest, k - 1)) {
    result.push([first, ...combo]);
  }
  for (const combo of combinations(rest, k)) {
    result.push(combo);
  }

  return result;
}

function byRankDesc(a: Card, b: Card): number {
  return b.rank - a.rank;
}

/**
 * Rank groups sorted by count desc, then rank desc
 */
function getRankGroups(cards: readonly Card[]): Array<{ rank: Rank; cards: Card[] }> {
  const groups = new Map<Rank, Card[]>();
  for (const card of cards) {
    const group = groups.get(card.rank);
    if (group) {
      group.push(card);
    } else {
      groups.set(card.rank, [card]);
    }
  }
  return Array.from(groups.entries())
    .map(([rank, grouped]) => ({ rank, cards: grouped }))
    .sort((a, b) => b.cards.length - a.cards.length || b.rank - a.rank);
}

function getFlushCards(cards: readonly Card[]): Card[] | null {
  const bySuit = new Map<Suit, Card[]>();
  for (const card of cards) {
    const suited = bySuit.get(card.suit) ?? [];
    suited.push(card);
    bySuit.set(card.suit, suited);
  }
  // At most one suit can hold five of seven cards
  for (const suited of bySuit.values()) {
    if (suited.length >= 5) {
      return [...suited].sort(byRankDesc);
    }
  }
  return null;
}

/**
 * Highest straight within the cards, as its five cards from the top down.
 * The wheel (A-2-3-4-5) is returned as 5-4-3-2-A.
 */
function findStraight(cards: readonly Card[]): Card[] | null {
  const byRank = new Map<number, Card>();
  for (const card of [...cards].sort(byRankDesc)) {
    if (!byRank.has(card.rank)) byRank.set(card.rank, card);
  }

  for (let high = 14; high >= 6; high--) {
    const run: Card[] = [];
    for (let r = high; r > high - 5; r--) {
      const card = byRank.get(r);
      if (!card) break;
      run.push(card);
    }
    if (run.length === 5) return run;
  }

  const ace = byRank.get(14);
  const wheel = [5, 4, 3, 2].map(r => byRank.get(r));
  if (ace && wheel.every((c): c is Card => c !== undefined)) {
    return [...wheel, ace];
  }

  return null;
}

function straightHigh(run: readonly Card[]): Rank {
  // run[0] is the top card; the wheel starts with the five
  return run[0].rank;
}

function assertEvaluable(cards: readonly Card[]): void {
  if (cards.length < MIN_CARDS) {
    throw GameErrors.insufficientCards(MIN_CARDS, cards.length);
  }
  if (cards.length > MAX_CARDS) {
    throw GameErrors.invalidCards(`at most ${MAX_CARDS} cards can be evaluated, got ${cards.length}`);
  }
  if (!allDistinct(cards)) {
    throw GameErrors.invalidCards('duplicate card in hand');
  }
}

// ============================================================================
// Pattern Evaluation
// ============================================================================

function evaluatePatterns(cards: readonly Card[]): EvaluatedHand {
  const sorted = [...cards].sort(byRankDesc);
  const flush = getFlushCards(cards);

  if (flush) {
    const straightFlush = findStraight(flush);
    if (straightFlush) {
      const high = straightHigh(straightFlush);
      return createEvaluatedHand(
        high === 14 ? HandCategory.RoyalFlush : HandCategory.StraightFlush,
        [high],
        straightFlush
      );
    }
  }

  const groups = getRankGroups(cards);
  const [top, second] = groups;
  const kickersExcluding = (...ranks: Rank[]): Card[] =>
    sorted.filter(c => !ranks.includes(c.rank));

  if (top.cards.length === 4) {
    const kicker = kickersExcluding(top.rank)[0];
    return createEvaluatedHand(
      HandCategory.FourOfAKind,
      [top.rank, kicker.rank],
      [...top.cards, kicker]
    );
  }

  // A second set of trips also fills the house
  if (top.cards.length === 3 && second !== undefined && second.cards.length >= 2) {
    return createEvaluatedHand(
      HandCategory.FullHouse,
      [top.rank, second.rank],
      [...top.cards, ...second.cards.slice(0, 2)]
    );
  }

  if (flush) {
    const five = flush.slice(0, 5);
    return createEvaluatedHand(HandCategory.Flush, five.map(c => c.rank), five);
  }

  const straight = findStraight(cards);
  if (straight) {
    return createEvaluatedHand(HandCategory.Straight, [straightHigh(straight)], straight);
  }

  if (top.cards.length === 3) {
    const kickers = kickersExcluding(top.rank).slice(0, 2);
    return createEvaluatedHand(
      HandCategory.ThreeOfAKind,
      [top.rank, ...kickers.map(c => c.rank)],
      [...top.cards, ...kickers]
    );
  }

  if (top.cards.length === 2 && second !== undefined && second.cards.length === 2) {
    const kicker = kickersExcluding(top.rank, second.rank)[0];
    return createEvaluatedHand(
      HandCategory.TwoPair,
      [top.rank, second.rank, kicker.rank],
      [...top.cards, ...second.cards, kicker]
    );
  }

  if (top.cards.length === 2) {
    const kickers = kickersExcluding(top.rank).slice(0, 3);
    return createEvaluatedHand(
      HandCategory.Pair,
      [top.rank, ...kickers.map(c => c.rank)],
      [...top.cards, ...kickers]
    );
  }

  const five = sorted.slice(0, 5);
  return createEvaluatedHand(HandCategory.HighCard, five.map(c => c.rank), five);
}

// ============================================================================
// Main API
// ============================================================================

/**
 * Evaluate the best 5-card hand from 5 to 7 cards
 *
 * @throws InsufficientCardsError if fewer than 5 cards are given
 * @throws GameError (INVALID_CARDS) for more than 7 cards or duplicates
 */
export function evaluateHand(cards: readonly Card[]): EvaluatedHand {
  assertEvaluable(cards);
  return evaluatePatterns(cards);
}

/**
 * Evaluate by scoring every 5-card subset and keeping the best
 */
export function evaluateHandExhaustive(cards: readonly Card[]): EvaluatedHand {
  assertEvaluable(cards);

  let best = evaluatePatterns(cards.slice(0, 5));
  for (const combo of combinations(cards, 5)) {
    const candidate = evaluatePatterns(combo);
    if (compareHandRanks(candidate, best) > 0) {
      best = candidate;
    }
  }
  return best;
}

/**
 * Compare two evaluated hands
 * Returns: negative if a < b, positive if a > b, 0 if equal
 */
export function compareHandRanks(a: EvaluatedHand, b: EvaluatedHand): number {
  if (a.category !== b.category) {
    return a.category - b.category;
  }

  const length = Math.max(a.tieBreak.length, b.tieBreak.length);
  for (let i = 0; i < length; i++) {
    const aRank = a.tieBreak[i] ?? 0;
    const bRank = b.tieBreak[i] ?? 0;
    if (aRank !== bRank) {
      return aRank - bRank;
    }
  }

  return 0;
}

/**
 * Evaluate a player's hole cards against the board
 */
export function evaluateHoldem(
  holeCards: readonly Card[],
  communityCards: readonly Card[]
): EvaluatedHand {
  if (holeCards.length !== 2) {
    throw GameErrors.invalidCards(`must have exactly 2 hole cards, got ${holeCards.length}`);
  }
  return evaluateHand([...holeCards, ...communityCards]);
}
