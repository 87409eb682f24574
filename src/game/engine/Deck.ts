/**
 * Deck.ts
 * Standard 52-card deck with shuffle and sequential draw
 *
 * Uses Fisher-Yates shuffle for uniform randomness. Cards leave the deck
 * when drawn and are never returned twice by the same instance.
 */

import { Card, SUITS, RANKS, createCard, cardKey, allDistinct } from './Card';
import { GameErrors, invariant } from './GameErrors';

// ============================================================================
// Types
// ============================================================================

/**
 * Source of uniform values in [0, 1)
 */
export type RandomSource = () => number;

// ============================================================================
// Deck
// ============================================================================

export class Deck {
  private cards: Card[];

  private constructor(cards: Card[]) {
    invariant(allDistinct(cards), 'deck contains duplicate cards');
    this.cards = cards;
  }

  /**
   * Fresh 52-card deck in canonical order (clubs, diamonds, hearts, spades; 2 to A)
   */
  static standard(): Deck {
    const cards: Card[] = [];
    for (const suit of SUITS) {
      for (const rank of RANKS) {
        cards.push(createCard(suit, rank));
      }
    }
    return new Deck(cards);
  }

  /**
   * Deck whose first cards are `top`, followed by every other card in
   * canonical order. Lets a caller script the exact deal.
   */
  static stacked(top: readonly Card[]): Deck {
    const used = new Set(top.map(cardKey));
    const rest = Deck.standard().cards.filter(c => !used.has(cardKey(c)));
    return new Deck([...top, ...rest]);
  }

  get remaining(): number {
    return this.cards.length;
  }

  /**
   * Shuffle remaining cards in place (Fisher-Yates)
   */
  shuffle(random: RandomSource = Math.random): this {
    const cards = this.cards;
    for (let i = cards.length - 1; i > 0; i--) {
      const j = Math.floor(random() * (i + 1));
      [cards[i], cards[j]] = [cards[j], cards[i]];
    }
    return this;
  }

  /**
   * Remove and return the top `count` cards
   * @throws InsufficientCardsError when fewer than `count` cards remain
   */
  draw(count: number): Card[] {
    invariant(Number.isInteger(count) && count >= 0, `cannot draw ${count} cards`);
    if (count > this.cards.length) {
      throw GameErrors.insufficientCards(count, this.cards.length);
    }
    return this.cards.splice(0, count);
  }

  /**
   * Discard the top card
   */
  burn(): void {
    this.draw(1);
  }

  peek(): readonly Card[] {
    return [...this.cards];
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function createShuffledDeck(random: RandomSource = Math.random): Deck {
  return Deck.standard().shuffle(random);
}

/**
 * Deterministic generator (mulberry32) for reproducible shuffles
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;

  return function (): number {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
