/**
 * Card.ts
 * Card representation for Texas Hold'em
 *
 * Immutable card type with suit and rank.
 */

// ============================================================================
// Types
// ============================================================================

export type Suit = 'clubs' | 'diamonds' | 'hearts' | 'spades';

export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;
// 11 = Jack, 12 = Queen, 13 = King, 14 = Ace

export interface Card {
  readonly suit: Suit;
  readonly rank: Rank;
}

// ============================================================================
// Constants
// ============================================================================

export const SUITS: readonly Suit[] = ['clubs', 'diamonds', 'hearts', 'spades'];

export const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];

export const RANK_NAMES: Record<Rank, string> = {
  2: '2',
  3: '3',
  4: '4',
  5: '5',
  6: '6',
  7: '7',
  8: '8',
  9: '9',
  10: '10',
  11: 'J',
  12: 'Q',
  13: 'K',
  14: 'A',
};

export const SUIT_SYMBOLS: Record<Suit, string> = {
  clubs: '♣',
  diamonds: '♦',
  hearts: '♥',
  spades: '♠',
};

const SUIT_BY_CHAR: Readonly<Record<string, Suit>> = {
  c: 'clubs',
  d: 'diamonds',
  h: 'hearts',
  s: 'spades',
  '♣': 'clubs',
  '♦': 'diamonds',
  '♥': 'hearts',
  '♠': 'spades',
};

const RANK_BY_NAME: Readonly<Record<string, Rank>> = {
  '2': 2,
  '3': 3,
  '4': 4,
  '5': 5,
  '6': 6,
  '7': 7,
  '8': 8,
  '9': 9,
  '10': 10,
  T: 10,
  J: 11,
  Q: 12,
  K: 13,
  A: 14,
};

// ============================================================================
// Functions
// ============================================================================

export function createCard(suit: Suit, rank: Rank): Card {
  return Object.freeze({ suit, rank });
}

/**
 * Format card for display (e.g., "A♠", "10♥")
 */
export function formatCard(card: Card): string {
  return `${RANK_NAMES[card.rank]}${SUIT_SYMBOLS[card.suit]}`;
}

export function formatCards(cards: readonly Card[]): string {
  return cards.map(formatCard).join(' ');
}

/**
 * Stable identity for a card, used to detect duplicates
 */
export function cardKey(card: Card): string {
  return `${card.rank}:${card.suit}`;
}

export function isRed(card: Card): boolean {
  return card.suit === 'hearts' || card.suit === 'diamonds';
}

/**
 * Parse card from notation: "As", "Th", "10d", "K♠".
 * Returns null when the notation is not a card.
 */
export function parseCard(notation: string): Card | null {
  const chars = Array.from(notation.trim());
  if (chars.length < 2) return null;

  const suitChar = chars[chars.length - 1];
  const rankPart = chars.slice(0, -1).join('').toUpperCase();

  const suit = SUIT_BY_CHAR[suitChar.toLowerCase()];
  const rank = RANK_BY_NAME[rankPart];
  if (suit === undefined || rank === undefined) return null;

  return createCard(suit, rank);
}

/**
 * Parse a space-separated list of cards, e.g. "As Kd 10c".
 * Returns null if any entry is malformed.
 */
export function parseCards(notation: string): Card[] | null {
  const parts = notation.trim().split(/\s+/).filter(p => p.length > 0);
  const cards: Card[] = [];
  for (const part of parts) {
    const card = parseCard(part);
    if (card === null) return null;
    cards.push(card);
  }
  return cards;
}

/**
 * True when no two cards share rank and suit
 */
export function allDistinct(cards: readonly Card[]): boolean {
  return new Set(cards.map(cardKey)).size === cards.length;
}
