/**
 * GameConfig.ts
 * Table configuration for the engine
 *
 * Immutable once created. Partial configs are merged over the defaults and
 * validated before an engine ever sees them.
 */

import { Deck, RandomSource, createShuffledDeck } from './Deck';
import { GameErrors } from './GameErrors';
import type { PlayerId } from './Player';

// ============================================================================
// Types
// ============================================================================

export type DeckFactory = (random: RandomSource) => Deck;

export interface GameConfig {
  readonly smallBlind: number;
  readonly bigBlind: number;
  /** Stack given to a seated player who brings no chips of their own */
  readonly startingChips: number;
  /** Players below this stack sit the hand out */
  readonly minChipsToContinue: number;
  readonly maxSeats: number;
  /** Dealer button for the first hand */
  readonly dealerSeat: number;
  readonly random: RandomSource;
  /** Builds the deck for each hand; tests swap in stacked decks */
  readonly deckFactory: DeckFactory;
}

export interface SeatAssignment {
  readonly id: PlayerId;
  readonly name: string;
  readonly seat: number;
  readonly chips?: number;
}

// ============================================================================
// Defaults
// ============================================================================

export const MIN_SEATS = 2;
export const MAX_SEATS = 10;

export const DEFAULT_GAME_CONFIG: GameConfig = {
  smallBlind: 10,
  bigBlind: 20,
  startingChips: 10000,
  minChipsToContinue: 10,
  maxSeats: MAX_SEATS,
  dealerSeat: 0,
  random: Math.random,
  deckFactory: createShuffledDeck,
};

// ============================================================================
// Construction
// ============================================================================

export function createGameConfig(partial: Partial<GameConfig> = {}): GameConfig {
  const config: GameConfig = Object.freeze({ ...DEFAULT_GAME_CONFIG, ...partial });
  validateGameConfig(config);
  return config;
}

/**
 * @throws GameError(INVALID_CONFIG)
 */
export function validateGameConfig(config: GameConfig): void {
  if (!isPositiveInteger(config.smallBlind)) {
    throw GameErrors.invalidConfig(`small blind must be a positive integer, got ${config.smallBlind}`);
  }
  if (!isPositiveInteger(config.bigBlind)) {
    throw GameErrors.invalidConfig(`big blind must be a positive integer, got ${config.bigBlind}`);
  }
  if (config.bigBlind < config.smallBlind) {
    throw GameErrors.invalidConfig(
      `big blind ${config.bigBlind} is smaller than small blind ${config.smallBlind}`
    );
  }
  if (!isNonNegativeInteger(config.startingChips)) {
    throw GameErrors.invalidConfig(`starting chips must be a non-negative integer, got ${config.startingChips}`);
  }
  if (!isNonNegativeInteger(config.minChipsToContinue)) {
    throw GameErrors.invalidConfig(
      `minimum stack must be a non-negative integer, got ${config.minChipsToContinue}`
    );
  }
  if (!Number.isInteger(config.maxSeats) || config.maxSeats < MIN_SEATS || config.maxSeats > MAX_SEATS) {
    throw GameErrors.invalidConfig(`seat count must be between ${MIN_SEATS} and ${MAX_SEATS}, got ${config.maxSeats}`);
  }
  if (!isSeatIndex(config.dealerSeat, config.maxSeats)) {
    throw GameErrors.invalidConfig(`dealer seat ${config.dealerSeat} is not a seat at this table`);
  }
}

/**
 * @throws GameError(INVALID_CONFIG) for out-of-range or duplicate seats,
 *         duplicate ids, or bad stacks
 */
export function validateSeating(config: GameConfig, players: readonly SeatAssignment[]): void {
  const seats = new Set<number>();
  const ids = new Set<PlayerId>();

  for (const player of players) {
    if (!isSeatIndex(player.seat, config.maxSeats)) {
      throw GameErrors.invalidConfig(`seat ${player.seat} is not a seat at this table`);
    }
    if (seats.has(player.seat)) {
      throw GameErrors.invalidConfig(`seat ${player.seat} is assigned twice`);
    }
    if (ids.has(player.id)) {
      throw GameErrors.invalidConfig(`player id ${player.id} is seated twice`);
    }
    if (player.chips !== undefined && !isNonNegativeInteger(player.chips)) {
      throw GameErrors.invalidConfig(`stack for ${player.id} must be a non-negative integer`);
    }
    seats.add(player.seat);
    ids.add(player.id);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function isSeatIndex(seat: number, maxSeats: number): boolean {
  return Number.isInteger(seat) && seat >= 0 && seat < maxSeats;
}
