/**
 * GameEvents.ts
 * Event types emitted during game state transitions
 *
 * Events are immutable records of state changes, sequenced per engine.
 * Hole cards never appear before showdown.
 */

import type { Card } from './Card';
import type { PlayerId } from './Player';
import type { Street } from './BettingRound';
import type { Action, ActionEffect } from './Actions';
import type { GameErrorCode } from './GameErrors';

// ============================================================================
// Event Types
// ============================================================================

export type GameEventType =
  | 'HAND_STARTED'
  | 'BLINDS_POSTED'
  | 'HOLE_CARDS_DEALT'
  | 'PLAYER_ACTED'
  | 'ACTION_REJECTED'
  | 'STREET_CHANGED'
  | 'COMMUNITY_CARDS_DEALT'
  | 'SHOWDOWN'
  | 'POT_AWARDED'
  | 'HAND_ENDED';

// ============================================================================
// Base Event Interface
// ============================================================================

export interface EventStamp {
  readonly timestamp: number;
  readonly eventId: string;
  readonly handNumber: number;
  readonly sequence: number;
}

export interface BaseGameEvent extends EventStamp {
  readonly type: GameEventType;
}

// ============================================================================
// Specific Events
// ============================================================================

export interface HandStartedEvent extends BaseGameEvent {
  readonly type: 'HAND_STARTED';
  readonly dealerSeat: number;
  readonly smallBlindSeat: number;
  readonly bigBlindSeat: number;
  readonly playerIds: readonly PlayerId[];
  readonly playerStacks: ReadonlyMap<PlayerId, number>;
}

export interface BlindPosting {
  readonly playerId: PlayerId;
  readonly seat: number;
  readonly amount: number;
}

export interface BlindsPostedEvent extends BaseGameEvent {
  readonly type: 'BLINDS_POSTED';
  readonly smallBlind: BlindPosting;
  readonly bigBlind: BlindPosting;
  readonly potTotal: number;
}

export interface HoleCardsDealtEvent extends BaseGameEvent {
  readonly type: 'HOLE_CARDS_DEALT';
  /** Deal order, starting left of the dealer */
  readonly playerIds: readonly PlayerId[];
}

export interface PlayerActedEvent extends BaseGameEvent {
  readonly type: 'PLAYER_ACTED';
  readonly playerId: PlayerId;
  readonly seat: number;
  readonly action: Action;
  readonly effect: ActionEffect;
  readonly amount: number;
  readonly playerStack: number;
  readonly potTotal: number;
  readonly isAllIn: boolean;
}

export interface ActionRejectedEvent extends BaseGameEvent {
  readonly type: 'ACTION_REJECTED';
  readonly seat: number;
  readonly action: Action;
  readonly errorCode: GameErrorCode;
  readonly errorMessage: string;
}

export interface StreetChangedEvent extends BaseGameEvent {
  readonly type: 'STREET_CHANGED';
  readonly fromStreet: Street;
  readonly toStreet: Street;
  readonly potTotal: number;
}

export interface CommunityCardsDealtEvent extends BaseGameEvent {
  readonly type: 'COMMUNITY_CARDS_DEALT';
  readonly street: Street;
  readonly cards: readonly Card[];
  readonly allCommunityCards: readonly Card[];
}

export interface RevealedHand {
  readonly playerId: PlayerId;
  readonly seat: number;
  readonly holeCards: readonly Card[];
  readonly handDescription: string;
}

export interface ShowdownEvent extends BaseGameEvent {
  readonly type: 'SHOWDOWN';
  readonly hands: readonly RevealedHand[];
  readonly potTotal: number;
}

export interface PotAwardedEvent extends BaseGameEvent {
  readonly type: 'POT_AWARDED';
  readonly layerIndex: number;
  readonly totalPot: number;
  readonly winnerIds: readonly PlayerId[];
  readonly amounts: ReadonlyMap<PlayerId, number>;
  readonly isSplitPot: boolean;
  /** Null when won uncontested */
  readonly winningHandDescription: string | null;
}

export type HandEndReason = 'showdown' | 'all-fold';

export interface HandEndedEvent extends BaseGameEvent {
  readonly type: 'HAND_ENDED';
  readonly reason: HandEndReason;
  readonly winnerIds: readonly PlayerId[];
  readonly finalStacks: ReadonlyMap<PlayerId, number>;
}

export type GameEvent =
  | HandStartedEvent
  | BlindsPostedEvent
  | HoleCardsDealtEvent
  | PlayerActedEvent
  | ActionRejectedEvent
  | StreetChangedEvent
  | CommunityCardsDealtEvent
  | ShowdownEvent
  | PotAwardedEvent
  | HandEndedEvent;

// ============================================================================
// Event Factories
// ============================================================================

let eventCounter = 0;

function generateEventId(): string {
  return `evt_${Date.now()}_${++eventCounter}`;
}

export function createHandStartedEvent(
  stamp: EventStamp,
  dealerSeat: number,
  smallBlindSeat: number,
  bigBlindSeat: number,
  playerIds: readonly PlayerId[],
  playerStacks: ReadonlyMap<PlayerId, number>
): HandStartedEvent {
  return {
    type: 'HAND_STARTED',
    ...stamp,
    dealerSeat,
    smallBlindSeat,
    bigBlindSeat,
    playerIds,
    playerStacks,
  };
}

export function createBlindsPostedEvent(
  stamp: EventStamp,
  smallBlind: BlindPosting,
  bigBlind: BlindPosting,
  potTotal: number
): BlindsPostedEvent {
  return { type: 'BLINDS_POSTED', ...stamp, smallBlind, bigBlind, potTotal };
}

export function createHoleCardsDealtEvent(
  stamp: EventStamp,
  playerIds: readonly PlayerId[]
): HoleCardsDealtEvent {
  return { type: 'HOLE_CARDS_DEALT', ...stamp, playerIds };
}

export function createPlayerActedEvent(
  stamp: EventStamp,
  playerId: PlayerId,
  seat: number,
  action: Action,
  effect: ActionEffect,
  amount: number,
  playerStack: number,
  potTotal: number,
  isAllIn: boolean
): PlayerActedEvent {
  return {
    type: 'PLAYER_ACTED',
    ...stamp,
    playerId,
    seat,
    action,
    effect,
    amount,
    playerStack,
    potTotal,
    isAllIn,
  };
}

export function createActionRejectedEvent(
  stamp: EventStamp,
  seat: number,
  action: Action,
  errorCode: GameErrorCode,
  errorMessage: string
): ActionRejectedEvent {
  return { type: 'ACTION_REJECTED', ...stamp, seat, action, errorCode, errorMessage };
}

export function createStreetChangedEvent(
  stamp: EventStamp,
  fromStreet: Street,
  toStreet: Street,
  potTotal: number
): StreetChangedEvent {
  return { type: 'STREET_CHANGED', ...stamp, fromStreet, toStreet, potTotal };
}

export function createCommunityCardsDealtEvent(
  stamp: EventStamp,
  street: Street,
  cards: readonly Card[],
  allCommunityCards: readonly Card[]
): CommunityCardsDealtEvent {
  return { type: 'COMMUNITY_CARDS_DEALT', ...stamp, street, cards, allCommunityCards };
}

export function createShowdownEvent(
  stamp: EventStamp,
  hands: readonly RevealedHand[],
  potTotal: number
): ShowdownEvent {
  return { type: 'SHOWDOWN', ...stamp, hands, potTotal };
}

export function createPotAwardedEvent(
  stamp: EventStamp,
  layerIndex: number,
  totalPot: number,
  winnerIds: readonly PlayerId[],
  amounts: ReadonlyMap<PlayerId, number>,
  winningHandDescription: string | null
): PotAwardedEvent {
  return {
    type: 'POT_AWARDED',
    ...stamp,
    layerIndex,
    totalPot,
    winnerIds,
    amounts,
    isSplitPot: winnerIds.length > 1,
    winningHandDescription,
  };
}

export function createHandEndedEvent(
  stamp: EventStamp,
  reason: HandEndReason,
  winnerIds: readonly PlayerId[],
  finalStacks: ReadonlyMap<PlayerId, number>
): HandEndedEvent {
  return { type: 'HAND_ENDED', ...stamp, reason, winnerIds, finalStacks };
}

// ============================================================================
// Event Listener Types
// ============================================================================

export type GameEventListener = (event: GameEvent) => void;

export interface GameEventEmitter {
  on(listener: GameEventListener): () => void;
  /** Next stamp in this emitter's sequence */
  stamp(handNumber: number): EventStamp;
  emit(event: GameEvent): void;
  getHistory(): readonly GameEvent[];
  /** Drop the history and restart the sequence */
  clear(): void;
}

/**
 * Simple event emitter implementation. A throwing listener is reported and
 * skipped; the remaining listeners still run.
 */
export function createGameEventEmitter(): GameEventEmitter {
  const listeners: Set<GameEventListener> = new Set();
  const history: GameEvent[] = [];
  let sequence = 0;

  return {
    on(listener: GameEventListener): () => void {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },

    stamp(handNumber: number): EventStamp {
      return {
        timestamp: Date.now(),
        eventId: generateEventId(),
        handNumber,
        sequence: ++sequence,
      };
    },

    emit(event: GameEvent): void {
      history.push(event);
      for (const listener of listeners) {
        try {
          listener(event);
        } catch (error) {
          console.error('Event listener error:', error);
        }
      }
    },

    getHistory(): readonly GameEvent[] {
      return [...history];
    },

    clear(): void {
      history.length = 0;
      sequence = 0;
    },
  };
}
