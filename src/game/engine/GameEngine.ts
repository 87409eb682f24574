/**
 * GameEngine.ts
 * Main game orchestration engine
 *
 * Drives one hand at a time:
 * blinds → hole cards → preflop/flop/turn/river betting → showdown → payout
 *
 * Every public call runs to completion synchronously. Callers only ever see
 * snapshots; Player, BettingRound and PotManager stay private.
 */

import type { Card } from './Card';
import { Deck } from './Deck';
import { Player, PlayerId, PlayerStatus } from './Player';
import { Action, ActionRecord, LegalActions, noLegalActions } from './Actions';
import { BettingRound, Street, findNextSeat } from './BettingRound';
import { GameError, GameErrors, invariant } from './GameErrors';
import {
  GameConfig,
  SeatAssignment,
  createGameConfig,
  validateSeating,
} from './GameConfig';
import {
  EventStamp,
  GameEvent,
  GameEventEmitter,
  HandEndReason,
  createGameEventEmitter,
  createHandStartedEvent,
  createBlindsPostedEvent,
  createHoleCardsDealtEvent,
  createPlayerActedEvent,
  createActionRejectedEvent,
  createStreetChangedEvent,
  createCommunityCardsDealtEvent,
  createShowdownEvent,
  createPotAwardedEvent,
  createHandEndedEvent,
} from './GameEvents';
import type { EvaluatedHand } from '../../core/game/hand';
import {
  PotManager,
  PotSettlement,
  LayerAward,
  PlayerContributionInfo,
  SidePotCalculator,
  orderFromDealer,
} from '../../economy';

// ============================================================================
// Types
// ============================================================================

export type GamePhase = 'waiting' | Street | 'showdown' | 'complete';

export interface HandResult {
  readonly handNumber: number;
  readonly reason: HandEndReason;
  /** Winners of the main pot, in payout order */
  readonly winnerIds: readonly PlayerId[];
  /** Chips won per player across every layer */
  readonly payouts: ReadonlyMap<PlayerId, number>;
  readonly pots: readonly LayerAward[];
  readonly communityCards: readonly Card[];
  /** Empty when the hand ended without a showdown */
  readonly hands: ReadonlyMap<PlayerId, EvaluatedHand>;
  /** Board was dealt out with no betting left to do */
  readonly ranOut: boolean;
  readonly finalStacks: ReadonlyMap<PlayerId, number>;
}

export type RoundOutcome =
  | { readonly kind: 'next-to-act'; readonly seat: number }
  | { readonly kind: 'street-advanced'; readonly street: Street; readonly seat: number }
  | { readonly kind: 'hand-complete'; readonly result: HandResult };

export type ActionResult =
  | { readonly success: true; readonly outcome: RoundOutcome }
  | { readonly success: false; readonly error: GameError };

export interface EngineLegalActions extends LegalActions {
  /** callAmount / (pot + callAmount); null with nothing to call */
  readonly potOdds: number | null;
}

export interface SeatSnapshot {
  readonly seat: number;
  readonly playerId: PlayerId;
  readonly name: string;
  readonly chips: number;
  readonly streetContribution: number;
  readonly handContribution: number;
  readonly status: PlayerStatus;
  /** Null when hidden from the viewer */
  readonly holeCards: readonly Card[] | null;
  readonly isDealer: boolean;
}

export interface PotLayerSnapshot {
  readonly level: number;
  readonly total: number;
  readonly eligiblePlayers: readonly PlayerId[];
}

export interface GameSnapshot {
  readonly handNumber: number;
  readonly phase: GamePhase;
  readonly dealerSeat: number;
  readonly communityCards: readonly Card[];
  readonly seats: readonly (SeatSnapshot | null)[];
  readonly pots: readonly PotLayerSnapshot[];
  readonly potTotal: number;
  readonly betToCall: number;
  readonly minRaise: number;
  readonly seatToAct: number | null;
  readonly lastResult: HandResult | null;
}

// ============================================================================
// Game Engine
// ============================================================================

export class GameEngine {
  readonly config: GameConfig;
  private readonly seats: (Player | null)[];
  private readonly events: GameEventEmitter;
  private readonly pot = new PotManager();

  private deck: Deck | null = null;
  private round: BettingRound | null = null;
  private board: Card[] = [];
  private _phase: GamePhase = 'waiting';
  private _dealerSeat: number;
  private _handNumber = 0;
  private lastResult: HandResult | null = null;
  private chipsAtStart = 0;

  /**
   * @throws GameError(INVALID_CONFIG) for a bad config or seating
   */
  constructor(players: readonly SeatAssignment[], config: Partial<GameConfig> = {}) {
    this.config = createGameConfig(config);
    validateSeating(this.config, players);

    this.seats = new Array<Player | null>(this.config.maxSeats).fill(null);
    for (const assignment of players) {
      this.seats[assignment.seat] = new Player({
        id: assignment.id,
        name: assignment.name,
        seat: assignment.seat,
        chips: assignment.chips ?? this.config.startingChips,
      });
    }

    this._dealerSeat = this.config.dealerSeat;
    this.events = createGameEventEmitter();
  }

  get phase(): GamePhase {
    return this._phase;
  }

  get dealerSeat(): number {
    return this._dealerSeat;
  }

  get handNumber(): number {
    return this._handNumber;
  }

  get isHandInProgress(): boolean {
    return this.round !== null;
  }

  // ==========================================================================
  // Event Management
  // ==========================================================================

  onEvent(listener: (event: GameEvent) => void): () => void {
    return this.events.on(listener);
  }

  getEventHistory(): readonly GameEvent[] {
    return this.events.getHistory();
  }

  // ==========================================================================
  // Hand Lifecycle
  // ==========================================================================

  /**
   * Reset players, move the button, post blinds, deal and open preflop.
   * The outcome is `hand-complete` straight away when the blinds leave
   * nobody able to bet.
   *
   * @throws GameError(INVALID_ACTION) while a hand is running,
   *         GameError(NOT_ENOUGH_PLAYERS) with fewer than two stacks in play
   */
  startHand(): RoundOutcome {
    if (this.round !== null) {
      throw GameErrors.invalidAction('A hand is already in progress', { handNumber: this._handNumber });
    }

    const minChips = this.config.minChipsToContinue;
    const eligible = this.seatedPlayers().filter(p => p.chips > 0 && p.chips >= minChips);
    if (eligible.length < 2) {
      throw GameErrors.notEnoughPlayers(eligible.length);
    }

    for (const player of this.seatedPlayers()) {
      player.resetForHand(minChips);
    }

    const dealer = findNextSeat(this.seats, this._dealerSeat, isActive, this._handNumber === 0);
    invariant(dealer !== null, 'no seat for the dealer button');
    this._dealerSeat = dealer;
    this._handNumber++;

    this.events.clear();
    this.board = [];
    this.pot.reset();
    this.lastResult = null;
    this.chipsAtStart = this.stackTotal();
    this.deck = this.config.deckFactory(this.config.random);

    const active = this.seatedPlayers().filter(isActive);
    const smallBlindSeat =
      active.length === 2 ? dealer : this.requireSeat(findNextSeat(this.seats, dealer, isActive));
    const bigBlindSeat = this.requireSeat(findNextSeat(this.seats, smallBlindSeat, isActive));

    this.events.emit(createHandStartedEvent(
      this.stamp(),
      dealer,
      smallBlindSeat,
      bigBlindSeat,
      active.map(p => p.id),
      new Map(active.map(p => [p.id, p.chips]))
    ));

    this.postBlinds(smallBlindSeat, bigBlindSeat);
    this.dealHoleCards();

    this._phase = 'preflop';
    this.round = new BettingRound({
      street: 'preflop',
      seats: this.seats,
      startSeat: (bigBlindSeat + 1) % this.seats.length,
      betToCall: Math.max(...active.map(p => p.streetContribution)),
      minRaise: this.config.bigBlind,
    });

    return this.advance();
  }

  /**
   * Apply an action for `seat`. A rejected action leaves every piece of
   * state as it was.
   */
  applyAction(seat: number, action: Action): ActionResult {
    const round = this.round;
    if (round === null) {
      return this.reject(seat, action, GameErrors.invalidAction('No hand in progress', { seat }));
    }

    let record: ActionRecord;
    try {
      record = round.apply(seat, action);
    } catch (error) {
      if (error instanceof GameError) {
        return this.reject(seat, action, error);
      }
      throw error;
    }

    const player = this.requirePlayer(seat);
    this.events.emit(createPlayerActedEvent(
      this.stamp(),
      player.id,
      seat,
      action,
      record.effect,
      record.committed,
      player.chips,
      this.potTotal(),
      record.isAllIn
    ));

    return { success: true, outcome: this.advance() };
  }

  legalActions(seat: number): EngineLegalActions {
    const legal = this.round === null ? noLegalActions(seat) : this.round.legalActions(seat);
    const pot = this.potTotal();
    return {
      ...legal,
      potOdds: legal.callAmount > 0 ? legal.callAmount / (pot + legal.callAmount) : null,
    };
  }

  /**
   * Read-only view of the table. Hole cards are visible only to their owner
   * (`viewerSeat`) until the showdown reveals the hands still in play.
   */
  snapshot(viewerSeat: number | null = null): GameSnapshot {
    const revealed = this._phase === 'showdown' || this.lastResult?.reason === 'showdown';
    const inPlay = this.round !== null;
    const layers = inPlay ? SidePotCalculator.calculate(this.contributions()).layers : [];

    return {
      handNumber: this._handNumber,
      phase: this._phase,
      dealerSeat: this._dealerSeat,
      communityCards: [...this.board],
      seats: this.seats.map(player =>
        player === null
          ? null
          : {
              seat: player.seat,
              playerId: player.id,
              name: player.name,
              chips: player.chips,
              streetContribution: player.streetContribution,
              handContribution: player.handContribution,
              status: player.status,
              holeCards: player.holeCardsFor(viewerSeat, revealed && player.inHand),
              isDealer: player.seat === this._dealerSeat,
            }
      ),
      pots: layers.map(layer => ({
        level: layer.level,
        total: layer.total,
        eligiblePlayers: layer.eligiblePlayers,
      })),
      potTotal: inPlay ? this.potTotal() : 0,
      betToCall: this.round?.betToCall ?? 0,
      minRaise: this.round?.minRaise ?? this.config.bigBlind,
      seatToAct: this.round?.awaitingSeat ?? null,
      lastResult: this.lastResult,
    };
  }

  // ==========================================================================
  // Dealing
  // ==========================================================================

  private postBlinds(smallBlindSeat: number, bigBlindSeat: number): void {
    const small = this.requirePlayer(smallBlindSeat);
    const big = this.requirePlayer(bigBlindSeat);

    const smallAmount = Math.min(this.config.smallBlind, small.chips);
    small.commit(smallAmount);
    const bigAmount = Math.min(this.config.bigBlind, big.chips);
    big.commit(bigAmount);

    this.events.emit(createBlindsPostedEvent(
      this.stamp(),
      { playerId: small.id, seat: small.seat, amount: smallAmount },
      { playerId: big.id, seat: big.seat, amount: bigAmount },
      this.potTotal()
    ));
  }

  /**
   * Two passes, one card at a time, starting left of the dealer
   */
  private dealHoleCards(): void {
    const deck = this.requireDeck();
    const order = orderFromDealer(
      this.seatedPlayers().filter(p => p.inHand),
      this._dealerSeat,
      this.seats.length
    );

    for (let pass = 0; pass < 2; pass++) {
      for (const player of order) {
        player.receiveCards(deck.draw(1));
      }
    }

    this.events.emit(createHoleCardsDealtEvent(this.stamp(), order.map(p => p.id)));
  }

  /**
   * Burn, deal the street's community cards and open its betting round
   */
  private openStreet(street: Street, fromStreet: Street): BettingRound {
    const deck = this.requireDeck();
    deck.burn();
    const cards = deck.draw(street === 'flop' ? 3 : 1);
    this.board.push(...cards);
    this._phase = street;

    for (const player of this.seatedPlayers()) {
      player.resetStreet();
    }

    this.events.emit(createStreetChangedEvent(this.stamp(), fromStreet, street, this.potTotal()));
    this.events.emit(createCommunityCardsDealtEvent(this.stamp(), street, cards, [...this.board]));

    this.round = new BettingRound({
      street,
      seats: this.seats,
      startSeat: (this._dealerSeat + 1) % this.seats.length,
      betToCall: 0,
      minRaise: this.config.bigBlind,
    });
    return this.round;
  }

  // ==========================================================================
  // Progress
  // ==========================================================================

  private advance(): RoundOutcome {
    const round = this.round;
    invariant(round !== null, 'no betting round to advance');

    if (round.awaitingSeat !== null) {
      return { kind: 'next-to-act', seat: round.awaitingSeat };
    }

    const contenders = this.seatedPlayers().filter(p => p.inHand);
    if (contenders.length === 1) {
      return { kind: 'hand-complete', result: this.finishUncontested(contenders[0]) };
    }

    // Streets with nobody left to bet are dealt straight through
    let ranOut = false;
    let current = round.street;
    let next = nextStreet(current);
    while (next !== null) {
      const opened = this.openStreet(next, current);
      if (opened.awaitingSeat !== null) {
        return { kind: 'street-advanced', street: next, seat: opened.awaitingSeat };
      }
      ranOut = true;
      current = next;
      next = nextStreet(current);
    }

    return { kind: 'hand-complete', result: this.finishShowdown(ranOut) };
  }

  private finishUncontested(winner: Player): HandResult {
    this.pot.collect(this.contributions());
    const settlement = this.pot.awardUncontested(winner.id);
    return this.completeHand('all-fold', settlement, false);
  }

  private finishShowdown(ranOut: boolean): HandResult {
    this._phase = 'showdown';
    const entrants = this.seatedPlayers()
      .filter(p => p.inHand)
      .map(p => ({ playerId: p.id, seat: p.seat, holeCards: p.holeCards }));

    this.pot.collect(this.contributions());
    const settlement = this.pot.resolveShowdown(
      entrants,
      this.board,
      this._dealerSeat,
      this.seats.length
    );

    this.events.emit(createShowdownEvent(
      this.stamp(),
      entrants.map(e => ({
        playerId: e.playerId,
        seat: e.seat,
        holeCards: [...e.holeCards],
        handDescription: settlement.hands.get(e.playerId)?.description ?? '',
      })),
      this.pot.total
    ));

    return this.completeHand('showdown', settlement, ranOut);
  }

  private completeHand(reason: HandEndReason, settlement: PotSettlement, ranOut: boolean): HandResult {
    for (const award of settlement.awards) {
      this.events.emit(createPotAwardedEvent(
        this.stamp(),
        award.layerIndex,
        award.total,
        award.winnerIds,
        award.payouts,
        award.winningHand?.description ?? null
      ));
    }

    for (const [playerId, amount] of settlement.payouts) {
      this.requirePlayerById(playerId).award(amount);
    }

    const chipsAfter = this.stackTotal();
    invariant(
      chipsAfter === this.chipsAtStart,
      `chips not conserved: ${this.chipsAtStart} at start, ${chipsAfter} after payout`
    );

    const finalStacks = new Map(this.seatedPlayers().map(p => [p.id, p.chips]));
    const mainPot = settlement.awards[0];
    const result: HandResult = {
      handNumber: this._handNumber,
      reason,
      winnerIds: mainPot.winnerIds,
      payouts: settlement.payouts,
      pots: settlement.awards,
      communityCards: [...this.board],
      hands: settlement.hands,
      ranOut,
      finalStacks,
    };

    this.round = null;
    this.deck = null;
    this._phase = 'complete';
    this.lastResult = result;

    this.events.emit(createHandEndedEvent(this.stamp(), reason, result.winnerIds, finalStacks));
    return result;
  }

  private reject(seat: number, action: Action, error: GameError): ActionResult {
    this.events.emit(createActionRejectedEvent(this.stamp(), seat, action, error.code, error.message));
    return { success: false, error };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private stamp(): EventStamp {
    return this.events.stamp(this._handNumber);
  }

  private seatedPlayers(): Player[] {
    return this.seats.filter((p): p is Player => p !== null);
  }

  private contributions(): PlayerContributionInfo[] {
    return this.seatedPlayers()
      .filter(p => p.handContribution > 0)
      .map(p => ({
        playerId: p.id,
        seat: p.seat,
        totalContribution: p.handContribution,
        isFolded: p.status === 'folded',
      }));
  }

  private potTotal(): number {
    return this.seatedPlayers().reduce((sum, p) => sum + p.handContribution, 0);
  }

  private stackTotal(): number {
    return this.seatedPlayers().reduce((sum, p) => sum + p.chips, 0);
  }

  private requireDeck(): Deck {
    invariant(this.deck !== null, 'no deck for the current hand');
    return this.deck;
  }

  private requireSeat(seat: number | null): number {
    invariant(seat !== null, 'not enough seats in play');
    return seat;
  }

  private requirePlayer(seat: number): Player {
    const player = this.seats[seat];
    invariant(player !== null && player !== undefined, `no player in seat ${seat}`);
    return player;
  }

  private requirePlayerById(playerId: PlayerId): Player {
    const player = this.seatedPlayers().find(p => p.id === playerId);
    invariant(player !== undefined, `no player with id ${playerId}`);
    return player;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isActive(player: Player): boolean {
  return player.status === 'active';
}

function nextStreet(street: Street): Street | null {
  switch (street) {
    case 'preflop':
      return 'flop';
    case 'flop':
      return 'turn';
    case 'turn':
      return 'river';
    case 'river':
      return null;
  }
}
