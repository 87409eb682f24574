/**
 * GameEngine.test.ts
 * Tests for hand orchestration: blinds, turn order, streets, showdown,
 * side pots, snapshots and events
 */

import { GameEngine, GameSnapshot, RoundOutcome } from '../GameEngine';
import { Actions } from '../Actions';
import { Card, parseCards } from '../Card';
import { Deck } from '../Deck';
import { DeckFactory, SeatAssignment } from '../GameConfig';
import {
  GameError,
  GameErrorCode,
  InvalidActionError,
  InvalidRaiseAmountError,
  OutOfTurnError,
} from '../GameErrors';

// ============================================================================
// Test Setup
// ============================================================================

function cards(notation: string): Card[] {
  const parsed = parseCards(notation);
  if (parsed === null) {
    throw new Error(`bad card notation in test: ${notation}`);
  }
  return parsed;
}

/**
 * Deck that deals the given hole cards (listed in deal order, starting left
 * of the dealer) followed by burn/flop/burn/turn/burn/river
 */
function rigged(holesInDealOrder: readonly string[], board: string, burns: string): DeckFactory {
  const holes = holesInDealOrder.map(cards);
  const [burnFlop, burnTurn, burnRiver] = cards(burns);
  const [f1, f2, f3, turn, river] = cards(board);
  const top = [
    ...holes.map(h => h[0]),
    ...holes.map(h => h[1]),
    burnFlop, f1, f2, f3,
    burnTurn, turn,
    burnRiver, river,
  ];
  return () => Deck.stacked(top);
}

function threePlayers(alice = 1000, bob = 1000, carol = 1000): SeatAssignment[] {
  return [
    { id: 'alice', name: 'Alice', seat: 0, chips: alice },
    { id: 'bob', name: 'Bob', seat: 1, chips: bob },
    { id: 'carol', name: 'Carol', seat: 2, chips: carol },
  ];
}

function chipsInPlay(snapshot: GameSnapshot): number {
  const stacks = snapshot.seats.reduce((sum, seat) => sum + (seat?.chips ?? 0), 0);
  return stacks + snapshot.potTotal;
}

function expectOutcome(outcome: RoundOutcome, kind: RoundOutcome['kind']): void {
  expect(outcome.kind).toBe(kind);
}

// ============================================================================
// Hand Start
// ============================================================================

describe('GameEngine - starting a hand', () => {
  it('should post blinds and open preflop left of the big blind', () => {
    const engine = new GameEngine(threePlayers());
    const outcome = engine.startHand();

    expect(outcome).toEqual({ kind: 'next-to-act', seat: 0 });

    const snapshot = engine.snapshot();
    expect(snapshot.phase).toBe('preflop');
    expect(snapshot.handNumber).toBe(1);
    expect(snapshot.dealerSeat).toBe(0);
    expect(snapshot.seats[1]?.streetContribution).toBe(10);
    expect(snapshot.seats[2]?.streetContribution).toBe(20);
    expect(snapshot.potTotal).toBe(30);
    expect(snapshot.betToCall).toBe(20);
    expect(snapshot.seatToAct).toBe(0);
    expect(snapshot.communityCards).toEqual([]);
  });

  it('should have the dealer post the small blind heads-up', () => {
    const engine = new GameEngine(threePlayers().slice(0, 2));
    const outcome = engine.startHand();

    expect(outcome).toEqual({ kind: 'next-to-act', seat: 0 });
    const snapshot = engine.snapshot();
    expect(snapshot.seats[0]?.streetContribution).toBe(10);
    expect(snapshot.seats[1]?.streetContribution).toBe(20);
  });

  it('should refuse to start without two stacks in play', () => {
    const engine = new GameEngine([
      { id: 'alice', name: 'Alice', seat: 0, chips: 1000 },
      { id: 'bob', name: 'Bob', seat: 1, chips: 5 },
    ]);

    expect(() => engine.startHand()).toThrow(GameError);
    expect(engine.phase).toBe('waiting');
  });

  it('should sit out a player below the minimum stack', () => {
    const engine = new GameEngine(threePlayers(1000, 1000, 5));
    engine.startHand();

    expect(engine.snapshot().seats[2]?.status).toBe('sitting-out');
    expect(engine.snapshot().seats[2]?.holeCards).toBeNull();
  });

  it('should refuse to start a second hand mid-hand', () => {
    const engine = new GameEngine(threePlayers());
    engine.startHand();
    expect(() => engine.startHand()).toThrow(InvalidActionError);
  });

  it('should reject a bad configuration', () => {
    expect(() => new GameEngine(threePlayers(), { smallBlind: 0 })).toThrow(GameError);
    expect(() => new GameEngine(threePlayers(), { smallBlind: 50, bigBlind: 20 })).toThrow(GameError);
    expect(
      () =>
        new GameEngine([
          { id: 'alice', name: 'Alice', seat: 0 },
          { id: 'bob', name: 'Bob', seat: 0 },
        ])
    ).toThrow(GameError);
  });

  it('should seat players without a stack at the starting chips', () => {
    const engine = new GameEngine([
      { id: 'alice', name: 'Alice', seat: 0 },
      { id: 'bob', name: 'Bob', seat: 4 },
    ]);
    expect(engine.snapshot().seats[4]?.chips).toBe(10000);
  });
});

// ============================================================================
// Legal Actions
// ============================================================================

describe('GameEngine - legal actions', () => {
  it('should bound the raise and report pot odds', () => {
    const engine = new GameEngine(threePlayers());
    engine.startHand();

    const legal = engine.legalActions(0);
    expect(legal.actions).toEqual(['fold', 'call', 'raise', 'all-in']);
    expect(legal.callAmount).toBe(20);
    expect(legal.raiseRange).toEqual({ min: 20, max: 980 });
    expect(legal.potOdds).toBeCloseTo(0.4);
  });

  it('should offer nothing between hands', () => {
    const engine = new GameEngine(threePlayers());
    expect(engine.legalActions(0).actions).toEqual([]);
    expect(engine.legalActions(0).potOdds).toBeNull();
  });

  it('should leave state untouched when an action is rejected', () => {
    const engine = new GameEngine(threePlayers());
    engine.startHand();
    const before = engine.snapshot();

    const outOfTurn = engine.applyAction(1, Actions.call());
    expect(outOfTurn.success).toBe(false);
    if (!outOfTurn.success) {
      expect(outOfTurn.error).toBeInstanceOf(OutOfTurnError);
    }

    const check = engine.applyAction(0, Actions.check());
    expect(check.success).toBe(false);
    if (!check.success) {
      expect(check.error).toBeInstanceOf(InvalidActionError);
    }

    const smallRaise = engine.applyAction(0, Actions.raise(5));
    expect(smallRaise.success).toBe(false);
    if (!smallRaise.success) {
      expect(smallRaise.error).toBeInstanceOf(InvalidRaiseAmountError);
    }

    expect(engine.snapshot()).toEqual(before);

    const history = engine.getEventHistory();
    const last = history[history.length - 1];
    expect(last).toMatchObject({
      type: 'ACTION_REJECTED',
      seat: 0,
      errorCode: GameErrorCode.INVALID_RAISE_AMOUNT,
    });
  });

  it('should reject actions when no hand is running', () => {
    const engine = new GameEngine(threePlayers());
    const result = engine.applyAction(0, Actions.check());
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe(GameErrorCode.INVALID_ACTION);
    }
  });
});

// ============================================================================
// Hand Flow
// ============================================================================

describe('GameEngine - hand flow', () => {
  it('should award the pot at once when everyone else folds', () => {
    const engine = new GameEngine(threePlayers().slice(0, 2));
    engine.startHand();

    const result = engine.applyAction(0, Actions.fold());
    expect(result.success).toBe(true);
    if (!result.success || result.outcome.kind !== 'hand-complete') {
      throw new Error('expected the hand to complete');
    }

    const hand = result.outcome.result;
    expect(hand.reason).toBe('all-fold');
    expect(hand.winnerIds).toEqual(['bob']);
    expect(hand.payouts).toEqual(new Map([['bob', 30]]));
    expect(hand.communityCards).toEqual([]);
    expect(hand.finalStacks).toEqual(new Map([['alice', 990], ['bob', 1010]]));

    expect(engine.phase).toBe('complete');
    expect(engine.getEventHistory().map(e => e.type)).toEqual([
      'HAND_STARTED',
      'BLINDS_POSTED',
      'HOLE_CARDS_DEALT',
      'PLAYER_ACTED',
      'POT_AWARDED',
      'POT_AWARDED',
      'HAND_ENDED',
    ]);
  });

  it('should move the button and let the big blind act first after the flop heads-up', () => {
    const engine = new GameEngine(threePlayers().slice(0, 2));
    engine.startHand();
    engine.applyAction(0, Actions.fold());

    const opening = engine.startHand();
    expect(engine.dealerSeat).toBe(1);
    expect(opening).toEqual({ kind: 'next-to-act', seat: 1 });

    expect(engine.applyAction(1, Actions.call())).toEqual({
      success: true,
      outcome: { kind: 'next-to-act', seat: 0 },
    });
    expect(engine.applyAction(0, Actions.check())).toEqual({
      success: true,
      outcome: { kind: 'street-advanced', street: 'flop', seat: 0 },
    });
    expect(engine.snapshot().communityCards).toHaveLength(3);
  });

  it('should play a checked-down hand to showdown', () => {
    // Deal order from the dealer at seat 0: bob, carol, alice
    const engine = new GameEngine(threePlayers(), {
      deckFactory: rigged(['Kc Kd', 'Qc Qd', 'Ac Ad'], '2h 7s 9d Jc 4h', '3s 5s 6s'),
    });

    expectOutcome(engine.startHand(), 'next-to-act');

    const preview = engine.snapshot(0);
    expect(preview.seats[0]?.holeCards).toEqual(cards('Ac Ad'));
    expect(preview.seats[1]?.holeCards).toBeNull();

    const script: Array<[number, 'call' | 'check', RoundOutcome['kind']]> = [
      [0, 'call', 'next-to-act'],
      [1, 'call', 'next-to-act'],
      [2, 'check', 'street-advanced'],
      [1, 'check', 'next-to-act'],
      [2, 'check', 'next-to-act'],
      [0, 'check', 'street-advanced'],
      [1, 'check', 'next-to-act'],
      [2, 'check', 'next-to-act'],
      [0, 'check', 'street-advanced'],
      [1, 'check', 'next-to-act'],
      [2, 'check', 'next-to-act'],
    ];

    for (const [seat, type, kind] of script) {
      const result = engine.applyAction(seat, type === 'call' ? Actions.call() : Actions.check());
      expect(result.success).toBe(true);
      if (result.success) {
        expectOutcome(result.outcome, kind);
      }
      expect(chipsInPlay(engine.snapshot())).toBe(3000);
    }

    expect(engine.snapshot().communityCards).toEqual(cards('2h 7s 9d Jc 4h'));

    const last = engine.applyAction(0, Actions.check());
    if (!last.success || last.outcome.kind !== 'hand-complete') {
      throw new Error('expected the hand to complete');
    }

    const hand = last.outcome.result;
    expect(hand.reason).toBe('showdown');
    expect(hand.ranOut).toBe(false);
    expect(hand.winnerIds).toEqual(['alice']);
    expect(hand.hands.get('alice')?.description).toBe('Pair of Aces');
    expect(hand.finalStacks).toEqual(new Map([['alice', 1040], ['bob', 980], ['carol', 980]]));

    const after = engine.snapshot();
    expect(after.phase).toBe('complete');
    expect(after.potTotal).toBe(0);
    expect(after.pots).toEqual([]);
    expect(after.seats[1]?.holeCards).toEqual(cards('Kc Kd'));
    expect(chipsInPlay(after)).toBe(3000);

    const types = engine.getEventHistory().map(e => e.type);
    expect(types.slice(-3)).toEqual(['SHOWDOWN', 'POT_AWARDED', 'HAND_ENDED']);
    expect(types.filter(t => t === 'STREET_CHANGED')).toHaveLength(3);
  });

  it('should run the board out and split side pots when everyone is all-in', () => {
    const engine = new GameEngine(threePlayers(100, 300, 1000), {
      deckFactory: rigged(['Kc Kd', 'Qh 8s', 'Ac Ad'], '2c 7d 9h Jc 3s', '4s 5s 6s'),
    });

    expect(engine.startHand()).toEqual({ kind: 'next-to-act', seat: 0 });
    expect(engine.applyAction(0, Actions.allIn())).toEqual({
      success: true,
      outcome: { kind: 'next-to-act', seat: 1 },
    });
    expect(engine.applyAction(1, Actions.allIn())).toEqual({
      success: true,
      outcome: { kind: 'next-to-act', seat: 2 },
    });
    expect(engine.snapshot().potTotal).toBe(420);

    const last = engine.applyAction(2, Actions.allIn());
    if (!last.success || last.outcome.kind !== 'hand-complete') {
      throw new Error('expected the hand to complete');
    }

    const hand = last.outcome.result;
    expect(hand.ranOut).toBe(true);
    expect(hand.communityCards).toEqual(cards('2c 7d 9h Jc 3s'));
    expect(hand.pots.map(p => p.total)).toEqual([300, 400, 700]);
    expect(hand.pots.map(p => p.eligiblePlayers)).toEqual([
      ['alice', 'bob', 'carol'],
      ['bob', 'carol'],
      ['carol'],
    ]);
    expect(hand.payouts).toEqual(new Map([['alice', 300], ['bob', 400], ['carol', 700]]));
    expect(hand.winnerIds).toEqual(['alice']);

    const after = engine.snapshot();
    expect(after.seats.map(s => s?.chips ?? null).slice(0, 3)).toEqual([300, 400, 700]);
    expect(after.seats[2]?.holeCards).toEqual(cards('Qh 8s'));
  });

  it('should conserve chips over many shuffled hands', () => {
    const engine = new GameEngine(
      [
        { id: 'alice', name: 'Alice', seat: 0 },
        { id: 'bob', name: 'Bob', seat: 2 },
        { id: 'carol', name: 'Carol', seat: 5 },
        { id: 'dave', name: 'Dave', seat: 7 },
      ],
      { random: () => 0.5 }
    );
    const dealers: number[] = [];

    for (let i = 0; i < 8; i++) {
      let outcome = engine.startHand();
      dealers.push(engine.dealerSeat);

      while (outcome.kind !== 'hand-complete') {
        const seat = outcome.seat;
        const legal = engine.legalActions(seat);
        const action = legal.actions.includes('check') ? Actions.check() : Actions.call();
        const result = engine.applyAction(seat, action);
        if (!result.success) {
          throw result.error;
        }
        outcome = result.outcome;
        expect(chipsInPlay(engine.snapshot())).toBe(40000);
      }
    }

    expect(dealers).toEqual([0, 2, 5, 7, 0, 2, 5, 7]);
    expect(chipsInPlay(engine.snapshot())).toBe(40000);
  });
});

// ============================================================================
// Events
// ============================================================================

describe('GameEngine - events', () => {
  it('should sequence events and notify listeners', () => {
    const engine = new GameEngine(threePlayers());
    const seen: string[] = [];
    const unsubscribe = engine.onEvent(event => seen.push(event.type));

    engine.startHand();
    unsubscribe();
    engine.applyAction(0, Actions.fold());

    expect(seen).toEqual(['HAND_STARTED', 'BLINDS_POSTED', 'HOLE_CARDS_DEALT']);
    const sequences = engine.getEventHistory().map(e => e.sequence);
    expect(sequences).toEqual([1, 2, 3, 4]);
  });

  it('should start each hand with a fresh history', () => {
    const engine = new GameEngine(threePlayers().slice(0, 2));
    for (let hand = 0; hand < 3; hand++) {
      engine.startHand();
      const folder = engine.snapshot().seatToAct;
      if (folder === null) {
        throw new Error('expected a seat to act');
      }
      engine.applyAction(folder, Actions.fold());
    }

    const history = engine.getEventHistory();
    expect(history).toHaveLength(7);
    expect(history.every(e => e.handNumber === 3)).toBe(true);
    expect(history.map(e => e.sequence)).toEqual([1, 2, 3, 4, 5, 6, 7]);
  });

  it('should not deal hole cards into the event log', () => {
    const engine = new GameEngine(threePlayers());
    engine.startHand();

    const dealt = engine.getEventHistory().find(e => e.type === 'HOLE_CARDS_DEALT');
    expect(dealt).toEqual(expect.objectContaining({ playerIds: ['bob', 'carol', 'alice'] }));
    expect(dealt).not.toHaveProperty('playerCards');
  });

  it('should report a failing listener and keep going', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const engine = new GameEngine(threePlayers());
    engine.onEvent(() => {
      throw new Error('listener failed');
    });

    expect(engine.startHand()).toEqual({ kind: 'next-to-act', seat: 0 });
    expect(errorSpy).toHaveBeenCalledTimes(3);
    expect(errorSpy).toHaveBeenCalledWith('Event listener error:', expect.any(Error));

    errorSpy.mockRestore();
  });
});
