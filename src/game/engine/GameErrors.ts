/**
 * GameErrors.ts
 * Error types for the hold'em engine
 *
 * Caller-facing errors carry a machine-readable code and leave engine state
 * untouched. Invariant violations indicate a defect and are never returned
 * as result values.
 */

// ============================================================================
// Error Codes
// ============================================================================

export enum GameErrorCode {
  // Player input
  INSUFFICIENT_CHIPS = 'INSUFFICIENT_CHIPS',
  INVALID_ACTION = 'INVALID_ACTION',
  INVALID_RAISE_AMOUNT = 'INVALID_RAISE_AMOUNT',
  OUT_OF_TURN = 'OUT_OF_TURN',

  // Cards
  INSUFFICIENT_CARDS = 'INSUFFICIENT_CARDS',
  INVALID_CARDS = 'INVALID_CARDS',

  // Table setup
  NOT_ENOUGH_PLAYERS = 'NOT_ENOUGH_PLAYERS',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

// ============================================================================
// Base Error Class
// ============================================================================

export class GameError extends Error {
  readonly code: GameErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: GameErrorCode,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'GameError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Specialized Error Classes
// ============================================================================

export class InsufficientChipsError extends GameError {
  constructor(seat: number, requested: number, available: number) {
    super(
      GameErrorCode.INSUFFICIENT_CHIPS,
      `Seat ${seat} cannot commit ${requested} chips, only ${available} available`,
      { seat, requested, available }
    );
    this.name = 'InsufficientChipsError';
  }
}

export class InsufficientCardsError extends GameError {
  constructor(requested: number, available: number) {
    super(
      GameErrorCode.INSUFFICIENT_CARDS,
      `Need ${requested} cards, only ${available} available`,
      { requested, available }
    );
    this.name = 'InsufficientCardsError';
  }
}

export class InvalidActionError extends GameError {
  constructor(reason: string, details: Record<string, unknown> = {}) {
    super(GameErrorCode.INVALID_ACTION, reason, details);
    this.name = 'InvalidActionError';
  }
}

export class OutOfTurnError extends GameError {
  constructor(seat: number, awaitingSeat: number | null) {
    super(
      GameErrorCode.OUT_OF_TURN,
      awaitingSeat === null
        ? `Seat ${seat} cannot act, no action is pending`
        : `Seat ${seat} acted out of turn, waiting on seat ${awaitingSeat}`,
      { seat, awaitingSeat }
    );
    this.name = 'OutOfTurnError';
  }
}

export class InvalidRaiseAmountError extends GameError {
  constructor(amount: number, minimum: number, maximum: number) {
    super(
      GameErrorCode.INVALID_RAISE_AMOUNT,
      `Raise of ${amount} is not allowed, must be between ${minimum} and ${maximum}`,
      { amount, minimum, maximum }
    );
    this.name = 'InvalidRaiseAmountError';
  }
}

// ============================================================================
// Invariants
// ============================================================================

/**
 * Raised when internal bookkeeping is inconsistent. Never recoverable.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = 'InvariantViolationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message);
  }
}

// ============================================================================
// Error Factory
// ============================================================================

export const GameErrors = {
  insufficientChips: (seat: number, requested: number, available: number) =>
    new InsufficientChipsError(seat, requested, available),

  insufficientCards: (requested: number, available: number) =>
    new InsufficientCardsError(requested, available),

  invalidAction: (reason: string, details?: Record<string, unknown>) =>
    new InvalidActionError(reason, details),

  outOfTurn: (seat: number, awaitingSeat: number | null) =>
    new OutOfTurnError(seat, awaitingSeat),

  invalidRaiseAmount: (amount: number, minimum: number, maximum: number) =>
    new InvalidRaiseAmountError(amount, minimum, maximum),

  invalidCards: (reason: string) =>
    new GameError(GameErrorCode.INVALID_CARDS, `Invalid cards: ${reason}`, { reason }),

  notEnoughPlayers: (eligible: number) =>
    new GameError(
      GameErrorCode.NOT_ENOUGH_PLAYERS,
      `At least 2 players with chips are required to start a hand, found ${eligible}`,
      { eligible }
    ),

  invalidConfig: (reason: string) =>
    new GameError(GameErrorCode.INVALID_CONFIG, `Invalid game configuration: ${reason}`, { reason }),
};
