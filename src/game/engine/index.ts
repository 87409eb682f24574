/**
 * Game Engine
 *
 * Core Texas Hold'em game logic.
 */

// Card primitives
export * from './Card';
export * from './Deck';

// Players and betting
export * from './Player';
export * from './Actions';
export * from './BettingRound';

// Errors, configuration and events
export * from './GameErrors';
export * from './GameConfig';
export * from './GameEvents';

// Orchestration
export * from './GameEngine';
