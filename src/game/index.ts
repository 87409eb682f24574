/**
 * Game Module
 *
 * Texas Hold'em game engine.
 */

export * from './engine';
