/**
 * Economy Module
 *
 * Pot accounting for a hand:
 * - Side pot layering for unequal all-in stacks
 * - Showdown resolution and uncontested awards
 */

// ============================================================================
// Side Pots
// ============================================================================

export type { PlayerContributionInfo, PotLayer, SidePotResult } from './SidePot';
export { SidePotCalculator, orderFromDealer } from './SidePot';

// ============================================================================
// Pot Manager
// ============================================================================

export type { ShowdownEntrant, LayerAward, PotSettlement } from './PotManager';
export { PotManager } from './PotManager';
