// Application layer: Party access

import type { GameState } from '@/domain/game/GameState.js';
import type { Companion } from '@/domain/game/types.js';

/**
 * The companion that acts and is targeted in combat.
 * Others in the party travel along, regenerate and rest, but do not fight.
 */
export function activeCompanion(state: GameState): Companion | null {
  return state.companions[0] ?? null;
}
