// Domain layer: Narration collaborator contract
// NO external dependencies - pure TypeScript

import type { NarrationSource } from '../game/GameState.js';

export interface CombatantSnapshot {
  name: string;
  hp: number;
  maxHp: number;
  ac: number;
  mana?: number;
  maxMana?: number;
}

/**
 * Read-only picture of the game handed to the narrator.
 * Built after rules resolution; nothing here flows back into state.
 */
export interface NarrationSnapshot {
  campaignName: string;
  room: { id: string; name: string; kind: string; description: string };
  player: CombatantSnapshot & { race: string; className: string; level: number; gold: number };
  companions: CombatantSnapshot[];
  enemies: CombatantSnapshot[];
  inCombat: boolean;
  gameOver: boolean;
  inventory: string[];
  questFlags: string[];
  recentTurns: string[];
}

export interface NarrationResult {
  text: string;
  source: NarrationSource;
}

export interface NarrationRequest {
  snapshot: NarrationSnapshot;
  playerInput: string;
  rulesResult: string;
}

export interface SuggestionRequest {
  snapshot: NarrationSnapshot;
  /** Legal verbs for the current mode */
  actions: string[];
  companionName: string;
}

export interface INarrator {
  narrate(request: NarrationRequest): Promise<NarrationResult>;
  suggest(request: SuggestionRequest): Promise<NarrationResult>;
}
