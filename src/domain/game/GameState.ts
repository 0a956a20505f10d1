// Domain layer: Game state types
// NO external dependencies - pure TypeScript

import type { Character, Companion, Enemy } from './types.js';
import type { EquipmentSlot, ItemDefinition } from '../content/types.js';

export type Equipment = Record<EquipmentSlot, ItemDefinition | null>;

export interface Corpse {
  id: number;
  name: string;
  looted: boolean;
}

/**
 * Room and quest progress
 * Serialized under the conventional keys defeated_rooms / corpses / next_corpse_id
 */
export interface WorldFlags {
  defeatedRooms: string[];
  corpses: Record<string, Corpse[]>;
  nextCorpseId: number;
  lootTaken: string[];
  lootFailed: string[];
  quest: Record<string, boolean>;
}

export interface SpellDecision {
  id: string;
  type: 'spell';
  level: number;
  choices: string[];
}

export type PendingDecision = SpellDecision;

export type NarrationSource = 'ai' | 'fallback' | 'stub';

export interface NarrationEntry {
  turn: number;
  playerInput: string;
  rulesResult: string;
  narration: string;
  source: NarrationSource;
}

/**
 * Complete state of one adventure
 * Owned by a single GameSession; mutated by every resolved action
 */
export interface GameState {
  campaignId: string;
  player: Character;
  /** Ordered party; index 0 fights, the rest only travel along */
  companions: Companion[];
  roomId: string;
  visited: string[];
  inventory: ItemDefinition[];
  equipment: Equipment;
  inventoryLimit: number;
  inCombat: boolean;
  enemies: Enemy[];
  turn: number;
  turnLog: string[];
  lastEvent: string;
  lastPlayerInput: string;
  narrationLog: NarrationEntry[];
  playerDefending: boolean;
  companionDefending: boolean;
  gameOver: boolean;
  campaignCompleted: boolean;
  restStreak: number;
  pendingDecisions: PendingDecision[];
  flags: WorldFlags;
}

export const DEFAULT_INVENTORY_LIMIT = 10;
export const NARRATION_LOG_WINDOW = 50;

export function createEmptyEquipment(): Equipment {
  return {
    head: null,
    arms: null,
    hands: null,
    chest: null,
    legs: null,
    feet: null,
  };
}

export function createEmptyFlags(): WorldFlags {
  return {
    defeatedRooms: [],
    corpses: {},
    nextCorpseId: 1,
    lootTaken: [],
    lootFailed: [],
    quest: {},
  };
}

/**
 * A character kept between campaigns, with the gear they carried out
 */
export interface RosterEntry {
  character: Character;
  inventory: ItemDefinition[];
  equipment: Equipment;
}
