// Application layer: New game setup, roster restore and campaign completion

import type { ContentLookup } from '@/domain/content/registry.js';
import type { ItemDefinition } from '@/domain/content/types.js';
import type { Character, DiceEngine, Stats } from '@/domain/game/types.js';
import type { Equipment, GameState, RosterEntry } from '@/domain/game/GameState.js';
import {
  DEFAULT_INVENTORY_LIMIT,
  createEmptyEquipment,
  createEmptyFlags,
} from '@/domain/game/GameState.js';
import { createCampaignCompanions } from './rules/companions.js';
import { startRoom } from './rules/exploration.js';
import { stripQuestItems, syncPlayerAc } from './rules/inventory.js';
import { createPlayer } from './rules/player.js';
import { grantXp } from './rules/progression.js';
import { ContentIntegrityError } from '@/utils/errors.js';

export const HEALING_POTION_ID = 'healing_potion';
export const RESTOCK_POTION_COUNT = 3;

const STARTING_KIT = [
  HEALING_POTION_ID,
  HEALING_POTION_ID,
  HEALING_POTION_ID,
  'leather_cap',
  'worn_boots',
];

export interface NewCharacterInput {
  name: string;
  className: string;
  race?: string;
  stats: Partial<Stats>;
}

export interface NewGameInput {
  campaignId: string;
  companionId?: string;
  /** Either a fresh character or one restored from the roster */
  character: NewCharacterInput | RosterEntry;
  inventoryLimit?: number;
}

export interface NewGame {
  state: GameState;
  intro: string;
}

function isRosterEntry(input: NewCharacterInput | RosterEntry): input is RosterEntry {
  return 'character' in input;
}

export function startingKit(registry: ContentLookup, campaignId: string): ItemDefinition[] {
  return STARTING_KIT.map((id) => registry.itemFromId(campaignId, id));
}

/**
 * Tops the pack up to three healing potions
 */
export function restockPotions(
  registry: ContentLookup,
  campaignId: string,
  inventory: ItemDefinition[]
): void {
  const potions = inventory.filter((item) => item.id === HEALING_POTION_ID).length;
  for (let i = potions; i < RESTOCK_POTION_COUNT; i++) {
    inventory.push(registry.itemFromId(campaignId, HEALING_POTION_ID));
  }
}

/**
 * A roster character starts each campaign rested and resupplied
 */
export function restoreRosterEntry(
  registry: ContentLookup,
  campaignId: string,
  entry: RosterEntry
): { player: Character; inventory: ItemDefinition[]; equipment: Equipment } {
  const player = structuredClone(entry.character);
  player.hp = player.maxHp;
  player.mana = player.maxMana;

  const inventory = structuredClone(entry.inventory);
  restockPotions(registry, campaignId, inventory);

  return {
    player,
    inventory,
    equipment: { ...createEmptyEquipment(), ...structuredClone(entry.equipment) },
  };
}

export function createNewGame(
  registry: ContentLookup,
  dice: DiceEngine,
  input: NewGameInput
): NewGame {
  const { campaignId } = input;
  const campaign = registry.getCampaign(campaignId);
  const startRoomId = campaign.roomOrder[0];
  if (!startRoomId) {
    throw new ContentIntegrityError(`Campaign ${campaignId} has no rooms`);
  }

  const hero = isRosterEntry(input.character)
    ? restoreRosterEntry(registry, campaignId, input.character)
    : {
        player: createPlayer(
          registry,
          input.character.name,
          input.character.className,
          input.character.stats,
          input.character.race
        ),
        inventory: startingKit(registry, campaignId),
        equipment: createEmptyEquipment(),
      };

  const state: GameState = {
    campaignId,
    player: hero.player,
    companions: createCampaignCompanions(
      registry,
      campaignId,
      input.companionId ? [input.companionId] : undefined
    ),
    roomId: startRoomId,
    visited: [],
    inventory: hero.inventory,
    equipment: hero.equipment,
    inventoryLimit: input.inventoryLimit ?? DEFAULT_INVENTORY_LIMIT,
    inCombat: false,
    enemies: [],
    turn: 0,
    turnLog: [],
    lastEvent: '',
    lastPlayerInput: '',
    narrationLog: [],
    playerDefending: false,
    companionDefending: false,
    gameOver: false,
    campaignCompleted: false,
    restStreak: 0,
    pendingDecisions: [],
    flags: createEmptyFlags(),
  };

  syncPlayerAc(state);
  const intro = startRoom({ registry, dice, state }, registry.getRoom(campaignId, startRoomId));
  state.lastEvent = intro;
  return { state, intro };
}

/**
 * Completion rewards, applied once when the adventure ends with the player standing.
 * Returns the level-up messages, or null when nothing applied.
 */
export function applyCampaignCompletion(registry: ContentLookup, state: GameState): string[] | null {
  if (!state.gameOver || state.player.hp <= 0 || state.campaignCompleted) {
    return null;
  }
  const { completionXp } = registry.getCampaign(state.campaignId);
  const messages = completionXp > 0 ? grantXp(registry, state, completionXp) : [];
  stripQuestItems(registry, state);
  syncPlayerAc(state);
  state.campaignCompleted = true;
  return messages;
}

export function toRosterEntry(state: GameState): RosterEntry {
  return {
    character: structuredClone(state.player),
    inventory: structuredClone(state.inventory),
    equipment: structuredClone(state.equipment),
  };
}
