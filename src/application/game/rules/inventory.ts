// Application layer: Inventory, equipment, items and loot

import type { ContentLookup } from '@/domain/content/registry.js';
import type { ArmorItem, ItemDefinition, ItemKind, PotionItem } from '@/domain/content/types.js';
import { EQUIPMENT_SLOTS } from '@/domain/content/types.js';
import type { GameState } from '@/domain/game/GameState.js';
import type { ActionOutcome } from '@/domain/game/session.js';
import type { Combatant, DiceEngine } from '@/domain/game/types.js';
import { activeCompanion } from './party.js';

const DEFAULT_HEAL_DICE = '1d6';

const COMPANION_KEYWORDS = ['companion', 'her', 'him'];
const PLAYER_KEYWORDS = ['me', 'self', 'player', 'you'];

export type ItemLookup<T extends ItemDefinition = ItemDefinition> =
  | { ok: true; item: T }
  | { ok: false; message: string };

function done(message: string): ActionOutcome {
  return { consumed: true, message };
}

function rejected(message: string): ActionOutcome {
  return { consumed: false, message };
}

export function inventoryUsed(state: GameState): number {
  return state.inventory.filter((item) => item.countsTowardLimit).length;
}

export function canAddItem(state: GameState, item: ItemDefinition): boolean {
  if (!item.countsTowardLimit) return true;
  return inventoryUsed(state) < state.inventoryLimit;
}

export function addItemToInventory(state: GameState, item: ItemDefinition): ActionOutcome {
  if (!canAddItem(state, item)) {
    return rejected('Inventory is full.');
  }
  state.inventory.push(item);
  return done(`Added ${item.name} to your pack.`);
}

function removeFromInventory(state: GameState, item: ItemDefinition): void {
  const idx = state.inventory.indexOf(item);
  if (idx >= 0) state.inventory.splice(idx, 1);
}

function matchesKindKeyword(item: ItemDefinition, query: string): boolean {
  switch (item.kind) {
    case 'potion':
      return ['potion', 'healing', 'heal'].includes(query);
    case 'armor':
      return ['armor', 'armour'].includes(query);
    case 'quest':
    case 'misc':
    case 'unknown':
      return false;
  }
}

export function findItem(state: GameState, query: string, kindFilter?: ItemKind): ItemLookup {
  const needle = query.trim().toLowerCase();
  if (!needle) {
    return { ok: false, message: 'Use what?' };
  }
  const matches = state.inventory.filter((item) => {
    if (kindFilter && item.kind !== kindFilter) return false;
    const name = item.name.toLowerCase();
    return (
      needle === name ||
      needle === item.id.toLowerCase() ||
      name.includes(needle) ||
      matchesKindKeyword(item, needle)
    );
  });
  if (matches.length === 0) {
    return { ok: false, message: "You don't have that." };
  }
  // Copies of the same item are interchangeable
  const distinct = [...new Set(matches.map((item) => item.name))];
  if (distinct.length > 1) {
    const names = distinct.join(', ');
    return { ok: false, message: `Be more specific or use an item number: ${names}` };
  }
  return { ok: true, item: matches[0] };
}

// Equipment

export function equipmentAcBonus(state: GameState): number {
  let bonus = 0;
  for (const slot of EQUIPMENT_SLOTS) {
    const effect = state.equipment[slot]?.effect;
    if (effect?.type === 'ac') bonus += effect.bonus;
  }
  return bonus;
}

export function syncPlayerAc(state: GameState): void {
  state.player.ac = state.player.baseAc + equipmentAcBonus(state);
}

function resolveArmor(state: GameState, query: string): ItemLookup<ArmorItem> {
  const trimmed = query.trim();
  let found: ItemLookup;
  if (/^\d+$/.test(trimmed)) {
    const item = state.inventory[parseInt(trimmed, 10) - 1];
    if (!item) {
      return { ok: false, message: 'That item number does not exist.' };
    }
    found = { ok: true, item };
  } else {
    found = findItem(state, trimmed, 'armor');
  }
  if (!found.ok) return found;
  if (found.item.kind !== 'armor') {
    return { ok: false, message: 'That item is not armor.' };
  }
  return { ok: true, item: found.item };
}

export function equipItem(state: GameState, query: string): ActionOutcome {
  const found = resolveArmor(state, query);
  if (!found.ok) return rejected(found.message);
  const item = found.item;
  if (!EQUIPMENT_SLOTS.includes(item.slot)) {
    return rejected("That armor can't be equipped.");
  }

  const current = state.equipment[item.slot];
  if (current) {
    const usedAfterRemoval = inventoryUsed(state) - (item.countsTowardLimit ? 1 : 0);
    if (current.countsTowardLimit && usedAfterRemoval >= state.inventoryLimit) {
      return rejected('Inventory is full; unequip something first.');
    }
  }

  removeFromInventory(state, item);
  if (current) state.inventory.push(current);
  state.equipment[item.slot] = item;
  syncPlayerAc(state);
  return done(`Equipped ${item.name} to ${item.slot}.`);
}

export function unequipItem(state: GameState, slot: string): ActionOutcome {
  const key = slot.trim().toLowerCase();
  const equipSlot = EQUIPMENT_SLOTS.find((candidate) => candidate === key);
  if (!equipSlot) {
    return rejected('Unknown equipment slot.');
  }
  const current = state.equipment[equipSlot];
  if (!current) {
    return rejected('That slot is already empty.');
  }
  if (!canAddItem(state, current)) {
    return rejected('Inventory is full.');
  }
  state.inventory.push(current);
  state.equipment[equipSlot] = null;
  syncPlayerAc(state);
  return done(`Removed ${current.name} from ${equipSlot}.`);
}

// Consumables

function hpRatio(unit: Combatant): number {
  return unit.hp / Math.max(1, unit.maxHp);
}

/**
 * Explicit keywords pick a side; otherwise the lower HP ratio wins,
 * ties go to the player and a downed companion is never picked.
 */
export function resolveHealTarget(state: GameState, target: string | null): Combatant {
  const companion = activeCompanion(state);
  const key = (target ?? '').trim().toLowerCase();

  if (companion && (COMPANION_KEYWORDS.includes(key) || key === companion.name.toLowerCase())) {
    return companion;
  }
  if (PLAYER_KEYWORDS.includes(key) || !companion) {
    return state.player;
  }
  if (companion.hp > 0 && hpRatio(companion) < hpRatio(state.player)) {
    return companion;
  }
  return state.player;
}

export function useItem(
  state: GameState,
  dice: DiceEngine,
  query: string,
  target: string | null = null
): ActionOutcome {
  const found = findItem(state, query, 'potion');
  if (!found.ok) return rejected(found.message);
  const item = found.item;
  if (item.kind !== 'potion') {
    return rejected(`${item.name} can't be used right now.`);
  }
  const potion: PotionItem = item;
  const effect = potion.effect;
  if (!effect || effect.type !== 'heal') {
    return rejected(`${potion.name} has no usable effect yet.`);
  }

  const recipient = resolveHealTarget(state, target);
  const roll = dice.rollExpression(effect.dice || DEFAULT_HEAL_DICE);
  const before = recipient.hp;
  recipient.hp = Math.min(recipient.maxHp, recipient.hp + roll.total);
  const healed = recipient.hp - before;

  removeFromInventory(state, potion);
  return done(`You use ${potion.name} on ${recipient.name}, healing ${healed} (${roll.detail}).`);
}

// Loot

export interface LootRoll {
  gold: number;
  itemId: string | null;
}

/**
 * Gold expression first, then one die over the loot table
 */
export function rollLoot(
  registry: ContentLookup,
  dice: DiceEngine,
  campaignId: string,
  mobName: string
): LootRoll {
  const { loot } = registry.getMobProfile(campaignId, mobName);
  const gold = loot.gold ? dice.rollExpression(loot.gold).total : 0;
  if (loot.items.length === 0) {
    return { gold, itemId: null };
  }
  const idx = dice.rollDie(loot.items.length) - 1;
  return { gold, itemId: loot.items[idx] };
}

/**
 * Campaign rewards do not travel between runs
 */
export function stripQuestItems(registry: ContentLookup, state: GameState): void {
  const questIds = new Set(registry.questItemIds(state.campaignId));
  const isQuest = (item: ItemDefinition): boolean => item.kind === 'quest' || questIds.has(item.id);

  state.inventory = state.inventory.filter((item) => !isQuest(item));
  for (const slot of EQUIPMENT_SLOTS) {
    const item = state.equipment[slot];
    if (item && isQuest(item)) state.equipment[slot] = null;
  }
  syncPlayerAc(state);
}
