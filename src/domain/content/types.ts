// Domain layer: Static campaign content types
// NO external dependencies - pure TypeScript

import type { StatName } from '../game/types.js';

export type EquipmentSlot = 'head' | 'arms' | 'hands' | 'chest' | 'legs' | 'feet';

export const EQUIPMENT_SLOTS: readonly EquipmentSlot[] = [
  'head',
  'arms',
  'hands',
  'chest',
  'legs',
  'feet',
];

// Item effects
export type ItemEffect =
  | { type: 'heal'; dice: string }
  | { type: 'ac'; bonus: number };

interface ItemBase {
  id: string;
  name: string;
  countsTowardLimit: boolean;
  effect: ItemEffect | null;
}

export interface PotionItem extends ItemBase {
  kind: 'potion';
}

export interface ArmorItem extends ItemBase {
  kind: 'armor';
  slot: EquipmentSlot;
}

export interface QuestItem extends ItemBase {
  kind: 'quest';
}

export interface MiscItem extends ItemBase {
  kind: 'misc';
}

/**
 * Placeholder for references the catalog cannot resolve.
 * Lookups never fail on items; they hand back one of these instead.
 */
export interface UnknownItem extends ItemBase {
  kind: 'unknown';
}

export type ItemDefinition = PotionItem | ArmorItem | QuestItem | MiscItem | UnknownItem;

export type ItemKind = ItemDefinition['kind'];

// Rooms
export interface SocialConfig {
  stat: StatName;
  dc: number;
  successFlag?: string;
  successMessage?: string;
  failMessage?: string;
  doneFlag: string;
}

export interface LootConfig {
  stat: StatName;
  dc: number;
  winItemId?: string;
  endsCampaign: boolean;
  successMessage?: string;
  failMessage?: string;
}

interface RoomBase {
  id: string;
  name: string;
  description: string;
}

export interface SocialRoom extends RoomBase {
  kind: 'social';
  npc: string | null;
  social: SocialConfig;
}

export interface CombatRoom extends RoomBase {
  kind: 'combat';
  enemy: string;
}

export interface LootRoom extends RoomBase {
  kind: 'loot';
  loot: LootConfig;
}

export interface PassageRoom extends RoomBase {
  kind: 'passage';
}

export type Room = SocialRoom | CombatRoom | LootRoom | PassageRoom;

// Creatures
export type AiPolicy = 'focus_player' | 'focus_companion' | 'focus_weakest';

export interface LootTable {
  gold?: string;
  items: string[];
}

export interface MobProfile {
  name: string;
  hp: number;
  hpExpr?: string;
  hpMin: number;
  count: number;
  ac: number;
  attackBonus: number;
  damage: string;
  loot: LootTable;
  ai: AiPolicy;
  xp: number;
}

export interface CompanionProfile {
  id: string;
  name: string;
  hp: number;
  maxHp: number;
  ac: number;
  attackBonus: number;
  damage: string;
  defendHpThreshold: number;
  mana: number;
  maxMana: number;
  spells: string[];
}

// Character building
export type ClassRole = 'caster' | 'melee';

export type ClassSpecial =
  | { kind: 'power'; damageBonus: number; flavor: string }
  | { kind: 'precision'; attackBonus: number; flavor: string }
  | { kind: 'spell' };

export interface ClassProfile {
  name: string;
  role: ClassRole;
  description: string;
  baseHp: number;
  baseAc: number;
  attackBonus: number;
  damage: string;
  hpPerLevel: number;
  spells: string[];
  learnableSpells: string[];
  manaStat: StatName;
  special: ClassSpecial;
}

export interface RaceProfile {
  name: string;
  description: string;
  statMods: Partial<Record<StatName, number>>;
}

export interface SpellProfile {
  name: string;
  damage?: string;
  mana: number;
}

export interface Campaign {
  id: string;
  name: string;
  description: string;
  roomOrder: string[];
  rooms: Record<string, Room>;
  items: Record<string, ItemDefinition>;
  mobs: Record<string, MobProfile>;
  companions: Record<string, CompanionProfile>;
  defaultCompanionIds: string[];
  exits: Record<string, Record<string, string>>;
  completionXp: number;
  defeatLine?: string;
}

/**
 * Rules data shared by every campaign
 */
export interface RulesContent {
  classes: Record<string, ClassProfile>;
  races: Record<string, RaceProfile>;
  spells: Record<string, SpellProfile>;
}
