// Infrastructure layer: Save format (version 2) and its zod schema
// Older saves (single companion/enemy, string items, flat flag bags) load through the same path

import { z } from 'zod';
import type { ContentLookup } from '@/domain/content/registry.js';
import type { ItemDefinition } from '@/domain/content/types.js';
import { EQUIPMENT_SLOTS } from '@/domain/content/types.js';
import type {
  Equipment,
  GameState,
  NarrationEntry,
  NarrationSource,
  PendingDecision,
  RosterEntry,
} from '@/domain/game/GameState.js';
import { NARRATION_LOG_WINDOW, createEmptyEquipment } from '@/domain/game/GameState.js';
import type { Character, Companion, Enemy, Stats } from '@/domain/game/types.js';
import { migrateFlags, serializeFlags } from '@/application/game/rules/flags.js';
import { syncPlayerAc } from '@/application/game/rules/inventory.js';
import { STAT_NAMES, ensureCasterMana } from '@/application/game/rules/player.js';
import { restockPotions } from '@/application/game/setup.js';
import { itemSchema } from '@/infrastructure/content/schemas.js';
import { slugify } from '@/utils/string.js';

export const SAVE_FORMAT_VERSION = 2;

const savedCharacterSchema = z
  .object({
    name: z.string().min(1),
    race: z.string().default('Human'),
    class_name: z.string().optional(),
    cls: z.string().optional(),
    stats: z.record(z.string(), z.number()).default({}),
    hp: z.number().int(),
    max_hp: z.number().int(),
    ac: z.number().int(),
    base_ac: z.number().int().optional(),
    mana: z.number().int().default(0),
    max_mana: z.number().int().default(0),
    attack_bonus: z.number().int(),
    damage: z.string(),
    gold: z.number().int().default(0),
    xp: z.number().int().default(0),
    level: z.number().int().min(1).default(1),
    learned_spells: z.array(z.string()).optional(),
  })
  .transform((raw, ctx) => {
    const className = raw.class_name ?? raw.cls;
    if (!className) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'class_name is required' });
      return z.NEVER;
    }
    return { ...raw, className };
  });

const savedCompanionSchema = z.object({
  id: z.string().optional(),
  name: z.string().min(1),
  hp: z.number().int(),
  max_hp: z.number().int(),
  ac: z.number().int(),
  attack_bonus: z.number().int(),
  damage: z.string(),
  mana: z.number().int().default(0),
  max_mana: z.number().int().default(0),
  learned_spells: z.array(z.string()).default([]),
  defend_hp_threshold: z.number().int().default(3),
});

const savedEnemySchema = z.object({
  name: z.string().min(1),
  hp: z.number().int(),
  max_hp: z.number().int(),
  ac: z.number().int(),
  attack_bonus: z.number().int(),
  damage: z.string(),
  asleep: z.boolean().default(false),
});

// Full definitions, bare names, or loose objects re-resolved against the catalog
const savedItemSchema = z.union([
  itemSchema,
  z.string(),
  z.object({ id: z.string().optional(), name: z.string().optional() }),
]);

const narrationSourceSchema = z.enum(['ai', 'fallback', 'stub']);

const savedNarrationSchema = z.object({
  turn: z.number().int().default(0),
  player_input: z.string().default(''),
  rules_result: z.string().default(''),
  narration: z.string().optional(),
  gm_response: z.string().optional(),
  source: narrationSourceSchema.optional(),
  gm_source: z.string().optional(),
});

const savedDecisionSchema = z.object({
  id: z.string().optional(),
  type: z.literal('spell'),
  level: z.number().int(),
  choices: z.array(z.string()),
});

export const savedGameSchema = z.object({
  version: z.number().int().default(1),
  campaign_id: z.string().default('ruined_watchtower'),
  player: savedCharacterSchema,
  companions: z.array(savedCompanionSchema).default([]),
  companion: savedCompanionSchema.optional(),
  room_id: z.string().min(1),
  visited: z.array(z.string()).default([]),
  flags: z.record(z.string(), z.unknown()).default({}),
  inventory: z.array(savedItemSchema).default([]),
  equipment: z.record(z.string(), savedItemSchema.nullable()).default({}),
  inventory_limit: z.number().int().min(0).default(10),
  in_combat: z.boolean().default(false),
  enemies: z.array(savedEnemySchema).default([]),
  enemy: savedEnemySchema.nullable().optional(),
  turn: z.number().int().default(0),
  turn_log: z.array(z.string()).default([]),
  last_event: z.string().default(''),
  last_player_input: z.string().default(''),
  narration_log: z.array(savedNarrationSchema).optional(),
  response_log: z.array(savedNarrationSchema).optional(),
  player_defending: z.boolean().default(false),
  companion_defending: z.boolean().default(false),
  game_over: z.boolean().default(false),
  campaign_completed: z.boolean().default(false),
  rest_streak: z.number().int().min(0).default(0),
  pending_decisions: z.array(savedDecisionSchema).optional(),
  pending_level_choices: z.array(savedDecisionSchema).optional(),
});

export const savedRosterSchema = z.object({
  version: z.number().int().default(1),
  character: savedCharacterSchema,
  inventory: z.array(savedItemSchema).default([]),
  equipment: z.record(z.string(), savedItemSchema.nullable()).default({}),
});

export type SerializedGameState = z.input<typeof savedGameSchema>;
export type SerializedRosterEntry = z.input<typeof savedRosterSchema>;

type SavedCharacter = z.output<typeof savedCharacterSchema>;
type SavedCompanion = z.output<typeof savedCompanionSchema>;
type SavedEnemy = z.output<typeof savedEnemySchema>;
type SavedItem = z.output<typeof savedItemSchema>;
type SavedNarration = z.output<typeof savedNarrationSchema>;

// Serialize

function serializeCharacter(player: Character): z.input<typeof savedCharacterSchema> {
  return {
    name: player.name,
    race: player.race,
    class_name: player.className,
    stats: { ...player.stats },
    hp: player.hp,
    max_hp: player.maxHp,
    ac: player.ac,
    base_ac: player.baseAc,
    mana: player.mana,
    max_mana: player.maxMana,
    attack_bonus: player.attackBonus,
    damage: player.damage,
    gold: player.gold,
    xp: player.xp,
    level: player.level,
    learned_spells: [...player.learnedSpells],
  };
}

function serializeCompanion(companion: Companion): z.input<typeof savedCompanionSchema> {
  return {
    id: companion.id,
    name: companion.name,
    hp: companion.hp,
    max_hp: companion.maxHp,
    ac: companion.ac,
    attack_bonus: companion.attackBonus,
    damage: companion.damage,
    mana: companion.mana,
    max_mana: companion.maxMana,
    learned_spells: [...companion.learnedSpells],
    defend_hp_threshold: companion.defendHpThreshold,
  };
}

function serializeEnemy(enemy: Enemy): z.input<typeof savedEnemySchema> {
  return {
    name: enemy.name,
    hp: enemy.hp,
    max_hp: enemy.maxHp,
    ac: enemy.ac,
    attack_bonus: enemy.attackBonus,
    damage: enemy.damage,
    asleep: enemy.asleep,
  };
}

function serializeNarration(entry: NarrationEntry): z.input<typeof savedNarrationSchema> {
  return {
    turn: entry.turn,
    player_input: entry.playerInput,
    rules_result: entry.rulesResult,
    narration: entry.narration,
    source: entry.source,
  };
}

export function serializeGameState(state: GameState): SerializedGameState {
  return {
    version: SAVE_FORMAT_VERSION,
    campaign_id: state.campaignId,
    player: serializeCharacter(state.player),
    companions: state.companions.map(serializeCompanion),
    room_id: state.roomId,
    visited: [...state.visited],
    flags: serializeFlags(state.flags),
    inventory: structuredClone(state.inventory),
    equipment: structuredClone(state.equipment),
    inventory_limit: state.inventoryLimit,
    in_combat: state.inCombat,
    enemies: state.enemies.map(serializeEnemy),
    turn: state.turn,
    turn_log: [...state.turnLog],
    last_event: state.lastEvent,
    last_player_input: state.lastPlayerInput,
    narration_log: state.narrationLog.slice(-NARRATION_LOG_WINDOW).map(serializeNarration),
    player_defending: state.playerDefending,
    companion_defending: state.companionDefending,
    game_over: state.gameOver,
    campaign_completed: state.campaignCompleted,
    rest_streak: state.restStreak,
    pending_decisions: structuredClone(state.pendingDecisions),
  };
}

export function serializeRosterEntry(entry: RosterEntry): SerializedRosterEntry {
  return {
    version: 1,
    character: serializeCharacter(entry.character),
    inventory: structuredClone(entry.inventory),
    equipment: structuredClone(entry.equipment),
  };
}

// Deserialize

function toStats(raw: Record<string, number>): Stats {
  const stats: Stats = { STR: 0, DEX: 0, CON: 0, INT: 0, WIS: 0, CHA: 0 };
  for (const stat of STAT_NAMES) {
    stats[stat] = Math.trunc(raw[stat] ?? 0);
  }
  return stats;
}

function toCharacter(registry: ContentLookup, raw: SavedCharacter): Character {
  const learned = raw.learned_spells ?? [...registry.getClassProfile(raw.className).spells];
  return {
    name: raw.name,
    race: raw.race,
    className: raw.className,
    stats: toStats(raw.stats),
    hp: raw.hp,
    maxHp: raw.max_hp,
    ac: raw.ac,
    baseAc: raw.base_ac ?? raw.ac,
    mana: raw.mana,
    maxMana: raw.max_mana,
    attackBonus: raw.attack_bonus,
    damage: raw.damage,
    gold: raw.gold,
    xp: raw.xp,
    level: raw.level,
    learnedSpells: learned,
  };
}

function toCompanion(raw: SavedCompanion): Companion {
  return {
    id: raw.id ?? slugify(raw.name, 'companion'),
    name: raw.name,
    hp: raw.hp,
    maxHp: raw.max_hp,
    ac: raw.ac,
    attackBonus: raw.attack_bonus,
    damage: raw.damage,
    mana: raw.mana,
    maxMana: raw.max_mana,
    learnedSpells: raw.learned_spells,
    defendHpThreshold: raw.defend_hp_threshold,
  };
}

function toEnemy(raw: SavedEnemy): Enemy {
  return {
    name: raw.name,
    hp: raw.hp,
    maxHp: raw.max_hp,
    ac: raw.ac,
    attackBonus: raw.attack_bonus,
    damage: raw.damage,
    asleep: raw.asleep,
  };
}

function toItem(registry: ContentLookup, campaignId: string, raw: SavedItem): ItemDefinition {
  if (typeof raw === 'string') {
    return registry.itemFromName(campaignId, raw);
  }
  if ('kind' in raw) {
    return raw;
  }
  if (raw.id) return registry.itemFromId(campaignId, raw.id);
  return registry.itemFromName(campaignId, raw.name ?? 'unknown');
}

function toEquipment(
  registry: ContentLookup,
  campaignId: string,
  raw: Record<string, SavedItem | null>
): Equipment {
  const equipment = createEmptyEquipment();
  for (const slot of EQUIPMENT_SLOTS) {
    const item = raw[slot];
    equipment[slot] = item ? toItem(registry, campaignId, item) : null;
  }
  return equipment;
}

function toNarrationSource(raw: SavedNarration): NarrationSource {
  const parsed = narrationSourceSchema.safeParse(raw.source ?? raw.gm_source);
  return parsed.success ? parsed.data : 'fallback';
}

function toNarrationEntry(raw: SavedNarration): NarrationEntry {
  return {
    turn: raw.turn,
    playerInput: raw.player_input,
    rulesResult: raw.rules_result,
    narration: raw.narration ?? raw.gm_response ?? '',
    source: toNarrationSource(raw),
  };
}

function toDecisions(raw: z.output<typeof savedDecisionSchema>[]): PendingDecision[] {
  return raw.map((decision) => ({
    id: decision.id ?? `spell-level-${decision.level}`,
    type: decision.type,
    level: decision.level,
    choices: [...decision.choices],
  }));
}

/**
 * Builds a GameState from a parsed save, migrating legacy shapes.
 * Throws ZodError on malformed input; the repository turns that into SaveLoadError.
 */
export function deserializeGameState(registry: ContentLookup, input: unknown): GameState {
  const raw = savedGameSchema.parse(input);
  const campaignId = raw.campaign_id;
  const campaign = registry.getCampaign(campaignId);

  const companionRecords = raw.companions.length > 0 ? raw.companions : raw.companion ? [raw.companion] : [];
  const enemyRecords = raw.enemies.length > 0 ? raw.enemies : raw.enemy ? [raw.enemy] : [];
  const narrationRecords = raw.narration_log ?? raw.response_log ?? [];
  const lootRoomIds = Object.values(campaign.rooms)
    .filter((room) => room.kind === 'loot')
    .map((room) => room.id);

  const state: GameState = {
    campaignId,
    player: toCharacter(registry, raw.player),
    companions: companionRecords.map(toCompanion),
    roomId: raw.room_id,
    visited: [...raw.visited],
    inventory: raw.inventory.map((item) => toItem(registry, campaignId, item)),
    equipment: toEquipment(registry, campaignId, raw.equipment),
    inventoryLimit: raw.inventory_limit,
    inCombat: raw.in_combat,
    enemies: enemyRecords.map(toEnemy),
    turn: raw.turn,
    turnLog: [...raw.turn_log],
    lastEvent: raw.last_event,
    lastPlayerInput: raw.last_player_input,
    narrationLog: narrationRecords.slice(-NARRATION_LOG_WINDOW).map(toNarrationEntry),
    playerDefending: raw.player_defending,
    companionDefending: raw.companion_defending,
    gameOver: raw.game_over,
    campaignCompleted: raw.campaign_completed,
    restStreak: raw.rest_streak,
    pendingDecisions: toDecisions(raw.pending_decisions ?? raw.pending_level_choices ?? []),
    flags: migrateFlags(raw.flags, { campaignId, roomId: raw.room_id, lootRoomIds }),
  };

  if (state.inventory.length === 0) {
    restockPotions(registry, campaignId, state.inventory);
  }
  syncPlayerAc(state);
  ensureCasterMana(registry, state);
  return state;
}

/**
 * Roster entry as stored; the caller decides how much to restore for a new run
 */
export function deserializeRosterEntry(
  registry: ContentLookup,
  campaignId: string,
  input: unknown
): RosterEntry {
  const raw = savedRosterSchema.parse(input);
  return {
    character: toCharacter(registry, raw.character),
    inventory: raw.inventory.map((item) => toItem(registry, campaignId, item)),
    equipment: toEquipment(registry, campaignId, raw.equipment),
  };
}
