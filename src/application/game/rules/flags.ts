// Application layer: World flag helpers and legacy flag migration

import type { Corpse, GameState, WorldFlags } from '@/domain/game/GameState.js';
import { createEmptyFlags } from '@/domain/game/GameState.js';

export function isRoomDefeated(state: GameState, roomId: string): boolean {
  return state.flags.defeatedRooms.includes(roomId);
}

export function markRoomDefeated(state: GameState, roomId: string): void {
  if (!state.flags.defeatedRooms.includes(roomId)) {
    state.flags.defeatedRooms.push(roomId);
  }
}

export function nextCorpseId(state: GameState): number {
  const id = state.flags.nextCorpseId;
  state.flags.nextCorpseId = id + 1;
  return id;
}

export function setQuestFlag(state: GameState, flag: string): void {
  state.flags.quest[flag] = true;
}

function markOnce(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}

// Legacy migration

export interface FlagMigrationContext {
  campaignId: string;
  roomId: string;
  /** Loot rooms of the campaign; a legacy boolean loot flag applies to all of them */
  lootRoomIds: string[];
}

const LEGACY_ENCOUNTER_KEYS = ['bandit_defeated', 'bandit_looted', 'enemy_name'];
const STRUCTURED_KEYS = ['defeated_rooms', 'corpses', 'next_corpse_id', 'loot_taken', 'loot_failed'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === 'string');
}

function toCorpse(value: unknown, index: number): Corpse | null {
  if (typeof value === 'string') {
    return { id: index + 1, name: value, looted: false };
  }
  if (isRecord(value) && typeof value.name === 'string') {
    return {
      id: typeof value.id === 'number' ? value.id : index + 1,
      name: value.name,
      looted: value.looted === true,
    };
  }
  return null;
}

function migrateCorpses(value: unknown): Record<string, Corpse[]> {
  const result: Record<string, Corpse[]> = {};
  if (!isRecord(value)) return result;
  for (const [roomId, entry] of Object.entries(value)) {
    if (Array.isArray(entry)) {
      result[roomId] = entry
        .map((item, idx) => toCorpse(item, idx))
        .filter((corpse): corpse is Corpse => corpse !== null);
    } else if (typeof entry === 'string' && entry) {
      result[roomId] = [{ id: 1, name: entry, looted: false }];
    }
  }
  return result;
}

function lootRoomList(value: unknown, ctx: FlagMigrationContext): string[] {
  if (value === true) return [...ctx.lootRoomIds];
  return stringList(value);
}

/**
 * Turns any stored flag bag (current or legacy) into WorldFlags.
 * Runs once per load; applying it to its own output changes nothing.
 */
export function migrateFlags(raw: unknown, ctx: FlagMigrationContext): WorldFlags {
  const flags = createEmptyFlags();
  if (!isRecord(raw)) return flags;

  flags.defeatedRooms = [...new Set(stringList(raw.defeated_rooms))];
  flags.corpses = migrateCorpses(raw.corpses);
  flags.lootTaken = lootRoomList(raw.loot_taken, ctx);
  flags.lootFailed = lootRoomList(raw.loot_failed, ctx);

  if (LEGACY_ENCOUNTER_KEYS.some((key) => key in raw)) {
    const roomId = ctx.campaignId === 'ruined_watchtower' ? 'barracks' : ctx.roomId;
    if (raw.bandit_defeated) {
      markOnce(flags.defeatedRooms, roomId);
    }
    if (typeof raw.enemy_name === 'string' && raw.enemy_name && !flags.corpses[roomId]) {
      flags.corpses[roomId] = [{ id: 1, name: raw.enemy_name, looted: false }];
    }
    if (raw.bandit_looted) {
      for (const corpse of flags.corpses[roomId] ?? []) {
        corpse.looted = true;
      }
    }
  }

  const highestId = Object.values(flags.corpses)
    .flat()
    .reduce((max, corpse) => Math.max(max, corpse.id), 0);
  const storedNext = typeof raw.next_corpse_id === 'number' ? raw.next_corpse_id : 1;
  flags.nextCorpseId = Math.max(storedNext, highestId + 1);

  const quest = isRecord(raw.quest) ? raw.quest : {};
  for (const [key, value] of Object.entries({ ...raw, ...quest })) {
    if (key === 'quest' || STRUCTURED_KEYS.includes(key) || LEGACY_ENCOUNTER_KEYS.includes(key)) {
      continue;
    }
    if (typeof value === 'boolean') {
      flags.quest[key] = value;
    }
  }

  return flags;
}

/**
 * Serialized shape: conventional snake_case keys, quest flags nested
 */
export function serializeFlags(flags: WorldFlags): Record<string, unknown> {
  return {
    defeated_rooms: [...flags.defeatedRooms],
    corpses: structuredClone(flags.corpses),
    next_corpse_id: flags.nextCorpseId,
    loot_taken: [...flags.lootTaken],
    loot_failed: [...flags.lootFailed],
    quest: { ...flags.quest },
  };
}
