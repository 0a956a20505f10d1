// Application layer: Player creation and mana management

import type { ContentLookup } from '@/domain/content/registry.js';
import type { ClassProfile } from '@/domain/content/types.js';
import type { GameState } from '@/domain/game/GameState.js';
import type { Character, StatName, Stats } from '@/domain/game/types.js';

export const STAT_NAMES: readonly StatName[] = ['STR', 'DEX', 'CON', 'INT', 'WIS', 'CHA'];

export const STAT_MIN = 0;
export const STAT_MAX = 4;
/** Points a new character spends across the six stats */
export const STAT_POINT_BUDGET = 12;

function clampStat(value: number): number {
  return Math.max(STAT_MIN, Math.min(STAT_MAX, value));
}

/**
 * Race modifiers are added then clamped to [0, 4]; unmodified stats pass through.
 */
export function applyRaceMods(
  registry: ContentLookup,
  rawStats: Partial<Stats>,
  race: string
): Stats {
  const stats: Stats = { STR: 0, DEX: 0, CON: 0, INT: 0, WIS: 0, CHA: 0 };
  for (const stat of STAT_NAMES) {
    stats[stat] = Math.trunc(rawStats[stat] ?? 0);
  }
  const profile = registry.getRaceProfile(race);
  if (!profile) {
    return stats;
  }
  for (const stat of STAT_NAMES) {
    const mod = profile.statMods[stat];
    if (mod !== undefined) {
      stats[stat] = clampStat(stats[stat] + mod);
    }
  }
  return stats;
}

export function isCaster(profile: ClassProfile): boolean {
  return profile.role === 'caster';
}

export function casterMana(profile: ClassProfile, stats: Stats): number {
  return 2 + 2 * Math.max(0, stats[profile.manaStat]);
}

export function createPlayer(
  registry: ContentLookup,
  name: string,
  className: string,
  rawStats: Partial<Stats>,
  race = 'Human'
): Character {
  const profile = registry.getClassProfile(className);
  const stats = applyRaceMods(registry, rawStats, race);
  const hp = profile.baseHp + Math.max(0, stats.CON);
  const mana = isCaster(profile) ? casterMana(profile, stats) : 0;

  return {
    name,
    race,
    className,
    stats,
    hp,
    maxHp: hp,
    ac: profile.baseAc,
    baseAc: profile.baseAc,
    attackBonus: profile.attackBonus,
    damage: profile.damage,
    mana,
    maxMana: mana,
    gold: 0,
    xp: 0,
    level: 1,
    learnedSpells: [...profile.spells],
  };
}

/**
 * Repairs a loaded caster without a pool and keeps mana within bounds
 */
export function ensureCasterMana(registry: ContentLookup, state: GameState): void {
  const { player } = state;
  const profile = registry.getClassProfile(player.className);
  if (!isCaster(profile)) {
    return;
  }
  if (player.maxMana <= 0) {
    player.maxMana = casterMana(profile, player.stats);
    player.mana = player.maxMana;
  } else {
    player.mana = Math.max(0, Math.min(player.mana, player.maxMana));
  }
}
