// Application layer: Experience and levelling

import type { ContentLookup } from '@/domain/content/registry.js';
import type { GameState } from '@/domain/game/GameState.js';
import { isCaster } from './player.js';
import { spellChoicesForLevel } from './spells.js';

/** XP needed for each level; index 0 is level 1 */
export const XP_TABLE: readonly number[] = [0, 100, 250, 500, 1000, 2000, 3500, 5000, 7000, 10000];

export const MAX_LEVEL = XP_TABLE.length;

export function xpForLevel(level: number): number {
  if (level <= 0) return 0;
  return XP_TABLE[Math.min(level, MAX_LEVEL) - 1];
}

export function levelFromXp(xp: number): number {
  for (let level = MAX_LEVEL; level > 0; level--) {
    if (xp >= XP_TABLE[level - 1]) return level;
  }
  return 1;
}

function canLevelUp(state: GameState): boolean {
  const { level, xp } = state.player;
  return level < MAX_LEVEL && xp >= xpForLevel(level + 1);
}

function applyLevelUp(registry: ContentLookup, state: GameState): string {
  const { player } = state;
  const profile = registry.getClassProfile(player.className);

  player.level += 1;
  player.maxHp += profile.hpPerLevel;
  player.hp += profile.hpPerLevel;
  if (player.level % 2 === 0) {
    player.attackBonus += 1;
  }
  if (isCaster(profile)) {
    player.maxMana += 2;
    player.mana = player.maxMana;
  }

  const choices = spellChoicesForLevel(profile, player.level, player.learnedSpells);
  if (choices.length > 0) {
    // Resolved later through resolveDecision
    state.pendingDecisions.push({
      id: `spell-level-${player.level}`,
      type: 'spell',
      level: player.level,
      choices,
    });
  }

  return `Level up! ${player.name} is now level ${player.level}.`;
}

/**
 * Adds XP and applies every level-up it unlocks; returns one message per level gained
 */
export function grantXp(registry: ContentLookup, state: GameState, amount: number): string[] {
  if (amount <= 0) return [];
  state.player.xp += amount;
  const messages: string[] = [];
  while (canLevelUp(state)) {
    messages.push(applyLevelUp(registry, state));
  }
  return messages;
}
