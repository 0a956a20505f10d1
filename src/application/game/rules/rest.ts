// Application layer: Rest, mana regeneration and pending decisions

import type { ContentLookup } from '@/domain/content/registry.js';
import type { GameState, PendingDecision } from '@/domain/game/GameState.js';
import type { ActionOutcome } from '@/domain/game/session.js';
import { isCaster } from './player.js';

export function regenPlayerMana(registry: ContentLookup, state: GameState, amount = 1): number {
  const { player } = state;
  if (!isCaster(registry.getClassProfile(player.className)) || player.maxMana <= 0) {
    return 0;
  }
  const before = player.mana;
  player.mana = Math.min(player.maxMana, player.mana + amount);
  return player.mana - before;
}

/**
 * Every companion with a pool regenerates, not only the one that fights
 */
export function regenCompanionMana(state: GameState, amount = 1): number {
  let total = 0;
  for (const companion of state.companions) {
    if (companion.maxMana <= 0) continue;
    const before = companion.mana;
    companion.mana = Math.min(companion.maxMana, companion.mana + amount);
    total += companion.mana - before;
  }
  return total;
}

export interface RestResult {
  message: string;
  /** Head of the pending queue, if a choice is waiting */
  decision: PendingDecision | null;
}

export function applyRest(registry: ContentLookup, state: GameState): RestResult {
  const mana = regenPlayerMana(registry, state) + regenCompanionMana(state);

  let hp = 0;
  state.restStreak += 1;
  if (state.restStreak >= 2) {
    for (const unit of [state.player, ...state.companions]) {
      if (unit.hp < unit.maxHp) {
        unit.hp += 1;
        hp += 1;
      }
    }
    state.restStreak = 0;
  }

  const parts = ['You rest and regain your focus.'];
  if (mana) parts.push(`Mana +${mana}.`);
  if (hp) parts.push(`HP +${hp}.`);

  return { message: parts.join(' '), decision: state.pendingDecisions[0] ?? null };
}

export function resetRestStreak(state: GameState): void {
  state.restStreak = 0;
}

/**
 * Applies a choice to the head decision; an invalid choice changes nothing
 */
export function resolveDecision(state: GameState, choice: string): ActionOutcome {
  const decision = state.pendingDecisions[0];
  if (!decision) {
    return { consumed: false, message: 'There is nothing to decide right now.' };
  }
  const needle = choice.trim().toLowerCase();
  const picked = decision.choices.find((option) => option.toLowerCase() === needle);
  if (!picked) {
    return {
      consumed: false,
      message: `Choose one of: ${decision.choices.join(', ')}.`,
      decision,
    };
  }

  switch (decision.type) {
    case 'spell':
      state.player.learnedSpells.push(picked);
      break;
  }
  state.pendingDecisions.shift();

  const next = state.pendingDecisions[0];
  return { consumed: true, message: `You learn ${picked}.`, decision: next };
}
