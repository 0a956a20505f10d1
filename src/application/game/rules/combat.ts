// Application layer: Combat resolution
// Player action, companion action, enemy actions, then end-of-combat detection

import type { GameState } from '@/domain/game/GameState.js';
import type { ActionOutcome, RulesContext } from '@/domain/game/session.js';
import type { Combatant, DiceEngine, Enemy } from '@/domain/game/types.js';
import { formatSigned } from './dice.js';
import { markRoomDefeated, nextCorpseId } from './flags.js';
import { activeCompanion } from './party.js';
import { grantXp } from './progression.js';
import { regenCompanionMana, regenPlayerMana } from './rest.js';
import type { DamageSpell } from './spells.js';
import { asDamageSpell, bestDamageSpell } from './spells.js';

export const DEFEND_AC_BONUS = 2;

export interface AttackRoll {
  hit: boolean;
  roll: number;
  total: number;
}

export function attackRoll(
  dice: DiceEngine,
  attackBonus: number,
  targetAc: number,
  targetDefending: boolean
): AttackRoll {
  const roll = dice.rollDie(20);
  const total = roll + attackBonus;
  const effectiveAc = targetAc + (targetDefending ? DEFEND_AC_BONUS : 0);
  return { hit: total >= effectiveAc, roll, total };
}

/**
 * Rolls damage onto the target, never below 0 HP; returns "N (detail)"
 */
export function applyDamage(dice: DiceEngine, target: Combatant, expr: string, bonus = 0): string {
  const roll = dice.rollExpression(expr);
  const damage = roll.total + bonus;
  const detail = bonus ? `${roll.detail}${formatSigned(bonus)}` : roll.detail;
  target.hp = Math.max(0, Math.min(target.maxHp, target.hp - damage));
  return `${damage} (${detail})`;
}

export function livingEnemies(state: GameState): Enemy[] {
  return state.enemies.filter((enemy) => enemy.hp > 0);
}

export type EnemyLookup = { ok: true; enemy: Enemy } | { ok: false; message: string };

/**
 * Index (1-based, among the living) or name substring; default is the lowest HP
 */
export function selectEnemy(state: GameState, query: string | null): EnemyLookup {
  const alive = livingEnemies(state);
  if (alive.length === 0) {
    return { ok: false, message: "There's nothing to attack." };
  }
  const token = (query ?? '').trim().toLowerCase();
  if (!token) {
    const weakest = alive.reduce((best, enemy) => (enemy.hp < best.hp ? enemy : best));
    return { ok: true, enemy: weakest };
  }
  if (/^\d+$/.test(token)) {
    const enemy = alive[parseInt(token, 10) - 1];
    return enemy ? { ok: true, enemy } : { ok: false, message: "That target doesn't exist." };
  }
  const matches = alive.filter((enemy) => enemy.name.toLowerCase().includes(token));
  if (matches.length === 0) return { ok: false, message: 'No such target.' };
  if (matches.length > 1) return { ok: false, message: 'Be more specific.' };
  return { ok: true, enemy: matches[0] };
}

// Player actions

interface StrikeOptions {
  attackBonus: number;
  damage: string;
  damageBonus: number;
  flavor: string;
}

function playerStrike(ctx: RulesContext, target: Enemy, options: StrikeOptions): string {
  const { hit, roll, total } = attackRoll(ctx.dice, options.attackBonus, target.ac, false);
  if (!hit) {
    return `${options.flavor}Miss ${target.name} (roll ${roll} -> ${total}).`;
  }
  const dealt = applyDamage(ctx.dice, target, options.damage, options.damageBonus);
  return `${options.flavor}Hit ${target.name} (roll ${roll} -> ${total}) for ${dealt} damage.`;
}

function castAt(ctx: RulesContext, target: Enemy, spell: DamageSpell): ActionOutcome {
  const { player } = ctx.state;
  if (player.mana < spell.mana) {
    return { consumed: false, message: 'You are out of mana.' };
  }
  player.mana -= spell.mana;
  const profile = ctx.registry.getClassProfile(player.className);
  return {
    consumed: true,
    message: playerStrike(ctx, target, {
      attackBonus: player.attackBonus + player.stats[profile.manaStat],
      damage: spell.damage,
      damageBonus: 0,
      flavor: `You channel ${spell.name}. `,
    }),
  };
}

export function playerDefend(state: GameState): ActionOutcome {
  state.playerDefending = true;
  return {
    consumed: true,
    message: `${state.player.name} takes a defensive stance (+2 AC until next attack).`,
  };
}

export function playerAttack(ctx: RulesContext, target: string | null): ActionOutcome {
  const found = selectEnemy(ctx.state, target);
  if (!found.ok) return { consumed: false, message: found.message };
  const { player } = ctx.state;
  return {
    consumed: true,
    message: playerStrike(ctx, found.enemy, {
      attackBonus: player.attackBonus,
      damage: player.damage,
      damageBonus: 0,
      flavor: '',
    }),
  };
}

export function playerSpecial(ctx: RulesContext, target: string | null): ActionOutcome {
  const found = selectEnemy(ctx.state, target);
  if (!found.ok) return { consumed: false, message: found.message };
  const { player } = ctx.state;
  const { special } = ctx.registry.getClassProfile(player.className);

  switch (special.kind) {
    case 'power':
      return {
        consumed: true,
        message: playerStrike(ctx, found.enemy, {
          attackBonus: player.attackBonus,
          damage: player.damage,
          damageBonus: special.damageBonus,
          flavor: special.flavor,
        }),
      };
    case 'precision':
      return {
        consumed: true,
        message: playerStrike(ctx, found.enemy, {
          attackBonus: player.attackBonus + special.attackBonus,
          damage: player.damage,
          damageBonus: 0,
          flavor: special.flavor,
        }),
      };
    case 'spell': {
      const spell = bestDamageSpell(ctx.registry, player.learnedSpells);
      if (!spell) return { consumed: false, message: 'You have no damage spells to cast.' };
      return castAt(ctx, found.enemy, spell);
    }
  }
}

/**
 * "cast <spell> [target]": the longest learned spell name that prefixes the text wins
 */
export function playerCast(ctx: RulesContext, text: string): ActionOutcome {
  const { player } = ctx.state;
  const input = text.trim().toLowerCase();
  if (!input) {
    return { consumed: false, message: 'Cast which spell?' };
  }
  const known = [...player.learnedSpells]
    .sort((a, b) => b.length - a.length)
    .find((name) => {
      const lower = name.toLowerCase();
      return input === lower || input.startsWith(`${lower} `);
    });
  if (!known) {
    return { consumed: false, message: "You don't know that spell." };
  }
  const spell = asDamageSpell(ctx.registry.getSpell(known));
  if (!spell) {
    return { consumed: false, message: `${known} has no use in a fight.` };
  }
  const targetText = input.slice(known.length).trim();
  const found = selectEnemy(ctx.state, targetText || null);
  if (!found.ok) return { consumed: false, message: found.message };
  return castAt(ctx, found.enemy, spell);
}

// Companion and enemies

export function companionAction(ctx: RulesContext): string | null {
  const { state, dice } = ctx;
  const companion = activeCompanion(state);
  if (!companion) return null;
  if (companion.hp <= 0) {
    return `${companion.name} is down and cannot act.`;
  }
  if (companion.hp <= companion.defendHpThreshold) {
    state.companionDefending = true;
    return `${companion.name} keeps their distance and braces (+2 AC).`;
  }
  const found = selectEnemy(state, null);
  if (!found.ok) {
    return `${companion.name} scans the room, weapon lowered.`;
  }
  const target = found.enemy;

  const spell = companion.maxMana > 0 ? bestDamageSpell(ctx.registry, companion.learnedSpells) : null;
  if (spell && companion.mana >= spell.mana) {
    companion.mana -= spell.mana;
    const { hit, roll, total } = attackRoll(dice, companion.attackBonus, target.ac, false);
    if (!hit) {
      return `${companion.name} channels ${spell.name}. Miss ${target.name} (roll ${roll} -> ${total}).`;
    }
    const dealt = applyDamage(dice, target, spell.damage);
    return `${companion.name} channels ${spell.name}. Hit ${target.name} (roll ${roll} -> ${total}) for ${dealt} damage.`;
  }

  const { hit, roll, total } = attackRoll(dice, companion.attackBonus, target.ac, false);
  if (!hit) {
    return `${companion.name} misses ${target.name} (roll ${roll} -> ${total}).`;
  }
  const dealt = applyDamage(dice, target, companion.damage);
  return `${companion.name} strikes ${target.name} (roll ${roll} -> ${total}) for ${dealt} damage.`;
}

type Side = 'player' | 'companion';

function pickSide(ctx: RulesContext, enemy: Enemy): Side {
  const { state } = ctx;
  const companion = activeCompanion(state);
  const companionUp = companion !== null && companion.hp > 0;
  const { ai } = ctx.registry.getMobProfile(state.campaignId, enemy.name);

  switch (ai) {
    case 'focus_player':
      return state.player.hp > 0 || !companionUp ? 'player' : 'companion';
    case 'focus_companion':
      return companionUp ? 'companion' : 'player';
    case 'focus_weakest':
      return companion && companionUp && companion.hp < state.player.hp ? 'companion' : 'player';
  }
}

export function enemyActions(ctx: RulesContext): string[] {
  const { state, dice } = ctx;
  const alive = livingEnemies(state);
  if (alive.length === 0) return ['The foes are down.'];

  const results: string[] = [];
  for (const enemy of alive) {
    const companion = activeCompanion(state);
    if (pickSide(ctx, enemy) === 'companion' && companion) {
      const { hit, roll, total } = attackRoll(dice, enemy.attackBonus, companion.ac, state.companionDefending);
      if (hit) {
        const dealt = applyDamage(dice, companion, enemy.damage);
        results.push(`${enemy.name} lashes at ${companion.name} (roll ${roll} -> ${total}) for ${dealt} damage.`);
      } else {
        results.push(`${enemy.name} misses ${companion.name} (roll ${roll} -> ${total}).`);
      }
      continue;
    }
    const { player } = state;
    const { hit, roll, total } = attackRoll(dice, enemy.attackBonus, player.ac, state.playerDefending);
    if (hit) {
      const dealt = applyDamage(dice, player, enemy.damage);
      results.push(`${enemy.name} strikes ${player.name} (roll ${roll} -> ${total}) for ${dealt} damage.`);
    } else {
      results.push(`${enemy.name} misses ${player.name} (roll ${roll} -> ${total}).`);
    }
  }
  return results;
}

export function clearRoundStances(state: GameState): void {
  state.playerDefending = false;
  state.companionDefending = false;
}

/**
 * Victory is checked before defeat. Returns null when combat goes on,
 * and also once the enemy list has already been cleared.
 */
export function endCombatIfNeeded(ctx: RulesContext): string | null {
  const { state, registry } = ctx;
  if (state.enemies.length === 0) return null;

  if (state.enemies.every((enemy) => enemy.hp <= 0)) {
    state.inCombat = false;
    markRoomDefeated(state, state.roomId);

    const xp = state.enemies.reduce(
      (sum, enemy) => sum + registry.getMobProfile(state.campaignId, enemy.name).xp,
      0
    );
    const levelMessages = grantXp(registry, state, xp);

    const corpses = state.enemies.map((enemy) => ({
      id: nextCorpseId(state),
      name: enemy.name,
      looted: false,
    }));
    state.flags.corpses[state.roomId] = corpses;
    state.enemies = [];

    const list = corpses.map((corpse) => `${corpse.id}. ${corpse.name}`).join(', ');
    const parts = [
      `The foes fall. Corpses: ${list}. You can 'loot <number>' or 'loot all'. The way forward is clear.`,
    ];
    if (xp > 0) parts.push(`XP +${xp}.`);
    parts.push(...levelMessages);
    return parts.join(' ');
  }

  if (state.player.hp <= 0) {
    state.gameOver = true;
    const { defeatLine } = registry.getCampaign(state.campaignId);
    return defeatLine ? `You collapse from your wounds. ${defeatLine}` : 'You collapse from your wounds.';
  }
  return null;
}

/**
 * Runs the rest of a round after a consumed player action
 */
export function finishRound(ctx: RulesContext, playerMessage: string): string {
  const results = [playerMessage];
  const companionMessage = companionAction(ctx);
  if (companionMessage) results.push(companionMessage);
  results.push(...enemyActions(ctx));
  clearRoundStances(ctx.state);

  const ending = endCombatIfNeeded(ctx);
  if (ending) results.push(ending);

  regenPlayerMana(ctx.registry, ctx.state);
  regenCompanionMana(ctx.state);
  return results.join(' ');
}
