import { describe, expect, it } from 'vitest';
import { WIZARD, newGame, registry } from '@/__tests__/helpers.js';
import { grantXp, levelFromXp, xpForLevel } from './progression.js';
import { applyRest, resolveDecision } from './rest.js';

describe('xp table', () => {
  it('maps levels to thresholds and back', () => {
    expect(xpForLevel(1)).toBe(0);
    expect(xpForLevel(2)).toBe(100);
    expect(levelFromXp(99)).toBe(1);
    expect(levelFromXp(249)).toBe(2);
    expect(levelFromXp(1_000_000)).toBe(10);
  });
});

describe('grantXp', () => {
  it('levels a fighter with more HP and attack on even levels', () => {
    const { state } = newGame();
    expect(grantXp(registry, state, 100)).toEqual(['Level up! Ana is now level 2.']);
    expect(state.player).toMatchObject({ level: 2, xp: 100, maxHp: 18, hp: 18, attackBonus: 4 });
    expect(state.pendingDecisions).toEqual([]);
  });

  it('applies every level crossed and queues spell choices on even levels', () => {
    const { state } = newGame(WIZARD);
    expect(grantXp(registry, state, 250)).toEqual([
      'Level up! Vex is now level 2.',
      'Level up! Vex is now level 3.',
    ]);
    expect(state.player).toMatchObject({ level: 3, maxHp: 12, attackBonus: 2, maxMana: 14, mana: 14 });
    expect(state.pendingDecisions).toEqual([
      { id: 'spell-level-2', type: 'spell', level: 2, choices: ['Magic Missile', 'Shield', 'Sleep'] },
    ]);
  });

  it('ignores non-positive amounts', () => {
    const { state } = newGame();
    expect(grantXp(registry, state, 0)).toEqual([]);
    expect(state.player.xp).toBe(0);
  });
});

describe('rest', () => {
  it('restores mana every time and HP every second rest in a row', () => {
    const { state } = newGame(WIZARD);
    state.player.mana = 4;
    state.player.hp = 5;
    state.companions[0].hp = 7;

    expect(applyRest(registry, state)).toEqual({ message: 'You rest and regain your focus. Mana +1.', decision: null });
    expect(state.restStreak).toBe(1);
    expect(applyRest(registry, state).message).toBe('You rest and regain your focus. Mana +1. HP +2.');
    expect(state.player).toMatchObject({ mana: 6, hp: 6 });
    expect(state.companions[0].hp).toBe(8);
    expect(state.restStreak).toBe(0);
  });

  it('says only that when nothing needs restoring', () => {
    const { state } = newGame();
    expect(applyRest(registry, state).message).toBe('You rest and regain your focus.');
  });

  it('reports a waiting choice', () => {
    const { state } = newGame(WIZARD);
    grantXp(registry, state, 100);
    expect(applyRest(registry, state).decision?.id).toBe('spell-level-2');
  });
});

describe('resolveDecision', () => {
  it('has nothing to resolve on a fresh game', () => {
    const { state } = newGame();
    expect(resolveDecision(state, 'Shield')).toEqual({
      consumed: false,
      message: 'There is nothing to decide right now.',
    });
  });

  it('keeps the decision on an invalid choice and learns a valid one', () => {
    const { state } = newGame(WIZARD);
    grantXp(registry, state, 100);

    const invalid = resolveDecision(state, 'fireball');
    expect(invalid.consumed).toBe(false);
    expect(invalid.message).toBe('Choose one of: Magic Missile, Shield, Sleep.');
    expect(state.pendingDecisions).toHaveLength(1);

    expect(resolveDecision(state, ' magic missile ')).toEqual({
      consumed: true,
      message: 'You learn Magic Missile.',
      decision: undefined,
    });
    expect(state.player.learnedSpells).toEqual(['Spark', 'Magic Missile']);
    expect(state.pendingDecisions).toEqual([]);
  });
});
