import { describe, expect, it } from 'vitest';
import { newGame } from '@/__tests__/helpers.js';
import { ExplorationState } from './ExplorationState.js';

describe('ExplorationState.parse', () => {
  const exploration = new ExplorationState(5);

  it('reads movement in its three forms', () => {
    expect(exploration.parse('go down')).toEqual({ type: 'move', destination: 'down' });
    expect(exploration.parse('  UP ')).toEqual({ type: 'move', destination: 'up' });
    expect(exploration.parse('move')).toEqual({ type: 'move', destination: null });
  });

  it('clamps the rest count', () => {
    expect(exploration.parse('rest')).toEqual({ type: 'rest', count: 1 });
    expect(exploration.parse('rest 5')).toEqual({ type: 'rest', count: 5 });
    expect(exploration.parse('rest 50')).toEqual({ type: 'rest', count: 5 });
    expect(exploration.parse('rest 0')).toEqual({ type: 'rest', count: 1 });
    expect(exploration.parse('rest -2')).toEqual({ type: 'rest', count: 1 });
    expect(exploration.parse('rest a while')).toEqual({ type: 'rest', count: 1 });
  });

  it('splits an item from its target', () => {
    expect(exploration.parse('drink healing potion on Mara')).toEqual({
      type: 'use',
      item: 'healing potion',
      target: 'mara',
    });
  });

  it('passes room verbs through with their argument', () => {
    expect(exploration.parse('loot 2')).toEqual({ type: 'room', verb: 'loot', target: '2' });
    expect(exploration.parse('talk')).toEqual({ type: 'room', verb: 'talk', target: '' });
  });

  it('returns null for anything else', () => {
    expect(exploration.parse('')).toBeNull();
    expect(exploration.parse('dance')).toBeNull();
    expect(exploration.parse('equip')).toBeNull();
  });
});

describe('ExplorationState.handle', () => {
  it('rests several times as one action spanning that many turns', () => {
    const game = newGame();
    game.state.player.hp = 10;
    const outcome = new ExplorationState().handle({ type: 'rest', count: 3 }, game.ctx);
    expect(outcome).toEqual({
      consumed: true,
      message:
        'You rest and regain your focus. You rest and regain your focus. HP +1. You rest and regain your focus.',
      decision: undefined,
      turns: 3,
    });
    expect(game.state.player.hp).toBe(11);
  });

  it('hands a bare move to the room', () => {
    const game = newGame();
    expect(new ExplorationState().handle({ type: 'move', destination: null }, game.ctx).message).toBe(
      'You prepare to move on.'
    );
  });
});
