import { describe, expect, it } from 'vitest';
import { enterRoom, newGame } from '@/__tests__/helpers.js';
import { CombatState } from './CombatState.js';

describe('CombatState', () => {
  const combat = new CombatState();

  it('parses the combat vocabulary', () => {
    expect(combat.parse('attack 2')).toEqual({ type: 'attack', target: '2' });
    expect(combat.parse('Attack')).toEqual({ type: 'attack', target: null });
    expect(combat.parse('defend')).toEqual({ type: 'defend' });
    expect(combat.parse('cast Magic Missile rats')).toEqual({ type: 'cast', text: 'magic missile rats' });
    expect(combat.parse('use potion')).toEqual({ type: 'use', item: 'potion', target: null });
  });

  it('rejects exploration verbs and stray arguments', () => {
    expect(combat.parse('defend me')).toBeNull();
    expect(combat.parse('search')).toBeNull();
    expect(combat.parse('flee')).toBeNull();
  });

  it('leaves the round unplayed when the player action is refused', () => {
    const game = newGame();
    enterRoom(game, 'barracks');
    expect(combat.handle({ type: 'attack', target: 'dragon' }, game.ctx)).toEqual({
      consumed: false,
      message: 'No such target.',
    });
    expect(game.roller.remaining).toBe(0);
  });

  it('plays the whole round after a potion', () => {
    const game = newGame();
    enterRoom(game, 'barracks');
    game.state.player.hp = 8;
    // heal 1d6+2, Mara's swing, the bandit's swing
    game.roller.push(2, 5, 4);

    expect(combat.handle({ type: 'use', item: 'potion', target: null }, game.ctx)).toEqual({
      consumed: true,
      message:
        'You use Healing Potion on Ana, healing 4 (2+2). ' +
        'Mara misses Watchtower Bandit (roll 5 -> 7). ' +
        'Watchtower Bandit misses Ana (roll 4 -> 7).',
    });
    expect(game.state.player.hp).toBe(12);
  });
});
