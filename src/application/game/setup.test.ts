import { describe, expect, it } from 'vitest';
import { FIGHTER, WATCHTOWER, newGame, registry } from '@/__tests__/helpers.js';
import { applyRaceMods, createPlayer } from './rules/player.js';
import { restockPotions, restoreRosterEntry, toRosterEntry } from './setup.js';

describe('createPlayer', () => {
  it('applies race modifiers and clamps them to the stat range', () => {
    const stats = applyRaceMods(registry, { STR: 2, DEX: 1, CON: 4, INT: 1, WIS: 4, CHA: 0 }, 'Dwarf');
    expect(stats).toEqual({ STR: 3, DEX: 1, CON: 4, INT: 1, WIS: 4, CHA: 0 });
  });

  it('leaves stats alone for a race without a profile', () => {
    expect(applyRaceMods(registry, { STR: 4 }, 'Orc')).toEqual({
      STR: 4,
      DEX: 0,
      CON: 0,
      INT: 0,
      WIS: 0,
      CHA: 0,
    });
  });

  it('gives casters a mana pool from their casting stat', () => {
    const cleric = createPlayer(registry, 'Tam', 'Cleric', { STR: 2, DEX: 1, CON: 4, INT: 1, WIS: 4, CHA: 0 }, 'Dwarf');
    expect(cleric).toMatchObject({ hp: 16, maxHp: 16, ac: 14, mana: 10, maxMana: 10, level: 1 });

    const fighter = createPlayer(registry, 'Ana', 'Fighter', FIGHTER.stats);
    expect(fighter).toMatchObject({ hp: 16, ac: 15, mana: 0, maxMana: 0, race: 'Human' });
  });
});

describe('roster restore', () => {
  it('tops the pack up to three potions', () => {
    const inventory = [registry.itemFromId(WATCHTOWER, 'healing_potion')];
    restockPotions(registry, WATCHTOWER, inventory);
    expect(inventory.map((item) => item.id)).toEqual(['healing_potion', 'healing_potion', 'healing_potion']);
  });

  it('brings the character back rested with their gear', () => {
    const { state } = newGame();
    state.player.hp = 3;
    state.player.gold = 40;
    state.inventory = [registry.itemFromId(WATCHTOWER, 'worn_boots')];
    state.equipment.head = registry.itemFromId(WATCHTOWER, 'leather_cap');

    const restored = restoreRosterEntry(registry, WATCHTOWER, toRosterEntry(state));
    expect(restored.player).toMatchObject({ hp: 16, gold: 40 });
    expect(restored.inventory.map((item) => item.id)).toEqual([
      'worn_boots',
      'healing_potion',
      'healing_potion',
      'healing_potion',
    ]);
    expect(restored.equipment.head?.id).toBe('leather_cap');
    expect(restored.equipment.feet).toBeNull();
    expect(state.player.hp).toBe(3);
  });
});
