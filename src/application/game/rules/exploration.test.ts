import { beforeEach, describe, expect, it } from 'vitest';
import { enterRoom, newGame, registry, type TestGame } from '@/__tests__/helpers.js';
import { applyRoomAction, movePlayer } from './exploration.js';

describe('new game', () => {
  it('opens in the first room of the campaign', () => {
    const { state } = newGame();
    expect(state.roomId).toBe('courtyard');
    expect(state.visited).toEqual(['courtyard']);
    expect(state.inCombat).toBe(false);
    expect(state.lastEvent).toBe(
      'Broken stone and fallen beams surround a mossy fire pit. A hooded scout watches you from a collapsed archway, hand near a shortbow.'
    );
  });
});

describe('social room', () => {
  let game: TestGame;

  beforeEach(() => {
    game = newGame();
  });

  it('sets both flags on a successful talk', () => {
    game.roller.push(11);
    expect(applyRoomAction(game.ctx, 'talk')).toEqual({
      consumed: true,
      message:
        "You win Eryn's trust (roll 11 -> 13). She points out a safe route and warns you about a lone bandit inside.",
    });
    expect(game.state.flags.quest).toEqual({ social_done: true, scout_helped: true });
  });

  it('only marks the encounter done on a failed talk', () => {
    game.roller.push(5);
    expect(applyRoomAction(game.ctx, 'parley').message).toBe(
      'Eryn stays guarded (roll 5 -> 7). She gives no help, but allows you to pass.'
    );
    expect(game.state.flags.quest).toEqual({ social_done: true });
  });

  it('has the NPC wait on any other verb', () => {
    expect(applyRoomAction(game.ctx, 'search').message).toBe('Eryn the Scout waits, watching for your move.');
  });
});

describe('movement', () => {
  let game: TestGame;

  beforeEach(() => {
    game = newGame();
  });

  it('follows an exit key into a fight', () => {
    game.roller.push(4, 2);
    expect(movePlayer(game.ctx, 'down')).toEqual({ consumed: true, message: 'A fight breaks out with Big Rats.' });
    expect(game.state.roomId).toBe('cellar');
    expect(game.state.enemies.map((enemy) => enemy.hp)).toEqual([3, 1]);
    expect(game.state.visited).toEqual(['courtyard', 'cellar']);
  });

  it('accepts a destination room id', () => {
    expect(movePlayer(game.ctx, 'Barracks').message).toBe('A fight breaks out with Watchtower Bandit.');
  });

  it('lists the options for an unknown way without spending a turn', () => {
    expect(movePlayer(game.ctx, 'sideways')).toEqual({
      consumed: false,
      message: "Can't go that way. Options: barracks, cellar.",
    });
    expect(game.state.roomId).toBe('courtyard');
  });

  it('shows the room description once its fight is won', () => {
    game.state.flags.defeatedRooms.push('barracks');
    const outcome = movePlayer(game.ctx, 'up');
    expect(outcome.message).toBe(registry.getRoom('ruined_watchtower', 'barracks').description);
    expect(game.state.inCombat).toBe(false);
    expect(game.state.enemies).toEqual([]);
  });
});

describe('loot room', () => {
  let game: TestGame;

  beforeEach(() => {
    game = newGame();
    enterRoom(game, 'spire');
  });

  it('awards the prize and ends the campaign on success', () => {
    // Quest items do not count against a full pack
    game.state.inventoryLimit = game.state.inventory.length;
    game.roller.push(20);

    expect(applyRoomAction(game.ctx, 'open').message).toBe(
      'You work the rusted lock free (roll 20 -> 22). Inside rests the Silver Locket of the Watch. Your adventure ends in triumph.'
    );
    expect(game.state.inventory.map((item) => item.id)).toContain('silver_locket');
    expect(game.state.flags.lootTaken).toEqual(['spire']);
    expect(game.state.gameOver).toBe(true);

    expect(applyRoomAction(game.ctx, 'search').message).toBe('The chest is already open and empty.');
  });

  it('can be retried after a failed check', () => {
    game.roller.push(3);
    expect(applyRoomAction(game.ctx, 'loot').message).toBe(
      'Your tools slip (roll 3 -> 5). The lock resists for now, but you can try again.'
    );
    expect(game.state.flags.lootFailed).toEqual(['spire']);
    expect(game.state.gameOver).toBe(false);
  });

  it('has nowhere else to go', () => {
    expect(applyRoomAction(game.ctx, 'leave').message).toBe("There's nowhere left to go but the chest.");
  });
});

describe('combat room after the fight', () => {
  let game: TestGame;

  beforeEach(() => {
    game = newGame();
  });

  it('blocks room actions while the enemy stands', () => {
    game.state.roomId = 'cellar';
    expect(applyRoomAction(game.ctx, 'search').message).toBe('The enemy blocks your way, ready to strike.');
  });

  it('loots a single corpse for gold and one table item', () => {
    game.state.roomId = 'barracks';
    game.state.flags.defeatedRooms.push('barracks');
    game.state.flags.corpses.barracks = [{ id: 1, name: 'Watchtower Bandit', looted: false }];
    // 1d6+2 gold, then one die over three table items
    game.roller.push(4, 1);

    expect(applyRoomAction(game.ctx, 'loot').message).toBe(
      'You loot the corpse and gain 6 gold. You find Padded Armguards.'
    );
    expect(game.state.player.gold).toBe(6);
    expect(game.state.inventory[game.state.inventory.length - 1].id).toBe('padded_arms');
    expect(applyRoomAction(game.ctx, 'loot').message).toBe('You already searched the corpses.');
  });

  it('keeps the gold but leaves the item when the pack is full', () => {
    game.state.roomId = 'barracks';
    game.state.inventoryLimit = game.state.inventory.length;
    game.state.flags.defeatedRooms.push('barracks');
    game.state.flags.corpses.barracks = [{ id: 1, name: 'Watchtower Bandit', looted: false }];
    game.roller.push(1, 3);

    expect(applyRoomAction(game.ctx, 'loot').message).toBe(
      'You loot the corpse and gain 3 gold. You spot Leather Cap, but inventory is full.'
    );
    expect(game.state.flags.corpses.barracks[0].looted).toBe(true);
  });

  it('asks which corpse when there are several', () => {
    game.state.roomId = 'cellar';
    game.state.flags.defeatedRooms.push('cellar');
    game.state.flags.corpses.cellar = [
      { id: 1, name: 'Big Rats', looted: false },
      { id: 2, name: 'Big Rats', looted: false },
    ];

    expect(applyRoomAction(game.ctx, 'loot').message).toBe(
      "Multiple corpses here. Use 'loot <number>' or 'loot all'."
    );
    expect(applyRoomAction(game.ctx, 'loot', '3').message).toBe('That corpse does not exist.');
    expect(applyRoomAction(game.ctx, 'loot', 'all').message).toBe('You search the corpse but find nothing.');
    expect(game.state.flags.corpses.cellar.every((corpse) => corpse.looted)).toBe(true);
  });
});
