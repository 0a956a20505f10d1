import { beforeEach, describe, expect, it } from 'vitest';
import { newGame, registry } from '@/__tests__/helpers.js';
import { equipItem } from '@/application/game/rules/inventory.js';
import { toRosterEntry } from '@/application/game/setup.js';
import { SaveLoadError } from '@/utils/errors.js';
import { CharacterRepository } from './CharacterRepository.js';
import { GameStateRepository } from './GameStateRepository.js';
import { IN_MEMORY_PATH, openDatabase, type DatabaseConnection } from './connection.js';
import { serializeGameState } from './serialization.js';

let db: DatabaseConnection;

beforeEach(async () => {
  db = await openDatabase({ path: IN_MEMORY_PATH });
});

describe('GameStateRepository', () => {
  let repo: GameStateRepository;

  beforeEach(() => {
    repo = new GameStateRepository(db, registry);
  });

  it('saves and loads a game by id', async () => {
    const { state } = newGame();
    state.turn = 2;
    await repo.saveState('game-1', state);

    expect(await repo.loadState('game-1')).toEqual(state);
    expect(db.getData().gameStates[0]).toMatchObject({
      id: 'game-1',
      campaign_id: 'ruined_watchtower',
      format_version: 2,
    });
  });

  it('overwrites the record on a later save', async () => {
    const { state } = newGame();
    await repo.saveState('game-1', state);
    const createdAt = db.getData().gameStates[0].created_at;

    state.player.gold = 12;
    await repo.saveState('game-1', state);

    expect(db.getData().gameStates).toHaveLength(1);
    expect(db.getData().gameStates[0].created_at).toBe(createdAt);
    expect((await repo.loadState('game-1'))?.player.gold).toBe(12);
  });

  it('returns null for an unknown id', async () => {
    expect(await repo.loadState('missing')).toBeNull();
  });

  it('reports a corrupt record as a load error', async () => {
    db.getData().gameStates.push({
      id: 'broken',
      campaign_id: 'ruined_watchtower',
      format_version: 2,
      state: { player: { name: 'Nobody' } },
      created_at: '2026-01-01T00:00:00.000Z',
      updated_at: '2026-01-01T00:00:00.000Z',
    });
    await expect(repo.loadState('broken')).rejects.toThrow(SaveLoadError);
    await expect(repo.loadState('broken')).rejects.toThrow('Save broken is corrupt');
  });

  it('reports a save for a campaign that no longer exists', async () => {
    const { state } = newGame();
    await repo.saveState('orphan', state);
    db.getData().gameStates[0].state = { ...serializeGameState(state), campaign_id: 'atlantis' };

    await expect(repo.loadState('orphan')).rejects.toThrow(
      'Save orphan references unknown content: Unknown campaign: atlantis'
    );
  });

  it('bumps the store version on every write', async () => {
    const before = db.getVersion();
    await repo.saveState('a', newGame().state);
    expect(db.getVersion()).toBe(before + 1);
  });
});

describe('CharacterRepository', () => {
  let repo: CharacterRepository;

  beforeEach(() => {
    repo = new CharacterRepository(db, registry);
  });

  it('stores one entry per name slug', async () => {
    const { state } = newGame();
    equipItem(state, 'cap');
    expect(await repo.save(toRosterEntry(state))).toBe('ana');

    state.player.gold = 30;
    await repo.save(toRosterEntry(state));
    expect(db.getData().characters).toHaveLength(1);

    const entry = await repo.findByName('ANA', 'ruined_watchtower');
    expect(entry?.character.gold).toBe(30);
    expect(entry?.equipment.head?.id).toBe('leather_cap');
  });

  it('returns null for an unknown name', async () => {
    expect(await repo.findByName('Nobody', 'ruined_watchtower')).toBeNull();
  });

  it('lists names in order', async () => {
    const first = newGame().state;
    first.player.name = 'Zed';
    const second = newGame().state;
    second.player.name = 'Bryn';
    await repo.save(toRosterEntry(first));
    await repo.save(toRosterEntry(second));

    expect(await repo.listNames()).toEqual(['Bryn', 'Zed']);
  });
});
