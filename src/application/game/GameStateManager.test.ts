import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FIGHTER, registry } from '@/__tests__/helpers.js';
import { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import { FixedDiceRoller } from '@/infrastructure/game/DiceRoller.js';
import { NotFoundError } from '@/utils/errors.js';
import { Narrator } from './agents/Narrator.js';
import { GameStateManager } from './GameStateManager.js';
import { Dice } from './rules/dice.js';

describe('GameStateManager', () => {
  let db: DatabaseService;
  let roller: FixedDiceRoller;

  function createManager(): GameStateManager {
    return new GameStateManager({
      registry,
      dice: new Dice(roller),
      narrator: new Narrator(null),
      gameStates: db.gameStates,
      characters: db.characters,
      inventoryLimit: 8,
    });
  }

  beforeEach(async () => {
    roller = new FixedDiceRoller([]);
    db = await DatabaseService.initialize({ path: ':memory:' }, registry);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('saves a new game and its character straight away', async () => {
    const manager = createManager();
    const { session, intro } = await manager.createGame({ campaignId: 'ruined_watchtower', character: FIGHTER });

    expect(intro).toBe(session.getState().lastEvent);
    expect(session.getState().inventoryLimit).toBe(8);
    expect(db.getStats()).toMatchObject({ games: 1, characters: 1 });
    expect(manager.liveSessionCount).toBe(1);
  });

  it('resumes a saved game in a fresh process', async () => {
    const first = createManager();
    const { session } = await first.createGame({ campaignId: 'ruined_watchtower', character: FIGHTER });
    await session.processAction('rest');

    const second = createManager();
    const resumed = await second.getSession(session.id);
    expect(resumed.getState().turn).toBe(1);
    expect(resumed.getState().player.name).toBe('Ana');
    expect(await second.getSession(session.id)).toBe(resumed);
  });

  it('throws NotFoundError for an unknown game', async () => {
    await expect(createManager().getSession('missing')).rejects.toThrow(NotFoundError);
  });

  it('keeps the game save when the roster write fails', async () => {
    const manager = createManager();
    const { session } = await manager.createGame({ campaignId: 'ruined_watchtower', character: FIGHTER });
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(db.characters, 'save').mockRejectedValue(new Error('disk full'));

    await expect(session.processAction('rest')).resolves.toMatchObject({ consumed: true, turn: 1 });
    expect(warn).toHaveBeenCalledWith('[GameStateManager] Roster sync failed for Ana:', 'disk full');
    expect((await db.gameStates.loadState(session.id))?.turn).toBe(1);
  });

  it('saves every live session', async () => {
    const manager = createManager();
    await manager.createGame({ campaignId: 'ruined_watchtower', character: FIGHTER });
    await manager.createGame({ campaignId: 'ruined_watchtower', character: { ...FIGHTER, name: 'Bryn' } });
    expect(await manager.saveAll()).toBe(2);
    expect(await manager.listCharacters()).toEqual(['Ana', 'Bryn']);
  });
});
