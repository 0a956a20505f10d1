import type { Application } from 'express';
import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { FIGHTER, registry } from '@/__tests__/helpers.js';
import { Narrator } from '@/application/game/agents/Narrator.js';
import { GameStateManager } from '@/application/game/GameStateManager.js';
import { Dice } from '@/application/game/rules/dice.js';
import { DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import { FixedDiceRoller } from '@/infrastructure/game/DiceRoller.js';
import { createApp } from './app.js';

const COURTYARD =
  'Broken stone and fallen beams surround a mossy fire pit. A hooded scout watches you from a collapsed archway, hand near a shortbow.';

const newCharacter = {
  campaignId: 'ruined_watchtower',
  character: { ...FIGHTER, className: 'fighter' },
};

describe('HTTP API', () => {
  let app: Application;
  let roller: FixedDiceRoller;

  beforeEach(async () => {
    roller = new FixedDiceRoller([]);
    const db = await DatabaseService.initialize({ path: ':memory:' }, registry);
    const manager = new GameStateManager({
      registry,
      dice: new Dice(roller),
      narrator: new Narrator(null),
      gameStates: db.gameStates,
      characters: db.characters,
    });
    app = createApp({ registry, manager }, { logFormat: false });
  });

  async function startGame(): Promise<string> {
    const res = await request(app).post('/api/games').send(newCharacter).expect(201);
    return res.body.game.gameId;
  }

  it('reports health', async () => {
    const res = await request(app).get('/health').expect(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.liveGames).toBe(0);
  });

  it('lists campaigns with their companions and the character options', async () => {
    const res = await request(app).get('/api/campaigns').expect(200);
    expect(res.body.count).toBe(2);
    expect(res.body.campaigns.map((c: { id: string }) => c.id)).toEqual(['lost_crypt', 'ruined_watchtower']);
    expect(res.body.campaigns[1].companions).toEqual([{ id: 'mara', name: 'Mara' }]);
    expect(res.body.classes).toEqual(['Fighter', 'Rogue', 'Wizard', 'Cleric']);
    expect(res.body.races).toEqual(['Human', 'Elf', 'Dwarf', 'Halfling']);
  });

  describe('POST /api/games', () => {
    it('creates a game with a new character', async () => {
      const res = await request(app).post('/api/games').send(newCharacter).expect(201);
      expect(res.body.success).toBe(true);
      expect(res.body.intro).toBe(COURTYARD);
      expect(res.body.game).toMatchObject({
        campaignId: 'ruined_watchtower',
        roomId: 'courtyard',
        mode: 'exploration',
        turn: 0,
        gameOver: false,
        player: { name: 'Ana', race: 'Human', className: 'Fighter', level: 1, hp: 16, maxHp: 16, ac: 15 },
        inventory: ['Healing Potion', 'Healing Potion', 'Healing Potion', 'Leather Cap', 'Worn Boots'],
        pendingDecision: null,
        narration: null,
      });
      expect(res.body.game.companions.map((c: { name: string }) => c.name)).toEqual(['Mara']);
    });

    it('rejects stats that do not spend the whole budget', async () => {
      const res = await request(app)
        .post('/api/games')
        .send({ ...newCharacter, character: { ...FIGHTER, stats: { STR: 4, DEX: 4 } } })
        .expect(400);
      expect(res.body.error.code).toBe('VALIDATION_ERROR');
    });

    it('rejects an unknown class', async () => {
      const res = await request(app)
        .post('/api/games')
        .send({ ...newCharacter, character: { ...FIGHTER, className: 'Bard' } })
        .expect(400);
      expect(res.body.error).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Unknown class: Bard' });
    });

    it('rejects a companion the campaign does not have', async () => {
      const res = await request(app)
        .post('/api/games')
        .send({ ...newCharacter, companionId: 'eldrin' })
        .expect(400);
      expect(res.body.error.message).toBe('Unknown companion: eldrin');
    });

    it('returns 404 for an unknown campaign', async () => {
      const res = await request(app)
        .post('/api/games')
        .send({ ...newCharacter, campaignId: 'atlantis' })
        .expect(404);
      expect(res.body).toEqual({
        success: false,
        error: { code: 'CAMPAIGN_NOT_FOUND', message: 'Campaign atlantis not found' },
      });
    });

    it('brings a roster character into a new run', async () => {
      await startGame();
      const roster = await request(app).get('/api/characters').expect(200);
      expect(roster.body).toEqual({ success: true, count: 1, characters: ['Ana'] });

      const res = await request(app)
        .post('/api/games')
        .send({ campaignId: 'ruined_watchtower', character: { rosterName: 'ana' } })
        .expect(201);
      expect(res.body.game.player).toMatchObject({ name: 'Ana', className: 'Fighter', hp: 16 });
    });

    it('returns 404 for a name not on the roster', async () => {
      const res = await request(app)
        .post('/api/games')
        .send({ campaignId: 'ruined_watchtower', character: { rosterName: 'Nobody' } })
        .expect(404);
      expect(res.body.error.code).toBe('CHARACTER_NOT_FOUND');
    });
  });

  describe('game actions', () => {
    it('resolves an action and narrates it', async () => {
      const gameId = await startGame();
      roller.push(11);

      const res = await request(app).post(`/api/games/${gameId}/actions`).send({ input: 'talk' }).expect(200);
      expect(res.body.result).toMatchObject({
        consumed: true,
        rulesResult:
          "You win Eryn's trust (roll 11 -> 13). She points out a safe route and warns you about a lone bandit inside.",
        narration: { text: 'The ruin creaks with old stone. What do you do?', source: 'stub' },
        turn: 1,
        mode: 'exploration',
      });
      expect(res.body.game.narration).toEqual({
        text: 'The ruin creaks with old stone. What do you do?',
        source: 'stub',
      });
    });

    it('rejects an empty action', async () => {
      const gameId = await startGame();
      await request(app).post(`/api/games/${gameId}/actions`).send({ input: '   ' }).expect(400);
    });

    it('has nothing to decide on a fresh game', async () => {
      const gameId = await startGame();
      const res = await request(app).post(`/api/games/${gameId}/decisions`).send({ choice: 'Shield' }).expect(200);
      expect(res.body.result).toMatchObject({
        consumed: false,
        rulesResult: 'There is nothing to decide right now.',
      });
    });

    it('returns a companion suggestion', async () => {
      const gameId = await startGame();
      const res = await request(app).get(`/api/games/${gameId}/suggestion`).expect(200);
      expect(res.body.suggestion).toEqual({
        text: "Mara whispers, 'Keep your distance and watch for traps.'",
        source: 'stub',
      });
    });

    it('returns 404 for an unknown game', async () => {
      const res = await request(app).get('/api/games/nope').expect(404);
      expect(res.body.error.code).toBe('GAME_NOT_FOUND');
    });
  });

  it('answers unknown routes with the error envelope', async () => {
    const res = await request(app).get('/api/dragons').expect(404);
    expect(res.body).toEqual({ success: false, error: { code: 'NOT_FOUND', message: 'Resource not found' } });
  });
});
