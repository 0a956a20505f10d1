// API layer: Game routes
// Create games, submit actions, answer level-up choices and ask the companion

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler, createError } from '@/api/middleware/errorHandler.js';
import type { ContentLookup } from '@/domain/content/registry.js';
import { EQUIPMENT_SLOTS } from '@/domain/content/types.js';
import type { GameStateManager } from '@/application/game/GameStateManager.js';
import type { ActionResult, GameSession } from '@/application/game/GameSession.js';
import { STAT_MAX, STAT_MIN, STAT_POINT_BUDGET } from '@/application/game/rules/player.js';
import { NotFoundError } from '@/utils/errors.js';

// ========== Schemas ==========

const statSchema = z.number().int().min(STAT_MIN).max(STAT_MAX).default(0);

const StatsSchema = z
  .object({
    STR: statSchema,
    DEX: statSchema,
    CON: statSchema,
    INT: statSchema,
    WIS: statSchema,
    CHA: statSchema,
  })
  .refine((stats) => Object.values(stats).reduce((sum, value) => sum + value, 0) === STAT_POINT_BUDGET, {
    message: `Stats must add up to ${STAT_POINT_BUDGET}`,
  });

const NewCharacterSchema = z.object({
  name: z.string().trim().min(1).max(60),
  className: z.string().min(1),
  race: z.string().min(1).default('Human'),
  stats: StatsSchema,
});

const RosterCharacterSchema = z.object({
  rosterName: z.string().trim().min(1),
});

const CreateGameSchema = z.object({
  campaignId: z.string().min(1),
  companionId: z.string().min(1).optional(),
  character: z.union([RosterCharacterSchema, NewCharacterSchema]),
});

const ActionSchema = z.object({
  input: z.string().trim().min(1).max(500),
});

const DecisionSchema = z.object({
  choice: z.string().trim().min(1),
});

// ========== Views ==========

export function describeGame(session: GameSession) {
  const state = session.getState();
  const latest = state.narrationLog[state.narrationLog.length - 1];
  return {
    gameId: session.id,
    campaignId: state.campaignId,
    roomId: state.roomId,
    mode: session.mode,
    turn: state.turn,
    gameOver: state.gameOver,
    lastEvent: state.lastEvent,
    player: {
      name: state.player.name,
      race: state.player.race,
      className: state.player.className,
      level: state.player.level,
      xp: state.player.xp,
      hp: state.player.hp,
      maxHp: state.player.maxHp,
      ac: state.player.ac,
      mana: state.player.mana,
      maxMana: state.player.maxMana,
      gold: state.player.gold,
      learnedSpells: [...state.player.learnedSpells],
    },
    companions: state.companions.map((c) => ({
      id: c.id,
      name: c.name,
      hp: c.hp,
      maxHp: c.maxHp,
      ac: c.ac,
      mana: c.mana,
      maxMana: c.maxMana,
    })),
    enemies: state.enemies
      .filter((e) => e.hp > 0)
      .map((e) => ({ name: e.name, hp: e.hp, maxHp: e.maxHp, ac: e.ac })),
    inventory: state.inventory.map((item) => item.name),
    equipment: Object.fromEntries(
      EQUIPMENT_SLOTS.map((slot) => [slot, state.equipment[slot]?.name ?? null])
    ),
    pendingDecision: state.pendingDecisions[0] ?? null,
    narration: latest ? { text: latest.narration, source: latest.source } : null,
  };
}

function describeResult(result: ActionResult) {
  return {
    consumed: result.consumed,
    rulesResult: result.rulesResult,
    narration: result.narration,
    decision: result.decision,
    turn: result.turn,
    mode: result.mode,
    gameOver: result.gameOver,
  };
}

function matchName(wanted: string, names: string[]): string | undefined {
  const needle = wanted.trim().toLowerCase();
  return names.find((name) => name.toLowerCase() === needle);
}

// ========== Routes ==========

export function createGameRouter(manager: GameStateManager, registry: ContentLookup): Router {
  const router = Router();

  // Start a new game
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const body = CreateGameSchema.parse(req.body);

      const campaign = registry.listCampaigns().find((c) => c.id === body.campaignId);
      if (!campaign) {
        throw new NotFoundError(`Campaign ${body.campaignId} not found`, 'CAMPAIGN_NOT_FOUND');
      }
      if (body.companionId && !campaign.companions[body.companionId]) {
        throw createError(`Unknown companion: ${body.companionId}`, 400, 'VALIDATION_ERROR');
      }

      let character = body.character;
      if ('className' in character) {
        const className = matchName(character.className, registry.listClassNames());
        if (!className) {
          throw createError(`Unknown class: ${character.className}`, 400, 'VALIDATION_ERROR');
        }
        const race = matchName(character.race, registry.listRaceNames());
        if (!race) {
          throw createError(`Unknown race: ${character.race}`, 400, 'VALIDATION_ERROR');
        }
        character = { ...character, className, race };
      }

      const { session, intro } = await manager.createGame({
        campaignId: body.campaignId,
        companionId: body.companionId,
        character,
      });

      res.status(201).json({
        success: true,
        intro,
        game: describeGame(session),
      });
    })
  );

  // Current game view
  router.get(
    '/:gameId',
    asyncHandler(async (req: Request, res: Response) => {
      const session = await manager.getSession(req.params.gameId);
      res.json({ success: true, game: describeGame(session) });
    })
  );

  // Submit one player action
  router.post(
    '/:gameId/actions',
    asyncHandler(async (req: Request, res: Response) => {
      const { input } = ActionSchema.parse(req.body);
      const session = await manager.getSession(req.params.gameId);
      const result = await session.processAction(input);
      res.json({ success: true, result: describeResult(result), game: describeGame(session) });
    })
  );

  // Answer the waiting level-up choice
  router.post(
    '/:gameId/decisions',
    asyncHandler(async (req: Request, res: Response) => {
      const { choice } = DecisionSchema.parse(req.body);
      const session = await manager.getSession(req.params.gameId);
      const result = await session.resolveDecision(choice);
      res.json({ success: true, result: describeResult(result), game: describeGame(session) });
    })
  );

  // Companion suggestion
  router.get(
    '/:gameId/suggestion',
    asyncHandler(async (req: Request, res: Response) => {
      const session = await manager.getSession(req.params.gameId);
      const suggestion = await session.suggest();
      res.json({ success: true, suggestion });
    })
  );

  return router;
}
