// API layer: Character routes
// The roster of characters that can start a new campaign

import { Router, type Request, type Response } from 'express';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import type { GameStateManager } from '@/application/game/GameStateManager.js';

export function createCharacterRouter(manager: GameStateManager): Router {
  const router = Router();

  // List saved character names
  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      const characters = await manager.listCharacters();
      res.json({
        success: true,
        count: characters.length,
        characters,
      });
    })
  );

  return router;
}
