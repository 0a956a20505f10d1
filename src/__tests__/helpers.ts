// Shared test fixtures: real content, scripted dice and fresh games

import type { GameState } from '@/domain/game/GameState.js';
import type { RulesContext } from '@/domain/game/session.js';
import { Dice } from '@/application/game/rules/dice.js';
import { startRoom } from '@/application/game/rules/exploration.js';
import { createNewGame, type NewCharacterInput } from '@/application/game/setup.js';
import { loadContentRegistry } from '@/infrastructure/content/ContentLoader.js';
import { FixedDiceRoller } from '@/infrastructure/game/DiceRoller.js';

export const registry = loadContentRegistry();

export const WATCHTOWER = 'ruined_watchtower';

// 14 + CON 2 = 16 HP, AC 15
export const FIGHTER: NewCharacterInput = {
  name: 'Ana',
  className: 'Fighter',
  stats: { STR: 4, DEX: 2, CON: 2, INT: 2, WIS: 1, CHA: 1 },
};

// 8 + CON 2 = 10 HP, AC 12, mana 2 + 2 * INT 4 = 10
export const WIZARD: NewCharacterInput = {
  name: 'Vex',
  className: 'Wizard',
  stats: { STR: 0, DEX: 2, CON: 2, INT: 4, WIS: 2, CHA: 2 },
};

export interface TestGame {
  roller: FixedDiceRoller;
  dice: Dice;
  state: GameState;
  ctx: RulesContext;
}

/**
 * A fresh watchtower run in the courtyard; queue rolls on `roller` before each action
 */
export function newGame(character: NewCharacterInput = FIGHTER): TestGame {
  const roller = new FixedDiceRoller([]);
  const dice = new Dice(roller);
  const { state } = createNewGame(registry, dice, { campaignId: WATCHTOWER, character });
  return { roller, dice, state, ctx: { registry, dice, state } };
}

/**
 * Puts the player in a room as if they had just walked in
 */
export function enterRoom(game: TestGame, roomId: string, ...rolls: number[]): string {
  game.roller.push(...rolls);
  game.state.roomId = roomId;
  return startRoom(game.ctx, registry.getRoom(game.state.campaignId, roomId));
}
