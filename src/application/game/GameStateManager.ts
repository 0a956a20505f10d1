// Application layer: GameStateManager
// Keeps live sessions, creates new games and handles save/load orchestration

import { v4 as uuidv4 } from 'uuid';
import type { ContentLookup } from '@/domain/content/registry.js';
import type { GameState, RosterEntry } from '@/domain/game/GameState.js';
import type { DiceEngine } from '@/domain/game/types.js';
import type { INarrator } from '@/domain/llm/narration.js';
import type { CharacterRepository } from '@/infrastructure/database/lowdb/CharacterRepository.js';
import type { GameStateRepository } from '@/infrastructure/database/lowdb/GameStateRepository.js';
import { GameSession, type SessionStore } from '@/application/game/GameSession.js';
import { createNewGame, toRosterEntry, type NewCharacterInput } from '@/application/game/setup.js';
import { NotFoundError } from '@/utils/errors.js';

export interface GameStateManagerDependencies {
  registry: ContentLookup;
  dice: DiceEngine;
  narrator: INarrator;
  gameStates: GameStateRepository;
  characters: CharacterRepository;
  inventoryLimit?: number;
  maxRestCount?: number;
}

export interface CreateGameInput {
  campaignId: string;
  companionId?: string;
  character: NewCharacterInput | { rosterName: string };
}

export interface CreatedGame {
  session: GameSession;
  intro: string;
}

export class GameStateManager implements SessionStore {
  private readonly sessions = new Map<string, GameSession>();

  constructor(private readonly deps: GameStateManagerDependencies) {}

  /**
   * Saves the game and syncs the character into the roster.
   * A roster failure is logged and does not fail the save.
   */
  async save(gameId: string, state: GameState): Promise<void> {
    await this.deps.gameStates.saveState(gameId, state);
    try {
      await this.deps.characters.save(toRosterEntry(state));
    } catch (error) {
      console.warn(
        `[GameStateManager] Roster sync failed for ${state.player.name}:`,
        error instanceof Error ? error.message : error
      );
    }
  }

  async createGame(input: CreateGameInput): Promise<CreatedGame> {
    const { registry, dice } = this.deps;
    // Fails fast on an unknown campaign before touching the roster
    registry.getCampaign(input.campaignId);

    let character: NewCharacterInput | RosterEntry;
    if ('rosterName' in input.character) {
      const entry = await this.deps.characters.findByName(input.character.rosterName, input.campaignId);
      if (!entry) {
        throw new NotFoundError(
          `Character ${input.character.rosterName} not found`,
          'CHARACTER_NOT_FOUND'
        );
      }
      character = entry;
    } else {
      character = input.character;
    }

    const { state, intro } = createNewGame(registry, dice, {
      campaignId: input.campaignId,
      companionId: input.companionId,
      character,
      inventoryLimit: this.deps.inventoryLimit,
    });

    const session = this.attach(uuidv4(), state);
    await session.save();
    console.log(`[GameStateManager] Started game ${session.id} in ${input.campaignId}`);
    return { session, intro };
  }

  /**
   * Live session, or one restored from its save
   * @throws NotFoundError when neither exists
   */
  async getSession(gameId: string): Promise<GameSession> {
    const live = this.sessions.get(gameId);
    if (live) return live;

    const state = await this.deps.gameStates.loadState(gameId);
    if (!state) {
      throw new NotFoundError(`Game ${gameId} not found`, 'GAME_NOT_FOUND');
    }
    console.log(`[GameStateManager] Resumed game ${gameId}`);
    return this.attach(gameId, state);
  }

  async listCharacters(): Promise<string[]> {
    return this.deps.characters.listNames();
  }

  /**
   * Saves every live session; used on shutdown
   */
  async saveAll(): Promise<number> {
    for (const session of this.sessions.values()) {
      await session.save();
    }
    return this.sessions.size;
  }

  get liveSessionCount(): number {
    return this.sessions.size;
  }

  private attach(gameId: string, state: GameState): GameSession {
    const session = new GameSession(gameId, state, {
      registry: this.deps.registry,
      dice: this.deps.dice,
      narrator: this.deps.narrator,
      store: this,
      maxRestCount: this.deps.maxRestCount,
    });
    this.sessions.set(gameId, session);
    return session;
  }
}
