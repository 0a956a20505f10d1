// Infrastructure layer: GameState repository using LowDB
// Handles persistence of game state for save/load functionality

import { ZodError } from 'zod';
import type { ContentLookup } from '@/domain/content/registry.js';
import type { GameState } from '@/domain/game/GameState.js';
import { ContentIntegrityError, SaveLoadError } from '@/utils/errors.js';
import type { DatabaseConnection, GameStateRecord } from './connection.js';
import { SAVE_FORMAT_VERSION, deserializeGameState, serializeGameState } from './serialization.js';

/**
 * Repository for game state persistence
 * One record per game id; every save overwrites it
 */
export class GameStateRepository {
  constructor(
    private db: DatabaseConnection,
    private registry: ContentLookup
  ) {}

  async saveState(gameId: string, state: GameState): Promise<void> {
    const data = this.db.getData();
    const now = new Date().toISOString();
    const existing = data.gameStates.find((record) => record.id === gameId);

    const record: GameStateRecord = {
      id: gameId,
      campaign_id: state.campaignId,
      format_version: SAVE_FORMAT_VERSION,
      state: serializeGameState(state),
      created_at: existing?.created_at ?? now,
      updated_at: now,
    };

    if (existing) {
      data.gameStates[data.gameStates.indexOf(existing)] = record;
    } else {
      data.gameStates.push(record);
    }

    await this.db.write();
  }

  /**
   * Load a game state
   * @returns Game state, or null if no save exists under this id
   * @throws SaveLoadError when the stored record is corrupt
   */
  async loadState(gameId: string): Promise<GameState | null> {
    const record = this.db.getData().gameStates.find((s) => s.id === gameId);
    if (!record) {
      return null;
    }

    try {
      return deserializeGameState(this.registry, record.state);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new SaveLoadError(`Save ${gameId} is corrupt`, { issues: error.issues });
      }
      if (error instanceof ContentIntegrityError) {
        throw new SaveLoadError(`Save ${gameId} references unknown content: ${error.message}`);
      }
      throw error;
    }
  }
}
