// Database Service - Main entry point for database operations
// Provides access to all repositories and handles initialization

import type { ContentLookup } from '@/domain/content/registry.js';
import {
  openDatabase,
  type DatabaseConfig,
  type DatabaseConnection,
  CharacterRepository,
  GameStateRepository,
} from './lowdb/index.js';

export class DatabaseService {
  // Repositories
  public readonly gameStates: GameStateRepository;
  public readonly characters: CharacterRepository;

  private constructor(
    private readonly connection: DatabaseConnection,
    registry: ContentLookup
  ) {
    this.gameStates = new GameStateRepository(connection, registry);
    this.characters = new CharacterRepository(connection, registry);
  }

  /**
   * Open the store at config.path (':memory:' keeps everything in process)
   */
  static async initialize(config: DatabaseConfig, registry: ContentLookup): Promise<DatabaseService> {
    const connection = await openDatabase(config);
    console.log(`[DatabaseService] Opened ${config.path}`);
    return new DatabaseService(connection, registry);
  }

  async close(): Promise<void> {
    await this.connection.close();
    console.log(`[DatabaseService] Closed ${this.connection.path}`);
  }

  getStats(): { games: number; characters: number; version: number } {
    const data = this.connection.getData();
    return {
      games: data.gameStates.length,
      characters: data.characters.length,
      version: this.connection.getVersion(),
    };
  }
}
