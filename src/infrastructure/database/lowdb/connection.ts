// LowDB connection and database instance management
// JSON file storage for game saves and the character roster

import { Low, Memory } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { dirname } from 'path';
import { mkdirSync } from 'fs';

export const IN_MEMORY_PATH = ':memory:';

// Database schema definition
export interface DatabaseSchema {
  _version: number;           // Incremented on every write
  gameStates: GameStateRecord[];
  characters: CharacterRecord[];
}

export interface GameStateRecord {
  id: string;
  campaign_id: string;
  format_version: number;
  /** Serialized game state, validated on load */
  state: unknown;
  created_at: string;
  updated_at: string;
}

export interface CharacterRecord {
  /** Slug of the character name */
  key: string;
  name: string;
  data: unknown;
  updated_at: string;
}

function createDefaultData(): DatabaseSchema {
  return {
    _version: 1,
    gameStates: [],
    characters: [],
  };
}

// Database configuration
export interface DatabaseConfig {
  /** File path, or ':memory:' for a throwaway store */
  path: string;
}

export class DatabaseConnection {
  private db: Low<DatabaseSchema>;

  constructor(private readonly config: DatabaseConfig) {
    if (config.path === IN_MEMORY_PATH) {
      this.db = new Low(new Memory<DatabaseSchema>(), createDefaultData());
      return;
    }

    mkdirSync(dirname(config.path), { recursive: true });
    this.db = new Low(new JSONFile<DatabaseSchema>(config.path), createDefaultData());
  }

  /**
   * Initialize by reading data
   */
  async init(): Promise<void> {
    await this.db.read();

    // Files written before a collection existed
    const data = this.db.data;
    data._version ??= 1;
    data.gameStates ??= [];
    data.characters ??= [];
  }

  get path(): string {
    return this.config.path;
  }

  getData(): DatabaseSchema {
    return this.db.data;
  }

  async write(): Promise<void> {
    this.db.data._version += 1;
    await this.db.write();
  }

  getVersion(): number {
    return this.db.data._version;
  }

  /**
   * Close (no-op for LowDB, just ensure writes)
   */
  async close(): Promise<void> {
    await this.db.write();
  }
}

export async function openDatabase(config: DatabaseConfig): Promise<DatabaseConnection> {
  const connection = new DatabaseConnection(config);
  await connection.init();
  return connection;
}
