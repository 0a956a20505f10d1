// Character Repository - LowDB implementation
// The roster: characters carried from one campaign to the next

import { ZodError } from 'zod';
import type { ContentLookup } from '@/domain/content/registry.js';
import type { RosterEntry } from '@/domain/game/GameState.js';
import { SaveLoadError } from '@/utils/errors.js';
import { slugify } from '@/utils/string.js';
import type { CharacterRecord, DatabaseConnection } from './connection.js';
import { deserializeRosterEntry, serializeRosterEntry } from './serialization.js';

export class CharacterRepository {
  constructor(
    private db: DatabaseConnection,
    private registry: ContentLookup
  ) {}

  /**
   * Create or replace the roster entry for this character's name
   */
  async save(entry: RosterEntry): Promise<string> {
    const key = slugify(entry.character.name);
    const record: CharacterRecord = {
      key,
      name: entry.character.name,
      data: serializeRosterEntry(entry),
      updated_at: new Date().toISOString(),
    };

    const characters = this.db.getData().characters;
    const index = characters.findIndex((c) => c.key === key);
    if (index >= 0) {
      characters[index] = record;
    } else {
      characters.push(record);
    }

    await this.db.write();
    return key;
  }

  /**
   * Load a roster entry by name, resolving loose items against the campaign catalog
   */
  async findByName(name: string, campaignId: string): Promise<RosterEntry | null> {
    const key = slugify(name);
    const record = this.db.getData().characters.find((c) => c.key === key);
    if (!record) return null;

    try {
      return deserializeRosterEntry(this.registry, campaignId, record.data);
    } catch (error) {
      if (error instanceof ZodError) {
        throw new SaveLoadError(`Roster entry ${name} is corrupt`, { issues: error.issues });
      }
      throw error;
    }
  }

  /**
   * Sorted, de-duplicated character names
   */
  async listNames(): Promise<string[]> {
    const names = this.db.getData().characters.map((c) => c.name);
    return [...new Set(names)].sort();
  }
}
