// Domain layer: Content lookup port
// NO external dependencies - pure TypeScript

import type {
  Campaign,
  ClassProfile,
  CompanionProfile,
  ItemDefinition,
  MobProfile,
  RaceProfile,
  Room,
  SpellProfile,
} from './types.js';

/**
 * Read-only view over campaign and rules content.
 * Unknown campaign/room/mob/companion/class ids are content bugs and throw;
 * unknown items resolve to an "unknown" placeholder.
 */
export interface ContentLookup {
  getCampaign(campaignId: string): Campaign;
  listCampaigns(): Campaign[];
  getRoom(campaignId: string, roomId: string): Room;
  nextRoomId(campaignId: string, roomId: string): string | null;
  itemFromId(campaignId: string, itemId: string): ItemDefinition;
  itemFromName(campaignId: string, name: string): ItemDefinition;
  getMobProfile(campaignId: string, name: string): MobProfile;
  getCompanionProfile(campaignId: string, companionId: string): CompanionProfile;
  getExits(campaignId: string, roomId: string): Record<string, string>;
  questItemIds(campaignId: string): string[];
  getClassProfile(className: string): ClassProfile;
  getRaceProfile(race: string): RaceProfile | undefined;
  listClassNames(): string[];
  listRaceNames(): string[];
  getSpell(name: string): SpellProfile | undefined;
}
