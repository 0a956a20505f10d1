// Application layer: Content registry
// Immutable lookup tables over campaigns and shared rules data

import type { ContentLookup } from '@/domain/content/registry.js';
import type {
  Campaign,
  ClassProfile,
  CompanionProfile,
  ItemDefinition,
  MobProfile,
  RaceProfile,
  Room,
  RulesContent,
  SpellProfile,
} from '@/domain/content/types.js';
import { ContentIntegrityError } from '@/utils/errors.js';

export class ContentRegistry implements ContentLookup {
  private readonly campaigns = new Map<string, Campaign>();

  constructor(
    campaigns: Campaign[],
    private readonly rules: RulesContent
  ) {
    for (const campaign of campaigns) {
      if (this.campaigns.has(campaign.id)) {
        throw new ContentIntegrityError(`Duplicate campaign id: ${campaign.id}`);
      }
      this.verifyCampaign(campaign);
      this.campaigns.set(campaign.id, campaign);
    }
    for (const profile of Object.values(rules.classes)) {
      for (const spell of [...profile.spells, ...profile.learnableSpells]) {
        if (!rules.spells[spell]) {
          throw new ContentIntegrityError(`Class ${profile.name} references unknown spell ${spell}`);
        }
      }
    }
  }

  getCampaign(campaignId: string): Campaign {
    const campaign = this.campaigns.get(campaignId);
    if (!campaign) {
      throw new ContentIntegrityError(`Unknown campaign: ${campaignId}`, { campaignId });
    }
    return campaign;
  }

  listCampaigns(): Campaign[] {
    return [...this.campaigns.values()];
  }

  getRoom(campaignId: string, roomId: string): Room {
    const room = this.getCampaign(campaignId).rooms[roomId];
    if (!room) {
      throw new ContentIntegrityError(`Unknown room ${roomId} in campaign ${campaignId}`, {
        campaignId,
        roomId,
      });
    }
    return room;
  }

  nextRoomId(campaignId: string, roomId: string): string | null {
    const order = this.getCampaign(campaignId).roomOrder;
    const idx = order.indexOf(roomId);
    if (idx < 0 || idx + 1 >= order.length) {
      return null;
    }
    return order[idx + 1];
  }

  itemFromId(campaignId: string, itemId: string): ItemDefinition {
    const item = this.getCampaign(campaignId).items[itemId];
    return item ? structuredClone(item) : unknownItem(itemId);
  }

  itemFromName(campaignId: string, name: string): ItemDefinition {
    const needle = name.toLowerCase();
    const item = Object.values(this.getCampaign(campaignId).items).find(
      (candidate) => candidate.name.toLowerCase() === needle
    );
    return item ? structuredClone(item) : unknownItem(name);
  }

  getMobProfile(campaignId: string, name: string): MobProfile {
    const mob = this.getCampaign(campaignId).mobs[name];
    if (!mob) {
      throw new ContentIntegrityError(`Unknown mob ${name} in campaign ${campaignId}`);
    }
    return mob;
  }

  getCompanionProfile(campaignId: string, companionId: string): CompanionProfile {
    const profile = this.getCampaign(campaignId).companions[companionId];
    if (!profile) {
      throw new ContentIntegrityError(`Unknown companion ${companionId} in campaign ${campaignId}`);
    }
    return profile;
  }

  getExits(campaignId: string, roomId: string): Record<string, string> {
    return { ...(this.getCampaign(campaignId).exits[roomId] ?? {}) };
  }

  questItemIds(campaignId: string): string[] {
    return Object.entries(this.getCampaign(campaignId).items)
      .filter(([, item]) => item.kind === 'quest')
      .map(([id]) => id);
  }

  getClassProfile(className: string): ClassProfile {
    const profile = this.rules.classes[className];
    if (!profile) {
      throw new ContentIntegrityError(`Unknown class: ${className}`);
    }
    return profile;
  }

  getRaceProfile(race: string): RaceProfile | undefined {
    return this.rules.races[race];
  }

  listClassNames(): string[] {
    return Object.keys(this.rules.classes);
  }

  listRaceNames(): string[] {
    return Object.keys(this.rules.races);
  }

  getSpell(name: string): SpellProfile | undefined {
    return this.rules.spells[name];
  }

  private verifyCampaign(campaign: Campaign): void {
    const fail = (message: string): never => {
      throw new ContentIntegrityError(`Campaign ${campaign.id}: ${message}`);
    };

    for (const roomId of campaign.roomOrder) {
      if (!campaign.rooms[roomId]) fail(`room order lists unknown room ${roomId}`);
    }
    for (const [roomId, room] of Object.entries(campaign.rooms)) {
      if (room.id !== roomId) fail(`room key ${roomId} does not match id ${room.id}`);
      if (room.kind === 'combat' && !campaign.mobs[room.enemy]) {
        fail(`room ${roomId} references unknown mob ${room.enemy}`);
      }
      if (room.kind === 'loot' && room.loot.winItemId && !campaign.items[room.loot.winItemId]) {
        fail(`room ${roomId} references unknown item ${room.loot.winItemId}`);
      }
    }
    for (const [roomId, exits] of Object.entries(campaign.exits)) {
      if (!campaign.rooms[roomId]) fail(`exits listed for unknown room ${roomId}`);
      for (const destination of Object.values(exits)) {
        if (!campaign.rooms[destination]) fail(`exit from ${roomId} leads to unknown room ${destination}`);
      }
    }
    for (const mob of Object.values(campaign.mobs)) {
      for (const itemId of mob.loot.items) {
        if (!campaign.items[itemId]) fail(`mob ${mob.name} drops unknown item ${itemId}`);
      }
    }
    for (const companionId of campaign.defaultCompanionIds) {
      if (!campaign.companions[companionId]) fail(`unknown default companion ${companionId}`);
    }
  }
}

function unknownItem(name: string): ItemDefinition {
  return { id: 'unknown', name, kind: 'unknown', countsTowardLimit: true, effect: null };
}
