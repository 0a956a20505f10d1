// Application layer: Companion creation from campaign profiles

import type { ContentLookup } from '@/domain/content/registry.js';
import type { CompanionProfile } from '@/domain/content/types.js';
import type { Companion } from '@/domain/game/types.js';
import { ContentIntegrityError } from '@/utils/errors.js';

export function createCompanionFromProfile(profile: CompanionProfile): Companion {
  return {
    id: profile.id,
    name: profile.name,
    hp: profile.hp,
    maxHp: profile.maxHp,
    ac: profile.ac,
    attackBonus: profile.attackBonus,
    damage: profile.damage,
    mana: profile.mana,
    maxMana: profile.maxMana,
    learnedSpells: [...profile.spells],
    defendHpThreshold: profile.defendHpThreshold,
  };
}

function defaultCompanionIds(registry: ContentLookup, campaignId: string): string[] {
  const campaign = registry.getCampaign(campaignId);
  if (campaign.defaultCompanionIds.length > 0) {
    return campaign.defaultCompanionIds;
  }
  return Object.keys(campaign.companions).slice(0, 1);
}

export function createCompanion(
  registry: ContentLookup,
  campaignId: string,
  companionId?: string
): Companion {
  const id = companionId ?? defaultCompanionIds(registry, campaignId)[0];
  if (!id) {
    throw new ContentIntegrityError(`Campaign ${campaignId} defines no companions`);
  }
  return createCompanionFromProfile(registry.getCompanionProfile(campaignId, id));
}

/**
 * Builds the party: the listed ids in order, or the campaign's defaults
 */
export function createCampaignCompanions(
  registry: ContentLookup,
  campaignId: string,
  companionIds?: string[]
): Companion[] {
  const ids =
    companionIds && companionIds.length > 0 ? companionIds : defaultCompanionIds(registry, campaignId);
  return ids.map((id) => createCompanion(registry, campaignId, id));
}
