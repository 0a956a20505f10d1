import { describe, expect, it } from 'vitest';
import { registry } from '@/__tests__/helpers.js';
import { loadCampaigns, loadRules } from '@/infrastructure/content/ContentLoader.js';
import { ContentIntegrityError } from '@/utils/errors.js';
import { ContentRegistry } from './ContentRegistry.js';

describe('ContentRegistry', () => {
  it('loads every campaign file in name order', () => {
    expect(registry.listCampaigns().map((campaign) => campaign.id)).toEqual(['lost_crypt', 'ruined_watchtower']);
  });

  it('walks the room order', () => {
    expect(registry.nextRoomId('ruined_watchtower', 'courtyard')).toBe('cellar');
    expect(registry.nextRoomId('ruined_watchtower', 'spire')).toBeNull();
  });

  it('hands out independent item copies', () => {
    const first = registry.itemFromId('ruined_watchtower', 'leather_cap');
    first.name = 'Dented Cap';
    expect(registry.itemFromId('ruined_watchtower', 'leather_cap').name).toBe('Leather Cap');
  });

  it('turns an unknown item into a placeholder that still takes space', () => {
    expect(registry.itemFromName('ruined_watchtower', 'Rusty Key')).toEqual({
      id: 'unknown',
      name: 'Rusty Key',
      kind: 'unknown',
      countsTowardLimit: true,
      effect: null,
    });
  });

  it('knows which items are quest rewards', () => {
    expect(registry.questItemIds('ruined_watchtower')).toEqual(['silver_locket']);
  });

  it('treats unknown ids as content bugs', () => {
    expect(() => registry.getCampaign('atlantis')).toThrow(ContentIntegrityError);
    expect(() => registry.getRoom('ruined_watchtower', 'dungeon')).toThrow(
      'Unknown room dungeon in campaign ruined_watchtower'
    );
    expect(() => registry.getClassProfile('Bard')).toThrow('Unknown class: Bard');
    expect(registry.getRaceProfile('Orc')).toBeUndefined();
  });

  it('refuses a campaign whose exits lead nowhere', () => {
    const [campaign] = loadCampaigns().filter((c) => c.id === 'ruined_watchtower');
    const broken = { ...campaign, exits: { ...campaign.exits, spire: { down: 'moat' } } };
    expect(() => new ContentRegistry([broken], loadRules())).toThrow(
      'Campaign ruined_watchtower: exit from spire leads to unknown room moat'
    );
  });

  it('refuses duplicate campaign ids', () => {
    const campaigns = loadCampaigns();
    expect(() => new ContentRegistry([...campaigns, campaigns[0]], loadRules())).toThrow(
      'Duplicate campaign id: lost_crypt'
    );
  });
});
