// API layer: Campaign routes
// Read-only listing of the content registry

import { Router, type Request, type Response } from 'express';
import type { ContentLookup } from '@/domain/content/registry.js';

export function createCampaignRouter(registry: ContentLookup): Router {
  const router = Router();

  // Campaigns with their companions, plus the classes and races a new character can take
  router.get('/', (_req: Request, res: Response) => {
    const campaigns = registry.listCampaigns().map((campaign) => ({
      id: campaign.id,
      name: campaign.name,
      description: campaign.description,
      companions: Object.values(campaign.companions).map((c) => ({ id: c.id, name: c.name })),
      defaultCompanionIds: [...campaign.defaultCompanionIds],
    }));

    res.json({
      success: true,
      count: campaigns.length,
      campaigns,
      classes: registry.listClassNames(),
      races: registry.listRaceNames(),
    });
  });

  return router;
}
