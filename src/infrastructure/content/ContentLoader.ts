// Infrastructure layer: Content loader
// Reads rules.json and campaigns/*.json and builds the registry

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { ZodError } from 'zod';
import { ContentRegistry } from '@/application/content/ContentRegistry.js';
import type { Campaign, RulesContent } from '@/domain/content/types.js';
import { ContentIntegrityError } from '@/utils/errors.js';
import { campaignSchema, rulesSchema } from './schemas.js';

export const DEFAULT_CONTENT_DIR = fileURLToPath(new URL('../../../content', import.meta.url));

function readJson(file: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ContentIntegrityError(`Cannot read content file ${file}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

function parseWith<T>(file: string, parse: (raw: unknown) => T): T {
  try {
    return parse(readJson(file));
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ContentIntegrityError(`Invalid content file ${file}`, { issues: error.issues });
    }
    throw error;
  }
}

export function loadRules(contentDir: string = DEFAULT_CONTENT_DIR): RulesContent {
  return parseWith(path.join(contentDir, 'rules.json'), (raw) => rulesSchema.parse(raw));
}

export function loadCampaigns(contentDir: string = DEFAULT_CONTENT_DIR): Campaign[] {
  const campaignDir = path.join(contentDir, 'campaigns');
  if (!fs.existsSync(campaignDir)) {
    throw new ContentIntegrityError(`Campaign directory not found: ${campaignDir}`);
  }
  return fs
    .readdirSync(campaignDir)
    .filter((name) => name.endsWith('.json'))
    .sort()
    .map((name) => parseWith(path.join(campaignDir, name), (raw) => campaignSchema.parse(raw)));
}

export function loadContentRegistry(contentDir: string = DEFAULT_CONTENT_DIR): ContentRegistry {
  const rules = loadRules(contentDir);
  const campaigns = loadCampaigns(contentDir);
  console.log(`[ContentLoader] Loaded ${campaigns.length} campaign(s) from ${contentDir}`);
  return new ContentRegistry(campaigns, rules);
}
