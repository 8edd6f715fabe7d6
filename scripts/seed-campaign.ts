// Seed Script: Create or replace a campaign from a JSON roster file
// Usage: tsx scripts/seed-campaign.ts [path/to/campaign.json]

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { initDatabase, closeDatabase } from '../src/infrastructure/database/lowdb/connection.js';
import { CampaignRepository } from '../src/infrastructure/database/lowdb/CampaignRepository.js';
import { rosterSchema } from '../src/infrastructure/database/lowdb/schemas.js';
import type { CampaignAggregate } from '../src/domain/campaign/types.js';

const SeedFileSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string().min(1),
  roster: rosterSchema,
});

const defaultFile = fileURLToPath(new URL('./fixtures/sample-campaign.json', import.meta.url));

async function seedCampaign(file: string): Promise<void> {
  console.log(`Reading ${file}...`);
  const seed = SeedFileSchema.parse(JSON.parse(readFileSync(file, 'utf8')));

  const db = await initDatabase({
    path: process.env.DB_PATH || './data/campaigns.json',
  });
  const campaigns = new CampaignRepository(db);

  const campaignId = seed.id ?? uuidv4();
  const existing = await campaigns.load(campaignId);

  const aggregate: CampaignAggregate = {
    campaignId,
    name: seed.name,
    roster: seed.roster,
    activeCombat: null,
    activePlayerChoices: [],
    readAloudText: null,
    sceneImageUri: null,
    narrativeLog: [],
    recentRolls: [],
    version: existing ? existing.version + 1 : 1,
    lastActivityAt: Date.now(),
  };

  await campaigns.save(aggregate);
  await closeDatabase();

  console.log(`${existing ? 'Replaced' : 'Created'} campaign ${campaignId} (${seed.roster.length} characters)`);
}

seedCampaign(process.argv[2] ?? defaultFile).catch((error) => {
  console.error('Seed failed:', error);
  process.exit(1);
});
