// Application layer: Composition root for the campaign services

import type { CampaignStore } from '@/domain/campaign/types.js';
import type { NotificationSink } from '@/domain/notifications/types.js';
import { CampaignLock } from './campaign/CampaignLock.js';
import { CampaignMutator } from './campaign/CampaignMutator.js';
import { CombatCoordinator } from './combat/CombatCoordinator.js';
import { NarrativeService } from './narrative/NarrativeService.js';
import { NotificationRouter } from './notifications/NotificationRouter.js';
import { ToolExecutor } from './tools/ToolExecutor.js';

export interface CampaignServices {
  lock: CampaignLock;
  router: NotificationRouter;
  mutator: CampaignMutator;
  coordinator: CombatCoordinator;
  narrative: NarrativeService;
  tools: ToolExecutor;
}

export function createCampaignServices(store: CampaignStore, sink: NotificationSink): CampaignServices {
  const lock = new CampaignLock();
  const router = new NotificationRouter(sink);
  const mutator = new CampaignMutator(store, router, lock);
  const coordinator = new CombatCoordinator(mutator);
  const narrative = new NarrativeService(mutator);
  const tools = new ToolExecutor(coordinator, narrative);

  return { lock, router, mutator, coordinator, narrative, tools };
}
