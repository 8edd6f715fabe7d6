// API layer: Campaign state routes

import { Router, type Request, type Response } from 'express';
import type { CombatCoordinator } from '@/application/combat/CombatCoordinator.js';
import type { SseAudienceHub } from '@/infrastructure/streaming/SseAudienceHub.js';
import { asyncHandler } from '@/api/middleware/errorHandler.js';

export function createCampaignRouter(coordinator: CombatCoordinator, hub: SseAudienceHub): Router {
  const router = Router();

  // Full snapshot, for viewers (re)joining mid-session
  router.get(
    '/:campaignId/state',
    asyncHandler(async (req: Request, res: Response) => {
      const { campaignId } = req.params;
      const state = await coordinator.getState(campaignId);
      res.json({
        success: true,
        data: {
          ...state,
          viewers: { dm: hub.viewerCount(campaignId, 'dm'), players: hub.viewerCount(campaignId, 'players') },
        },
      });
    })
  );

  return router;
}
