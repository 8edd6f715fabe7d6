// API layer: SSE streaming endpoint
// Viewers subscribe to one campaign as DM or player and receive the events routed to their groups

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { CampaignStore } from '@/domain/campaign/types.js';
import type { SseAudienceHub } from '@/infrastructure/streaming/SseAudienceHub.js';
import { asyncHandler, createError } from '@/api/middleware/errorHandler.js';

const SubscribeQuerySchema = z.object({
  role: z.enum(['dm', 'player']).default('player'),
});

export function createStreamingRouter(hub: SseAudienceHub, store: CampaignStore): Router {
  const router = Router();

  router.get(
    '/campaigns/:campaignId',
    asyncHandler(async (req: Request, res: Response) => {
      const { campaignId } = req.params;
      const query = SubscribeQuerySchema.safeParse(req.query);
      if (!query.success) {
        throw createError('role must be "dm" or "player"', 400, 'VALIDATION_ERROR');
      }

      const campaign = await store.load(campaignId);
      if (!campaign) {
        throw createError(`Campaign ${campaignId} not found`, 404, 'NOT_FOUND');
      }

      // Set SSE headers
      res.setHeader('Content-Type', 'text/event-stream');
      res.setHeader('Cache-Control', 'no-cache');
      res.setHeader('Connection', 'keep-alive');
      res.setHeader('X-Accel-Buffering', 'no'); // Disable nginx buffering
      res.flushHeaders();

      const unsubscribe = hub.subscribe(campaignId, query.data.role, res);

      // Clean up on client disconnect
      req.on('close', unsubscribe);
    })
  );

  return router;
}
