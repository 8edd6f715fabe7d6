// API layer: Tool gateway routes
// POST /api/campaigns/:campaignId/tools/:toolName with the tool arguments as the JSON body

import { Router, type Request, type Response } from 'express';
import { TOOL_NAMES, type ToolExecutor } from '@/application/tools/ToolExecutor.js';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import { STATUS_BY_CODE } from '@/utils/errors.js';

export function createToolRouter(tools: ToolExecutor): Router {
  const router = Router();

  router.get('/:campaignId/tools', (_req: Request, res: Response) => {
    res.json({ success: true, data: { tools: TOOL_NAMES } });
  });

  router.post(
    '/:campaignId/tools/:toolName',
    asyncHandler(async (req: Request, res: Response) => {
      const { campaignId, toolName } = req.params;
      const result = await tools.execute(campaignId, toolName, req.body ?? {});

      if (result.success) {
        res.json(result);
      } else {
        res.status(STATUS_BY_CODE[result.error.code]).json(result);
      }
    })
  );

  return router;
}
