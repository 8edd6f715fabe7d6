// API layer: Express app configuration
// Composes all middleware and routes

import express, { type Application, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { CampaignServices } from '@/application/createCampaignServices.js';
import type { CampaignCache } from '@/infrastructure/cache/CampaignCache.js';
import type { SseAudienceHub } from '@/infrastructure/streaming/SseAudienceHub.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createToolRouter } from './routes/tools.js';
import { createCampaignRouter } from './routes/campaigns.js';
import { createStreamingRouter } from './routes/streaming.js';
import { metrics } from '@/utils/metrics.js';

export interface AppConfig {
  corsOrigins: string[];
  trustProxy: boolean;
  logFormat: string;
}

export interface AppDependencies {
  services: CampaignServices;
  store: CampaignCache;
  hub: SseAudienceHub;
}

export function createApp(deps: AppDependencies, config: Partial<AppConfig> = {}): Application {
  const app = express();

  const {
    corsOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000'],
    trustProxy = false,
    logFormat = process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
  } = config;

  // Trust proxy (for proper client IP behind reverse proxy)
  if (trustProxy) {
    app.set('trust proxy', 1);
  }

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for API-only server
  }));

  // CORS
  app.use(cors({
    origin: corsOrigins,
    credentials: true,
  }));

  // Logging
  if (process.env.NODE_ENV !== 'test') {
    app.use(morgan(logFormat));
  }

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Health check (before routes)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      viewers: deps.hub.totalConnections(),
      pendingDeliveries: deps.services.router.pendingCampaigns(),
      busyCampaigns: deps.services.lock.activeCampaigns,
      cache: deps.store.getStats(),
      metrics: metrics.getAll(),
    });
  });

  // API routes
  app.use('/api/campaigns', createToolRouter(deps.services.tools));
  app.use('/api/campaigns', createCampaignRouter(deps.services.coordinator, deps.hub));
  app.use('/api/stream', createStreamingRouter(deps.hub, deps.store));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
      },
    });
  });

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
