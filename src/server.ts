// Server entry point
// Bootstrap and start the HTTP server

import 'dotenv/config';
import { createApp } from '@/api/app.js';
import { buildAppConfig, validateConfig } from '@/utils/config.js';
import { initDatabaseService, DatabaseService } from '@/infrastructure/database/DatabaseService.js';
import { CampaignCache, defaultCampaignCacheConfig } from '@/infrastructure/cache/CampaignCache.js';
import { SseAudienceHub } from '@/infrastructure/streaming/SseAudienceHub.js';
import { createCampaignServices } from '@/application/createCampaignServices.js';
import { createLogger, enableToolAuditLog } from '@/utils/logger.js';

const logger = createLogger('server');

async function main(): Promise<void> {
  // Build configuration from environment
  const config = buildAppConfig(process.env);

  // Validate configuration
  const errors = validateConfig(config);
  if (errors.length > 0) {
    console.error('Configuration errors:');
    errors.forEach((err) => console.error(`  - ${err}`));
    process.exit(1);
  }

  if (config.logging.toolAuditLog) {
    enableToolAuditLog(config.logging.logDirectory);
  }

  // Initialize database
  console.log('Initializing database...');
  let dbService: DatabaseService;
  try {
    dbService = await initDatabaseService(config.database.path);
    const stats = dbService.getStats();
    console.log(`  Campaigns: ${stats.campaigns.total} (${stats.campaigns.inCombat} in combat)`);
  } catch (error) {
    console.error('Failed to initialize database:', error);
    process.exit(1);
  }

  const cache = new CampaignCache(dbService.campaigns, {
    ...defaultCampaignCacheConfig(),
    maxSize: config.cache.maxSize,
    ttlMs: config.cache.ttlMs,
    enabled: config.cache.enabled,
  });
  const hub = new SseAudienceHub(config.streaming.keepAliveMs);
  const services = createCampaignServices(cache, hub);

  // Log startup info
  console.log('========================================');
  console.log('  Table Relay Starting...');
  console.log('========================================');
  console.log(`  Node Env: ${config.server.nodeEnv}`);
  console.log(`  Port: ${config.server.port}`);
  console.log(`  Database: ${config.database.path}`);
  console.log(`  Tool audit log: ${config.logging.toolAuditLog ? config.logging.logDirectory : 'off'}`);
  console.log('========================================');

  // Create Express app
  const app = createApp(
    { services, store: cache, hub },
    {
      corsOrigins: config.server.corsOrigins,
      trustProxy: config.server.nodeEnv === 'production',
      logFormat: config.server.nodeEnv === 'production' ? 'combined' : 'dev',
    }
  );

  // Start server
  const server = app.listen(config.server.port, config.server.host, () => {
    console.log(`✓ Server running at http://${config.server.host}:${config.server.port}`);
    console.log(`✓ Health check: http://${config.server.host}:${config.server.port}/health`);
    console.log('========================================');
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Starting graceful shutdown...`);
    hub.close();
    cache.stop();
    server.close(() => {
      console.log('✓ Server closed');
      services.router
        .flush()
        .then(() => DatabaseService.close())
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        });
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('✗ Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (err) => {
    console.error('Uncaught Exception:', err);
    shutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason, promise) => {
    console.error('Unhandled Rejection at:', promise, 'reason:', reason);
  });
}

// Run main
main().catch((error) => {
  console.error('Fatal error during startup:', error);
  process.exit(1);
});
