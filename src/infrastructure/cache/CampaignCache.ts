// Infrastructure: Campaign Cache
// Write-through LRU cache of committed campaign aggregates in front of the repository

import type { CampaignAggregate, CampaignStore } from '@/domain/campaign/types.js';
import { createLogger } from '@/utils/logger.js';

const logger = createLogger('CampaignCache');

export interface CampaignCacheConfig {
  maxSize: number;           // Max cached campaigns (default: 200)
  ttlMs: number;             // Cache entry TTL (default: 5 minutes)
  cleanupIntervalMs: number; // Cleanup interval (default: 1 minute)
  enabled: boolean;
}

interface CachedCampaign {
  aggregate: CampaignAggregate;
  cachedAt: number;          // Timestamp for TTL
}

/**
 * CampaignCache - a CampaignStore that remembers what it loaded and saved.
 *
 * The map is kept in recency order: every hit or write moves the entry to the
 * end, so the first key is the least recently used.
 *
 * Entries only ever hold committed state: `save` writes through to the
 * underlying store first and caches only after that succeeds. Returned
 * aggregates are shared; mutate a clone.
 */
export class CampaignCache implements CampaignStore {
  private cache: Map<string, CachedCampaign> = new Map();
  private cleanupTimer: NodeJS.Timeout | null = null;
  private hits = 0;
  private misses = 0;

  constructor(
    private store: CampaignStore,
    private config: CampaignCacheConfig
  ) {
    if (this.config.enabled) {
      this.startCleanup();
    }
  }

  async load(campaignId: string): Promise<CampaignAggregate | null> {
    if (!this.config.enabled) {
      return this.store.load(campaignId);
    }

    const cached = this.cache.get(campaignId);
    if (cached) {
      if (Date.now() - cached.cachedAt <= this.config.ttlMs) {
        this.touch(campaignId, cached);
        this.hits++;
        return cached.aggregate;
      }
      this.cache.delete(campaignId);
      logger.debug('Cache entry expired', { campaignId });
    }

    this.misses++;
    const aggregate = await this.store.load(campaignId);
    if (aggregate) {
      this.remember(aggregate);
    }
    return aggregate;
  }

  async save(aggregate: CampaignAggregate): Promise<void> {
    await this.store.save(aggregate);
    if (this.config.enabled) {
      this.remember(structuredClone(aggregate));
    }
  }

  getStats(): { size: number; maxSize: number; hitRate: number } {
    const lookups = this.hits + this.misses;
    return {
      size: this.cache.size,
      maxSize: this.config.maxSize,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  /**
   * Stop the cleanup timer
   */
  stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  // ==================== Private Methods ====================

  private remember(aggregate: CampaignAggregate): void {
    const existing = this.cache.has(aggregate.campaignId);
    if (!existing && this.cache.size >= this.config.maxSize) {
      this.evictLeastRecent();
    }
    this.touch(aggregate.campaignId, { aggregate, cachedAt: Date.now() });
  }

  private touch(campaignId: string, entry: CachedCampaign): void {
    this.cache.delete(campaignId);
    this.cache.set(campaignId, entry);
  }

  private evictLeastRecent(): void {
    for (const key of this.cache.keys()) {
      this.cache.delete(key);
      logger.debug('Evicted least recently used campaign', { campaignId: key });
      return;
    }
  }

  private startCleanup(): void {
    this.cleanupTimer = setInterval(() => {
      this.cleanup();
    }, this.config.cleanupIntervalMs);
    // Never keep the process alive just for cache upkeep
    this.cleanupTimer.unref();
  }

  private cleanup(): void {
    const now = Date.now();
    let cleaned = 0;

    for (const [key, value] of this.cache.entries()) {
      if (now - value.cachedAt > this.config.ttlMs) {
        this.cache.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug('Cleaned expired cache entries', { count: cleaned });
    }
  }
}

export function defaultCampaignCacheConfig(): CampaignCacheConfig {
  return {
    maxSize: 200,
    ttlMs: 5 * 60 * 1000,
    cleanupIntervalMs: 60 * 1000,
    enabled: true,
  };
}
