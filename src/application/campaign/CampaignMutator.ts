// Application layer: Campaign mutation pipeline
// lock -> load -> apply to a draft -> save -> emit. Nothing is visible until the save succeeds.

import type { CampaignAggregate, CampaignStore } from '@/domain/campaign/types.js';
import type { EventPublisher, GameEvent, PendingEvent } from '@/domain/notifications/types.js';
import { CampaignLock } from './CampaignLock.js';
import { NotFoundError, PersistenceError, isCampaignError } from '@/utils/errors.js';
import { createLogger } from '@/utils/logger.js';
import { METRICS, metrics } from '@/utils/metrics.js';

const logger = createLogger('CampaignMutator');

export interface MutationPlan<T> {
  result: T;
  event: PendingEvent;
}

/**
 * Applies a change to `draft` in place. Throwing aborts the mutation with no
 * write and no event.
 */
export type Mutation<T> = (draft: CampaignAggregate) => MutationPlan<T>;

export interface MutationOutcome<T> {
  result: T;
  event: GameEvent;
  aggregate: CampaignAggregate;
}

export class CampaignMutator {
  constructor(
    private store: CampaignStore,
    private publisher: EventPublisher,
    private lock: CampaignLock = new CampaignLock()
  ) {}

  /**
   * Run one mutation as a unit. Every committed mutation bumps the aggregate
   * version by one and emits exactly one event carrying that version.
   */
  mutate<T>(campaignId: string, operation: string, mutation: Mutation<T>): Promise<MutationOutcome<T>> {
    return this.lock.run(campaignId, async () => {
      const current = await this.requireCampaign(campaignId);
      const draft = structuredClone(current);

      let plan: MutationPlan<T>;
      try {
        plan = mutation(draft);
        draft.version = current.version + 1;
        draft.lastActivityAt = Date.now();
        await this.store.save(draft);
      } catch (error) {
        metrics.increment(METRICS.MUTATION_FAILED);
        logger.warn('Mutation rejected', {
          campaignId,
          operation,
          error: error instanceof Error ? error.message : String(error),
          code: isCampaignError(error) ? error.code : null,
        });
        if (isCampaignError(error)) throw error;
        throw new PersistenceError(`Failed to apply ${operation} to campaign ${campaignId}`, error);
      }

      metrics.increment(METRICS.MUTATION_COMMITTED);
      const event = stampEvent(plan.event, campaignId, draft.version);
      logger.debug('Mutation committed', {
        campaignId,
        operation,
        version: draft.version,
        event: event.name,
      });

      this.publisher.dispatch(event);
      return { result: plan.result, event, aggregate: draft };
    });
  }

  /**
   * Consistent read, ordered with the campaign's mutations. Returns a private copy.
   */
  read(campaignId: string): Promise<CampaignAggregate> {
    return this.lock.run(campaignId, async () => structuredClone(await this.requireCampaign(campaignId)));
  }

  private async requireCampaign(campaignId: string): Promise<CampaignAggregate> {
    const aggregate = await this.store.load(campaignId);
    if (!aggregate) {
      throw new NotFoundError(`Campaign ${campaignId} not found`, { campaignId });
    }
    return aggregate;
  }
}

function stampEvent(pending: PendingEvent, campaignId: string, sequence: number): GameEvent {
  return { ...pending, campaignId, sequence, occurredAt: Date.now() };
}
