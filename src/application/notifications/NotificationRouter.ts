// Application layer: Notification router
// Maps each event to its audience groups and publishes one message per group.
// Delivery runs on a per-campaign chain so one campaign's events arrive in commit order.

import {
  CATEGORY_AUDIENCES,
  EVENT_CATEGORIES,
  type Audience,
  type AudienceMessage,
  type EventPublisher,
  type GameEvent,
  type HubEventName,
  type NotificationSink,
} from '@/domain/notifications/types.js';
import { createLogger } from '@/utils/logger.js';
import { METRICS, metrics } from '@/utils/metrics.js';

const logger = createLogger('NotificationRouter');

export function resolveAudiences(eventName: HubEventName): readonly Audience[] {
  return CATEGORY_AUDIENCES[EVENT_CATEGORIES[eventName]];
}

export class NotificationRouter implements EventPublisher {
  private chains: Map<string, Promise<void>> = new Map();

  constructor(private sink: NotificationSink) {}

  /**
   * Queue delivery and return immediately. Delivery failures never reach the caller.
   */
  dispatch(event: GameEvent): void {
    const { campaignId } = event;
    const previous = this.chains.get(campaignId) ?? Promise.resolve();

    const next: Promise<void> = previous
      .then(() => this.deliver(event))
      .then(() => {
        if (this.chains.get(campaignId) === next) {
          this.chains.delete(campaignId);
        }
      });
    this.chains.set(campaignId, next);
  }

  /**
   * Resolve once everything queued so far (for one campaign, or all) has been attempted
   */
  async flush(campaignId?: string): Promise<void> {
    if (campaignId !== undefined) {
      let pending = this.chains.get(campaignId);
      while (pending) {
        await pending;
        pending = this.chains.get(campaignId);
      }
      return;
    }

    while (this.chains.size > 0) {
      await Promise.all(this.chains.values());
    }
  }

  pendingCampaigns(): number {
    return this.chains.size;
  }

  private async deliver(event: GameEvent): Promise<void> {
    for (const audience of resolveAudiences(event.name)) {
      const message: AudienceMessage = {
        campaignId: event.campaignId,
        audience,
        sequence: event.sequence,
        occurredAt: event.occurredAt,
        payload: event.payload,
      };

      try {
        await this.sink.publishToAudience(event.campaignId, audience, event.name, message);
        metrics.increment(METRICS.NOTIFICATION_PUBLISHED);
      } catch (error) {
        metrics.increment(METRICS.NOTIFICATION_FAILED);
        logger.error('Failed to publish event', {
          campaignId: event.campaignId,
          event: event.name,
          sequence: event.sequence,
          audience,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
