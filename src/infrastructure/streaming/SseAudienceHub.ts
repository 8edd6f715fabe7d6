// Infrastructure: Server-Sent Events audience hub
// Tracks open SSE connections per campaign and audience group; implements NotificationSink.

import type { Audience, AudienceMessage, HubEventName, NotificationSink } from '@/domain/notifications/types.js';
import { createLogger } from '@/utils/logger.js';

const logger = createLogger('SseAudienceHub');

export type ViewerRole = 'dm' | 'player';

/**
 * The slice of an HTTP response the hub writes to. Express responses fit.
 */
export interface SseStream {
  write(chunk: string): boolean;
  end(): unknown;
  readonly writableEnded: boolean;
}

interface Connection {
  id: number;
  campaignId: string;
  role: ViewerRole;
  stream: SseStream;
  keepAlive: NodeJS.Timeout;
}

export function audiencesForRole(role: ViewerRole): Audience[] {
  return role === 'dm' ? ['dm', 'all'] : ['players', 'all'];
}

export function formatSseMessage(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export class SseAudienceHub implements NotificationSink {
  private groups: Map<string, Set<Connection>> = new Map();
  private nextId = 1;

  constructor(private keepAliveMs = 30000) {}

  /**
   * Register a viewer. Returns the function that unregisters it.
   */
  subscribe(campaignId: string, role: ViewerRole, stream: SseStream): () => void {
    const connection: Connection = {
      id: this.nextId++,
      campaignId,
      role,
      stream,
      keepAlive: setInterval(() => {
        if (stream.writableEnded) {
          this.remove(connection);
          return;
        }
        stream.write(': keepalive\n\n');
      }, this.keepAliveMs),
    };
    connection.keepAlive.unref();

    for (const audience of audiencesForRole(role)) {
      const key = groupKey(campaignId, audience);
      let group = this.groups.get(key);
      if (!group) {
        group = new Set();
        this.groups.set(key, group);
      }
      group.add(connection);
    }

    stream.write(formatSseMessage('connected', { campaignId, role }));
    logger.debug('Viewer connected', { campaignId, role, connectionId: connection.id });

    return () => this.remove(connection);
  }

  async publishToAudience(
    campaignId: string,
    audience: Audience,
    eventName: HubEventName,
    message: AudienceMessage
  ): Promise<void> {
    const group = this.groups.get(groupKey(campaignId, audience));
    if (!group || group.size === 0) {
      logger.debug('No viewers for audience', { campaignId, audience, event: eventName });
      return;
    }

    const frame = formatSseMessage(eventName, message);
    for (const connection of [...group]) {
      if (connection.stream.writableEnded) {
        this.remove(connection);
        continue;
      }
      try {
        connection.stream.write(frame);
      } catch (error) {
        logger.warn('Dropping broken viewer stream', {
          campaignId,
          connectionId: connection.id,
          error: error instanceof Error ? error.message : String(error),
        });
        this.remove(connection);
      }
    }
  }

  viewerCount(campaignId: string, audience: Audience = 'all'): number {
    return this.groups.get(groupKey(campaignId, audience))?.size ?? 0;
  }

  totalConnections(): number {
    const unique = new Set<number>();
    for (const group of this.groups.values()) {
      for (const connection of group) unique.add(connection.id);
    }
    return unique.size;
  }

  /**
   * End every open stream (graceful shutdown)
   */
  close(): void {
    const all = new Set<Connection>();
    for (const group of this.groups.values()) {
      for (const connection of group) all.add(connection);
    }
    for (const connection of all) {
      this.remove(connection);
      if (!connection.stream.writableEnded) {
        connection.stream.end();
      }
    }
  }

  private remove(connection: Connection): void {
    clearInterval(connection.keepAlive);
    for (const audience of audiencesForRole(connection.role)) {
      const key = groupKey(connection.campaignId, audience);
      const group = this.groups.get(key);
      if (!group) continue;
      group.delete(connection);
      if (group.size === 0) {
        this.groups.delete(key);
      }
    }
  }
}

function groupKey(campaignId: string, audience: Audience): string {
  return `${campaignId}:${audience}`;
}
