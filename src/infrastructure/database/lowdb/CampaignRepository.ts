// Infrastructure layer: Campaign repository using LowDB
// Whole-aggregate persistence. JSON columns are encoded and decoded here and nowhere else.

import type { CampaignAggregate, CampaignStore } from '@/domain/campaign/types.js';
import { PersistenceError } from '@/utils/errors.js';
import type { CampaignRecord, DatabaseConnection } from './connection.js';
import {
  choicesSchema,
  decodeColumn,
  encounterSchema,
  narrativeLogSchema,
  recentRollsSchema,
  rosterSchema,
} from './schemas.js';

/**
 * Repository for campaign aggregates
 */
export class CampaignRepository implements CampaignStore {
  constructor(private db: DatabaseConnection) {}

  async load(campaignId: string): Promise<CampaignAggregate | null> {
    const record = this.db.getData().campaigns.find((c) => c.id === campaignId);
    if (!record) {
      return null;
    }

    try {
      return toAggregate(record);
    } catch (error) {
      throw new PersistenceError(`Stored campaign ${campaignId} could not be decoded`, error);
    }
  }

  /**
   * Upsert the whole aggregate and flush once. A failed flush restores the
   * previous record so nothing half-written is served afterwards.
   */
  async save(aggregate: CampaignAggregate): Promise<void> {
    const data = this.db.getData();
    const index = data.campaigns.findIndex((c) => c.id === aggregate.campaignId);
    const previous = index >= 0 ? data.campaigns[index] : undefined;

    const now = new Date().toISOString();
    const record = toRecord(aggregate, previous?.created_at ?? now, now);

    if (previous) {
      data.campaigns[index] = record;
    } else {
      data.campaigns.push(record);
    }

    try {
      await this.db.write();
    } catch (error) {
      if (previous) {
        data.campaigns[index] = previous;
      } else {
        data.campaigns = data.campaigns.filter((c) => c !== record);
      }
      throw new PersistenceError(`Failed to save campaign ${aggregate.campaignId}`, error);
    }
  }

  getStats() {
    const campaigns = this.db.getData().campaigns;
    return {
      total: campaigns.length,
      inCombat: campaigns.filter((c) => c.active_combat !== null).length,
    };
  }
}

function toRecord(aggregate: CampaignAggregate, createdAt: string, updatedAt: string): CampaignRecord {
  return {
    id: aggregate.campaignId,
    name: aggregate.name,
    roster: JSON.stringify(aggregate.roster),
    active_combat: aggregate.activeCombat ? JSON.stringify(aggregate.activeCombat) : null,
    active_player_choices: JSON.stringify(aggregate.activePlayerChoices),
    read_aloud_text: aggregate.readAloudText,
    scene_image_uri: aggregate.sceneImageUri,
    narrative_log: JSON.stringify(aggregate.narrativeLog),
    recent_rolls: JSON.stringify(aggregate.recentRolls),
    version: aggregate.version,
    last_activity_at: new Date(aggregate.lastActivityAt).toISOString(),
    created_at: createdAt,
    updated_at: updatedAt,
  };
}

function toAggregate(record: CampaignRecord): CampaignAggregate {
  return {
    campaignId: record.id,
    name: record.name,
    roster: decodeColumn(record.roster, rosterSchema),
    activeCombat: record.active_combat ? decodeColumn(record.active_combat, encounterSchema) : null,
    activePlayerChoices: decodeColumn(record.active_player_choices || '[]', choicesSchema),
    readAloudText: record.read_aloud_text ?? null,
    sceneImageUri: record.scene_image_uri ?? null,
    narrativeLog: decodeColumn(record.narrative_log || '[]', narrativeLogSchema),
    recentRolls: decodeColumn(record.recent_rolls || '[]', recentRollsSchema),
    version: record.version,
    lastActivityAt: Date.parse(record.last_activity_at),
  };
}
