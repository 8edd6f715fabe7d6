// Domain layer: Campaign aggregate
// The unit of consistency: roster + optional encounter, saved and loaded as one

import type { Character } from '@/domain/character/types.js';
import type { CombatEncounter } from '@/domain/combat/types.js';

export type LogImportance = 'minor' | 'standard' | 'critical';

export interface LogEntry {
  id: string;
  timestamp: number;
  entry: string;
  importance: LogImportance;
}

export interface RollRecord {
  id: string;
  characterId: string;
  /** Denormalized for display */
  characterName: string;
  checkType: string;
  result: number;
  outcome: string;
  timestamp: number;
}

/** Only the newest rolls are kept on the aggregate */
export const MAX_RECENT_ROLLS = 10;

export interface CampaignAggregate {
  campaignId: string;
  name: string;
  roster: Character[];
  activeCombat: CombatEncounter | null;
  activePlayerChoices: string[];
  /** Boxed text on the DM screen, read to the table */
  readAloudText: string | null;
  sceneImageUri: string | null;
  narrativeLog: LogEntry[];
  /** Newest first */
  recentRolls: RollRecord[];
  /** Incremented once per committed mutation; stamped on emitted events */
  version: number;
  lastActivityAt: number;
}

/**
 * Persistence boundary. `save` writes the whole aggregate or fails as a whole.
 */
export interface CampaignStore {
  load(campaignId: string): Promise<CampaignAggregate | null>;
  save(aggregate: CampaignAggregate): Promise<void>;
}
