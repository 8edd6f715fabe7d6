// Domain layer: Notification events and audience routing table
// NO external dependencies - pure TypeScript

import type { LogEntry, RollRecord } from '@/domain/campaign/types.js';
import type { Character } from '@/domain/character/types.js';
import type { CombatEndReason, CombatStatePayload } from '@/domain/combat/types.js';

/**
 * Audience groups a campaign's viewers belong to.
 * A DM is in `dm` and `all`; a player is in `players` and `all`.
 */
export type Audience = 'dm' | 'players' | 'all';

export const HUB_EVENTS = {
  // Combat lifecycle
  COMBAT_STARTED: 'CombatStarted',
  COMBAT_STATE_UPDATED: 'CombatStateUpdated',
  TURN_ADVANCED: 'TurnAdvanced',
  ROUND_ADVANCED: 'RoundAdvanced',
  COMBAT_ENDED: 'CombatEnded',

  // Character state
  INITIATIVE_SET: 'InitiativeSet',
  CHARACTER_STATE_UPDATED: 'CharacterStateUpdated',

  // Choices
  PLAYER_CHOICES_PRESENTED: 'PlayerChoicesPresented',
  PLAYER_CHOICE_SUBMITTED: 'PlayerChoiceSubmitted',

  // Atmosphere (player screens)
  ATMOSPHERE_PULSE: 'AtmospherePulse',
  NARRATIVE_ANCHOR_UPDATED: 'NarrativeAnchorUpdated',
  GROUP_INSIGHT_TRIGGERED: 'GroupInsightTriggered',

  // DM narration
  READ_ALOUD_TEXT_RECEIVED: 'ReadAloudTextReceived',
  GAME_LOG_UPDATED: 'GameLogUpdated',

  // Shared scene
  SCENE_IMAGE_UPDATED: 'SceneImageUpdated',
  PLAYER_ROLL_LOGGED: 'PlayerRollLogged',
} as const;

export type HubEventName = typeof HUB_EVENTS[keyof typeof HUB_EVENTS];

export type EventCategory =
  | 'combat_lifecycle'
  | 'character_state'
  | 'player_choice'
  | 'dm_choices'
  | 'atmosphere'
  | 'dm_narration'
  | 'shared_scene';

export const EVENT_CATEGORIES: Record<HubEventName, EventCategory> = {
  CombatStarted: 'combat_lifecycle',
  CombatStateUpdated: 'combat_lifecycle',
  TurnAdvanced: 'combat_lifecycle',
  RoundAdvanced: 'combat_lifecycle',
  CombatEnded: 'combat_lifecycle',
  InitiativeSet: 'character_state',
  CharacterStateUpdated: 'character_state',
  PlayerChoiceSubmitted: 'player_choice',
  PlayerChoicesPresented: 'dm_choices',
  AtmospherePulse: 'atmosphere',
  NarrativeAnchorUpdated: 'atmosphere',
  GroupInsightTriggered: 'atmosphere',
  ReadAloudTextReceived: 'dm_narration',
  GameLogUpdated: 'dm_narration',
  SceneImageUpdated: 'shared_scene',
  PlayerRollLogged: 'shared_scene',
};

/**
 * The routing contract: which groups see which category
 */
export const CATEGORY_AUDIENCES: Record<EventCategory, readonly Audience[]> = {
  combat_lifecycle: ['all'],
  character_state: ['all'],
  player_choice: ['dm'],
  dm_choices: ['players'],
  atmosphere: ['players'],
  dm_narration: ['dm'],
  shared_scene: ['all'],
};

// ========== Payloads ==========

/**
 * New state of everything a mutation touched. Receivers replace characters by id
 * and the combat state wholesale, so applying the same slice twice is harmless.
 */
export interface CampaignSlice {
  combat: CombatStatePayload | null;
  characters: Character[];
}

export interface CombatEndedPayload extends CampaignSlice {
  reason: CombatEndReason;
}

export interface PlayerChoicesPayload {
  choices: string[];
}

export interface PlayerChoicePayload {
  characterId: string;
  characterName: string;
  choice: string;
  timestamp: number;
}

export interface AtmospherePulsePayload {
  text: string;
  intensity?: 'Low' | 'Medium' | 'High';
  sensoryType?: 'Sound' | 'Smell' | 'Visual' | 'Feeling';
}

export interface NarrativeAnchorPayload {
  shortText: string;
  moodCategory?: 'Danger' | 'Mystery' | 'Safety' | 'Urgency';
}

export interface GroupInsightPayload {
  text: string;
  relevantSkill: string;
  highlightEffect: boolean;
}

export interface ReadAloudTextPayload {
  text: string;
}

export interface SceneImagePayload {
  imageUri: string;
  description: string;
}

export interface EventPayloads {
  CombatStarted: CampaignSlice;
  CombatStateUpdated: CampaignSlice;
  TurnAdvanced: CampaignSlice;
  RoundAdvanced: CampaignSlice;
  CombatEnded: CombatEndedPayload;
  InitiativeSet: CampaignSlice;
  CharacterStateUpdated: CampaignSlice;
  PlayerChoicesPresented: PlayerChoicesPayload;
  PlayerChoiceSubmitted: PlayerChoicePayload;
  AtmospherePulse: AtmospherePulsePayload;
  NarrativeAnchorUpdated: NarrativeAnchorPayload;
  GroupInsightTriggered: GroupInsightPayload;
  ReadAloudTextReceived: ReadAloudTextPayload;
  GameLogUpdated: LogEntry;
  SceneImageUpdated: SceneImagePayload;
  PlayerRollLogged: RollRecord;
}

export interface EventEnvelope<K extends HubEventName> {
  name: K;
  campaignId: string;
  /** Aggregate version after the mutation; orders events within one campaign */
  sequence: number;
  occurredAt: number;
  payload: EventPayloads[K];
}

export type GameEvent = { [K in HubEventName]: EventEnvelope<K> }[HubEventName];

/**
 * Body handed to the transport for one audience group
 */
export interface AudienceMessage {
  campaignId: string;
  audience: Audience;
  sequence: number;
  occurredAt: number;
  payload: GameEvent['payload'];
}

/**
 * Transport boundary. Implementations push one message to every viewer in the group.
 */
export interface NotificationSink {
  publishToAudience(
    campaignId: string,
    audience: Audience,
    eventName: HubEventName,
    message: AudienceMessage
  ): Promise<void>;
}

/**
 * An event before the mutator stamps campaign and sequence on it
 */
export type PendingEvent = { [K in HubEventName]: { name: K; payload: EventPayloads[K] } }[HubEventName];

/**
 * Hand-off from the mutation path to delivery. Must not throw or block.
 */
export interface EventPublisher {
  dispatch(event: GameEvent): void;
}
