// Application layer: Narrative cues and player choices
// Events here carry their own payloads rather than a campaign slice.

import { v4 as uuidv4 } from 'uuid';
import type { CampaignAggregate, LogEntry, LogImportance, RollRecord } from '@/domain/campaign/types.js';
import { MAX_RECENT_ROLLS } from '@/domain/campaign/types.js';
import type {
  AtmospherePulsePayload,
  GroupInsightPayload,
  NarrativeAnchorPayload,
  PlayerChoicePayload,
  ReadAloudTextPayload,
  SceneImagePayload,
} from '@/domain/notifications/types.js';
import { HUB_EVENTS } from '@/domain/notifications/types.js';
import type { CampaignMutator, MutationOutcome } from '@/application/campaign/CampaignMutator.js';
import { resolveCharacter } from '@/application/campaign/resolveCharacter.js';
import { ValidationError } from '@/utils/errors.js';
import { createLogger } from '@/utils/logger.js';

const logger = createLogger('NarrativeService');

const SCENE_PLACEHOLDERS = 10;

export interface PlayerRoll {
  characterRef: string;
  checkType: string;
  result: number;
  outcome: string;
}

export class NarrativeService {
  constructor(private mutator: CampaignMutator) {}

  /**
   * Replace the choice buttons shown on player screens. An empty list clears them.
   */
  presentPlayerChoices(campaignId: string, choices: string[]): Promise<MutationOutcome<{ choices: string[] }>> {
    return this.mutator.mutate(campaignId, 'present_player_choices', (draft) => {
      const cleaned = choices.map((c) => c.trim()).filter((c) => c.length > 0);
      draft.activePlayerChoices = cleaned;
      return {
        result: { choices: cleaned },
        event: { name: HUB_EVENTS.PLAYER_CHOICES_PRESENTED, payload: { choices: cleaned } },
      };
    });
  }

  submitPlayerChoice(
    campaignId: string,
    characterRef: string,
    choice: string
  ): Promise<MutationOutcome<PlayerChoicePayload>> {
    return this.mutator.mutate(campaignId, 'submit_player_choice', (draft) => {
      const trimmed = choice.trim();
      if (!trimmed) {
        throw new ValidationError('choice must not be empty');
      }
      const character = resolveCharacter(draft.roster, characterRef);
      const payload: PlayerChoicePayload = {
        characterId: character.id,
        characterName: character.name,
        choice: trimmed,
        timestamp: Date.now(),
      };
      return { result: payload, event: { name: HUB_EVENTS.PLAYER_CHOICE_SUBMITTED, payload } };
    });
  }

  atmospherePulse(campaignId: string, payload: AtmospherePulsePayload): Promise<MutationOutcome<AtmospherePulsePayload>> {
    return this.mutator.mutate(campaignId, 'atmosphere_pulse', () => ({
      result: payload,
      event: { name: HUB_EVENTS.ATMOSPHERE_PULSE, payload },
    }));
  }

  narrativeAnchor(campaignId: string, payload: NarrativeAnchorPayload): Promise<MutationOutcome<NarrativeAnchorPayload>> {
    return this.mutator.mutate(campaignId, 'narrative_anchor', () => ({
      result: payload,
      event: { name: HUB_EVENTS.NARRATIVE_ANCHOR_UPDATED, payload },
    }));
  }

  groupInsight(campaignId: string, payload: GroupInsightPayload): Promise<MutationOutcome<GroupInsightPayload>> {
    return this.mutator.mutate(campaignId, 'group_insight', () => ({
      result: payload,
      event: { name: HUB_EVENTS.GROUP_INSIGHT_TRIGGERED, payload },
    }));
  }

  // ========== DM narration ==========

  /**
   * Boxed text for the DM to read out. Replaces the previous text.
   */
  displayReadAloudText(campaignId: string, text: string): Promise<MutationOutcome<ReadAloudTextPayload>> {
    return this.mutator.mutate(campaignId, 'display_read_aloud_text', (draft) => {
      const trimmed = requireText(text, 'text');
      draft.readAloudText = trimmed;
      const payload: ReadAloudTextPayload = { text: trimmed };
      return { result: payload, event: { name: HUB_EVENTS.READ_ALOUD_TEXT_RECEIVED, payload } };
    });
  }

  updateGameLog(
    campaignId: string,
    entry: string,
    importance: LogImportance = 'standard'
  ): Promise<MutationOutcome<LogEntry>> {
    return this.mutator.mutate(campaignId, 'update_game_log', (draft) => {
      const logEntry = appendLog(draft, requireText(entry, 'entry'), importance);
      return { result: logEntry, event: { name: HUB_EVENTS.GAME_LOG_UPDATED, payload: logEntry } };
    });
  }

  // ========== Shared scene ==========

  /**
   * Record a roll the table just made. Also lands in the narrative log as a minor entry.
   */
  logPlayerRoll(campaignId: string, roll: PlayerRoll): Promise<MutationOutcome<RollRecord>> {
    return this.mutator.mutate(campaignId, 'log_player_roll', (draft) => {
      if (!Number.isInteger(roll.result)) {
        throw new ValidationError('result must be an integer', { value: roll.result });
      }
      const character = resolveCharacter(draft.roster, roll.characterRef);
      const checkType = requireText(roll.checkType, 'check_type');
      const outcome = requireText(roll.outcome, 'outcome');

      const record: RollRecord = {
        id: uuidv4(),
        characterId: character.id,
        characterName: character.name,
        checkType,
        result: roll.result,
        outcome,
        timestamp: Date.now(),
      };
      draft.recentRolls = [record, ...draft.recentRolls].slice(0, MAX_RECENT_ROLLS);
      appendLog(draft, `[Roll] ${character.name}: ${checkType} = ${roll.result} (${outcome})`, 'minor');

      logger.info('Roll logged', { campaignId, characterId: character.id, checkType, result: roll.result });
      return { result: record, event: { name: HUB_EVENTS.PLAYER_ROLL_LOGGED, payload: record } };
    });
  }

  /**
   * Point the scene at an image for `description`. Images are not generated yet,
   * so the same description always maps to the same placeholder.
   */
  updateSceneImage(campaignId: string, description: string): Promise<MutationOutcome<SceneImagePayload>> {
    return this.mutator.mutate(campaignId, 'update_scene_image', (draft) => {
      const trimmed = requireText(description, 'description');
      const imageUri = placeholderSceneImage(trimmed);
      draft.sceneImageUri = imageUri;
      const payload: SceneImagePayload = { imageUri, description: trimmed };
      return { result: payload, event: { name: HUB_EVENTS.SCENE_IMAGE_UPDATED, payload } };
    });
  }
}

function requireText(value: string, field: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ValidationError(`${field} must not be empty`, { field });
  }
  return trimmed;
}

function appendLog(draft: CampaignAggregate, entry: string, importance: LogImportance): LogEntry {
  const logEntry: LogEntry = { id: uuidv4(), timestamp: Date.now(), entry, importance };
  draft.narrativeLog = [...draft.narrativeLog, logEntry];
  return logEntry;
}

/**
 * djb2 over UTF-16 code units, kept unsigned
 */
export function placeholderSceneImage(description: string): string {
  let hash = 5381;
  for (let i = 0; i < description.length; i++) {
    hash = ((hash * 33) ^ description.charCodeAt(i)) >>> 0;
  }
  return `/images/scenes/placeholder_${hash % SCENE_PLACEHOLDERS}.png`;
}
