// Application layer: Tool gateway
// Routes named tool calls (from the DM assistant or the HTTP API) to the coordinator
// and narrative service, and turns every outcome into a typed ToolResult.

import type { ZodType, ZodTypeDef } from 'zod';
import type { CombatantInfo } from '@/domain/combat/types.js';
import type { Audience, GameEvent } from '@/domain/notifications/types.js';
import type { CombatCoordinator, CharacterStateUpdate } from '@/application/combat/CombatCoordinator.js';
import type { NarrativeService } from '@/application/narrative/NarrativeService.js';
import type { MutationOutcome } from '@/application/campaign/CampaignMutator.js';
import { resolveAudiences } from '@/application/notifications/NotificationRouter.js';
import {
  AddCombatantSchema,
  AtmospherePulseSchema,
  CharacterRefSchema,
  EmptyArgsSchema,
  GroupInsightSchema,
  LogPlayerRollSchema,
  NarrativeAnchorSchema,
  PresentChoicesSchema,
  ReadAloudTextSchema,
  SceneImageSchema,
  SetInitiativeSchema,
  StartCombatSchema,
  SubmitChoiceSchema,
  UpdateCharacterStateSchema,
  UpdateGameLogSchema,
  type UpdateCharacterStateArgs,
} from './schemas.js';
import { type ErrorCode, UnknownToolError, ValidationError, isCampaignError } from '@/utils/errors.js';
import { createLogger, logToolCall } from '@/utils/logger.js';

const logger = createLogger('ToolExecutor');

export const TOOL_NAMES = [
  'get_game_state',
  'start_combat',
  'set_initiative',
  'advance_turn',
  'update_character_state',
  'mark_defeated',
  'end_combat',
  'add_combatant',
  'remove_combatant',
  'present_player_choices',
  'submit_player_choice',
  'atmosphere_pulse',
  'narrative_anchor',
  'group_insight',
  'update_game_log',
  'display_read_aloud_text',
  'log_player_roll',
  'update_scene_image',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some((tool) => tool === name);
}

export interface EmittedEvent {
  name: GameEvent['name'];
  sequence: number;
  audiences: readonly Audience[];
}

export interface ToolFailure {
  code: ErrorCode | 'INTERNAL_ERROR';
  message: string;
  details?: Record<string, unknown>;
}

export type ToolResult =
  | { success: true; data: unknown; events: EmittedEvent[] }
  | { success: false; error: ToolFailure };

interface HandlerOutput {
  data: unknown;
  events: GameEvent[];
}

type ToolHandler = (campaignId: string, args: unknown) => Promise<HandlerOutput>;

export class ToolExecutor {
  private handlers: Record<ToolName, ToolHandler>;

  constructor(
    private coordinator: CombatCoordinator,
    private narrative: NarrativeService
  ) {
    this.handlers = {
      get_game_state: async (campaignId, args) => {
        parseArgs('get_game_state', EmptyArgsSchema, args);
        return { data: await this.coordinator.getState(campaignId), events: [] };
      },
      start_combat: async (campaignId, args) => {
        const { combatants } = parseArgs('start_combat', StartCombatSchema, args);
        return fromOutcome(await this.coordinator.startCombat(campaignId, combatants));
      },
      set_initiative: async (campaignId, args) => {
        const { character_id, value } = parseArgs('set_initiative', SetInitiativeSchema, args);
        return fromOutcome(await this.coordinator.setInitiative(campaignId, character_id, value));
      },
      advance_turn: async (campaignId, args) => {
        parseArgs('advance_turn', EmptyArgsSchema, args);
        return fromOutcome(await this.coordinator.advanceTurn(campaignId));
      },
      update_character_state: async (campaignId, args) => {
        const parsed = parseArgs('update_character_state', UpdateCharacterStateSchema, args);
        return fromOutcome(
          await this.coordinator.updateCharacterState(campaignId, parsed.character_id, toUpdate(parsed))
        );
      },
      mark_defeated: async (campaignId, args) => {
        const { character_id } = parseArgs('mark_defeated', CharacterRefSchema, args);
        return fromOutcome(await this.coordinator.markDefeated(campaignId, character_id));
      },
      end_combat: async (campaignId, args) => {
        parseArgs('end_combat', EmptyArgsSchema, args);
        return fromOutcome(await this.coordinator.endCombat(campaignId));
      },
      add_combatant: async (campaignId, args) => {
        const { combatant } = parseArgs('add_combatant', AddCombatantSchema, args);
        const info: CombatantInfo = combatant;
        return fromOutcome(await this.coordinator.addCombatant(campaignId, info));
      },
      remove_combatant: async (campaignId, args) => {
        const { character_id } = parseArgs('remove_combatant', CharacterRefSchema, args);
        return fromOutcome(await this.coordinator.removeCombatant(campaignId, character_id));
      },
      present_player_choices: async (campaignId, args) => {
        const { choices } = parseArgs('present_player_choices', PresentChoicesSchema, args);
        return fromOutcome(await this.narrative.presentPlayerChoices(campaignId, choices));
      },
      submit_player_choice: async (campaignId, args) => {
        const { character_id, choice } = parseArgs('submit_player_choice', SubmitChoiceSchema, args);
        return fromOutcome(await this.narrative.submitPlayerChoice(campaignId, character_id, choice));
      },
      atmosphere_pulse: async (campaignId, args) => {
        const { text, intensity, sensory_type } = parseArgs('atmosphere_pulse', AtmospherePulseSchema, args);
        return fromOutcome(
          await this.narrative.atmospherePulse(campaignId, { text, intensity, sensoryType: sensory_type })
        );
      },
      narrative_anchor: async (campaignId, args) => {
        const { short_text, mood_category } = parseArgs('narrative_anchor', NarrativeAnchorSchema, args);
        return fromOutcome(
          await this.narrative.narrativeAnchor(campaignId, { shortText: short_text, moodCategory: mood_category })
        );
      },
      group_insight: async (campaignId, args) => {
        const { text, relevant_skill, highlight_effect } = parseArgs('group_insight', GroupInsightSchema, args);
        return fromOutcome(
          await this.narrative.groupInsight(campaignId, {
            text,
            relevantSkill: relevant_skill,
            highlightEffect: highlight_effect,
          })
        );
      },
      update_game_log: async (campaignId, args) => {
        const { entry, importance } = parseArgs('update_game_log', UpdateGameLogSchema, args);
        return fromOutcome(await this.narrative.updateGameLog(campaignId, entry, importance));
      },
      display_read_aloud_text: async (campaignId, args) => {
        const { text } = parseArgs('display_read_aloud_text', ReadAloudTextSchema, args);
        return fromOutcome(await this.narrative.displayReadAloudText(campaignId, text));
      },
      log_player_roll: async (campaignId, args) => {
        const { character_id, check_type, result, outcome } = parseArgs('log_player_roll', LogPlayerRollSchema, args);
        return fromOutcome(
          await this.narrative.logPlayerRoll(campaignId, {
            characterRef: character_id,
            checkType: check_type,
            result,
            outcome,
          })
        );
      },
      update_scene_image: async (campaignId, args) => {
        const { description } = parseArgs('update_scene_image', SceneImageSchema, args);
        return fromOutcome(await this.narrative.updateSceneImage(campaignId, description));
      },
    };
  }

  /**
   * Execute one tool call. Never throws: every failure comes back as a result.
   */
  async execute(campaignId: string, toolName: string, args: unknown = {}): Promise<ToolResult> {
    const startedAt = Date.now();
    logger.info('Executing tool', { campaignId, toolName });

    let result: ToolResult;
    try {
      if (!isToolName(toolName)) {
        throw new UnknownToolError(`Unknown tool: ${toolName}`, { validTools: [...TOOL_NAMES] });
      }
      const output = await this.handlers[toolName](campaignId, args);
      result = {
        success: true,
        data: output.data,
        events: output.events.map((event) => ({
          name: event.name,
          sequence: event.sequence,
          audiences: resolveAudiences(event.name),
        })),
      };
    } catch (error) {
      const failure = toFailure(error);
      result = { success: false, error: failure };
      if (failure.code === 'INTERNAL_ERROR' || failure.code === 'PERSISTENCE_FAILURE') {
        logger.error('Tool failed', { campaignId, toolName, code: failure.code, error: failure.message });
      } else {
        logger.info('Tool rejected', { campaignId, toolName, code: failure.code, error: failure.message });
      }
    }

    logToolCall({
      timestamp: new Date(startedAt).toISOString(),
      campaignId,
      toolName,
      arguments: args,
      success: result.success,
      errorCode: result.success ? undefined : result.error.code,
      eventNames: result.success ? result.events.map((e) => e.name) : [],
      sequence: result.success ? result.events[0]?.sequence : undefined,
      durationMs: Date.now() - startedAt,
    });

    return result;
  }
}

// ========== Helpers ==========

function parseArgs<T>(toolName: ToolName, schema: ZodType<T, ZodTypeDef, unknown>, args: unknown): T {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new ValidationError(`Invalid arguments for ${toolName}`, {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return parsed.data;
}

function fromOutcome(outcome: MutationOutcome<unknown>): HandlerOutput {
  return { data: outcome.result, events: [outcome.event] };
}

function toUpdate(args: UpdateCharacterStateArgs): CharacterStateUpdate {
  switch (args.key) {
    case 'stabilize':
      return { key: 'stabilize' };
    case 'current_hp':
    case 'damage':
    case 'temporary_hp':
    case 'initiative':
    case 'death_save_success':
    case 'death_save_failure':
      return { key: args.key, value: args.value };
    case 'conditions':
      return { key: 'conditions', value: args.value };
    case 'add_condition':
    case 'remove_condition':
    case 'status_notes':
      return { key: args.key, value: args.value };
  }
}

function toFailure(error: unknown): ToolFailure {
  if (isCampaignError(error)) {
    return {
      code: error.code,
      message: error.message,
      ...(error.details ? { details: error.details } : {}),
    };
  }
  return {
    code: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : String(error),
  };
}
