// Application layer: Combat coordinator
// The single entry point for combat and character-state mutations. Each call is one
// CampaignMutator unit: resolve, apply through vitality and turn order, save, emit one event.

import type { CampaignAggregate, LogEntry, RollRecord } from '@/domain/campaign/types.js';
import type { Character, VitalStatus } from '@/domain/character/types.js';
import { createCharacter, isPlayerCharacter } from '@/domain/character/types.js';
import type { CombatEncounter, CombatStatePayload, CombatantInfo } from '@/domain/combat/types.js';
import type { PendingEvent } from '@/domain/notifications/types.js';
import { HUB_EVENTS } from '@/domain/notifications/types.js';
import type { CampaignMutator, MutationOutcome, MutationPlan } from '@/application/campaign/CampaignMutator.js';
import { resolveCharacter } from '@/application/campaign/resolveCharacter.js';
import { CharacterVitality, getVitalStatus } from '@/application/vitality/CharacterVitality.js';
import { TurnOrderManager } from './TurnOrder.js';
import { buildCombatState, buildSlice } from './projection.js';
import { InvalidStateError, NotFoundError, ValidationError } from '@/utils/errors.js';
import { createLogger } from '@/utils/logger.js';

const logger = createLogger('CombatCoordinator');

/**
 * One `update_character_state` request. `stabilize` takes no value.
 */
export type CharacterStateUpdate =
  | { key: 'current_hp'; value: number }
  | { key: 'damage'; value: number }
  | { key: 'temporary_hp'; value: number }
  | { key: 'conditions'; value: string[] }
  | { key: 'add_condition'; value: string }
  | { key: 'remove_condition'; value: string }
  | { key: 'status_notes'; value: string }
  | { key: 'initiative'; value: number }
  | { key: 'death_save_success'; value: number }
  | { key: 'death_save_failure'; value: number }
  | { key: 'stabilize' };

export type CharacterStateKey = CharacterStateUpdate['key'];

export interface CharacterUpdateResult {
  character: Character;
  status: VitalStatus;
  combat: CombatStatePayload | null;
  /** Set when this update defeated the last enemy */
  combatEnded: boolean;
}

export interface CampaignStateView {
  campaignId: string;
  name: string;
  version: number;
  characters: Array<Character & { status: VitalStatus }>;
  combat: CombatStatePayload | null;
  activePlayerChoices: string[];
  readAloudText: string | null;
  sceneImageUri: string | null;
  narrativeLog: LogEntry[];
  recentRolls: RollRecord[];
}

export class CombatCoordinator {
  constructor(private mutator: CampaignMutator) {}

  // ========== Combat lifecycle ==========

  startCombat(campaignId: string, combatants: CombatantInfo[]): Promise<MutationOutcome<CombatStatePayload>> {
    return this.mutator.mutate(campaignId, 'start_combat', (draft) => {
      if (draft.activeCombat?.isActive) {
        throw new InvalidStateError('A combat is already active in this campaign', {
          combatId: draft.activeCombat.id,
        });
      }
      if (combatants.length === 0) {
        throw new ValidationError('start_combat needs at least one combatant');
      }

      const seen = new Set<string>();
      for (const info of combatants) {
        if (seen.has(info.id)) {
          throw new ValidationError(`Combatant ${info.id} is listed twice`, { combatantId: info.id });
        }
        seen.add(info.id);
        enlist(draft, info);
      }

      const encounter = TurnOrderManager.start(
        combatants.map((c) => ({ id: c.id, isSurprised: c.isSurprised })),
        lookupIn(draft)
      );
      draft.activeCombat = encounter;

      logger.info('Combat started', {
        campaignId,
        combatId: encounter.id,
        combatants: encounter.turnOrder.length,
      });

      const slice = buildSlice(draft, [...seen]);
      return plan(requireState(slice.combat), { name: HUB_EVENTS.COMBAT_STARTED, payload: slice });
    });
  }

  endCombat(campaignId: string): Promise<MutationOutcome<{ combatId: string }>> {
    return this.mutator.mutate(campaignId, 'end_combat', (draft) => {
      const encounter = requireCombat(draft);
      const participants = [...encounter.turnOrder, ...encounter.defeated].map((e) => e.id);
      draft.activeCombat = null;

      logger.info('Combat ended', { campaignId, combatId: encounter.id, reason: 'manual' });
      return plan(
        { combatId: encounter.id },
        { name: HUB_EVENTS.COMBAT_ENDED, payload: { ...buildSlice(draft, participants), reason: 'manual' } }
      );
    });
  }

  // ========== Turn order ==========

  setInitiative(campaignId: string, characterRef: string, value: number): Promise<MutationOutcome<CombatStatePayload>> {
    return this.mutator.mutate(campaignId, 'set_initiative', (draft) => {
      assertInteger(value, 'initiative');
      const character = resolveCharacter(draft.roster, characterRef);
      const turns = new TurnOrderManager(requireCombat(draft), lookupIn(draft));
      if (!turns.has(character.id)) {
        throw new InvalidStateError(`${character.name} is not in the turn order`, { characterId: character.id });
      }

      character.initiative = value;
      turns.resort();

      const slice = buildSlice(draft, [character.id]);
      return plan(requireState(slice.combat), { name: HUB_EVENTS.INITIATIVE_SET, payload: slice });
    });
  }

  advanceTurn(campaignId: string): Promise<MutationOutcome<CombatStatePayload>> {
    return this.mutator.mutate(campaignId, 'advance_turn', (draft) => {
      const turns = new TurnOrderManager(requireCombat(draft), lookupIn(draft));
      const { roundAdvanced, currentCombatantId } = turns.advanceTurn();

      if (roundAdvanced) {
        logger.debug('Round advanced', { campaignId, round: turns.encounter.roundNumber });
      }

      const slice = buildSlice(draft, currentCombatantId ? [currentCombatantId] : []);
      return plan(requireState(slice.combat), {
        name: roundAdvanced ? HUB_EVENTS.ROUND_ADVANCED : HUB_EVENTS.TURN_ADVANCED,
        payload: slice,
      });
    });
  }

  markDefeated(campaignId: string, characterRef: string): Promise<MutationOutcome<CharacterUpdateResult>> {
    return this.mutator.mutate(campaignId, 'mark_defeated', (draft) => {
      const character = resolveCharacter(draft.roster, characterRef);
      if (isPlayerCharacter(character)) {
        throw new InvalidStateError(`${character.name} is a player character and cannot be defeated`, {
          characterId: character.id,
        });
      }
      const encounter = requireCombat(draft);
      if (!new TurnOrderManager(encounter, lookupIn(draft)).has(character.id)) {
        throw new InvalidStateError(`${character.name} is not in the turn order`, { characterId: character.id });
      }

      new CharacterVitality(character).setHp(0);
      const combatEnded = defeat(draft, encounter, character);

      return defeatPlan(draft, character, combatEnded, HUB_EVENTS.COMBAT_STATE_UPDATED);
    });
  }

  /**
   * Join an active combat mid-fight (reinforcements, a summoned ally)
   */
  addCombatant(campaignId: string, info: CombatantInfo): Promise<MutationOutcome<CombatStatePayload>> {
    return this.mutator.mutate(campaignId, 'add_combatant', (draft) => {
      const turns = new TurnOrderManager(requireCombat(draft), lookupIn(draft));
      const character = enlist(draft, info);
      turns.add(character.id, info.isSurprised ?? false);

      const slice = buildSlice(draft, [character.id]);
      return plan(requireState(slice.combat), { name: HUB_EVENTS.COMBAT_STATE_UPDATED, payload: slice });
    });
  }

  /**
   * Take a combatant out of the turn order without defeating them (fled, dismissed).
   * Combat continues even if no enemy is left.
   */
  removeCombatant(campaignId: string, characterRef: string): Promise<MutationOutcome<CombatStatePayload>> {
    return this.mutator.mutate(campaignId, 'remove_combatant', (draft) => {
      const character = resolveCharacter(draft.roster, characterRef);
      const turns = new TurnOrderManager(requireCombat(draft), lookupIn(draft));
      turns.remove(character.id);

      const slice = buildSlice(draft, [character.id]);
      return plan(requireState(slice.combat), { name: HUB_EVENTS.COMBAT_STATE_UPDATED, payload: slice });
    });
  }

  // ========== Character state ==========

  updateCharacterState(
    campaignId: string,
    characterRef: string,
    update: CharacterStateUpdate
  ): Promise<MutationOutcome<CharacterUpdateResult>> {
    return this.mutator.mutate(campaignId, 'update_character_state', (draft) => {
      const character = resolveCharacter(draft.roster, characterRef);
      const vitality = new CharacterVitality(character);

      applyUpdate(vitality, update, campaignId);

      const encounter = draft.activeCombat;
      if (encounter && update.key === 'initiative') {
        const turns = new TurnOrderManager(encounter, lookupIn(draft));
        if (turns.has(character.id)) turns.resort();
      }

      // A downed NPC or enemy leaves the fight on its own
      let combatEnded = false;
      if (
        encounter &&
        !isPlayerCharacter(character) &&
        vitality.getStatus() === 'Defeated' &&
        new TurnOrderManager(encounter, lookupIn(draft)).has(character.id)
      ) {
        combatEnded = defeat(draft, encounter, character);
      }

      return defeatPlan(draft, character, combatEnded, HUB_EVENTS.CHARACTER_STATE_UPDATED);
    });
  }

  // ========== Queries ==========

  async getState(campaignId: string): Promise<CampaignStateView> {
    const aggregate = await this.mutator.read(campaignId);
    return {
      campaignId: aggregate.campaignId,
      name: aggregate.name,
      version: aggregate.version,
      characters: aggregate.roster.map((c) => ({ ...c, status: getVitalStatus(c) })),
      combat: aggregate.activeCombat ? buildCombatState(aggregate.activeCombat, aggregate.roster) : null,
      activePlayerChoices: aggregate.activePlayerChoices,
      readAloudText: aggregate.readAloudText,
      sceneImageUri: aggregate.sceneImageUri,
      narrativeLog: aggregate.narrativeLog,
      recentRolls: aggregate.recentRolls,
    };
  }
}

// ========== Helpers ==========

function plan<T>(result: T, event: PendingEvent): MutationPlan<T> {
  return { result, event };
}

function lookupIn(draft: CampaignAggregate) {
  return (id: string): Character | undefined => draft.roster.find((c) => c.id === id);
}

function requireCombat(draft: CampaignAggregate): CombatEncounter {
  if (!draft.activeCombat?.isActive) {
    throw new InvalidStateError('No active combat in this campaign');
  }
  return draft.activeCombat;
}

function requireState(state: CombatStatePayload | null): CombatStatePayload {
  if (!state) {
    throw new InvalidStateError('No active combat in this campaign');
  }
  return state;
}

/**
 * Find the roster record for a combatant, creating it for newcomers that are not PCs.
 * The rolled initiative always wins over the stored one. Non-PCs take the supplied
 * hit points; PCs keep their roster values. A non-PC at 0 hp cannot join.
 */
function enlist(draft: CampaignAggregate, info: CombatantInfo): Character {
  const existing = draft.roster.find((c) => c.id === info.id);
  const character = existing ?? recruit(draft, info);
  character.initiative = info.initiative;

  if (isPlayerCharacter(character)) {
    return character;
  }
  if (existing) {
    existing.maxHp = Math.max(1, info.maxHp);
    new CharacterVitality(existing).setHp(Math.min(existing.maxHp, Math.max(0, info.currentHp)));
  }
  if (getVitalStatus(character) === 'Defeated') {
    throw new InvalidStateError(`${character.name} is already defeated and cannot join combat`, {
      characterId: character.id,
      currentHp: character.currentHp,
    });
  }
  return character;
}

function recruit(draft: CampaignAggregate, info: CombatantInfo): Character {
  if (info.type === 'PC') {
    throw new NotFoundError(`Player character ${info.id} is not on the campaign roster`, {
      characterId: info.id,
    });
  }

  const maxHp = Math.max(1, info.maxHp);
  const character = createCharacter({
    id: info.id,
    name: info.name,
    type: info.type,
    maxHp,
    currentHp: Math.min(maxHp, Math.max(0, info.currentHp)),
    armorClass: info.armorClass ?? 10,
    initiative: info.initiative,
  });
  draft.roster.push(character);
  return character;
}

/**
 * Move a non-PC into the defeated list. Ends the encounter when no enemy is left.
 */
function defeat(draft: CampaignAggregate, encounter: CombatEncounter, character: Character): boolean {
  const { combatOver } = new TurnOrderManager(encounter, lookupIn(draft)).markDefeated(character.id);
  logger.info('Combatant defeated', { combatId: encounter.id, characterId: character.id, combatOver });

  if (combatOver) {
    draft.activeCombat = null;
    logger.info('Combat ended', { campaignId: draft.campaignId, combatId: encounter.id, reason: 'all_enemies_defeated' });
  }
  return combatOver;
}

function defeatPlan(
  draft: CampaignAggregate,
  character: Character,
  combatEnded: boolean,
  eventName: typeof HUB_EVENTS.COMBAT_STATE_UPDATED | typeof HUB_EVENTS.CHARACTER_STATE_UPDATED
): MutationPlan<CharacterUpdateResult> {
  const slice = buildSlice(draft, [character.id]);
  const result: CharacterUpdateResult = {
    character,
    status: getVitalStatus(character),
    combat: slice.combat,
    combatEnded,
  };

  if (combatEnded) {
    return plan(result, {
      name: HUB_EVENTS.COMBAT_ENDED,
      payload: { ...slice, reason: 'all_enemies_defeated' },
    });
  }
  return plan(result, { name: eventName, payload: slice });
}

function applyUpdate(vitality: CharacterVitality, update: CharacterStateUpdate, campaignId: string): void {
  const character = vitality.data;

  switch (update.key) {
    case 'current_hp': {
      const change = vitality.setHp(update.value);
      if (change.requestedHp !== undefined) {
        logger.warn('Hit points clamped', {
          campaignId,
          characterId: character.id,
          requested: change.requestedHp,
          applied: change.currentHp,
          maxHp: character.maxHp,
        });
      }
      break;
    }
    case 'damage': {
      const result = vitality.applyDamage(update.value);
      if (result.massiveDamage) {
        logger.info('Massive damage', { campaignId, characterId: character.id, damage: update.value });
      }
      break;
    }
    case 'temporary_hp':
      vitality.setTemporaryHp(update.value);
      break;
    case 'conditions':
      vitality.replaceConditions(update.value);
      break;
    case 'add_condition':
      vitality.addCondition(update.value);
      break;
    case 'remove_condition':
      vitality.removeCondition(update.value);
      break;
    case 'status_notes':
      character.statusNotes = update.value;
      break;
    case 'initiative':
      assertInteger(update.value, 'initiative');
      character.initiative = update.value;
      break;
    case 'death_save_success':
      vitality.recordDeathSaveSuccess(update.value);
      break;
    case 'death_save_failure':
      vitality.recordDeathSaveFailure(update.value);
      break;
    case 'stabilize':
      vitality.stabilize();
      break;
  }
}

function assertInteger(value: number, field: string): void {
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${field} must be an integer`, { field, value });
  }
}
