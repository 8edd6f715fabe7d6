// Application layer: Combat projections
// Combat views are computed from roster records on demand, never stored.

import type { Character } from '@/domain/character/types.js';
import type {
  CombatEncounter,
  CombatStatePayload,
  CombatantProjection,
  TurnOrderEntry,
} from '@/domain/combat/types.js';
import type { CampaignSlice } from '@/domain/notifications/types.js';
import type { CampaignAggregate } from '@/domain/campaign/types.js';
import { getCombatStatus } from '@/application/vitality/CharacterVitality.js';

export function projectCombatant(character: Character, entry: TurnOrderEntry): CombatantProjection {
  return {
    id: character.id,
    name: character.name,
    type: character.type,
    initiative: character.initiative,
    currentHp: character.currentHp,
    maxHp: character.maxHp,
    isDefeated: entry.isDefeated,
    isSurprised: entry.isSurprised,
    status: entry.isDefeated ? 'Defeated' : getCombatStatus(character),
  };
}

function projectEntries(entries: TurnOrderEntry[], roster: Character[]): CombatantProjection[] {
  const out: CombatantProjection[] = [];
  for (const entry of entries) {
    const character = roster.find((c) => c.id === entry.id);
    if (character) {
      out.push(projectCombatant(character, entry));
    }
  }
  return out;
}

export function buildCombatState(encounter: CombatEncounter, roster: Character[]): CombatStatePayload {
  const index = encounter.currentTurnIndex;
  return {
    combatId: encounter.id,
    isActive: encounter.isActive,
    roundNumber: encounter.roundNumber,
    turnOrder: projectEntries(encounter.turnOrder, roster),
    currentTurnIndex: index,
    currentCombatantId: index === null ? null : encounter.turnOrder[index]?.id ?? null,
    defeated: projectEntries(encounter.defeated, roster),
  };
}

/**
 * Full-state slice for a broadcast: current combat plus the named characters.
 */
export function buildSlice(aggregate: CampaignAggregate, characterIds: readonly string[]): CampaignSlice {
  const characters = aggregate.roster.filter((c) => characterIds.includes(c.id));
  return {
    combat: aggregate.activeCombat ? buildCombatState(aggregate.activeCombat, aggregate.roster) : null,
    characters,
  };
}
