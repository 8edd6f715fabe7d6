// Domain layer: Combat encounter types
// NO external dependencies - pure TypeScript

import type { CharacterType } from '@/domain/character/types.js';

/**
 * A slot in the turn order. Only combat-only facts live here; name, hp and
 * initiative are read from the roster character with the same id.
 */
export interface TurnOrderEntry {
  id: string;
  isDefeated: boolean;
  isSurprised: boolean;
}

/**
 * One active encounter per campaign. `null` on the aggregate means no combat.
 */
export interface CombatEncounter {
  id: string;
  isActive: boolean;
  roundNumber: number;
  turnOrder: TurnOrderEntry[];
  /** Index into turnOrder; null while turnOrder is empty */
  currentTurnIndex: number | null;
  surprisedEntities: string[];
  /** Entries removed from turnOrder by defeat, kept for payloads */
  defeated: TurnOrderEntry[];
  startedAt: number;
}

/**
 * Combat-facing status. PCs never get `Defeated`.
 */
export type CombatantStatus = 'none' | 'Unconscious' | 'Stable' | 'Dead' | 'Defeated';

/**
 * Read-only view of a roster character inside an encounter
 */
export interface CombatantProjection {
  id: string;
  name: string;
  type: CharacterType;
  initiative: number;
  currentHp: number;
  maxHp: number;
  isDefeated: boolean;
  isSurprised: boolean;
  status: CombatantStatus;
}

/**
 * Full combat state as broadcast to viewers
 */
export interface CombatStatePayload {
  combatId: string;
  isActive: boolean;
  roundNumber: number;
  turnOrder: CombatantProjection[];
  currentTurnIndex: number | null;
  currentCombatantId: string | null;
  defeated: CombatantProjection[];
}

/**
 * Combatant description supplied by the caller when combat starts or someone joins
 */
export interface CombatantInfo {
  id: string;
  name: string;
  type: CharacterType;
  initiative: number;
  currentHp: number;
  maxHp: number;
  armorClass?: number;
  isSurprised?: boolean;
}

export type CombatEndReason = 'manual' | 'all_enemies_defeated';
