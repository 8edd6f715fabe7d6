// Application layer: Turn-order manager
// Drives one CombatEncounter. Initiative and type are read from the roster, so the
// encounter itself only ever stores ids and combat-only flags.

import { v4 as uuidv4 } from 'uuid';
import type { Character } from '@/domain/character/types.js';
import type { CombatEncounter, TurnOrderEntry } from '@/domain/combat/types.js';
import { InvalidStateError } from '@/utils/errors.js';

export type RosterLookup = (id: string) => Character | undefined;

export interface AdvanceResult {
  roundAdvanced: boolean;
  currentCombatantId: string | null;
}

export interface RemovalResult {
  removedIndex: number;
  /** True when no undefeated enemy is left in the turn order */
  combatOver: boolean;
}

export interface StartParticipant {
  id: string;
  isSurprised?: boolean;
}

export class TurnOrderManager {
  constructor(
    readonly encounter: CombatEncounter,
    private readonly lookup: RosterLookup
  ) {}

  /**
   * Build a fresh encounter. Participants arrive in insertion order; the sort is
   * stable so equal initiatives keep that order.
   */
  static start(participants: StartParticipant[], lookup: RosterLookup, now = Date.now()): CombatEncounter {
    const turnOrder: TurnOrderEntry[] = participants.map((p) => ({
      id: p.id,
      isDefeated: false,
      isSurprised: p.isSurprised ?? false,
    }));

    const encounter: CombatEncounter = {
      id: uuidv4(),
      isActive: true,
      roundNumber: 1,
      turnOrder,
      currentTurnIndex: turnOrder.length > 0 ? 0 : null,
      surprisedEntities: turnOrder.filter((e) => e.isSurprised).map((e) => e.id),
      defeated: [],
      startedAt: now,
    };

    const manager = new TurnOrderManager(encounter, lookup);
    manager.sortEntries();
    return encounter;
  }

  // ========== Queries ==========

  indexOf(id: string): number {
    return this.encounter.turnOrder.findIndex((e) => e.id === id);
  }

  has(id: string): boolean {
    return this.indexOf(id) !== -1;
  }

  currentCombatantId(): string | null {
    const index = this.encounter.currentTurnIndex;
    if (index === null) return null;
    return this.encounter.turnOrder[index]?.id ?? null;
  }

  /** Any enemy still standing in the turn order? */
  hasActiveEnemies(): boolean {
    return this.encounter.turnOrder.some((e) => !e.isDefeated && this.lookup(e.id)?.type === 'Enemy');
  }

  // ========== Mutations ==========

  /**
   * Re-sort after an initiative change. The pointer follows the combatant whose
   * turn it was, not the raw index.
   */
  resort(): void {
    const current = this.currentCombatantId();
    this.sortEntries();
    if (current !== null) {
      this.encounter.currentTurnIndex = this.indexOf(current);
    }
  }

  advanceTurn(): AdvanceResult {
    const { turnOrder } = this.encounter;
    const index = this.encounter.currentTurnIndex;
    if (turnOrder.length === 0 || index === null) {
      throw new InvalidStateError('Cannot advance turn: the turn order is empty');
    }

    let next = index + 1;
    let roundAdvanced = false;
    if (next >= turnOrder.length) {
      next = 0;
      roundAdvanced = true;
      this.encounter.roundNumber += 1;
      this.encounter.surprisedEntities = [];
      for (const entry of turnOrder) {
        entry.isSurprised = false;
      }
    }

    this.encounter.currentTurnIndex = next;
    return { roundAdvanced, currentCombatantId: this.currentCombatantId() };
  }

  /**
   * Move an enemy out of the turn order into the defeated list.
   */
  markDefeated(id: string): RemovalResult {
    const index = this.requireIndex(id);
    const [entry] = this.encounter.turnOrder.splice(index, 1);
    if (entry) {
      entry.isDefeated = true;
      this.encounter.defeated.push(entry);
    }
    this.adjustPointerAfterRemoval(index);
    return { removedIndex: index, combatOver: !this.hasActiveEnemies() };
  }

  /**
   * Drop a combatant that left the fight. Same pointer rule as defeat.
   */
  remove(id: string): RemovalResult {
    const index = this.requireIndex(id);
    this.encounter.turnOrder.splice(index, 1);
    this.encounter.surprisedEntities = this.encounter.surprisedEntities.filter((s) => s !== id);
    this.adjustPointerAfterRemoval(index);
    return { removedIndex: index, combatOver: !this.hasActiveEnemies() };
  }

  /**
   * Join mid-fight: placed after everyone with equal or higher initiative.
   */
  add(id: string, isSurprised = false): number {
    if (this.has(id)) {
      throw new InvalidStateError(`Combatant ${id} is already in the turn order`, { combatantId: id });
    }

    const initiative = this.initiativeOf(id);
    const { turnOrder } = this.encounter;
    let position = turnOrder.findIndex((e) => this.initiativeOf(e.id) < initiative);
    if (position === -1) position = turnOrder.length;

    turnOrder.splice(position, 0, { id, isDefeated: false, isSurprised });
    this.encounter.defeated = this.encounter.defeated.filter((e) => e.id !== id);
    if (isSurprised) {
      this.encounter.surprisedEntities = [...this.encounter.surprisedEntities, id];
    }

    const index = this.encounter.currentTurnIndex;
    if (index === null) {
      this.encounter.currentTurnIndex = 0;
    } else if (position <= index) {
      this.encounter.currentTurnIndex = index + 1;
    }
    return position;
  }

  // ========== Internals ==========

  private requireIndex(id: string): number {
    const index = this.indexOf(id);
    if (index === -1) {
      throw new InvalidStateError(`Combatant ${id} is not in the turn order`, { combatantId: id });
    }
    return index;
  }

  /**
   * Entries before the pointer shift it back one. Removing the current entry
   * hands the turn to the one that followed it, wrapping to the top.
   */
  private adjustPointerAfterRemoval(removedIndex: number): void {
    const index = this.encounter.currentTurnIndex;
    if (this.encounter.turnOrder.length === 0) {
      this.encounter.currentTurnIndex = null;
    } else if (index === null) {
      return;
    } else if (removedIndex < index) {
      this.encounter.currentTurnIndex = index - 1;
    } else if (removedIndex === index && index >= this.encounter.turnOrder.length) {
      this.encounter.currentTurnIndex = 0;
    }
  }

  private sortEntries(): void {
    this.encounter.turnOrder.sort((a, b) => this.initiativeOf(b.id) - this.initiativeOf(a.id));
  }

  private initiativeOf(id: string): number {
    return this.lookup(id)?.initiative ?? 0;
  }
}
