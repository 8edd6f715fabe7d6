// Application layer: Character vitality state machine
// Hit points, vitality conditions and death saves for one roster character.
// Mutates the wrapped record in place; callers hand it a draft copy.

import type { Character, VitalStatus } from '@/domain/character/types.js';
import { isPlayerCharacter } from '@/domain/character/types.js';
import type { CombatantStatus } from '@/domain/combat/types.js';
import {
  MAX_DEATH_SAVES,
  VITALITY_CONDITIONS,
  hasCondition,
  normalizeConditions,
  withCondition,
  withoutConditions,
} from '@/domain/character/conditions.js';
import { InvalidStateError, ValidationError } from '@/utils/errors.js';

const { UNCONSCIOUS, STABLE, DEAD } = VITALITY_CONDITIONS;
const DEFEATED_STATUS = 'Defeated';

export interface HpChange {
  previousHp: number;
  currentHp: number;
  /** Requested value, when it had to be clamped into [0, maxHp] */
  requestedHp?: number;
}

export interface DamageResult extends HpChange {
  absorbedByTemporaryHp: number;
  massiveDamage: boolean;
}

export class CharacterVitality {
  constructor(readonly data: Character) {}

  // ========== Hit points ==========

  /**
   * Set current hp, clamped into [0, maxHp].
   * Dropping to 0 starts a fresh death-save clock for PCs; rising above 0 clears it.
   */
  setHp(value: number): HpChange {
    assertInteger(value, 'current_hp');

    const clamped = Math.min(this.data.maxHp, Math.max(0, value));
    if (clamped > 0 && this.isDead()) {
      throw new InvalidStateError(`${this.data.name} is dead and cannot be healed`, {
        characterId: this.data.id,
      });
    }

    const previousHp = this.data.currentHp;
    this.data.currentHp = clamped;

    if (isPlayerCharacter(this.data)) {
      if (clamped === 0 && previousHp > 0) {
        this.data.conditions = withCondition(
          withoutConditions(this.data.conditions, STABLE),
          UNCONSCIOUS
        );
        this.resetDeathSaves();
      } else if (clamped > 0 && (previousHp === 0 || hasCondition(this.data.conditions, STABLE))) {
        this.data.conditions = withoutConditions(this.data.conditions, UNCONSCIOUS, STABLE);
        this.resetDeathSaves();
      }
    }

    return {
      previousHp,
      currentHp: clamped,
      ...(clamped !== value ? { requestedHp: value } : {}),
    };
  }

  /**
   * Apply a hit. Temporary hp soaks first. A PC knocked to 0 by a hit whose
   * overflow is at least maxHp dies outright. Hits on a creature already at 0
   * change nothing here; the caller records the failed save.
   */
  applyDamage(amount: number): DamageResult {
    assertInteger(amount, 'damage');
    if (amount < 0) {
      throw new ValidationError('damage must not be negative', { value: amount });
    }

    const absorbedByTemporaryHp = Math.min(this.data.temporaryHp, amount);
    this.data.temporaryHp -= absorbedByTemporaryHp;
    const remaining = amount - absorbedByTemporaryHp;

    const previousHp = this.data.currentHp;
    if (previousHp === 0 || remaining === 0) {
      return { previousHp, currentHp: previousHp, absorbedByTemporaryHp, massiveDamage: false };
    }

    const overflow = remaining - previousHp;
    const change = this.setHp(Math.max(0, previousHp - remaining));
    const massiveDamage =
      change.currentHp === 0 && isPlayerCharacter(this.data) && overflow >= this.data.maxHp;
    if (massiveDamage) {
      this.markDead();
    }

    return {
      previousHp: change.previousHp,
      currentHp: change.currentHp,
      absorbedByTemporaryHp,
      massiveDamage,
    };
  }

  setTemporaryHp(value: number): void {
    assertInteger(value, 'temporary_hp');
    if (value < 0) {
      throw new ValidationError('temporary_hp must not be negative', { value });
    }
    this.data.temporaryHp = value;
  }

  // ========== Death saves ==========

  recordDeathSaveSuccess(count: number): void {
    assertSaveIncrement(count, 'death_save_success');
    this.assertDying('record a death save success');

    this.data.deathSaveSuccesses = Math.min(MAX_DEATH_SAVES, this.data.deathSaveSuccesses + count);
    if (this.data.deathSaveSuccesses === MAX_DEATH_SAVES) {
      this.enterStable();
    }
  }

  /**
   * A failure on a stable character puts them back on the clock.
   */
  recordDeathSaveFailure(count: number): void {
    assertSaveIncrement(count, 'death_save_failure');
    this.assertDying('record a death save failure');

    if (hasCondition(this.data.conditions, STABLE)) {
      this.data.conditions = withCondition(withoutConditions(this.data.conditions, STABLE), UNCONSCIOUS);
      this.data.deathSaveSuccesses = 0;
    }

    this.data.deathSaveFailures = Math.min(MAX_DEATH_SAVES, this.data.deathSaveFailures + count);
    if (this.data.deathSaveFailures === MAX_DEATH_SAVES) {
      this.markDead();
    }
  }

  /** Stabilized by someone else's action: straight to three successes */
  stabilize(): void {
    this.assertDying('stabilize');
    this.data.deathSaveSuccesses = MAX_DEATH_SAVES;
    this.enterStable();
  }

  markDead(): void {
    this.data.conditions = withCondition(
      withoutConditions(this.data.conditions, UNCONSCIOUS, STABLE),
      DEAD
    );
  }

  // ========== Conditions ==========

  /**
   * `Dead` kills, `Stable` stabilizes a dying PC. On PCs, `Unconscious` only
   * follows hit points and is accepted when it already holds.
   */
  addCondition(condition: string): void {
    const [normalized] = normalizeConditions([condition]);
    if (!normalized) {
      throw new ValidationError('Condition name must not be empty');
    }
    this.assertAssignable(normalized);

    if (normalized === DEAD) {
      this.markDead();
    } else if (normalized === STABLE && isPlayerCharacter(this.data)) {
      this.stabilize();
    } else if (normalized === UNCONSCIOUS && isPlayerCharacter(this.data)) {
      if (this.getStatus() !== 'Unconscious') {
        throw new ValidationError(`${this.data.name} is not dying; set current_hp to 0 instead`, {
          characterId: this.data.id,
          currentHp: this.data.currentHp,
        });
      }
    } else {
      this.data.conditions = withCondition(this.data.conditions, normalized);
    }
  }

  /**
   * Removing `Dead` revives the save clock. A PC's `Unconscious` and `Stable`
   * cannot be removed directly; heal or record saves instead.
   */
  removeCondition(condition: string): void {
    const name = condition.trim();
    const derived = name === UNCONSCIOUS || name === STABLE;
    if (derived && isPlayerCharacter(this.data) && hasCondition(this.data.conditions, name)) {
      throw new ValidationError(`${name} follows hit points and death saves for ${this.data.name}`, {
        characterId: this.data.id,
        condition: name,
      });
    }

    const wasDead = hasCondition(this.data.conditions, DEAD);
    this.data.conditions = withoutConditions(this.data.conditions, name);
    if (wasDead && name === DEAD) {
      this.resetDeathSaves();
      this.syncVitalityConditions();
    }
  }

  /**
   * Replace the whole list (DM override). Leaving out `Dead` revives the save clock.
   * For PCs, `Unconscious` and `Stable` in the list are ignored and re-derived
   * from hit points and saves.
   */
  replaceConditions(conditions: readonly string[]): void {
    const normalized = normalizeConditions(conditions);
    for (const condition of normalized) {
      this.assertAssignable(condition);
    }

    const wasDead = this.isDead();
    if (!isPlayerCharacter(this.data)) {
      this.data.conditions = normalized;
      return;
    }

    this.data.conditions = withoutConditions(normalized, UNCONSCIOUS, STABLE);
    if (wasDead && !hasCondition(this.data.conditions, DEAD)) {
      this.resetDeathSaves();
    }
    this.syncVitalityConditions();
  }

  // ========== Status ==========

  isDead(): boolean {
    return hasCondition(this.data.conditions, DEAD) || this.data.deathSaveFailures >= MAX_DEATH_SAVES;
  }

  isStable(): boolean {
    return (
      isPlayerCharacter(this.data) &&
      !this.isDead() &&
      this.data.currentHp === 0 &&
      this.data.deathSaveSuccesses >= MAX_DEATH_SAVES
    );
  }

  getStatus(): VitalStatus {
    if (!isPlayerCharacter(this.data)) {
      return this.data.currentHp === 0 || hasCondition(this.data.conditions, DEAD) ? 'Defeated' : 'Alive';
    }
    if (this.isDead()) return 'Dead';
    if (this.data.currentHp > 0) return 'Alive';
    return this.isStable() ? 'Stable' : 'Unconscious';
  }

  getCombatStatus(): CombatantStatus {
    const status = this.getStatus();
    return status === 'Alive' ? 'none' : status;
  }

  // ========== Internals ==========

  /**
   * `Defeated` is a derived status, never a stored condition
   */
  private assertAssignable(condition: string): void {
    if (condition === DEFEATED_STATUS) {
      throw new ValidationError(`${DEFEATED_STATUS} is derived from hit points; use mark_defeated or current_hp`, {
        characterId: this.data.id,
      });
    }
  }

  /**
   * Bring a PC's Unconscious/Stable/Dead conditions in line with hp and counters
   */
  private syncVitalityConditions(): void {
    if (!isPlayerCharacter(this.data)) return;

    if (hasCondition(this.data.conditions, DEAD) || this.data.currentHp > 0) {
      this.data.conditions = withoutConditions(this.data.conditions, UNCONSCIOUS, STABLE);
    } else if (this.data.deathSaveSuccesses >= MAX_DEATH_SAVES) {
      this.enterStable();
    } else {
      this.data.conditions = withCondition(withoutConditions(this.data.conditions, STABLE), UNCONSCIOUS);
    }
  }

  private enterStable(): void {
    this.data.conditions = withCondition(withoutConditions(this.data.conditions, UNCONSCIOUS), STABLE);
  }

  private resetDeathSaves(): void {
    this.data.deathSaveSuccesses = 0;
    this.data.deathSaveFailures = 0;
  }

  private assertDying(action: string): void {
    if (!isPlayerCharacter(this.data)) {
      throw new InvalidStateError(`Cannot ${action} for ${this.data.name}: death saves apply to player characters only`, {
        characterId: this.data.id,
      });
    }
    if (this.isDead()) {
      throw new InvalidStateError(`Cannot ${action} for ${this.data.name}: character is dead`, {
        characterId: this.data.id,
      });
    }
    if (this.data.currentHp > 0) {
      throw new InvalidStateError(`Cannot ${action} for ${this.data.name}: character is not at 0 hp`, {
        characterId: this.data.id,
        currentHp: this.data.currentHp,
      });
    }
  }
}

export function getVitalStatus(character: Character): VitalStatus {
  return new CharacterVitality(character).getStatus();
}

export function getCombatStatus(character: Character): CombatantStatus {
  return new CharacterVitality(character).getCombatStatus();
}

function assertInteger(value: number, field: string): void {
  if (!Number.isInteger(value)) {
    throw new ValidationError(`${field} must be an integer`, { field, value });
  }
}

function assertSaveIncrement(count: number, field: string): void {
  assertInteger(count, field);
  if (count < 1) {
    throw new ValidationError(`${field} must be a positive number of saves`, { field, value: count });
  }
}
