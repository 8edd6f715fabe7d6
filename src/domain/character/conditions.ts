// Domain layer: Condition names
// Pure constants - no dependencies

/**
 * Conditions the vitality state machine owns. Everything else is free-form.
 */
export const VITALITY_CONDITIONS = {
  UNCONSCIOUS: 'Unconscious',
  STABLE: 'Stable',
  DEAD: 'Dead',
} as const;

export type VitalityCondition = typeof VITALITY_CONDITIONS[keyof typeof VITALITY_CONDITIONS];

export const MAX_DEATH_SAVES = 3;

export function hasCondition(conditions: readonly string[], condition: string): boolean {
  return conditions.includes(condition);
}

/**
 * Add a condition, keeping set semantics and insertion order
 */
export function withCondition(conditions: readonly string[], condition: string): string[] {
  return conditions.includes(condition) ? [...conditions] : [...conditions, condition];
}

export function withoutConditions(conditions: readonly string[], ...remove: string[]): string[] {
  return conditions.filter((c) => !remove.includes(c));
}

/**
 * Trim and de-duplicate a condition list supplied by a caller
 */
export function normalizeConditions(conditions: readonly string[]): string[] {
  const out: string[] = [];
  for (const raw of conditions) {
    const condition = raw.trim();
    if (condition && !out.includes(condition)) {
      out.push(condition);
    }
  }
  return out;
}
