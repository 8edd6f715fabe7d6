// Domain layer: Character types
// Pure TypeScript - no external dependencies

export type CharacterType = 'PC' | 'NPC' | 'Enemy';

/**
 * A character on the campaign roster (party members and enlisted enemies alike).
 * The roster record is the only place hit points, conditions and initiative live;
 * combat views are projected from it.
 */
export interface Character {
  id: string;
  name: string;
  type: CharacterType;

  // Combat stats
  maxHp: number;
  currentHp: number;
  temporaryHp: number;
  armorClass: number;
  initiative: number;

  // Status
  conditions: string[];
  statusNotes?: string;

  // Death saves (PCs only), each 0..3
  deathSaveSuccesses: number;
  deathSaveFailures: number;

  // Weak reference to the controlling player
  playerId?: string;
  playerName?: string;
}

/**
 * Derived vitality state. `Defeated` only ever applies to NPCs and enemies.
 */
export type VitalStatus = 'Alive' | 'Unconscious' | 'Stable' | 'Dead' | 'Defeated';

export function isPlayerCharacter(character: Pick<Character, 'type'>): boolean {
  return character.type === 'PC';
}

export function createCharacter(partial: Partial<Character> & Pick<Character, 'id' | 'name'>): Character {
  const maxHp = partial.maxHp ?? 10;
  return {
    type: 'PC',
    maxHp,
    currentHp: maxHp,
    temporaryHp: 0,
    armorClass: 10,
    initiative: 0,
    conditions: [],
    deathSaveSuccesses: 0,
    deathSaveFailures: 0,
    ...partial,
  };
}
