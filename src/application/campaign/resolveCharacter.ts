// Application layer: Character lookup by id or exact name

import type { Character } from '@/domain/character/types.js';
import { NotFoundError } from '@/utils/errors.js';

/**
 * Exact id wins; otherwise the name must match exactly one roster entry.
 */
export function resolveCharacter(roster: Character[], nameOrId: string): Character {
  const byId = roster.find((c) => c.id === nameOrId);
  if (byId) {
    return byId;
  }

  const byName = roster.filter((c) => c.name === nameOrId);
  if (byName.length === 1) {
    return byName[0];
  }

  if (byName.length > 1) {
    throw new NotFoundError(`Character name "${nameOrId}" is ambiguous; use the character id`, {
      reference: nameOrId,
      candidates: byName.map((c) => c.id),
    });
  }

  throw new NotFoundError(`Character ${nameOrId} not found`, { reference: nameOrId });
}
