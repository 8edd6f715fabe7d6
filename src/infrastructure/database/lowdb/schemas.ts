// Storage-edge schemas: decode the JSON columns of a CampaignRecord into typed values

import { z } from 'zod';
import type { LogImportance } from '@/domain/campaign/types.js';
import type { CharacterType } from '@/domain/character/types.js';

const characterTypeSchema = z.enum(['PC', 'NPC', 'Enemy']) satisfies z.ZodType<CharacterType>;

export const characterSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: characterTypeSchema,
  maxHp: z.number().int(),
  currentHp: z.number().int(),
  temporaryHp: z.number().int().default(0),
  armorClass: z.number().int().default(10),
  initiative: z.number().int().default(0),
  conditions: z.array(z.string()).default([]),
  statusNotes: z.string().optional(),
  deathSaveSuccesses: z.number().int().min(0).max(3).default(0),
  deathSaveFailures: z.number().int().min(0).max(3).default(0),
  playerId: z.string().optional(),
  playerName: z.string().optional(),
});

export const rosterSchema = z.array(characterSchema);

const turnOrderEntrySchema = z.object({
  id: z.string(),
  isDefeated: z.boolean(),
  isSurprised: z.boolean(),
});

export const encounterSchema = z.object({
  id: z.string(),
  isActive: z.boolean(),
  roundNumber: z.number().int().min(1),
  turnOrder: z.array(turnOrderEntrySchema),
  currentTurnIndex: z.number().int().nullable(),
  surprisedEntities: z.array(z.string()).default([]),
  defeated: z.array(turnOrderEntrySchema).default([]),
  startedAt: z.number(),
});

export const choicesSchema = z.array(z.string());

export const logImportanceSchema = z.enum(['minor', 'standard', 'critical']) satisfies z.ZodType<LogImportance>;

export const narrativeLogSchema = z.array(
  z.object({
    id: z.string(),
    timestamp: z.number(),
    entry: z.string(),
    importance: logImportanceSchema,
  })
);

export const recentRollsSchema = z.array(
  z.object({
    id: z.string(),
    characterId: z.string(),
    characterName: z.string(),
    checkType: z.string(),
    result: z.number().int(),
    outcome: z.string(),
    timestamp: z.number(),
  })
);

/**
 * Parse a JSON column and validate its shape. Anything malformed surfaces as a ZodError
 * or SyntaxError for the caller to wrap.
 */
export function decodeColumn<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const parsed: unknown = JSON.parse(raw);
  return schema.parse(parsed);
}
