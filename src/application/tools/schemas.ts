// Application layer: Tool argument schemas
// Top-level tool arguments are snake_case; combatant descriptions use the camelCase field names of CombatantInfo.

import { z } from 'zod';

const characterRef = z.string().trim().min(1, 'character_id is required');
const integer = z.number().int();

export const CombatantInfoSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  type: z.enum(['PC', 'NPC', 'Enemy']),
  initiative: integer,
  currentHp: integer.min(0),
  maxHp: integer.min(1),
  armorClass: integer.min(0).optional(),
  isSurprised: z.boolean().optional(),
});

export const EmptyArgsSchema = z.object({}).passthrough();

export const StartCombatSchema = z.object({
  combatants: z.array(CombatantInfoSchema),
});

export const SetInitiativeSchema = z.object({
  character_id: characterRef,
  value: integer,
});

export const CharacterRefSchema = z.object({
  character_id: characterRef,
});

export const AddCombatantSchema = z.object({
  combatant: CombatantInfoSchema,
});

const saveCount = integer.default(1);

export const UpdateCharacterStateSchema = z.discriminatedUnion('key', [
  z.object({ character_id: characterRef, key: z.literal('current_hp'), value: integer }),
  z.object({ character_id: characterRef, key: z.literal('damage'), value: integer.min(0) }),
  z.object({ character_id: characterRef, key: z.literal('temporary_hp'), value: integer.min(0) }),
  z.object({ character_id: characterRef, key: z.literal('conditions'), value: z.array(z.string()) }),
  z.object({ character_id: characterRef, key: z.literal('add_condition'), value: z.string().trim().min(1) }),
  z.object({ character_id: characterRef, key: z.literal('remove_condition'), value: z.string().trim().min(1) }),
  z.object({ character_id: characterRef, key: z.literal('status_notes'), value: z.string() }),
  z.object({ character_id: characterRef, key: z.literal('initiative'), value: integer }),
  z.object({ character_id: characterRef, key: z.literal('death_save_success'), value: saveCount }),
  z.object({ character_id: characterRef, key: z.literal('death_save_failure'), value: saveCount }),
  z.object({ character_id: characterRef, key: z.literal('stabilize'), value: z.unknown().optional() }),
]);

export const PresentChoicesSchema = z.object({
  choices: z.array(z.string()).max(10),
});

export const SubmitChoiceSchema = z.object({
  character_id: characterRef,
  choice: z.string().trim().min(1),
});

export const AtmospherePulseSchema = z.object({
  text: z.string().trim().min(1),
  intensity: z.enum(['Low', 'Medium', 'High']).optional(),
  sensory_type: z.enum(['Sound', 'Smell', 'Visual', 'Feeling']).optional(),
});

export const NarrativeAnchorSchema = z.object({
  short_text: z.string().trim().min(1),
  mood_category: z.enum(['Danger', 'Mystery', 'Safety', 'Urgency']).optional(),
});

export const GroupInsightSchema = z.object({
  text: z.string().trim().min(1),
  relevant_skill: z.string().trim().min(1),
  highlight_effect: z.boolean().default(false),
});

export const UpdateGameLogSchema = z.object({
  entry: z.string().trim().min(1),
  importance: z.enum(['minor', 'standard', 'critical']).default('standard'),
});

export const ReadAloudTextSchema = z.object({
  text: z.string().trim().min(1),
});

export const LogPlayerRollSchema = z.object({
  character_id: characterRef,
  check_type: z.string().trim().min(1),
  result: integer,
  outcome: z.string().trim().min(1),
});

export const SceneImageSchema = z.object({
  description: z.string().trim().min(1),
});

export type UpdateCharacterStateArgs = z.infer<typeof UpdateCharacterStateSchema>;
