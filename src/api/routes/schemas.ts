// API layer: Shared request schemas

import { z } from 'zod';

// Face ranges and the exact count are checked by the Roll model so the engine reports INVALID_ROLL
export const MAX_DICE_IN_REQUEST = 20;

export const DiceSchema = z.array(z.number().int()).max(MAX_DICE_IN_REQUEST);

export const RollRequestSchema = z.object({
  dice: DiceSchema,
});

export const SelectionRequestSchema = z.object({
  dice: DiceSchema,
  categoryId: z.string().min(1),
});

export const CreateScoresheetSchema = z.object({
  requestId: z.string().min(1).max(100).optional(),
  player: z.string().min(1).max(100).optional(),
});
