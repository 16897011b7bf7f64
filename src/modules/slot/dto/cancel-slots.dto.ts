import { z } from 'zod';
import {
  calendarDateSchema,
  idSchema,
} from '../../../common/validation/schedule.schemas.js';

export const CancelSlotsSchema = z.object({
  slot_ids: z.array(idSchema).min(1).max(500),
});

export type CancelSlotsDto = z.infer<typeof CancelSlotsSchema>;

export const CancelSlotsByDateSchema = z.object({
  date: calendarDateSchema,
  // Admin only: a doctor id, or "all" for every doctor
  doctor_id: z.union([idSchema, z.literal('all')]).optional(),
});

export type CancelSlotsByDateDto = z.infer<typeof CancelSlotsByDateSchema>;
