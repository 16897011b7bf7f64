import { z } from 'zod';
import {
  calendarDateSchema,
  deliveryModeSchema,
  idSchema,
  slotStateSchema,
} from '../../../common/validation/schedule.schemas.js';

export const ListSlotsQuerySchema = z.object({
  doctor_id: idSchema.optional(),
  date: calendarDateSchema.optional(),
  state: slotStateSchema.optional(),
  delivery_mode: deliveryModeSchema.optional(),
});

export type ListSlotsQueryDto = z.infer<typeof ListSlotsQuerySchema>;
