import { z } from 'zod';
import {
  calendarDateSchema,
  idSchema,
  slotDurationSchema,
  timeOfDaySchema,
} from '../../../common/validation/schedule.schemas.js';

export const RescheduleSlotsByDateSchema = z.object({
  doctor_id: idSchema.optional(),
  source_date: calendarDateSchema,
  start_date: calendarDateSchema,
  end_date: calendarDateSchema,
  start_time: timeOfDaySchema,
  end_time: timeOfDaySchema,
  duration_minutes: slotDurationSchema,
});

export type RescheduleSlotsByDateDto = z.infer<typeof RescheduleSlotsByDateSchema>;
