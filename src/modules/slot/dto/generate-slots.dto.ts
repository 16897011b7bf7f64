import { z } from 'zod';
import {
  calendarDateSchema,
  deliveryModeSchema,
  idSchema,
  slotDurationSchema,
  timeOfDaySchema,
} from '../../../common/validation/schedule.schemas.js';

export const GenerateSlotsSchema = z.object({
  // Admins name the doctor; doctors always generate for themselves
  doctor_id: idSchema.optional(),
  delivery_mode: deliveryModeSchema.default('physical'),
  start_date: calendarDateSchema,
  end_date: calendarDateSchema,
  start_time: timeOfDaySchema,
  end_time: timeOfDaySchema,
  duration_minutes: slotDurationSchema,
});

export type GenerateSlotsDto = z.infer<typeof GenerateSlotsSchema>;
