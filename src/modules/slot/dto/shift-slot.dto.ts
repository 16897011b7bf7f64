import { z } from 'zod';
import {
  calendarDateSchema,
  timeOfDaySchema,
} from '../../../common/validation/schedule.schemas.js';

export const ShiftSlotSchema = z.object({
  date: calendarDateSchema,
  time: timeOfDaySchema,
});

export type ShiftSlotDto = z.infer<typeof ShiftSlotSchema>;
