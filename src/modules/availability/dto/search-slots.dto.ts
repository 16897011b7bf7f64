import { z } from 'zod';
import { calendarDateSchema } from '../../../common/validation/schedule.schemas.js';

export const DoctorDayQuerySchema = z.object({
  date: calendarDateSchema,
});

export const SpecialtyQuerySchema = z.object({
  from: calendarDateSchema.optional(),
});
