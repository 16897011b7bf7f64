import { z } from 'zod';
import {
  dateTimeSchema,
  deliveryModeSchema,
  idSchema,
} from '../../../common/validation/schedule.schemas.js';

const bookingMetadata = {
  institution_id: idSchema.optional(),
  specialty_id: idSchema.optional(),
  urgency: z.string().min(1).max(10).default('a'),
  visit_type: z.string().min(1).max(30).default('general'),
  delivery_mode: deliveryModeSchema.optional(),
  state: z.enum(['free', 'confirmed']).default('confirmed'),
  idempotency_key: z.string().min(1).max(64).optional(),
};

export const BookAppointmentSchema = z.union([
  z.object({
    slot_id: idSchema,
    ...bookingMetadata,
  }),
  // Legacy target: a doctor and a wall-clock start instead of a slot id
  z.object({
    doctor_id: idSchema,
    appointment_date: dateTimeSchema,
    ...bookingMetadata,
  }),
]);

export type BookAppointmentDto = z.infer<typeof BookAppointmentSchema>;
