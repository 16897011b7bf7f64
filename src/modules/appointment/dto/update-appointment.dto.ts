import { z } from 'zod';
import { dateTimeSchema } from '../../../common/validation/schedule.schemas.js';
import { APPOINTMENT_STATES } from '../../slot-store/slot-store.types.js';

export const UpdateAppointmentSchema = z
  .object({
    appointment_date: dateTimeSchema.optional(),
    state: z.enum(APPOINTMENT_STATES).optional(),
  })
  .refine(
    (dto) => dto.appointment_date !== undefined || dto.state !== undefined,
    { message: 'Provide appointment_date or state' },
  );

export type UpdateAppointmentDto = z.infer<typeof UpdateAppointmentSchema>;
