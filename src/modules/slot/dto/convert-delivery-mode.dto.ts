import { z } from 'zod';
import { deliveryModeSchema } from '../../../common/validation/schedule.schemas.js';

export const ConvertDeliveryModeSchema = z.object({
  delivery_mode: deliveryModeSchema,
});

export type ConvertDeliveryModeDto = z.infer<typeof ConvertDeliveryModeSchema>;
