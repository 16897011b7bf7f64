import { z } from 'zod';
import { SchedulingValidationException } from '../errors/scheduling.exceptions.js';
import { isCalendarDate, parseTimeOfDay } from '../time.js';
import {
  DELIVERY_MODES,
  SLOT_STATES,
} from '../../modules/slot-store/slot-store.types.js';

export const idSchema = z.coerce.number().int().positive();

export const calendarDateSchema = z
  .string()
  .refine(isCalendarDate, { message: 'Expected a date formatted as YYYY-MM-DD' });

export const timeOfDaySchema = z.string().transform((value, ctx) => {
  const time = parseTimeOfDay(value);
  if (time === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Expected a time formatted as HH:mm or hh:mm AM/PM',
    });
    return z.NEVER;
  }
  return time;
});

/** `YYYY-MM-DD HH:mm[:ss]` or `YYYY-MM-DD hh:mm AM/PM`, split into date and time. */
export const dateTimeSchema = z.string().transform((value, ctx) => {
  const trimmed = value.trim();
  const separator = trimmed.search(/[ T]/);
  const date = separator > 0 ? trimmed.slice(0, separator) : '';
  const time = separator > 0 ? parseTimeOfDay(trimmed.slice(separator + 1)) : null;
  if (!isCalendarDate(date) || time === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'Expected a date-time formatted as YYYY-MM-DD HH:mm',
    });
    return z.NEVER;
  }
  return { date, time };
});

export const deliveryModeSchema = z.enum(DELIVERY_MODES);
export const slotStateSchema = z.enum(SLOT_STATES);

export const slotDurationSchema = z.number().int().positive().max(720);

/** Parses untrusted input, raising the uniform validation error on failure. */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new SchedulingValidationException('Invalid request', {
      details: parsed.error.flatten(),
    });
  }
  return parsed.data;
}
