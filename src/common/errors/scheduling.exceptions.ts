import {
  BadRequestException,
  ConflictException,
  ForbiddenException,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';

export const SCHEDULING_ERROR_CODES = [
  'validation_error',
  'not_found',
  'forbidden',
  'slot_unavailable',
  'slot_conflict',
  'invalid_state',
] as const;
export type SchedulingErrorCode = (typeof SCHEDULING_ERROR_CODES)[number];

export function isSchedulingErrorCode(
  value: unknown,
): value is SchedulingErrorCode {
  return SCHEDULING_ERROR_CODES.some((code) => code === value);
}

export class SchedulingValidationException extends BadRequestException {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ error: 'validation_error', message, ...details });
  }
}

export class ResourceNotFoundException extends NotFoundException {
  constructor(resource: 'Slot' | 'Appointment', id: number) {
    super({ error: 'not_found', message: `${resource} ${id} not found` });
  }
}

export class OwnershipForbiddenException extends ForbiddenException {
  constructor(message = 'You are not allowed to act on this resource') {
    super({ error: 'forbidden', message });
  }
}

export class SlotUnavailableException extends ConflictException {
  constructor(message = 'Slot is no longer available') {
    super({ error: 'slot_unavailable', message });
  }
}

export class SlotConflictException extends ConflictException {
  constructor(message = 'Slot overlaps another slot of the same doctor') {
    super({ error: 'slot_conflict', message });
  }
}

export class InvalidSlotStateException extends UnprocessableEntityException {
  constructor(message: string) {
    super({ error: 'invalid_state', message });
  }
}
