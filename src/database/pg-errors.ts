import {
  SlotConflictException,
  SlotUnavailableException,
} from '../common/errors/scheduling.exceptions.js';

export const EXCLUSION_VIOLATION = '23P01';
export const UNIQUE_VIOLATION = '23505';
export const LOCK_NOT_AVAILABLE = '55P03';
export const DEADLOCK_DETECTED = '40P01';

export interface PgError {
  code: string;
  constraint?: string;
}

export function isPgError(error: unknown): error is PgError {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

export function isUniqueViolation(error: unknown, constraintFragment: string) {
  return (
    isPgError(error) &&
    error.code === UNIQUE_VIOLATION &&
    (error.constraint?.includes(constraintFragment) ?? false)
  );
}

/** Maps constraint violations raised by concurrent writers onto scheduling errors. */
export function translateStoreError(error: unknown): unknown {
  if (!isPgError(error)) {
    return error;
  }
  if (error.code === EXCLUSION_VIOLATION && error.constraint === 'no_slot_overlap') {
    return new SlotConflictException();
  }
  if (isUniqueViolation(error, 'uq_live_appointment_per_slot')) {
    return new SlotUnavailableException();
  }
  if (error.code === LOCK_NOT_AVAILABLE || error.code === DEADLOCK_DETECTED) {
    return new SlotUnavailableException();
  }
  return error;
}
