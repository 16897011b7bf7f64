import {
  OwnershipForbiddenException,
  SchedulingValidationException,
} from '../../common/errors/scheduling.exceptions.js';
import type { Caller } from '../auth/decorators/current-user.decorator.js';

/**
 * Doctor whose slots a request operates on. Doctors always act on their own
 * profile; admins must name one.
 */
export function resolveActingDoctor(caller: Caller, requested?: number): number {
  if (caller.role === 'doctor') {
    if (caller.doctorId === null) {
      throw new OwnershipForbiddenException('Caller has no doctor profile');
    }
    if (requested !== undefined && requested !== caller.doctorId) {
      throw new OwnershipForbiddenException('Doctors may only manage their own slots');
    }
    return caller.doctorId;
  }
  if (caller.role === 'admin') {
    if (requested === undefined) {
      throw new SchedulingValidationException('doctor_id is required');
    }
    return requested;
  }
  throw new OwnershipForbiddenException();
}

/** Doctor filter for id-addressed slot mutations; null lets admins reach any slot. */
export function ownedDoctorScope(caller: Caller): number | null {
  return caller.role === 'admin' ? null : resolveActingDoctor(caller);
}
