import type { Caller } from '../auth/decorators/current-user.decorator.js';
import type { Appointment } from '../slot-store/slot-store.types.js';

export type AppointmentAction = 'read' | 'update' | 'delete';
export type PolicyDecision = 'allow' | 'deny';

/**
 * Ownership rules, independent of appointment state: the creator may do
 * anything, the assigned doctor may read and update, nobody else may act.
 */
export function authorizeAppointment(
  action: AppointmentAction,
  caller: Caller,
  appointment: Pick<Appointment, 'createdBy' | 'doctorId'>,
): PolicyDecision {
  if (appointment.createdBy === caller.userId) {
    return 'allow';
  }
  const isAssignedDoctor =
    caller.doctorId !== null && caller.doctorId === appointment.doctorId;
  if (isAssignedDoctor && action !== 'delete') {
    return 'allow';
  }
  return 'deny';
}
