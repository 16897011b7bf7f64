import type { Appointment } from '../slot-store/slot-store.types.js';

export function presentAppointment(appointment: Appointment) {
  return {
    id: appointment.id,
    slot_id: appointment.slotId,
    doctor_id: appointment.doctorId,
    patient_id: appointment.patientId,
    institution_id: appointment.institutionId,
    specialty_id: appointment.specialtyId,
    urgency: appointment.urgency,
    visit_type: appointment.visitType,
    delivery_mode: appointment.deliveryMode,
    state: appointment.state,
    created_by: appointment.createdBy,
    created_at: appointment.createdAt.toISOString(),
    updated_at: appointment.updatedAt.toISOString(),
  };
}
