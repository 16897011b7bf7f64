export const SLOT_STATES = ['free', 'booked', 'cancelled'] as const;
export type SlotState = (typeof SLOT_STATES)[number];

export const DELIVERY_MODES = ['physical', 'telemedicine'] as const;
export type DeliveryMode = (typeof DELIVERY_MODES)[number];

export const APPOINTMENT_STATES = ['free', 'confirmed', 'cancelled'] as const;
export type AppointmentState = (typeof APPOINTMENT_STATES)[number];

export type SlotAuditAction =
  | 'generated'
  | 'shifted'
  | 'rescheduled'
  | 'cancelled'
  | 'converted'
  | 'booked'
  | 'released';

/** Dates are `YYYY-MM-DD`, times are `HH:mm` in clinic-local time. */
export interface Slot {
  id: number;
  doctorId: number;
  date: string;
  startTime: string;
  endTime: string;
  durationMinutes: number;
  deliveryMode: DeliveryMode;
  state: SlotState;
  createdAt: Date;
  updatedAt: Date;
}

export type NewSlot = Pick<
  Slot,
  'doctorId' | 'date' | 'startTime' | 'endTime' | 'durationMinutes' | 'deliveryMode'
>;

export type SlotSchedule = Pick<
  Slot,
  'date' | 'startTime' | 'endTime' | 'durationMinutes'
>;

export interface Appointment {
  id: number;
  slotId: number;
  doctorId: number;
  patientId: number;
  institutionId: number | null;
  specialtyId: number | null;
  urgency: string;
  visitType: string;
  deliveryMode: DeliveryMode;
  state: AppointmentState;
  createdBy: number;
  idempotencyKey: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewAppointment = Omit<Appointment, 'id' | 'createdAt' | 'updatedAt'>;

export type AppointmentPatch = Partial<
  Pick<Appointment, 'slotId' | 'state' | 'deliveryMode'>
>;

export interface SlotAuditEntry {
  slotId: number;
  action: SlotAuditAction;
  changes?: Record<string, unknown>;
  performedBy: number | null;
}

export interface SlotFilters {
  date?: string;
  state?: SlotState;
  deliveryMode?: DeliveryMode;
}

export interface AppointmentFilters {
  createdBy?: number;
  doctorId?: number;
}

export interface LockOptions {
  lock?: boolean;
}
