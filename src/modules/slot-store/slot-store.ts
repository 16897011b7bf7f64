import type {
  Appointment,
  AppointmentFilters,
  AppointmentPatch,
  DeliveryMode,
  LockOptions,
  NewAppointment,
  NewSlot,
  Slot,
  SlotAuditEntry,
  SlotFilters,
  SlotSchedule,
} from './slot-store.types.js';

export const SLOT_STORE = 'SLOT_STORE';

/**
 * Persistence operations available inside a unit of work. Every mutation is
 * conditional on the row's current state so that callers racing on the same
 * slot observe a single winner.
 */
export interface SlotSession {
  findSlot(id: number, options?: LockOptions): Promise<Slot | null>;
  /**
   * Serializes slot-set changes of one doctor until the unit of work ends.
   * Taken before reading existing slots to decide what to insert or move.
   */
  lockDoctor(doctorId: number): Promise<void>;
  /** Locks the given slots in id order and returns those that exist. */
  lockSlots(ids: number[]): Promise<Slot[]>;
  /** Live slots of one doctor on one date, ordered by start time. */
  findSlotsByDoctorAndDate(doctorId: number, date: string): Promise<Slot[]>;
  /** Live slots of one doctor within an inclusive date range. */
  findLiveSlotsInRange(
    doctorId: number,
    fromDate: string,
    toDate: string,
  ): Promise<Slot[]>;
  /** Live slots on a date, for one doctor or for all when `doctorId` is null, by doctor then start. */
  findLiveSlotsOnDate(date: string, doctorId: number | null): Promise<Slot[]>;
  listDoctorSlots(doctorId: number, filters: SlotFilters): Promise<Slot[]>;
  /** Free slots of the specialty's active doctors. */
  findFreeSlotsBySpecialty(
    specialtyId: number,
    fromDate: string,
  ): Promise<Slot[]>;
  /** Live slots of the doctor whose interval intersects `[startTime, endTime)`. */
  findOverlappingSlots(
    doctorId: number,
    date: string,
    startTime: string,
    endTime: string,
    excludeSlotId?: number,
  ): Promise<Slot[]>;
  /** Locks the free slot starting at the given time, failing fast if another unit of work holds it. */
  findFreeSlotAt(
    doctorId: number,
    date: string,
    startTime: string,
  ): Promise<Slot | null>;

  insertSlots(rows: NewSlot[]): Promise<Slot[]>;
  /** free -> booked; null when the slot was not free. */
  claimSlot(id: number): Promise<Slot | null>;
  /** booked -> free; null when the slot was not booked. */
  releaseSlot(id: number): Promise<Slot | null>;
  /** Cancels the given slots that are not cancelled yet and returns them. */
  cancelSlots(ids: number[]): Promise<Slot[]>;
  updateSlotSchedule(id: number, schedule: SlotSchedule): Promise<Slot>;
  updateSlotDeliveryMode(id: number, mode: DeliveryMode): Promise<Slot>;

  findAppointment(id: number, options?: LockOptions): Promise<Appointment | null>;
  /** Keys are scoped to the user who created the appointment. */
  findAppointmentByIdempotencyKey(
    createdBy: number,
    key: string,
  ): Promise<Appointment | null>;
  findLiveAppointmentBySlot(slotId: number): Promise<Appointment | null>;
  listAppointments(filters: AppointmentFilters): Promise<Appointment[]>;
  insertAppointment(row: NewAppointment): Promise<Appointment>;
  updateAppointment(id: number, patch: AppointmentPatch): Promise<Appointment>;
  /** Cancels live appointments attached to the given slots and returns them. */
  cancelAppointmentsForSlots(slotIds: number[]): Promise<Appointment[]>;

  recordAudit(entries: SlotAuditEntry[]): Promise<void>;
}

export interface SlotStore {
  /** Runs `work` atomically; any thrown error rolls every write back. */
  transaction<T>(work: (session: SlotSession) => Promise<T>): Promise<T>;
  read<T>(work: (session: SlotSession) => Promise<T>): Promise<T>;
}
