import { Inject, Injectable } from '@nestjs/common';
import { Clock } from '../../common/clock.js';
import { toDateString } from '../../common/time.js';
import { SLOT_STORE, type SlotStore } from '../slot-store/slot-store.js';
import type { Slot, SlotFilters } from '../slot-store/slot-store.types.js';

/** Read-only slot queries; every call reads committed store state. */
@Injectable()
export class AvailabilityService {
  constructor(
    @Inject(SLOT_STORE) private readonly store: SlotStore,
    private readonly clock: Clock,
  ) {}

  async searchDoctorDay(doctorId: number, date: string): Promise<Slot[]> {
    return this.store.read((session) =>
      session.findSlotsByDoctorAndDate(doctorId, date),
    );
  }

  /** Free slots of every doctor linked to the specialty, from `fromDate` (today by default). */
  async searchBySpecialty(specialtyId: number, fromDate?: string): Promise<Slot[]> {
    const from = fromDate ?? toDateString(this.clock.now());
    return this.store.read((session) =>
      session.findFreeSlotsBySpecialty(specialtyId, from),
    );
  }

  async listDoctorSlots(doctorId: number, filters: SlotFilters): Promise<Slot[]> {
    return this.store.read((session) => session.listDoctorSlots(doctorId, filters));
  }
}
