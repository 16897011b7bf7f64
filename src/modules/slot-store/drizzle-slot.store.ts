import { Inject, Injectable } from '@nestjs/common';
import { and, asc, desc, eq, gt, gte, inArray, lt, lte, ne, type SQL } from 'drizzle-orm';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import type { NeonQueryResultHKT } from 'drizzle-orm/neon-serverless';
import {
  DATABASE_CONNECTION,
  type DatabaseConnection,
} from '../../database/database.module.js';
import { translateStoreError } from '../../database/pg-errors.js';
import * as schema from '../../database/schema/index.js';
import type { SlotSession, SlotStore } from './slot-store.js';
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

const { doctors, slots, appointments, slotAuditLog, doctorSpecialties } = schema;

/** Both the pooled connection and an open transaction satisfy this. */
type Executor = PgDatabase<NeonQueryResultHKT, typeof schema>;
type SlotRow = typeof slots.$inferSelect;

/** Postgres renders TIME as `HH:mm:ss`; the domain speaks `HH:mm`. */
function toSlot(row: SlotRow): Slot {
  return {
    ...row,
    startTime: row.startTime.slice(0, 5),
    endTime: row.endTime.slice(0, 5),
  };
}

const liveSlot = () => ne(slots.state, 'cancelled');
const liveAppointment = () => ne(appointments.state, 'cancelled');

export class DrizzleSlotSession implements SlotSession {
  constructor(private readonly db: Executor) {}

  async findSlot(id: number, options: LockOptions = {}) {
    const query = this.db.select().from(slots).where(eq(slots.id, id));
    const [row] = options.lock ? await query.for('update') : await query;
    return row ? toSlot(row) : null;
  }

  async lockDoctor(doctorId: number) {
    // NO KEY UPDATE leaves foreign-key checks from slot and appointment inserts unblocked
    await this.db
      .select({ id: doctors.id })
      .from(doctors)
      .where(eq(doctors.id, doctorId))
      .for('no key update');
  }

  async lockSlots(ids: number[]) {
    if (ids.length === 0) {
      return [];
    }
    const rows = await this.db
      .select()
      .from(slots)
      .where(inArray(slots.id, ids))
      .orderBy(asc(slots.id))
      .for('update');
    return rows.map(toSlot);
  }

  async findSlotsByDoctorAndDate(doctorId: number, date: string) {
    const rows = await this.db
      .select()
      .from(slots)
      .where(and(eq(slots.doctorId, doctorId), eq(slots.date, date)))
      .orderBy(asc(slots.startTime));
    return rows.map(toSlot);
  }

  async findLiveSlotsInRange(doctorId: number, fromDate: string, toDate: string) {
    const rows = await this.db
      .select()
      .from(slots)
      .where(
        and(
          eq(slots.doctorId, doctorId),
          gte(slots.date, fromDate),
          lte(slots.date, toDate),
          liveSlot(),
        ),
      )
      .orderBy(asc(slots.date), asc(slots.startTime));
    return rows.map(toSlot);
  }

  async findLiveSlotsOnDate(date: string, doctorId: number | null) {
    const conditions: SQL[] = [eq(slots.date, date), liveSlot()];
    if (doctorId !== null) {
      conditions.push(eq(slots.doctorId, doctorId));
    }
    const rows = await this.db
      .select()
      .from(slots)
      .where(and(...conditions))
      .orderBy(asc(slots.doctorId), asc(slots.startTime));
    return rows.map(toSlot);
  }

  async listDoctorSlots(doctorId: number, filters: SlotFilters) {
    const conditions: SQL[] = [eq(slots.doctorId, doctorId)];
    if (filters.date) conditions.push(eq(slots.date, filters.date));
    if (filters.state) conditions.push(eq(slots.state, filters.state));
    if (filters.deliveryMode) {
      conditions.push(eq(slots.deliveryMode, filters.deliveryMode));
    }
    const rows = await this.db
      .select()
      .from(slots)
      .where(and(...conditions))
      .orderBy(asc(slots.date), asc(slots.startTime));
    return rows.map(toSlot);
  }

  async findFreeSlotsBySpecialty(specialtyId: number, fromDate: string) {
    const rows = await this.db
      .select({ slot: slots })
      .from(slots)
      .innerJoin(doctorSpecialties, eq(doctorSpecialties.doctorId, slots.doctorId))
      .innerJoin(doctors, eq(doctors.id, slots.doctorId))
      .where(
        and(
          eq(doctorSpecialties.specialtyId, specialtyId),
          eq(doctors.isActive, true),
          eq(slots.state, 'free'),
          gte(slots.date, fromDate),
        ),
      )
      .orderBy(asc(slots.date), asc(slots.startTime), asc(slots.doctorId));
    return rows.map((row) => toSlot(row.slot));
  }

  async findOverlappingSlots(
    doctorId: number,
    date: string,
    startTime: string,
    endTime: string,
    excludeSlotId?: number,
  ) {
    const conditions: SQL[] = [
      eq(slots.doctorId, doctorId),
      eq(slots.date, date),
      liveSlot(),
      lt(slots.startTime, endTime),
      gt(slots.endTime, startTime),
    ];
    if (excludeSlotId !== undefined) {
      conditions.push(ne(slots.id, excludeSlotId));
    }
    const rows = await this.db
      .select()
      .from(slots)
      .where(and(...conditions))
      .orderBy(asc(slots.startTime));
    return rows.map(toSlot);
  }

  async findFreeSlotAt(doctorId: number, date: string, startTime: string) {
    const [row] = await this.db
      .select()
      .from(slots)
      .where(
        and(
          eq(slots.doctorId, doctorId),
          eq(slots.date, date),
          eq(slots.startTime, startTime),
          eq(slots.state, 'free'),
        ),
      )
      .for('update', { noWait: true });
    return row ? toSlot(row) : null;
  }

  async insertSlots(rows: NewSlot[]) {
    if (rows.length === 0) {
      return [];
    }
    const inserted = await this.db.insert(slots).values(rows).returning();
    return inserted.map(toSlot);
  }

  async claimSlot(id: number) {
    const [row] = await this.db
      .update(slots)
      .set({ state: 'booked', updatedAt: new Date() })
      .where(and(eq(slots.id, id), eq(slots.state, 'free')))
      .returning();
    return row ? toSlot(row) : null;
  }

  async releaseSlot(id: number) {
    const [row] = await this.db
      .update(slots)
      .set({ state: 'free', updatedAt: new Date() })
      .where(and(eq(slots.id, id), eq(slots.state, 'booked')))
      .returning();
    return row ? toSlot(row) : null;
  }

  async cancelSlots(ids: number[]) {
    if (ids.length === 0) {
      return [];
    }
    const rows = await this.db
      .update(slots)
      .set({ state: 'cancelled', updatedAt: new Date() })
      .where(and(inArray(slots.id, ids), liveSlot()))
      .returning();
    return rows.map(toSlot);
  }

  async updateSlotSchedule(id: number, schedule: SlotSchedule) {
    const [row] = await this.db
      .update(slots)
      .set({ ...schedule, updatedAt: new Date() })
      .where(eq(slots.id, id))
      .returning();
    if (!row) {
      throw new Error(`Slot ${id} vanished during update`);
    }
    return toSlot(row);
  }

  async updateSlotDeliveryMode(id: number, mode: DeliveryMode) {
    const [row] = await this.db
      .update(slots)
      .set({ deliveryMode: mode, updatedAt: new Date() })
      .where(eq(slots.id, id))
      .returning();
    if (!row) {
      throw new Error(`Slot ${id} vanished during update`);
    }
    return toSlot(row);
  }

  async findAppointment(id: number, options: LockOptions = {}) {
    const query = this.db
      .select()
      .from(appointments)
      .where(eq(appointments.id, id));
    const [row] = options.lock ? await query.for('update') : await query;
    return row ?? null;
  }

  async findAppointmentByIdempotencyKey(createdBy: number, key: string) {
    const [row] = await this.db
      .select()
      .from(appointments)
      .where(
        and(
          eq(appointments.createdBy, createdBy),
          eq(appointments.idempotencyKey, key),
        ),
      );
    return row ?? null;
  }

  async findLiveAppointmentBySlot(slotId: number) {
    const [row] = await this.db
      .select()
      .from(appointments)
      .where(and(eq(appointments.slotId, slotId), liveAppointment()));
    return row ?? null;
  }

  async listAppointments(filters: AppointmentFilters) {
    const conditions: SQL[] = [];
    if (filters.createdBy !== undefined) {
      conditions.push(eq(appointments.createdBy, filters.createdBy));
    }
    if (filters.doctorId !== undefined) {
      conditions.push(eq(appointments.doctorId, filters.doctorId));
    }
    return this.db
      .select()
      .from(appointments)
      .where(and(...conditions))
      .orderBy(desc(appointments.createdAt), desc(appointments.id));
  }

  async insertAppointment(row: NewAppointment): Promise<Appointment> {
    const [inserted] = await this.db.insert(appointments).values(row).returning();
    return inserted;
  }

  async updateAppointment(id: number, patch: AppointmentPatch) {
    const [row] = await this.db
      .update(appointments)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(appointments.id, id))
      .returning();
    if (!row) {
      throw new Error(`Appointment ${id} vanished during update`);
    }
    return row;
  }

  async cancelAppointmentsForSlots(slotIds: number[]) {
    if (slotIds.length === 0) {
      return [];
    }
    return this.db
      .update(appointments)
      .set({ state: 'cancelled', updatedAt: new Date() })
      .where(and(inArray(appointments.slotId, slotIds), liveAppointment()))
      .returning();
  }

  async recordAudit(entries: SlotAuditEntry[]) {
    if (entries.length === 0) {
      return;
    }
    await this.db.insert(slotAuditLog).values(
      entries.map((entry) => ({
        slotId: entry.slotId,
        action: entry.action,
        changes: entry.changes ?? null,
        performedBy: entry.performedBy,
      })),
    );
  }
}

@Injectable()
export class DrizzleSlotStore implements SlotStore {
  constructor(
    @Inject(DATABASE_CONNECTION) private readonly db: DatabaseConnection,
  ) {}

  async transaction<T>(work: (session: SlotSession) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction(
        (tx) => work(new DrizzleSlotSession(tx)),
        { isolationLevel: 'read committed' },
      );
    } catch (error: unknown) {
      throw translateStoreError(error);
    }
  }

  async read<T>(work: (session: SlotSession) => Promise<T>): Promise<T> {
    return work(new DrizzleSlotSession(this.db));
  }
}
