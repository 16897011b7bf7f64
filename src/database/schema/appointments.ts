import { sql } from 'drizzle-orm';
import {
  pgTable,
  bigserial,
  bigint,
  varchar,
  timestamp,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { doctors } from './doctors.js';
import { slots } from './slots.js';
import type {
  AppointmentState,
  DeliveryMode,
} from '../../modules/slot-store/slot-store.types.js';

export const appointments = pgTable(
  'appointments',
  {
    id: bigserial({ mode: 'number' }).primaryKey(),
    slotId: bigint('slot_id', { mode: 'number' })
      .notNull()
      .references(() => slots.id),
    doctorId: bigint('doctor_id', { mode: 'number' })
      .notNull()
      .references(() => doctors.id),
    patientId: bigint('patient_id', { mode: 'number' }).notNull(),
    institutionId: bigint('institution_id', { mode: 'number' }),
    specialtyId: bigint('specialty_id', { mode: 'number' }),
    urgency: varchar({ length: 10 }).notNull().default('a'),
    visitType: varchar('visit_type', { length: 30 })
      .notNull()
      .default('general'),
    deliveryMode: varchar('delivery_mode', { length: 20 })
      .$type<DeliveryMode>()
      .notNull(),
    state: varchar({ length: 20 })
      .$type<AppointmentState>()
      .notNull()
      .default('confirmed'),
    createdBy: bigint('created_by', { mode: 'number' }).notNull(),
    idempotencyKey: varchar('idempotency_key', { length: 64 }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_live_appointment_per_slot')
      .on(table.slotId)
      .where(sql`state <> 'cancelled'`),
    uniqueIndex('uq_appointments_creator_idempotency_key').on(
      table.createdBy,
      table.idempotencyKey,
    ),
    index('idx_appt_doctor').on(table.doctorId, table.createdAt),
    index('idx_appt_created_by').on(table.createdBy, table.createdAt),
  ],
);
