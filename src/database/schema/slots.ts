import {
  pgTable,
  bigserial,
  bigint,
  varchar,
  integer,
  date,
  time,
  timestamp,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';
import { doctors } from './doctors.js';
import type {
  DeliveryMode,
  SlotAuditAction,
  SlotState,
} from '../../modules/slot-store/slot-store.types.js';

export const slots = pgTable(
  'slots',
  {
    id: bigserial({ mode: 'number' }).primaryKey(),
    doctorId: bigint('doctor_id', { mode: 'number' })
      .notNull()
      .references(() => doctors.id),
    date: date({ mode: 'string' }).notNull(),
    startTime: time('start_time').notNull(),
    endTime: time('end_time').notNull(),
    durationMinutes: integer('duration_minutes').notNull(),
    deliveryMode: varchar('delivery_mode', { length: 20 })
      .$type<DeliveryMode>()
      .notNull()
      .default('physical'),
    state: varchar({ length: 20 }).$type<SlotState>().notNull().default('free'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('idx_slots_doctor_date').on(
      table.doctorId,
      table.date,
      table.startTime,
    ),
    index('idx_slots_state_date').on(table.state, table.date),
  ],
);

export const slotAuditLog = pgTable(
  'slot_audit_log',
  {
    id: bigserial({ mode: 'number' }).primaryKey(),
    slotId: bigint('slot_id', { mode: 'number' })
      .notNull()
      .references(() => slots.id),
    action: varchar({ length: 20 }).$type<SlotAuditAction>().notNull(),
    changes: jsonb().$type<Record<string, unknown>>(),
    performedBy: bigint('performed_by', { mode: 'number' }),
    performedAt: timestamp('performed_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [index('idx_slot_audit_slot').on(table.slotId, table.performedAt)],
);
