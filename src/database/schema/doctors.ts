import {
  pgTable,
  bigserial,
  bigint,
  varchar,
  boolean,
  timestamp,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';

/** Read-only mirror of the profile store's doctors. */
export const doctors = pgTable(
  'doctors',
  {
    id: bigserial({ mode: 'number' }).primaryKey(),
    userId: bigint('user_id', { mode: 'number' }).notNull().unique(),
    name: varchar({ length: 255 }).notNull(),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
);

export const doctorSpecialties = pgTable(
  'doctor_specialties',
  {
    doctorId: bigint('doctor_id', { mode: 'number' })
      .notNull()
      .references(() => doctors.id, { onDelete: 'cascade' }),
    specialtyId: bigint('specialty_id', { mode: 'number' }).notNull(),
  },
  (table) => [
    primaryKey({ columns: [table.doctorId, table.specialtyId] }),
    index('idx_doctor_specialties_specialty').on(table.specialtyId),
  ],
);
