import { Logger } from '@nestjs/common';
import { neon } from '@neondatabase/serverless';
import * as dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config({ path: '.env' });

const logger = new Logger('Migrations');

export async function runMigrations(): Promise<void> {
  const databaseUrl = process.env.DATABASE_URL;

  if (!databaseUrl) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const sql = neon(databaseUrl);

  const tableExists = async (tableName: string): Promise<boolean> => {
    const result = await sql`
      SELECT EXISTS (
        SELECT FROM information_schema.tables
        WHERE table_schema = 'public'
        AND table_name = ${tableName}
      ) as exists
    `;
    return result[0]?.exists === true;
  };

  logger.log('Checking/creating database schema...');

  // Required by the overlap exclusion constraint
  await sql`CREATE EXTENSION IF NOT EXISTS btree_gist`;

  if (!(await tableExists('doctors'))) {
    logger.log('Creating doctors table...');
    await sql`
      CREATE TABLE doctors (
        id BIGSERIAL PRIMARY KEY,
        user_id BIGINT NOT NULL UNIQUE,
        name VARCHAR(255) NOT NULL,
        is_active BOOLEAN NOT NULL DEFAULT true,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `;
  }

  if (!(await tableExists('doctor_specialties'))) {
    logger.log('Creating doctor_specialties table...');
    await sql`
      CREATE TABLE doctor_specialties (
        doctor_id BIGINT NOT NULL REFERENCES doctors(id) ON DELETE CASCADE,
        specialty_id BIGINT NOT NULL,
        PRIMARY KEY (doctor_id, specialty_id)
      )
    `;
  }

  if (!(await tableExists('slots'))) {
    logger.log('Creating slots table...');
    await sql`
      CREATE TABLE slots (
        id BIGSERIAL PRIMARY KEY,
        doctor_id BIGINT NOT NULL REFERENCES doctors(id),
        date DATE NOT NULL,
        start_time TIME NOT NULL,
        end_time TIME NOT NULL,
        duration_minutes INTEGER NOT NULL CHECK (duration_minutes > 0),
        delivery_mode VARCHAR(20) NOT NULL DEFAULT 'physical'
          CHECK (delivery_mode IN ('physical', 'telemedicine')),
        state VARCHAR(20) NOT NULL DEFAULT 'free'
          CHECK (state IN ('free', 'booked', 'cancelled')),
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        CHECK (start_time < end_time)
      )
    `;
  }

  if (!(await tableExists('appointments'))) {
    logger.log('Creating appointments table...');
    await sql`
      CREATE TABLE appointments (
        id BIGSERIAL PRIMARY KEY,
        slot_id BIGINT NOT NULL REFERENCES slots(id),
        doctor_id BIGINT NOT NULL REFERENCES doctors(id),
        patient_id BIGINT NOT NULL,
        institution_id BIGINT,
        specialty_id BIGINT,
        urgency VARCHAR(10) NOT NULL DEFAULT 'a',
        visit_type VARCHAR(30) NOT NULL DEFAULT 'general',
        delivery_mode VARCHAR(20) NOT NULL
          CHECK (delivery_mode IN ('physical', 'telemedicine')),
        state VARCHAR(20) NOT NULL DEFAULT 'confirmed'
          CHECK (state IN ('free', 'confirmed', 'cancelled')),
        created_by BIGINT NOT NULL,
        idempotency_key VARCHAR(64),
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `;
  }

  if (!(await tableExists('slot_audit_log'))) {
    logger.log('Creating slot_audit_log table...');
    await sql`
      CREATE TABLE slot_audit_log (
        id BIGSERIAL PRIMARY KEY,
        slot_id BIGINT NOT NULL REFERENCES slots(id),
        action VARCHAR(20) NOT NULL,
        changes JSONB,
        performed_by BIGINT,
        performed_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `;
  }

  logger.log('Creating indexes...');

  await sql`CREATE INDEX IF NOT EXISTS idx_doctor_specialties_specialty ON doctor_specialties (specialty_id)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_slots_doctor_date ON slots (doctor_id, date, start_time)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_slots_state_date ON slots (state, date)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_appt_doctor ON appointments (doctor_id, created_at)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_appt_created_by ON appointments (created_by, created_at)`;
  await sql`CREATE INDEX IF NOT EXISTS idx_slot_audit_slot ON slot_audit_log (slot_id, performed_at)`;
  // Idempotency keys are unique per creator, not globally
  await sql`ALTER TABLE appointments DROP CONSTRAINT IF EXISTS appointments_idempotency_key_key`;
  await sql`
    CREATE UNIQUE INDEX IF NOT EXISTS uq_appointments_creator_idempotency_key
    ON appointments (created_by, idempotency_key)
  `;
  await sql`
    CREATE UNIQUE INDEX IF NOT EXISTS uq_live_appointment_per_slot
    ON appointments (slot_id) WHERE state <> 'cancelled'
  `;

  logger.log('Creating exclusion constraints...');

  // One doctor never holds two live slots whose intervals intersect
  await sql`
    DO $$
    BEGIN
      IF NOT EXISTS (
        SELECT 1 FROM pg_constraint WHERE conname = 'no_slot_overlap'
      ) THEN
        ALTER TABLE slots ADD CONSTRAINT no_slot_overlap
        EXCLUDE USING gist (
          doctor_id WITH =,
          tsrange(date + start_time, date + end_time) WITH &&
        ) WHERE (state <> 'cancelled');
      END IF;
    END $$
  `;

  logger.log('Migration completed successfully');
}

// Run directly if called as script
const isMainModule = process.argv[1]?.includes('migrate');
if (isMainModule) {
  runMigrations()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      logger.error(error instanceof Error ? error.stack : String(error));
      process.exit(1);
    });
}
