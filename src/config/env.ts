import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),

  // Postgres
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),

  // Tokens are issued elsewhere; this service only verifies them
  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),

  // Scheduling
  DEFAULT_SLOT_MINUTES: z.coerce.number().int().positive().default(30),
  SLOT_GENERATION_MAX_DAYS: z.coerce.number().int().positive().default(92),
});

export type Env = z.infer<typeof envSchema>;

export type SchedulingSettings = Pick<
  Env,
  'DEFAULT_SLOT_MINUTES' | 'SLOT_GENERATION_MAX_DAYS'
>;

/** `validate` hook for ConfigModule; throws with the offending fields. */
export function validateEnv(config: Record<string, unknown>): Env {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const fields = Object.entries(parsed.error.flatten().fieldErrors)
      .map(([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new Error(`Invalid environment variables: ${fields}`);
  }
  return parsed.data;
}
