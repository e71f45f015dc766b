import dotenv from 'dotenv'
import createDebug from 'debug'
import { z } from 'zod'
import { ValidationError } from './errors'

const debug = createDebug('reminders:env')

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  /** SQLite file, or ':memory:' */
  REMINDERS_DB_PATH: z.string().min(1, 'REMINDERS_DB_PATH must be non-empty').default('reminders.db'),
  /** Cron rule for the scan worker; every minute by default */
  REMINDERS_SCAN_RULE: z
    .string()
    .regex(/^\S+(\s+\S+){4,5}$/, 'REMINDERS_SCAN_RULE must be a cron expression with 5 or 6 fields')
    .default('* * * * *'),
})

export type EnvConfig = z.infer<typeof envSchema>

export function validateEnvironment(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config)

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors
    const lines = Object.entries(errors).map(([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`)
    throw new ValidationError(`Invalid environment configuration. ${lines.join('; ')}`)
  }

  debug('Environment validated (%s)', result.data.NODE_ENV)
  return result.data
}

/** Loads `.env` from the working directory, then validates process.env. Call once at startup. */
export function loadEnv(): EnvConfig {
  dotenv.config()
  return validateEnvironment(process.env)
}
