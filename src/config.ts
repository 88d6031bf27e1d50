/**
 * Runtime configuration
 *
 * Reads `.env` (when present) and validates process.env once at startup.
 * Modules receive the parsed values explicitly; nothing else reads process.env
 * except the safe-log helper.
 */

import 'dotenv/config'
import { z } from 'zod'

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined))

export const ConfigSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DATABASE_CA_CERT: optionalString,
  TELEGRAM_BOT_TOKEN: z.string().min(1, 'TELEGRAM_BOT_TOKEN is required'),
  TELEGRAM_WEBHOOK_SECRET: optionalString,
  MINIAPP_URL: optionalString.pipe(z.string().url().optional()),
  MINIAPP_AUTH_MAX_AGE_SECONDS: z.coerce.number().int().positive().default(86400),
  CORS_ORIGIN: z.string().default('*'),
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
})

export type Config = z.infer<typeof ConfigSchema>

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse(env)
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid configuration: ${problems}`)
  }
  return result.data
}
