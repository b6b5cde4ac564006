import { z } from 'zod'
import { Mode } from '../types/subscription.js'

export const SERVICE_NAME = 'GoldenSeed API'
export const SERVICE_VERSION = '1.0.0'

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

const configSchema = z
  .object({
    port: z.coerce.number().int().min(0).max(65535).default(8000),
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    databaseUrl: z.string().min(1).optional(),
    mode: z.nativeEnum(Mode).optional(),
    generator: z.enum(['builtin', 'disabled']).default('builtin'),
    publicBaseUrl: z.string().url().default('https://goldenseed.io'),
    db: z.object({
      poolMax: z.coerce.number().int().min(1).default(10),
      queryTimeoutMs: z.coerce.number().int().min(1).default(5_000),
      connectTimeoutMs: z.coerce.number().int().min(1).default(5_000),
      autoMigrate: booleanFlag.default('true'),
    }),
  })
  .transform((raw, ctx) => {
    const mode = raw.mode ?? (raw.databaseUrl ? Mode.PRODUCTION : Mode.DEMO)
    if (mode === Mode.PRODUCTION && !raw.databaseUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['databaseUrl'],
        message: 'DATABASE_URL is required when API_MODE is production',
      })
      return z.NEVER
    }
    return {
      ...raw,
      mode,
      logLevel: raw.logLevel ?? (raw.nodeEnv === 'test' ? 'silent' : 'info'),
      publicBaseUrl: raw.publicBaseUrl.replace(/\/+$/, ''),
    }
  })

export type Config = z.infer<typeof configSchema>

const blankToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value.trim() === '' ? undefined : value

/**
 * Reads and validates the process configuration. Called once at startup;
 * the result is passed down explicitly and never mutated.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return configSchema.parse({
    port: blankToUndefined(env.PORT),
    nodeEnv: blankToUndefined(env.NODE_ENV),
    logLevel: blankToUndefined(env.LOG_LEVEL),
    databaseUrl: blankToUndefined(env.DATABASE_URL),
    mode: blankToUndefined(env.API_MODE),
    generator: blankToUndefined(env.GENERATOR),
    publicBaseUrl: blankToUndefined(env.PUBLIC_BASE_URL),
    db: {
      poolMax: blankToUndefined(env.DB_POOL_MAX),
      queryTimeoutMs: blankToUndefined(env.DB_QUERY_TIMEOUT_MS),
      connectTimeoutMs: blankToUndefined(env.DB_CONNECT_TIMEOUT_MS),
      autoMigrate: blankToUndefined(env.DB_AUTO_MIGRATE),
    },
  })
}
