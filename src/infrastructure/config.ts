import { z } from 'zod'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  DATABASE_PATH: z.string().trim().min(1).default('data/recipes.db'),
  MEDIA_ROOT: z.string().trim().min(1).default('data/media'),
  MEDIA_URL: z
    .string()
    .trim()
    .default('/static/media/')
    .refine((v) => v.startsWith('/') && v.endsWith('/'), 'must start and end with "/"'),
  MAX_IMAGE_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),
  CORS_ORIGINS: z.string().default(''),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface AppConfig {
  port: number
  databasePath: string
  mediaRoot: string
  mediaUrl: string
  maxImageBytes: number
  corsOrigins: string[]
  logLevel: LogLevel
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env)
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new Error(`Invalid configuration: ${problems.join('; ')}`)
  }

  const parsed = result.data
  return {
    port: parsed.PORT,
    databasePath: parsed.DATABASE_PATH,
    mediaRoot: parsed.MEDIA_ROOT,
    mediaUrl: parsed.MEDIA_URL,
    maxImageBytes: parsed.MAX_IMAGE_BYTES,
    corsOrigins: parsed.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean),
    logLevel: parsed.LOG_LEVEL,
  }
}

let cached: AppConfig | null = null

export function getConfig(): AppConfig {
  if (!cached) cached = loadConfig()
  return cached
}

/** Forget the cached config so the next read picks up the current environment */
export function resetConfig(): void {
  cached = null
}
