import { z } from 'zod'
import { ConfigError } from '~/core/errors/ConfigError'

const logLevels = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

// Unknown values fall back so the logger can start and report other config errors
const baseEnvSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development').catch('development'),
    LOG_LEVEL: z.enum(logLevels).optional().catch(undefined),
})

const telegramEnvSchema = z.object({
    TELEGRAM_BOT_TOKEN: z.string().min(1, 'Telegram bot token is required'),
    REGISTRY_URL: z.string().url().default('http://localhost:8000'),
    REGISTRY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
})

// Registry service
export const registryEnvSchema = baseEnvSchema.extend({
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
    PORT: z.coerce.number().int().positive().default(8000),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    DB_CONNECTION_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
})

// Telegram bot
export const botEnvSchema = baseEnvSchema.merge(telegramEnvSchema).extend({
    BOT_PORT: z.coerce.number().int().positive().default(3008),
})

// Camera watcher
export const watcherEnvSchema = baseEnvSchema.merge(telegramEnvSchema).extend({
    DEVICE_ID: z.string().trim().min(1, 'DEVICE_ID is required'),
    DEVICE_NICKNAME: z.string().trim().optional(),
    CAMERA_SOURCE: z.string().min(1).default('/dev/video0'),
    CAPTURE_COMMAND: z.string().min(1).default('fswebcam'),
    CAPTURE_RESOLUTION: z.string().regex(/^\d+x\d+$/, 'Expected WIDTHxHEIGHT').default('1280x720'),
    CAPTURE_PERIOD_SECONDS: z.coerce.number().int().positive().default(3600),
    IMAGE_DIR: z.string().min(1).default('/tmp/camera-watch-frames'),
})

export type BaseEnv = z.infer<typeof baseEnvSchema>
export type RegistryEnv = z.infer<typeof registryEnvSchema>
export type BotEnv = z.infer<typeof botEnvSchema>
export type WatcherEnv = z.infer<typeof watcherEnvSchema>

/**
 * Validate environment variables against a process schema
 *
 * @throws ConfigError listing every invalid field
 */
export function loadEnv<T extends z.ZodTypeAny>(schema: T, source: NodeJS.ProcessEnv = process.env): z.infer<T> {
    const parsed = schema.safeParse(source)

    if (!parsed.success) {
        throw new ConfigError(parsed.error.flatten().fieldErrors)
    }

    return parsed.data
}

// Shared settings never fail: every field has a default or falls back to one
export const baseEnv: BaseEnv = loadEnv(baseEnvSchema)
