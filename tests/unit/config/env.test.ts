/**
 * Environment Schema Tests
 */

import { describe, it, expect } from 'vitest'
import { botEnvSchema, loadEnv, registryEnvSchema, watcherEnvSchema } from '~/config/env'
import { ConfigError } from '~/core/errors/ConfigError'

describe('loadEnv', () => {
    it('should apply registry defaults', () => {
        const env = loadEnv(registryEnvSchema, { DATABASE_URL: 'postgres://localhost/camera_watch_test' })

        expect(env).toEqual({
            NODE_ENV: 'development',
            DATABASE_URL: 'postgres://localhost/camera_watch_test',
            PORT: 8000,
            DB_POOL_MAX: 10,
            DB_CONNECTION_TIMEOUT_MS: 5000,
        })
    })

    it('should coerce numeric variables', () => {
        const env = loadEnv(registryEnvSchema, { DATABASE_URL: 'postgres://db/test', PORT: '9000', DB_POOL_MAX: '2' })

        expect(env.PORT).toBe(9000)
        expect(env.DB_POOL_MAX).toBe(2)
    })

    it('should fall back on unknown NODE_ENV and LOG_LEVEL values', () => {
        const env = loadEnv(registryEnvSchema, {
            DATABASE_URL: 'postgres://db/test',
            NODE_ENV: 'staging',
            LOG_LEVEL: 'verbose',
        })

        expect(env.NODE_ENV).toBe('development')
        expect(env.LOG_LEVEL).toBeUndefined()
    })

    it('should throw ConfigError naming every invalid field', () => {
        let caught: unknown
        try {
            loadEnv(registryEnvSchema, { PORT: 'eighty' })
        } catch (error) {
            caught = error
        }

        expect(caught).toBeInstanceOf(ConfigError)
        if (caught instanceof ConfigError) {
            expect(Object.keys(caught.fieldErrors).sort()).toEqual(['DATABASE_URL', 'PORT'])
            expect(caught.code).toBe('INVALID_CONFIG')
        }
    })

    it('should require a bot token and default the bot port', () => {
        expect(() => loadEnv(botEnvSchema, {})).toThrow('Invalid environment variables: TELEGRAM_BOT_TOKEN')

        const env = loadEnv(botEnvSchema, { TELEGRAM_BOT_TOKEN: 'test-token' })
        expect(env.BOT_PORT).toBe(3008)
        expect(env.REGISTRY_URL).toBe('http://localhost:8000')
        expect(env.REGISTRY_TIMEOUT_MS).toBe(10000)
    })

    it('should apply watcher defaults', () => {
        const env = loadEnv(watcherEnvSchema, { TELEGRAM_BOT_TOKEN: 'test-token', DEVICE_ID: ' cam1 ' })

        expect(env.DEVICE_ID).toBe('cam1')
        expect(env.DEVICE_NICKNAME).toBeUndefined()
        expect(env.CAMERA_SOURCE).toBe('/dev/video0')
        expect(env.CAPTURE_COMMAND).toBe('fswebcam')
        expect(env.CAPTURE_RESOLUTION).toBe('1280x720')
        expect(env.CAPTURE_PERIOD_SECONDS).toBe(3600)
        expect(env.IMAGE_DIR).toBe('/tmp/camera-watch-frames')
    })

    it('should reject a malformed capture resolution', () => {
        expect(() =>
            loadEnv(watcherEnvSchema, { TELEGRAM_BOT_TOKEN: 'test-token', DEVICE_ID: 'cam1', CAPTURE_RESOLUTION: 'hd' })
        ).toThrow('Invalid environment variables: CAPTURE_RESOLUTION')
    })
})
