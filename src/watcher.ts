/**
 * Camera watcher entrypoint
 *
 * One process per camera. Announces the device, then captures and delivers
 * a frame every CAPTURE_PERIOD_SECONDS until stopped.
 */

import 'dotenv/config'
import { loadEnv, watcherEnvSchema } from '~/config/env'
import { RegistryClient } from '~/features/registry/client/RegistryClient'
import { CameraCapture } from '~/features/watcher/services/CameraCapture'
import { CameraWatcher } from '~/features/watcher/services/CameraWatcher'
import { TelegramPhotoSender } from '~/features/watcher/services/TelegramPhotoSender'
import { loggers } from '~/core/utils/logger'

async function main() {
    const config = loadEnv(watcherEnvSchema)

    const watcher = new CameraWatcher(
        {
            registry: new RegistryClient({ baseUrl: config.REGISTRY_URL, timeoutMs: config.REGISTRY_TIMEOUT_MS }),
            camera: new CameraCapture({
                command: config.CAPTURE_COMMAND,
                source: config.CAMERA_SOURCE,
                resolution: config.CAPTURE_RESOLUTION,
                imageDir: config.IMAGE_DIR,
            }),
            sender: new TelegramPhotoSender(config.TELEGRAM_BOT_TOKEN),
        },
        {
            deviceId: config.DEVICE_ID,
            nickname: config.DEVICE_NICKNAME,
            periodMs: config.CAPTURE_PERIOD_SECONDS * 1000,
        }
    )

    try {
        await watcher.announce()
    } catch (error) {
        // bind auto-creates the device, so the loop can run without it
        loggers.watcher.warn({ err: error }, 'Could not announce device; continuing')
    }

    watcher.start()

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.on(signal, () => {
            loggers.watcher.info(`Received ${signal} signal, shutting down...`)
            watcher.stop()
            process.exit(0)
        })
    }
}

main().catch((error: unknown) => {
    loggers.watcher.fatal({ err: error }, 'Fatal error during startup')
    process.exit(1)
})
