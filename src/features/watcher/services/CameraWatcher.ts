/**
 * Camera Watcher
 *
 * Periodic loop for one device: capture a frame, look up the device's
 * subscribers in the registry, send the photo to each of them.
 * A failed cycle is logged and the next one runs on schedule. One chat
 * failing does not stop delivery to the others.
 */

import type { RegistryApi } from '~/features/registry/client/RegistryClient'
import type { FrameSource } from './CameraCapture'
import type { PhotoSender } from './TelegramPhotoSender'
import { loggers } from '~/core/utils/logger'

const logger = loggers.watcher

export interface CameraWatcherOptions {
    deviceId: string
    nickname?: string
    periodMs: number
}

export interface CycleReport {
    framePath: string
    subscribers: number
    delivered: number
    failed: number
}

export interface CameraWatcherDeps {
    registry: RegistryApi
    camera: FrameSource
    sender: PhotoSender
}

export class CameraWatcher {
    private timer: NodeJS.Timeout | null = null
    private running = false
    // Bumped by start() and stop() so a tick from an earlier run never reschedules
    private generation = 0

    constructor(
        private readonly deps: CameraWatcherDeps,
        private readonly options: CameraWatcherOptions
    ) {}

    get isRunning(): boolean {
        return this.running
    }

    get caption(): string {
        return `📷 ${this.options.nickname || this.options.deviceId}`
    }

    /**
     * Register this device with the registry (nickname merge semantics)
     */
    async announce(): Promise<void> {
        await this.deps.registry.registerDevice(this.options.deviceId, this.options.nickname ?? null)
        logger.info({ deviceId: this.options.deviceId }, 'Device announced to registry')
    }

    async runCycle(): Promise<CycleReport> {
        const { deviceId } = this.options

        const framePath = await this.deps.camera.captureFrame()
        logger.info({ deviceId, framePath }, 'Captured frame')

        const subscribers = await this.deps.registry.listSubscribers(deviceId)
        if (subscribers.length === 0) {
            logger.warn({ deviceId }, 'No subscribers - nothing to send')
            return { framePath, subscribers: 0, delivered: 0, failed: 0 }
        }

        const results = await Promise.allSettled(
            subscribers.map((chatId) => this.deps.sender.sendPhoto(chatId, framePath, this.caption))
        )

        let failed = 0
        results.forEach((result, index) => {
            if (result.status === 'rejected') {
                failed++
                logger.error({ err: result.reason, deviceId, chatId: subscribers[index] }, 'Photo delivery failed')
            }
        })

        const report = { framePath, subscribers: subscribers.length, delivered: subscribers.length - failed, failed }
        logger.info({ deviceId, ...report }, 'Photo sent via Telegram')
        return report
    }

    /**
     * Run a cycle now, then one every period after the previous finishes
     */
    start(): void {
        if (this.running) return
        this.running = true
        this.generation++
        logger.info({ deviceId: this.options.deviceId, periodMs: this.options.periodMs }, 'Camera watcher started')
        this.schedule(0, this.generation)
    }

    stop(): void {
        this.running = false
        this.generation++
        if (this.timer) {
            clearTimeout(this.timer)
            this.timer = null
        }
        logger.info({ deviceId: this.options.deviceId }, 'Camera watcher stopped')
    }

    private schedule(delayMs: number, generation: number): void {
        this.timer = setTimeout(() => {
            this.timer = null
            this.tick(generation).catch((error: unknown) => {
                logger.error({ err: error }, 'Watcher tick failed')
            })
        }, delayMs)
    }

    private async tick(generation: number): Promise<void> {
        try {
            await this.runCycle()
        } catch (error) {
            logger.error({ err: error, deviceId: this.options.deviceId }, 'Capture cycle failed')
        } finally {
            if (this.running && generation === this.generation) {
                this.schedule(this.options.periodMs, generation)
            }
        }
    }
}
