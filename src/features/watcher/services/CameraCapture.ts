/**
 * Camera Capture
 *
 * Grabs a single frame by running an external capture command
 * (fswebcam by default) and returns the path of the written JPEG.
 */

import { execFile } from 'child_process'
import { mkdir } from 'fs/promises'
import { join } from 'path'
import { promisify } from 'util'
import { WatcherError } from '../errors'
import { formatFrameTimestamp } from '~/utils/dateHelpers'

const execFileAsync = promisify(execFile)

export type CommandRunner = (command: string, args: string[]) => Promise<unknown>

export interface CameraCaptureOptions {
    command: string
    source: string
    resolution: string
    imageDir: string
}

/**
 * Anything that yields a freshly captured frame on disk
 */
export interface FrameSource {
    captureFrame(): Promise<string>
}

const runCommand: CommandRunner = (command, args) => execFileAsync(command, args, { timeout: 60000 })

export class CameraCapture implements FrameSource {
    constructor(
        private readonly options: CameraCaptureOptions,
        private readonly run: CommandRunner = runCommand,
        private readonly now: () => Date = () => new Date()
    ) {}

    /**
     * Arguments for the capture command; fswebcam syntax
     */
    buildArgs(outputPath: string): string[] {
        return ['-d', this.options.source, '-r', this.options.resolution, '--no-banner', outputPath]
    }

    async captureFrame(): Promise<string> {
        await mkdir(this.options.imageDir, { recursive: true })

        const framePath = join(this.options.imageDir, `frame_${formatFrameTimestamp(this.now())}.jpg`)

        try {
            await this.run(this.options.command, this.buildArgs(framePath))
        } catch (error) {
            throw new WatcherError(`Camera ${this.options.source} not available`, 'CAPTURE_FAILED', error, true)
        }

        return framePath
    }
}
