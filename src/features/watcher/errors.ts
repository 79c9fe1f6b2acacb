import { ServiceError } from '~/core/errors/ServiceError'

export class WatcherError extends ServiceError {
    constructor(message: string, code: string, cause?: unknown, retryable: boolean = false) {
        super('Watcher', message, code, cause, retryable)
    }
}
