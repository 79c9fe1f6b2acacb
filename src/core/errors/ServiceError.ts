/**
 * Base Service Error Class
 *
 * Standardized error structure shared by the registry, its HTTP client,
 * the bot and the watcher.
 *
 * Usage:
 * ```typescript
 * export class WatcherError extends ServiceError {
 *     constructor(message: string, code: string, cause?: unknown, retryable: boolean = false) {
 *         super('Watcher', message, code, cause, retryable)
 *     }
 * }
 *
 * throw new WatcherError('Camera not available', 'CAPTURE_FAILED', error, true)
 * ```
 */
export class ServiceError extends Error {
    /**
     * @param serviceName - Name of the service (e.g. 'Registry', 'Watcher')
     * @param message - Human-readable error message
     * @param code - Machine-readable error code (e.g. 'VALIDATION_ERROR')
     * @param cause - Original error, for error chaining
     * @param retryable - Whether the caller may retry the operation
     */
    constructor(
        public readonly serviceName: string,
        message: string,
        public readonly code: string,
        public readonly cause?: unknown,
        public readonly retryable: boolean = false
    ) {
        super(message)
        this.name = `${serviceName}Error`

        // Maintains proper stack trace for where error was thrown (V8 only)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor)
        }
    }

    /**
     * Format error for logging
     */
    toJSON() {
        return {
            name: this.name,
            serviceName: this.serviceName,
            message: this.message,
            code: this.code,
            retryable: this.retryable,
            cause: this.cause,
            stack: this.stack,
        }
    }
}
