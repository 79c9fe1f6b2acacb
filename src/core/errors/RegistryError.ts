/**
 * Registry error taxonomy
 *
 * Every failure the registry can surface maps to exactly one HTTP status.
 * Missing subscriptions and unknown devices on read paths are not errors.
 */

import { ServiceError } from './ServiceError'

export type FieldErrors = Record<string, string[]>

export class RegistryError extends ServiceError {
    constructor(
        message: string,
        code: string,
        public readonly httpStatus: number,
        cause?: unknown,
        retryable: boolean = false
    ) {
        super('Registry', message, code, cause, retryable)
    }
}

/**
 * Missing or malformed identifier, rejected before any storage access
 */
export class ValidationError extends RegistryError {
    constructor(
        message: string,
        public readonly details: FieldErrors = {}
    ) {
        super(message, 'VALIDATION_ERROR', 400)
        this.name = 'ValidationError'
    }
}

/**
 * A write referenced a row that does not exist (bind before register)
 */
export class ReferentialIntegrityError extends RegistryError {
    constructor(message: string, cause?: unknown) {
        super(message, 'REFERENTIAL_INTEGRITY', 409, cause)
        this.name = 'ReferentialIntegrityError'
    }
}

/**
 * Store unreachable or pool exhausted. Callers own the retry.
 */
export class StorageUnavailableError extends RegistryError {
    constructor(message: string, cause?: unknown) {
        super(message, 'STORAGE_UNAVAILABLE', 503, cause, true)
        this.name = 'StorageUnavailableError'
    }
}

export class StorageError extends RegistryError {
    constructor(message: string, cause?: unknown) {
        super(message, 'STORAGE_ERROR', 500, cause)
        this.name = 'StorageError'
    }
}

export class NotFoundError extends RegistryError {
    constructor(message: string) {
        super(message, 'NOT_FOUND', 404)
        this.name = 'NotFoundError'
    }
}
