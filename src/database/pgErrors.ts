import {
    RegistryError,
    ReferentialIntegrityError,
    StorageError,
    StorageUnavailableError,
} from '~/core/errors/RegistryError'

/** PostgreSQL SQLSTATE for foreign_key_violation */
export const FOREIGN_KEY_VIOLATION = '23503'

// admin_shutdown, crash_shutdown, cannot_connect_now, too_many_connections
const UNAVAILABLE_SQLSTATES = new Set(['57P01', '57P02', '57P03', '53300'])

const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EHOSTUNREACH', 'EPIPE'])

// Messages pg and pg-pool use for connection loss and pool exhaustion
const UNAVAILABLE_MESSAGE = /timeout exceeded when trying to connect|connection terminated|cannot use a pool after calling end/i

export function getErrorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code
    }
    return undefined
}

export function isStorageUnavailable(error: unknown): boolean {
    const code = getErrorCode(error)
    if (code && (code.startsWith('08') || UNAVAILABLE_SQLSTATES.has(code) || NETWORK_ERROR_CODES.has(code))) {
        return true
    }
    return error instanceof Error && UNAVAILABLE_MESSAGE.test(error.message)
}

/**
 * Map a driver error onto the registry error taxonomy
 *
 * @param operation - Registry operation name, used in messages
 */
export function translateStorageError(error: unknown, operation: string): RegistryError {
    if (error instanceof RegistryError) {
        return error
    }

    if (getErrorCode(error) === FOREIGN_KEY_VIOLATION) {
        return new ReferentialIntegrityError(`${operation} references a row that does not exist`, error)
    }

    if (isStorageUnavailable(error)) {
        return new StorageUnavailableError(`Storage unavailable during ${operation}`, error)
    }

    return new StorageError(`Storage failure during ${operation}`, error)
}
