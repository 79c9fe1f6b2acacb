import { ServiceError } from './ServiceError'

/**
 * Thrown when environment variables fail schema validation
 */
export class ConfigError extends ServiceError {
    constructor(public readonly fieldErrors: Record<string, string[] | undefined>) {
        const fields = Object.keys(fieldErrors).join(', ')
        super('Config', `Invalid environment variables: ${fields}`, 'INVALID_CONFIG')
    }
}
