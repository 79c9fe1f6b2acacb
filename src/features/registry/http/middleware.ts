import type { ErrorRequestHandler, RequestHandler } from 'express'
import { RegistryError, ValidationError } from '~/core/errors/RegistryError'
import { loggers } from '~/core/utils/logger'

const logger = loggers.http

export interface ErrorBody {
    error: string
    code: string
    details?: Record<string, string[]>
}

/**
 * Log method, path, status and duration of every request
 */
export const requestLogger = (): RequestHandler => {
    return (req, res, next) => {
        const startedAt = process.hrtime.bigint()

        res.on('finish', () => {
            const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6
            logger.info(
                { method: req.method, path: req.originalUrl, status: res.statusCode, durationMs },
                'Request completed'
            )
        })

        next()
    }
}

export const notFoundHandler = (): RequestHandler => {
    return (_req, res) => {
        const body: ErrorBody = { error: 'Not found', code: 'NOT_FOUND' }
        res.status(404).json(body)
    }
}

// body-parser and express attach an HTTP status to the errors they raise
function getClientErrorStatus(err: unknown): number | undefined {
    if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
        return err.status >= 400 && err.status < 500 ? err.status : undefined
    }
    return undefined
}

function isJsonParseFailure(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed'
}

/**
 * Translate errors into JSON responses
 * RegistryError carries its own status; anything else is a 500.
 */
export const errorHandler = (): ErrorRequestHandler => {
    return (err, req, res, _next) => {
        const failure: unknown = err

        if (failure instanceof RegistryError) {
            const body: ErrorBody = { error: failure.message, code: failure.code }
            if (failure instanceof ValidationError) {
                body.details = failure.details
            }

            if (failure.httpStatus >= 500) {
                logger.error({ err: failure, method: req.method, path: req.originalUrl }, 'Registry request failed')
            } else {
                logger.warn({ code: failure.code, method: req.method, path: req.originalUrl }, failure.message)
            }

            res.status(failure.httpStatus).json(body)
            return
        }

        if (isJsonParseFailure(failure)) {
            const body: ErrorBody = { error: 'Malformed JSON body', code: 'VALIDATION_ERROR' }
            res.status(400).json(body)
            return
        }

        const clientStatus = getClientErrorStatus(failure)
        if (clientStatus) {
            const body: ErrorBody = { error: 'Bad request', code: 'BAD_REQUEST' }
            res.status(clientStatus).json(body)
            return
        }

        logger.error({ err: failure, method: req.method, path: req.originalUrl }, 'Unhandled error')
        const body: ErrorBody = { error: 'Internal server error', code: 'INTERNAL_ERROR' }
        res.status(500).json(body)
    }
}
