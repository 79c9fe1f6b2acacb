/**
 * Structured Logger using Pino
 *
 * - JSON output in production
 * - Pretty-printed output in development
 * - Silent under test unless LOG_LEVEL says otherwise
 */

import pino from 'pino'
import { baseEnv } from '~/config/env'

const isProduction = baseEnv.NODE_ENV === 'production'
const isTest = baseEnv.NODE_ENV === 'test'

const defaultLevel = isTest ? 'silent' : isProduction ? 'info' : 'debug'

export const logger = pino({
    level: baseEnv.LOG_LEVEL ?? defaultLevel,
    formatters: {
        level: (label) => {
            return { level: label }
        },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport:
        isProduction || isTest
            ? undefined
            : {
                  target: 'pino-pretty',
                  options: {
                      colorize: true,
                      translateTime: 'SYS:HH:MM:ss',
                      ignore: 'pid,hostname',
                  },
              },
})

export type Logger = pino.Logger

/**
 * Create a child logger with context
 */
export const createContextLogger = (context: Record<string, unknown>): Logger => {
    return logger.child(context)
}

export const loggers = {
    app: createContextLogger({ module: 'app' }),
    database: createContextLogger({ module: 'database' }),
    http: createContextLogger({ module: 'http' }),
    registry: createContextLogger({ module: 'registry' }),
    bot: createContextLogger({ module: 'bot' }),
    watcher: createContextLogger({ module: 'watcher' }),
}

const flowLoggerCache = new Map<string, Logger>()

/**
 * Create logger for a specific component (memoized)
 */
export const createFlowLogger = (flowName: string): Logger => {
    const cached = flowLoggerCache.get(flowName)
    if (cached) {
        return cached
    }

    const flowLogger = createContextLogger({ module: 'flow', flow: flowName })
    flowLoggerCache.set(flowName, flowLogger)
    return flowLogger
}
