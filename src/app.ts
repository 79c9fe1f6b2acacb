/**
 * Registry Service entrypoint
 *
 * Lifecycle: validate config, create the pool, apply migrations, serve
 * HTTP, and on SIGINT/SIGTERM stop accepting requests and close the pool.
 */

import 'dotenv/config'
import { readFileSync } from 'fs'
import type { Server } from 'http'
import type { Pool } from 'pg'
import { loadEnv, registryEnvSchema } from '~/config/env'
import { closeDatabase, initDatabase, testConnection } from '~/config/database'
import { runMigrations } from '~/database/migrations/runMigrations'
import { PostgresRegistryStore } from '~/features/registry/stores/PostgresRegistryStore'
import { RegistryService } from '~/features/registry/services/RegistryService'
import { createRegistryApp } from '~/features/registry/http/app'
import { loggers } from '~/core/utils/logger'

const packageJson: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'))
const APP_VERSION =
    typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
        ? String(packageJson.version)
        : 'unknown'

async function main() {
    const config = loadEnv(registryEnvSchema)
    loggers.app.info(`Starting camera registry v${APP_VERSION}`)

    const pool = initDatabase({
        connectionString: config.DATABASE_URL,
        maxConnections: config.DB_POOL_MAX,
        connectionTimeoutMillis: config.DB_CONNECTION_TIMEOUT_MS,
    })

    if (!(await testConnection(pool))) {
        loggers.app.fatal('Failed to connect to database. Exiting...')
        await closeDatabase(pool)
        process.exit(1)
    }

    try {
        await runMigrations(pool)
    } catch (error) {
        loggers.app.fatal({ err: error }, 'Failed to run migrations')
        await closeDatabase(pool)
        process.exit(1)
    }

    const service = new RegistryService(new PostgresRegistryStore(pool))
    const app = createRegistryApp(service)

    const server = app.listen(config.PORT, () => {
        loggers.app.info({ port: config.PORT }, 'HTTP server started')
        loggers.app.info({ url: `http://localhost:${config.PORT}/health` }, 'Health check endpoint')
    })

    registerShutdown(server, pool)
}

function registerShutdown(server: Server, pool: Pool) {
    let shuttingDown = false

    const shutdown = async (signal: NodeJS.Signals) => {
        if (shuttingDown) return
        shuttingDown = true
        loggers.app.info(`Received ${signal} signal, shutting down gracefully...`)

        await new Promise<void>((resolve) => server.close(() => resolve()))
        await closeDatabase(pool)
        process.exit(0)
    }

    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.on(signal, () => {
            shutdown(signal).catch((error: unknown) => {
                loggers.app.error({ err: error }, 'Error during shutdown')
                process.exit(1)
            })
        })
    }
}

main().catch((error: unknown) => {
    loggers.app.fatal({ err: error }, 'Fatal error during startup')
    process.exit(1)
})
