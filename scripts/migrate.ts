/**
 * Apply pending registry migrations without starting the HTTP server
 *
 * Usage: npm run db:migrate
 */

import 'dotenv/config'
import { loadEnv, registryEnvSchema } from '~/config/env'
import { closeDatabase, initDatabase } from '~/config/database'
import { runMigrations } from '~/database/migrations/runMigrations'
import { loggers } from '~/core/utils/logger'

async function main() {
    const config = loadEnv(registryEnvSchema)
    const pool = initDatabase({
        connectionString: config.DATABASE_URL,
        maxConnections: 1,
        connectionTimeoutMillis: config.DB_CONNECTION_TIMEOUT_MS,
    })

    try {
        const applied = await runMigrations(pool)
        loggers.app.info({ applied }, applied.length > 0 ? 'Migrations applied' : 'Database already up to date')
    } finally {
        await closeDatabase(pool)
    }
}

main().catch((error: unknown) => {
    loggers.app.fatal({ err: error }, 'Migration failed')
    process.exit(1)
})
