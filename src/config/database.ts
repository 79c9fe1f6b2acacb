import { Pool } from 'pg'
import { loggers } from '~/core/utils/logger'

export interface DatabaseConfig {
    connectionString: string
    maxConnections: number
    connectionTimeoutMillis: number
}

/**
 * Create the process-wide PostgreSQL pool
 *
 * The pool is handed to whoever needs it; nothing else in the codebase
 * reaches for it as a global.
 */
export function initDatabase(config: DatabaseConfig): Pool {
    const pool = new Pool({
        connectionString: config.connectionString,
        max: config.maxConnections,
        connectionTimeoutMillis: config.connectionTimeoutMillis,
    })

    pool.on('error', (err) => {
        loggers.database.error({ err }, 'Unexpected error on idle client')
    })

    return pool
}

/**
 * Test database connection
 */
export async function testConnection(pool: Pool): Promise<boolean> {
    try {
        const client = await pool.connect()
        try {
            await client.query('SELECT NOW()')
        } finally {
            client.release()
        }
        loggers.database.info('Database connection successful')
        return true
    } catch (error) {
        loggers.database.error({ err: error }, 'Database connection failed')
        return false
    }
}

/**
 * Close database connection pool
 */
export async function closeDatabase(pool: Pool): Promise<void> {
    await pool.end()
    loggers.database.info('Database connection closed')
}
