import { readFileSync } from 'fs'
import { join, dirname } from 'path'
import { fileURLToPath } from 'url'
import type { ConnectionSource, Queryable } from '../types'
import { withClient, withTransaction } from '../transaction'
import { loggers } from '~/core/utils/logger'

const migrationsDir = dirname(fileURLToPath(import.meta.url))

export const MIGRATIONS = ['001_init.sql'] as const

async function ensureMigrationsTable(db: Queryable): Promise<void> {
    await db.query(
        `CREATE TABLE IF NOT EXISTS migrations (
            name       TEXT PRIMARY KEY,
            applied_at TIMESTAMP NOT NULL DEFAULT NOW()
        )`
    )
}

async function isMigrationApplied(db: Queryable, migrationName: string): Promise<boolean> {
    const result = await db.query('SELECT 1 FROM migrations WHERE name = $1', [migrationName])
    return result.rows.length > 0
}

export function readMigration(migrationName: string): string {
    return readFileSync(join(migrationsDir, migrationName), 'utf-8')
}

/**
 * Apply pending migrations in order, each in its own transaction
 *
 * @returns names of the migrations applied by this run
 */
export async function runMigrations(source: ConnectionSource): Promise<string[]> {
    loggers.database.info('Running database migrations')

    const pending = await withClient(source, async (db) => {
        await ensureMigrationsTable(db)

        const names: string[] = []
        for (const migration of MIGRATIONS) {
            if (await isMigrationApplied(db, migration)) {
                loggers.database.debug({ migration }, 'Skipping migration (already applied)')
                continue
            }
            names.push(migration)
        }
        return names
    })

    for (const migration of pending) {
        loggers.database.info({ migration }, 'Running migration')
        const migrationSQL = readMigration(migration)

        await withTransaction(source, async (client) => {
            await client.query(migrationSQL)
            await client.query('INSERT INTO migrations (name) VALUES ($1) ON CONFLICT (name) DO NOTHING', [migration])
        })
    }

    loggers.database.info({ applied: pending.length }, 'All migrations completed')
    return pending
}
