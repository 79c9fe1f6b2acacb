/**
 * Migration Runner Tests
 */

import { describe, it, expect } from 'vitest'
import { MIGRATIONS, readMigration, runMigrations } from '~/database/migrations/runMigrations'
import { createMockPool, queryResult } from '../../utils/mockPg'

describe('runMigrations', () => {
    it('should apply pending migrations inside a transaction and record them', async () => {
        const pool = createMockPool()

        const applied = await runMigrations(pool)

        expect(applied).toEqual(['001_init.sql'])
        const statements = pool.client.statements()
        expect(statements[0]).toMatch(/^CREATE TABLE IF NOT EXISTS migrations/)
        expect(statements.slice(2)).toEqual([
            'BEGIN ISOLATION LEVEL READ COMMITTED',
            readMigration('001_init.sql').replace(/\s+/g, ' ').trim(),
            'INSERT INTO migrations (name) VALUES ($1) ON CONFLICT (name) DO NOTHING',
            'COMMIT',
        ])
        expect(pool.client.release).toHaveBeenCalledTimes(2)
    })

    it('should skip migrations that were already applied', async () => {
        const pool = createMockPool()
        pool.client.respondTo(/SELECT 1 FROM migrations/, queryResult([{ exists: 1 }]))

        const applied = await runMigrations(pool)

        expect(applied).toEqual([])
        expect(pool.client.statements()).not.toContain('COMMIT')
        expect(pool.connect).toHaveBeenCalledTimes(1)
    })

    it('should ship a schema with cascading subscriptions', () => {
        expect(MIGRATIONS).toEqual(['001_init.sql'])

        const sql = readMigration('001_init.sql')
        expect(sql).toContain('CREATE TABLE IF NOT EXISTS registered_users')
        expect(sql).toContain('CREATE TABLE IF NOT EXISTS devices')
        expect(sql).toContain('CREATE TABLE IF NOT EXISTS user_devices')
        expect(sql.match(/ON DELETE CASCADE/g)).toHaveLength(2)
    })
})
