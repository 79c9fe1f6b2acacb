/**
 * Scoped connection and transaction helpers
 *
 * @example
 * ```typescript
 * await withTransaction(pool, async (client) => {
 *   await client.query('INSERT INTO devices ...')
 *   await client.query('INSERT INTO user_devices ...')
 *   // Both succeed or both roll back
 * })
 * ```
 */

import type { ConnectionSource, Queryable } from './types'
import { createFlowLogger } from '~/core/utils/logger'

const txLogger = createFlowLogger('transaction')

export type ClientCallback<T> = (client: Queryable) => Promise<T>

/**
 * Run a callback on one pooled client; the client is released whatever happens
 */
export async function withClient<T>(source: ConnectionSource, callback: ClientCallback<T>): Promise<T> {
    const client = await source.connect()
    try {
        return await callback(client)
    } finally {
        client.release()
    }
}

/**
 * Run a callback inside a single READ COMMITTED transaction
 *
 * Commits when the callback resolves, rolls back when it throws and rethrows
 * the original error. A client whose rollback failed is released with that
 * error so the pool discards it. There are no retries here.
 */
export async function withTransaction<T>(source: ConnectionSource, callback: ClientCallback<T>): Promise<T> {
    const client = await source.connect()
    let brokenConnection: Error | undefined

    try {
        await client.query('BEGIN ISOLATION LEVEL READ COMMITTED')

        const result = await callback(client)
        await client.query('COMMIT')

        txLogger.debug('Transaction committed')
        return result
    } catch (error) {
        try {
            await client.query('ROLLBACK')
            txLogger.debug({ err: error }, 'Transaction rolled back')
        } catch (rollbackError) {
            txLogger.error({ err: rollbackError }, 'Failed to rollback transaction')
            brokenConnection = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError))
        }
        throw error
    } finally {
        client.release(brokenConnection)
    }
}
