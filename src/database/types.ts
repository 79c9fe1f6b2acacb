import type { QueryResult, QueryResultRow } from 'pg'

/**
 * Anything that can run a parameterised query: a pool or a checked-out client
 */
export interface Queryable {
    query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>
}

/**
 * A checked-out client that must be returned to the pool
 */
export interface PooledClient extends Queryable {
    release(err?: Error | boolean): void
}

/**
 * Source of pooled clients (a pg Pool in production)
 */
export interface ConnectionSource {
    connect(): Promise<PooledClient>
}
