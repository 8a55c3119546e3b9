import { Pool } from 'pg'
import { logger } from './logger'
import { serverEnv } from './env'

// Connection pool configuration
// - max: connections per process (DATABASE_POOL_MAX)
// - idleTimeoutMillis: release idle clients so short-lived workers don't hold connections
// - connectionTimeoutMillis: fail fast when the database is unreachable
export interface PoolOptions {
    connectionString?: string
    max?: number
}

export function createPool(options: PoolOptions = {}): Pool {
    const connectionString = options.connectionString ?? serverEnv.DATABASE_URL
    if (!connectionString) {
        throw new Error('DATABASE_URL is not configured')
    }

    const pool = new Pool({
        connectionString,
        max: options.max ?? serverEnv.DATABASE_POOL_MAX,
        idleTimeoutMillis: 10_000,
        connectionTimeoutMillis: 5_000,
    })

    // Idle client errors would otherwise crash the process; route them through
    // the structured logger for correlation and redaction
    pool.on('error', (error) => {
        logger.error('PostgreSQL pool error', { error: error.message })
    })

    return pool
}
