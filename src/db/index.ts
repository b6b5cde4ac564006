import pg from 'pg'
import type { Pool as PgPool } from 'pg'
import type { Config } from '../config/index.js'
import type { Logger } from '../config/logger.js'

const { Pool } = pg

export interface StoreProbe {
  ping(): Promise<boolean>
}

/**
 * Owns the PostgreSQL pool. Constructed once at process start and passed to
 * the repositories; `close` ends the pool at shutdown.
 */
export class Database implements StoreProbe {
  constructor(
    readonly pool: PgPool,
    private readonly logger: Logger
  ) {
    pool.on('error', (err) => {
      this.logger.error({ err }, 'Unexpected error on idle client')
    })
  }

  async ping(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1')
      return true
    } catch (err) {
      this.logger.warn({ err }, 'Database ping failed')
      return false
    }
  }

  async close(): Promise<void> {
    await this.pool.end()
  }
}

export function createDatabase(
  config: Pick<Config, 'databaseUrl' | 'db'>,
  logger: Logger
): Database {
  const pool = new Pool({
    connectionString: config.databaseUrl,
    max: config.db.poolMax,
    connectionTimeoutMillis: config.db.connectTimeoutMs,
    query_timeout: config.db.queryTimeoutMs,
    statement_timeout: config.db.queryTimeoutMs,
  })

  return new Database(pool, logger)
}
