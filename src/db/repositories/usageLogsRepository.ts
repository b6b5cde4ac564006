import type { Queryable } from './queryable.js'

export interface UsageLogInput {
  userId: string
  apiKeyId: string | null
  endpoint: string
  chunksGenerated: number
  responseTimeMs: number
  statusCode: number
}

export class UsageLogsRepository {
  constructor(private readonly db: Queryable) {}

  async insert(entry: UsageLogInput): Promise<void> {
    await this.db.query(
      `
      INSERT INTO usage_logs (user_id, api_key_id, endpoint, chunks_generated, response_time_ms, status_code)
      VALUES ($1, $2, $3, $4, $5, $6)
      `,
      [
        entry.userId,
        entry.apiKeyId,
        entry.endpoint,
        entry.chunksGenerated,
        entry.responseTimeMs,
        entry.statusCode,
      ]
    )
  }

  /** Chunks generated in the current calendar month, summed server-side. */
  async monthlyChunks(userId: string): Promise<number> {
    const result = await this.db.query<{ chunks: number | string | null }>(
      'SELECT get_monthly_usage($1) AS chunks',
      [userId]
    )

    return Number(result.rows[0]?.chunks ?? 0)
  }

  /** Whether the trailing-minute request count is below `limit`. */
  async withinRateLimit(userId: string, limit: number): Promise<boolean> {
    const result = await this.db.query<{ allowed: boolean | null }>(
      'SELECT check_rate_limit($1, $2) AS allowed',
      [userId, limit]
    )

    return result.rows[0]?.allowed === true
  }
}
