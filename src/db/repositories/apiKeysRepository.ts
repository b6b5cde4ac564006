import { toDate, toNullableDate, type Queryable } from './queryable.js'

export interface ApiKey {
  id: string
  userId: string
  keyHash: string
  keyPrefix: string
  name: string | null
  active: boolean
  lastUsedAt: Date | null
  createdAt: Date
  expiresAt: Date | null
}

export interface CreateApiKeyInput {
  userId: string
  keyHash: string
  keyPrefix: string
  name: string
  expiresAt?: Date | null
}

type ApiKeyRow = {
  id: string
  user_id: string
  key_hash: string
  key_prefix: string
  name: string | null
  active: boolean
  last_used_at: Date | string | null
  created_at: Date | string
  expires_at: Date | string | null
}

const COLUMNS =
  'id, user_id, key_hash, key_prefix, name, active, last_used_at, created_at, expires_at'

const mapApiKey = (row: ApiKeyRow): ApiKey => ({
  id: row.id,
  userId: row.user_id,
  keyHash: row.key_hash,
  keyPrefix: row.key_prefix,
  name: row.name,
  active: row.active,
  lastUsedAt: toNullableDate(row.last_used_at),
  createdAt: toDate(row.created_at),
  expiresAt: toNullableDate(row.expires_at),
})

export class ApiKeysRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: CreateApiKeyInput): Promise<ApiKey> {
    const result = await this.db.query<ApiKeyRow>(
      `
      INSERT INTO api_keys (user_id, key_hash, key_prefix, name, active, expires_at)
      VALUES ($1, $2, $3, $4, TRUE, $5)
      RETURNING ${COLUMNS}
      `,
      [input.userId, input.keyHash, input.keyPrefix, input.name, input.expiresAt ?? null]
    )

    return mapApiKey(result.rows[0])
  }

  /** Active, unexpired key with the given digest. */
  async findActiveByHash(keyHash: string): Promise<ApiKey | null> {
    const result = await this.db.query<ApiKeyRow>(
      `
      SELECT ${COLUMNS}
      FROM api_keys
      WHERE key_hash = $1
        AND active = TRUE
        AND (expires_at IS NULL OR expires_at > NOW())
      LIMIT 1
      `,
      [keyHash]
    )

    return result.rows[0] ? mapApiKey(result.rows[0]) : null
  }

  async listByUser(userId: string): Promise<ApiKey[]> {
    const result = await this.db.query<ApiKeyRow>(
      `
      SELECT ${COLUMNS}
      FROM api_keys
      WHERE user_id = $1
      ORDER BY created_at ASC, id ASC
      `,
      [userId]
    )

    return result.rows.map(mapApiKey)
  }

  async touchLastUsed(id: string, usedAt: Date = new Date()): Promise<void> {
    await this.db.query(
      `
      UPDATE api_keys
      SET last_used_at = $2
      WHERE id = $1
      `,
      [id, usedAt]
    )
  }

  /** Deactivates a key. Rows are never deleted so usage history keeps its reference. */
  async deactivate(id: string): Promise<boolean> {
    const result = await this.db.query(
      `
      UPDATE api_keys
      SET active = FALSE
      WHERE id = $1 AND active = TRUE
      `,
      [id]
    )

    return (result.rowCount ?? 0) > 0
  }
}
