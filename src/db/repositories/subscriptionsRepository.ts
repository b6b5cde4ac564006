import { toDate, toNullableDate, type Queryable } from './queryable.js'
import type { SubscriptionTier } from '../../types/subscription.js'

export interface Subscription {
  id: string
  userId: string
  tier: SubscriptionTier
  billingSubscriptionId: string | null
  chunksLimit: number
  rateLimit: number
  active: boolean
  currentPeriodStart: Date | null
  currentPeriodEnd: Date | null
  createdAt: Date
}

export interface CreateSubscriptionInput {
  userId: string
  tier: SubscriptionTier
  chunksLimit: number
  rateLimit: number
  billingSubscriptionId?: string | null
}

type SubscriptionRow = {
  id: string
  user_id: string
  tier: SubscriptionTier
  billing_subscription_id: string | null
  chunks_limit: number
  rate_limit: number
  active: boolean
  current_period_start: Date | string | null
  current_period_end: Date | string | null
  created_at: Date | string
}

const COLUMNS = `id, user_id, tier, billing_subscription_id, chunks_limit, rate_limit, active,
  current_period_start, current_period_end, created_at`

const mapSubscription = (row: SubscriptionRow): Subscription => ({
  id: row.id,
  userId: row.user_id,
  tier: row.tier,
  billingSubscriptionId: row.billing_subscription_id,
  chunksLimit: row.chunks_limit,
  rateLimit: row.rate_limit,
  active: row.active,
  currentPeriodStart: toNullableDate(row.current_period_start),
  currentPeriodEnd: toNullableDate(row.current_period_end),
  createdAt: toDate(row.created_at),
})

export class SubscriptionsRepository {
  constructor(private readonly db: Queryable) {}

  async create(input: CreateSubscriptionInput): Promise<Subscription> {
    const result = await this.db.query<SubscriptionRow>(
      `
      INSERT INTO subscriptions (user_id, tier, billing_subscription_id, chunks_limit, rate_limit, active)
      VALUES ($1, $2, $3, $4, $5, TRUE)
      RETURNING ${COLUMNS}
      `,
      [
        input.userId,
        input.tier,
        input.billingSubscriptionId ?? null,
        input.chunksLimit,
        input.rateLimit,
      ]
    )

    return mapSubscription(result.rows[0])
  }

  /** Most recently created active subscription, if any. */
  async findActiveByUser(userId: string): Promise<Subscription | null> {
    const result = await this.db.query<SubscriptionRow>(
      `
      SELECT ${COLUMNS}
      FROM subscriptions
      WHERE user_id = $1 AND active = TRUE
      ORDER BY created_at DESC
      LIMIT 1
      `,
      [userId]
    )

    return result.rows[0] ? mapSubscription(result.rows[0]) : null
  }
}
