import { afterAll, beforeAll, beforeEach, describe, expect, it } from 'vitest'
import { createLogger } from '../../src/config/logger.js'
import {
  ApiKeysRepository,
  SubscriptionsRepository,
  UsageLogsRepository,
  UsersRepository,
} from '../../src/db/repositories/index.js'
import { createSchema, dropSchema, resetDatabase } from '../../src/db/schema.js'
import { CredentialStore, hashKey } from '../../src/services/credentials.js'
import { ProvisioningService } from '../../src/services/provisioning.js'
import { StoreUsageMeter } from '../../src/services/usage.js'
import { SubscriptionTier } from '../../src/types/subscription.js'
import { createTestDatabase, type TestDatabase } from './testDatabase.js'

const logger = createLogger({ logLevel: 'silent', nodeEnv: 'test' })

describe('DB repositories integration', () => {
  let database: TestDatabase

  let users: UsersRepository
  let subscriptions: SubscriptionsRepository
  let apiKeys: ApiKeysRepository
  let usageLogs: UsageLogsRepository

  beforeAll(async () => {
    database = await createTestDatabase()
    await createSchema(database.db)

    users = new UsersRepository(database.db)
    subscriptions = new SubscriptionsRepository(database.db)
    apiKeys = new ApiKeysRepository(database.db)
    usageLogs = new UsageLogsRepository(database.db)
  })

  beforeEach(async () => {
    await resetDatabase(database.db)
  })

  afterAll(async () => {
    await dropSchema(database.db)
    await database.close()
  })

  const insertLogAt = async (userId: string, chunks: number, age: string): Promise<void> => {
    await database.db.query(
      `
      INSERT INTO usage_logs (user_id, endpoint, chunks_generated, created_at)
      VALUES ($1, '/api/v1/generate', $2, NOW() - $3::interval)
      `,
      [userId, chunks, age]
    )
  }

  describe('schema', () => {
    it('is idempotent', async () => {
      await expect(createSchema(database.db)).resolves.toBeUndefined()
    })

    it('refreshes updated_at when users and subscriptions change', async () => {
      const user = await database.db.query<{ id: string; updated_at: Date }>(
        `
        INSERT INTO users (email, updated_at)
        VALUES ('touch@example.com', NOW() - INTERVAL '1 day')
        RETURNING id, updated_at
        `
      )
      const userId = user.rows[0].id
      const touchedUser = await database.db.query<{ updated_at: Date }>(
        `UPDATE users SET billing_customer_id = 'cus_test_1' WHERE id = $1 RETURNING updated_at`,
        [userId]
      )
      expect(touchedUser.rows[0].updated_at.getTime() - user.rows[0].updated_at.getTime()).toBeGreaterThan(
        60 * 60 * 1000
      )

      const subscription = await database.db.query<{ id: string; updated_at: Date }>(
        `
        INSERT INTO subscriptions (user_id, tier, chunks_limit, rate_limit, updated_at)
        VALUES ($1, 'free', 10000, 100, NOW() - INTERVAL '1 day')
        RETURNING id, updated_at
        `,
        [userId]
      )
      const touchedSubscription = await database.db.query<{ updated_at: Date }>(
        `UPDATE subscriptions SET active = FALSE WHERE id = $1 RETURNING updated_at`,
        [subscription.rows[0].id]
      )
      expect(
        touchedSubscription.rows[0].updated_at.getTime() - subscription.rows[0].updated_at.getTime()
      ).toBeGreaterThan(60 * 60 * 1000)
    })
  })

  describe('users', () => {
    it('creates and finds a user', async () => {
      const created = await users.create({ email: 'dev@example.com' })

      expect(created.email).toBe('dev@example.com')
      expect(created.billingCustomerId).toBeNull()
      expect(created.createdAt).toBeInstanceOf(Date)
      await expect(users.findById(created.id)).resolves.toEqual(created)
    })

    it('enforces unique emails', async () => {
      await users.create({ email: 'dup@example.com' })
      await expect(users.create({ email: 'dup@example.com' })).rejects.toThrow()
    })

    it('returns null for an unknown id', async () => {
      await expect(users.findById('00000000-0000-0000-0000-000000000000')).resolves.toBeNull()
    })
  })

  describe('subscriptions', () => {
    it('returns the most recent active subscription', async () => {
      const user = await users.create({ email: 'sub@example.com' })
      await subscriptions.create({
        userId: user.id,
        tier: SubscriptionTier.FREE,
        chunksLimit: 10_000,
        rateLimit: 100,
      })
      await database.db.query(`UPDATE subscriptions SET created_at = NOW() - INTERVAL '1 day'`)
      await subscriptions.create({
        userId: user.id,
        tier: SubscriptionTier.INDIE,
        chunksLimit: 1_000_000,
        rateLimit: 1_000,
        billingSubscriptionId: 'sub_test_1',
      })

      const active = await subscriptions.findActiveByUser(user.id)

      expect(active?.tier).toBe(SubscriptionTier.INDIE)
      expect(active?.chunksLimit).toBe(1_000_000)
      expect(active?.billingSubscriptionId).toBe('sub_test_1')
    })

    it('ignores inactive subscriptions', async () => {
      const user = await users.create({ email: 'lapsed@example.com' })
      const subscription = await subscriptions.create({
        userId: user.id,
        tier: SubscriptionTier.STUDIO,
        chunksLimit: 10_000_000,
        rateLimit: 10_000,
      })
      await database.db.query('UPDATE subscriptions SET active = FALSE WHERE id = $1', [subscription.id])

      await expect(subscriptions.findActiveByUser(user.id)).resolves.toBeNull()
    })
  })

  describe('api keys', () => {
    it('finds active keys by digest and records last use', async () => {
      const user = await users.create({ email: 'keys@example.com' })
      const key = await apiKeys.create({
        userId: user.id,
        keyHash: hashKey('gs_test_key'),
        keyPrefix: 'gs_test_key',
        name: 'CI',
      })
      expect(key.lastUsedAt).toBeNull()

      const usedAt = new Date('2026-01-15T12:00:00.000Z')
      await apiKeys.touchLastUsed(key.id, usedAt)

      const found = await apiKeys.findActiveByHash(hashKey('gs_test_key'))
      expect(found?.id).toBe(key.id)
      expect(found?.lastUsedAt?.toISOString()).toBe('2026-01-15T12:00:00.000Z')
    })

    it('deactivates a key once', async () => {
      const user = await users.create({ email: 'revoke@example.com' })
      const key = await apiKeys.create({
        userId: user.id,
        keyHash: hashKey('gs_revoked'),
        keyPrefix: 'gs_revoked',
        name: 'Old',
      })

      await expect(apiKeys.deactivate(key.id)).resolves.toBe(true)
      await expect(apiKeys.deactivate(key.id)).resolves.toBe(false)
      await expect(apiKeys.findActiveByHash(hashKey('gs_revoked'))).resolves.toBeNull()

      const [listed] = await apiKeys.listByUser(user.id)
      expect(listed.active).toBe(false)
    })

    it('does not resolve expired keys', async () => {
      const user = await users.create({ email: 'expired@example.com' })
      await apiKeys.create({
        userId: user.id,
        keyHash: hashKey('gs_expired'),
        keyPrefix: 'gs_expired',
        name: 'Expired',
        expiresAt: new Date(Date.now() - 60_000),
      })

      await expect(apiKeys.findActiveByHash(hashKey('gs_expired'))).resolves.toBeNull()
    })
  })

  describe('usage logs', () => {
    it('sums chunks for the current month only', async () => {
      const user = await users.create({ email: 'usage@example.com' })
      await usageLogs.insert({
        userId: user.id,
        apiKeyId: null,
        endpoint: '/api/v1/generate',
        chunksGenerated: 100,
        responseTimeMs: 3,
        statusCode: 200,
      })
      await usageLogs.insert({
        userId: user.id,
        apiKeyId: null,
        endpoint: '/api/v1/batch',
        chunksGenerated: 25,
        responseTimeMs: 5,
        statusCode: 200,
      })
      await insertLogAt(user.id, 5_000, '2 months')

      await expect(usageLogs.monthlyChunks(user.id)).resolves.toBe(125)
    })

    it('reports zero for a user without usage', async () => {
      const user = await users.create({ email: 'idle@example.com' })
      await expect(usageLogs.monthlyChunks(user.id)).resolves.toBe(0)
    })

    it('counts only the trailing minute against the rate limit', async () => {
      const user = await users.create({ email: 'rate@example.com' })
      await insertLogAt(user.id, 1, '5 minutes')
      await insertLogAt(user.id, 1, '5 minutes')

      await expect(usageLogs.withinRateLimit(user.id, 2)).resolves.toBe(true)

      await insertLogAt(user.id, 1, '1 second')
      await expect(usageLogs.withinRateLimit(user.id, 2)).resolves.toBe(true)

      await insertLogAt(user.id, 1, '2 seconds')
      await expect(usageLogs.withinRateLimit(user.id, 2)).resolves.toBe(false)
    })
  })

  describe('provisioning and credential resolution', () => {
    it('resolves a provisioned key to its principal until revoked', async () => {
      const provisioning = new ProvisioningService({ users, subscriptions, apiKeys, logger })
      const credentials = new CredentialStore({ users, subscriptions, apiKeys, logger })

      const userId = await provisioning.createUser('studio@example.com')
      if (!userId) throw new Error('user not created')

      await expect(provisioning.createSubscription(userId, 'studio')).resolves.toBe(true)
      const rawKey = await provisioning.createApiKey(userId)
      if (!rawKey) throw new Error('key not created')
      expect(rawKey).toMatch(/^gs_/)

      const principal = await credentials.resolve(rawKey)
      const [summary] = await provisioning.listApiKeys(userId)

      expect(principal).toEqual({
        userId,
        apiKeyId: summary.id,
        email: 'studio@example.com',
        tier: SubscriptionTier.STUDIO,
        chunksLimit: 10_000_000,
        rateLimit: 10_000,
      })
      expect(summary.keyPrefix).toBe(rawKey.slice(0, 11))
      expect(summary.name).toBe('Default API Key')
      expect(summary.lastUsedAt).toBeInstanceOf(Date)

      await expect(provisioning.revokeApiKey(summary.id)).resolves.toBe(true)
      await expect(credentials.resolve(rawKey)).resolves.toBeNull()
    })

    it('does not resolve a key whose user has no active subscription', async () => {
      const provisioning = new ProvisioningService({ users, subscriptions, apiKeys, logger })
      const credentials = new CredentialStore({ users, subscriptions, apiKeys, logger })

      const userId = await provisioning.createUser('nosub@example.com')
      if (!userId) throw new Error('user not created')
      const rawKey = await provisioning.createApiKey(userId, 'Unpaid')
      if (!rawKey) throw new Error('key not created')

      await expect(credentials.resolve(rawKey)).resolves.toBeNull()
    })

    it('feeds the usage meter from logged requests', async () => {
      const meter = new StoreUsageMeter(usageLogs, logger)
      const user = await users.create({ email: 'meter@example.com' })

      await meter.logUsage({
        userId: user.id,
        apiKeyId: null,
        endpoint: '/api/v1/generate',
        chunksGenerated: 40,
        responseTimeMs: 2,
        statusCode: 200,
      })

      await expect(meter.monthlyUsage(user.id)).resolves.toEqual({ kind: 'known', chunks: 40 })
      await expect(meter.withinRateLimit(user.id, 1)).resolves.toEqual({ kind: 'deny' })
      await expect(meter.withinRateLimit(user.id, 2)).resolves.toEqual({ kind: 'permit' })
    })
  })
})
