/**
 * List API Keys
 *
 * Prints the keys issued to a user. Only display prefixes are shown;
 * raw keys are never stored.
 *
 * Usage: npm run list-keys -- <user id>
 */

import { loadConfig } from '../src/config/index.js'
import { createLogger } from '../src/config/logger.js'
import { createDatabase } from '../src/db/index.js'
import {
  ApiKeysRepository,
  SubscriptionsRepository,
  UsersRepository,
} from '../src/db/repositories/index.js'
import { ProvisioningService } from '../src/services/provisioning.js'

async function main(): Promise<void> {
  const userId = process.argv[2]

  if (!userId) {
    console.log('Usage: npm run list-keys -- <user id>')
    process.exit(1)
  }

  const config = loadConfig()
  if (!config.databaseUrl) throw new Error('DATABASE_URL is not set')

  const logger = createLogger(config)
  const database = createDatabase(config, logger)

  try {
    const provisioning = new ProvisioningService({
      users: new UsersRepository(database.pool),
      subscriptions: new SubscriptionsRepository(database.pool),
      apiKeys: new ApiKeysRepository(database.pool),
      logger,
    })

    const keys = await provisioning.listApiKeys(userId)
    if (keys.length === 0) {
      console.log(`No API keys for user ${userId}`)
      return
    }

    for (const key of keys) {
      const status = key.active ? 'active' : 'revoked'
      const lastUsed = key.lastUsedAt ? key.lastUsedAt.toISOString() : 'never'
      console.log(`${key.id}  ${key.keyPrefix}...  ${status}  last used: ${lastUsed}  ${key.name ?? ''}`)
    }
  } finally {
    await database.close()
  }
}

main().catch((err: unknown) => {
  console.error('Error:', err)
  process.exit(1)
})
