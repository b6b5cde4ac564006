/**
 * Provision API Key
 *
 * Creates a user, an active subscription and an API key in one go.
 * Connects directly to the database (no server needed).
 *
 * Usage: npm run provision-key -- <email> [tier] [key name]
 * Example: npm run provision-key -- dev@example.com indie "CI key"
 */

import { loadConfig } from '../src/config/index.js'
import { createLogger } from '../src/config/logger.js'
import { createDatabase } from '../src/db/index.js'
import {
  ApiKeysRepository,
  SubscriptionsRepository,
  UsersRepository,
} from '../src/db/repositories/index.js'
import { createSchema } from '../src/db/schema.js'
import { ProvisioningService } from '../src/services/provisioning.js'

async function main(): Promise<void> {
  const [email, tier = 'free', name] = process.argv.slice(2)

  if (!email) {
    console.log('Usage: npm run provision-key -- <email> [tier] [key name]')
    console.log('Example: npm run provision-key -- dev@example.com indie "CI key"')
    process.exit(1)
  }

  const config = loadConfig()
  if (!config.databaseUrl) throw new Error('DATABASE_URL is not set')

  const logger = createLogger(config)
  const database = createDatabase(config, logger)

  try {
    await createSchema(database.pool)

    const provisioning = new ProvisioningService({
      users: new UsersRepository(database.pool),
      subscriptions: new SubscriptionsRepository(database.pool),
      apiKeys: new ApiKeysRepository(database.pool),
      logger,
    })

    const userId = await provisioning.createUser(email)
    if (!userId) throw new Error(`Could not create user ${email}`)

    if (!(await provisioning.createSubscription(userId, tier))) {
      throw new Error(`Could not create ${tier} subscription`)
    }

    const apiKey = await provisioning.createApiKey(userId, name)
    if (!apiKey) throw new Error('Could not create API key')

    console.log('\nAPI Key provisioned:')
    console.log(`  User:  ${email} (${userId})`)
    console.log(`  Tier:  ${tier}`)
    console.log(`  Key:   ${apiKey}`)
    console.log('\nThis key is shown once. Store it now.')
    console.log(`Use with: -H "Authorization: Bearer ${apiKey}"`)
  } finally {
    await database.close()
  }
}

main().catch((err: unknown) => {
  console.error('Error:', err)
  process.exit(1)
})
