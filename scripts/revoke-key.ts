/**
 * Revoke API Key
 *
 * Deactivates a key by id. The row stays for usage history.
 *
 * Usage: npm run revoke-key -- <api key id>
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
  const apiKeyId = process.argv[2]

  if (!apiKeyId) {
    console.log('Usage: npm run revoke-key -- <api key id>')
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

    const revoked = await provisioning.revokeApiKey(apiKeyId)
    console.log(revoked ? `Revoked ${apiKeyId}` : `No active key with id ${apiKeyId}`)
    if (!revoked) process.exitCode = 1
  } finally {
    await database.close()
  }
}

main().catch((err: unknown) => {
  console.error('Error:', err)
  process.exit(1)
})
