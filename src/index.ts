import type { Server } from 'node:http'
import { createApp, type AppDependencies } from './app.js'
import { loadConfig, SERVICE_NAME, type Config } from './config/index.js'
import { createBootLogger, createLogger, type Logger } from './config/logger.js'
import { createDatabase, type Database } from './db/index.js'
import {
  ApiKeysRepository,
  SubscriptionsRepository,
  UsageLogsRepository,
  UsersRepository,
} from './db/repositories/index.js'
import { createSchema } from './db/schema.js'
import { counterStreamFactory } from './generator/counterStream.js'
import { CredentialStore, DemoCredentialResolver } from './services/credentials.js'
import { OfflineUsageMeter, StoreUsageMeter } from './services/usage.js'
import { Mode } from './types/subscription.js'

interface Runtime {
  deps: AppDependencies
  database: Database | null
}

/** Wires the store-backed or demo collaborators according to the configured mode. */
export function buildRuntime(config: Config, logger: Logger): Runtime {
  const generator = config.generator === 'builtin' ? counterStreamFactory : null

  if (config.mode === Mode.DEMO) {
    return {
      database: null,
      deps: {
        config,
        logger,
        credentials: new DemoCredentialResolver(),
        usage: new OfflineUsageMeter(logger),
        generator,
        store: null,
      },
    }
  }

  const database = createDatabase(config, logger)
  const db = database.pool

  return {
    database,
    deps: {
      config,
      logger,
      credentials: new CredentialStore({
        apiKeys: new ApiKeysRepository(db),
        users: new UsersRepository(db),
        subscriptions: new SubscriptionsRepository(db),
        logger,
      }),
      usage: new StoreUsageMeter(new UsageLogsRepository(db), logger),
      generator,
      store: database,
    },
  }
}

async function main(): Promise<void> {
  const config = loadConfig()
  const logger = createLogger(config)
  const { deps, database } = buildRuntime(config, logger)

  if (database && config.db.autoMigrate) {
    await createSchema(database.pool)
    logger.info('Database schema ready')
  }

  const app = createApp(deps)
  const server: Server = app.listen(config.port, () => {
    logger.info({ port: config.port, mode: config.mode, generator: config.generator }, `${SERVICE_NAME} listening`)
  })

  const shutdown = (signal: string): void => {
    logger.info({ signal }, 'Shutting down')
    server.close(() => {
      const closing = database ? database.close() : Promise.resolve()
      closing
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Failed to close database pool')
          process.exit(1)
        })
    })
  }

  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)
}

export function reportStartupFailure(err: unknown, logger: Logger = createBootLogger()): void {
  logger.fatal({ err }, 'Failed to start server')
}

if (process.env.NODE_ENV !== 'test') {
  main().catch((err: unknown) => {
    reportStartupFailure(err)
    process.exit(1)
  })
}
