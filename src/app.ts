import cors from 'cors'
import express, { type Express } from 'express'
import { pinoHttp } from 'pino-http'
import type { Config } from './config/index.js'
import type { Logger } from './config/logger.js'
import type { StoreProbe } from './db/index.js'
import type { GeneratorFactory } from './generator/types.js'
import { createAdmission } from './middleware/auth.js'
import { createErrorHandler, notFoundHandler } from './middleware/errorHandler.js'
import { createGenerationRouter } from './routes/generation.js'
import { createHealthRouter } from './routes/health.js'
import type { CredentialResolver } from './services/credentials.js'
import type { UsageMeter } from './services/usage.js'

export interface AppDependencies {
  config: Pick<Config, 'mode' | 'publicBaseUrl'>
  logger: Logger
  credentials: CredentialResolver
  usage: UsageMeter
  generator: GeneratorFactory | null
  store: StoreProbe | null
}

export function createApp(deps: AppDependencies): Express {
  const { config, logger } = deps
  const app = express()

  app.disable('x-powered-by')
  app.use(pinoHttp({ logger }))
  app.use(cors())
  app.use(express.json())

  const admission = createAdmission({
    credentials: deps.credentials,
    usage: deps.usage,
    logger,
    publicBaseUrl: config.publicBaseUrl,
  })

  // ── Status ────────────────────────────────────────────────────────────────────
  app.use(createHealthRouter({ mode: config.mode, generator: deps.generator, store: deps.store }))

  // ── Generation ────────────────────────────────────────────────────────────────
  app.use(
    '/api/v1',
    createGenerationRouter({
      admission,
      usage: deps.usage,
      generator: deps.generator,
      publicBaseUrl: config.publicBaseUrl,
    })
  )

  app.use(notFoundHandler)
  app.use(createErrorHandler(logger))

  return app
}
