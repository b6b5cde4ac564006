import { Router } from 'express'
import { SERVICE_NAME, SERVICE_VERSION } from '../config/index.js'
import type { StoreProbe } from '../db/index.js'
import type { GeneratorFactory } from '../generator/types.js'
import type { Mode } from '../types/subscription.js'

export interface HealthRouterDependencies {
  mode: Mode
  generator: GeneratorFactory | null
  store: StoreProbe | null
}

const ENDPOINTS = [
  { method: 'GET', path: '/', auth: false, description: 'Service status' },
  { method: 'GET', path: '/api/v1/health', auth: false, description: 'Generator and store availability' },
  { method: 'POST', path: '/api/v1/generate', auth: true, description: 'Deterministic chunks for a seed' },
  { method: 'GET', path: '/api/v1/verify/{hash_prefix}', auth: false, description: 'Verify a generation hash prefix' },
  { method: 'GET', path: '/api/v1/stats/coinflip', auth: false, description: 'Coin flip distribution for a seed' },
  { method: 'POST', path: '/api/v1/batch', auth: true, description: 'Hex chunks for up to 10 seeds' },
] as const

export function createHealthRouter(deps: HealthRouterDependencies): Router {
  const router = Router()

  router.get('/', (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      status: 'healthy',
      version: SERVICE_VERSION,
      docs: '/docs',
    })
  })

  router.get('/docs', (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      authentication: 'Authorization: Bearer gs_<key>',
      endpoints: ENDPOINTS,
    })
  })

  router.get('/api/v1/health', (_req, res, next) => {
    const storeAvailable = deps.store ? deps.store.ping() : Promise.resolve(false)
    storeAvailable
      .then((available) => {
        res.json({
          status: 'healthy',
          generator_available: deps.generator !== null,
          store_available: available,
          mode: deps.mode,
          version: SERVICE_VERSION,
        })
      })
      .catch(next)
  })

  return router
}
