import { Router } from 'express'
import { errorMessage, GeneratorUnavailableError, InternalError } from '../errors.js'
import type { GeneratorFactory } from '../generator/types.js'
import { requireApiKey, requirePrincipal, type Admission } from '../middleware/auth.js'
import { parseInput } from '../middleware/validate.js'
import {
  batchBodySchema,
  coinflipQuerySchema,
  generateBodySchema,
  verifyParamsSchema,
} from '../schemas/index.js'
import {
  coinFlipStats,
  digestChunks,
  encodeChunks,
  generateChunks,
  verificationUrl,
  type EncodedChunks,
  type OutputFormat,
} from '../services/generation.js'
import type { UsageMeter } from '../services/usage.js'
import type { Principal } from '../types/subscription.js'

export const GENERATE_ENDPOINT = '/api/v1/generate'
export const BATCH_ENDPOINT = '/api/v1/batch'

export interface GenerateResponse {
  data: EncodedChunks
  hash: string
  chunks_generated: number
  seed: number
  verification_url: string
}

export interface GenerationRouterDependencies {
  admission: Admission
  usage: UsageMeter
  generator: GeneratorFactory | null
  publicBaseUrl: string
}

interface GenerateJob {
  seed: number
  chunks: number
  skip: number
  format: OutputFormat
}

export function createGenerationRouter(deps: GenerationRouterDependencies): Router {
  const router = Router()

  const requireGenerator = (): GeneratorFactory => {
    if (!deps.generator) {
      throw new GeneratorUnavailableError()
    }
    return deps.generator
  }

  const run = (generator: GeneratorFactory, job: GenerateJob): GenerateResponse => {
    let raw: Buffer[]
    try {
      raw = generateChunks(generator, job)
    } catch (err) {
      throw new InternalError(`Generation failed: ${errorMessage(err)}`)
    }

    const hash = digestChunks(raw)
    return {
      data: encodeChunks(raw, job.format),
      hash,
      chunks_generated: job.chunks,
      seed: job.seed,
      verification_url: verificationUrl(deps.publicBaseUrl, hash),
    }
  }

  // Fire and forget: logUsage never rejects.
  const recordUsage = (principal: Principal, endpoint: string, chunks: number, startedAt: number): void => {
    void deps.usage.logUsage({
      userId: principal.userId,
      apiKeyId: principal.apiKeyId,
      endpoint,
      chunksGenerated: chunks,
      responseTimeMs: Date.now() - startedAt,
      statusCode: 200,
    })
  }

  /** Deterministic chunks for a seed. */
  router.post('/generate', requireApiKey(deps.admission), (req, res, next) => {
    const startedAt = Date.now()
    try {
      const principal = requirePrincipal(req)
      const body = parseInput(generateBodySchema, req.body)
      const result = run(requireGenerator(), body)
      recordUsage(principal, GENERATE_ENDPOINT, body.chunks, startedAt)
      res.json(result)
    } catch (err) {
      next(err)
    }
  })

  /** Placeholder check: only the prefix shape is validated. */
  router.get('/verify/:hashPrefix', (req, res, next) => {
    try {
      const { hashPrefix } = parseInput(verifyParamsSchema, req.params)
      if (hashPrefix.length < 16) {
        res.json({ valid: false, seed: null, chunks: null, message: 'Hash prefix too short (min 16 chars)' })
        return
      }
      res.json({
        valid: true,
        seed: null,
        chunks: null,
        message: 'Verification endpoint - full implementation requires database',
      })
    } catch (err) {
      next(err)
    }
  })

  router.get('/stats/coinflip', (req, res, next) => {
    try {
      const query = parseInput(coinflipQuerySchema, req.query)
      const generator = requireGenerator()
      try {
        res.json(coinFlipStats(generator, query.seed, query.flips))
      } catch (err) {
        throw new InternalError(`Stats generation failed: ${errorMessage(err)}`)
      }
    } catch (err) {
      next(err)
    }
  })

  /**
   * Up to 10 seeds, hex output. The call is admitted before the body is
   * read, then every seed goes through the admission chain again, so rate
   * and quota are checked once per seed.
   */
  router.post('/batch', requireApiKey(deps.admission), (req, res, next) => {
    const handle = async (): Promise<void> => {
      const body = parseInput(batchBodySchema, req.body)
      const generator = requireGenerator()

      const results: GenerateResponse[] = []
      for (const seed of body.seeds) {
        const startedAt = Date.now()
        const principal = await deps.admission(req.headers.authorization)
        results.push(run(generator, { seed, chunks: body.chunks_per_seed, skip: 0, format: 'hex' }))
        recordUsage(principal, BATCH_ENDPOINT, body.chunks_per_seed, startedAt)
      }

      res.json({ results })
    }

    handle().catch(next)
  })

  return router
}
