import { z } from 'zod'

export const MAX_CHUNKS = 10_000
export const MAX_BATCH_SEEDS = 10
export const MAX_CHUNKS_PER_SEED = 1_000
export const MAX_FLIPS = 1_000_000

const position = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER)

export const outputFormatSchema = z.enum(['hex', 'json', 'binary'])

export const generateBodySchema = z.object({
  seed: position.default(0),
  chunks: z.number().int().min(1).max(MAX_CHUNKS).default(100),
  format: outputFormatSchema.default('hex'),
  skip: position.default(0),
})

export type GenerateBody = z.infer<typeof generateBodySchema>

export const batchBodySchema = z.object({
  seeds: z.array(position).max(MAX_BATCH_SEEDS, `Max ${MAX_BATCH_SEEDS} seeds per request`),
  chunks_per_seed: z.number().int().min(1).max(MAX_CHUNKS_PER_SEED).default(100),
})

export type BatchBody = z.infer<typeof batchBodySchema>

export const coinflipQuerySchema = z.object({
  seed: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
  flips: z.coerce.number().int().min(1).max(MAX_FLIPS).default(100_000),
})

export const verifyParamsSchema = z.object({
  hashPrefix: z.string(),
})
