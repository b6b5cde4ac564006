/** Size in bytes of one unit of generator output. */
export const CHUNK_SIZE = 16

/**
 * Sequential stream of fixed-size chunks.
 *
 * Streams are deterministic: two fresh streams advanced by the same amount
 * yield identical chunks. A stream is single-use and request-scoped.
 */
export interface ChunkStream {
  /** Skips `count` chunks without returning them. */
  advance(count: number): void
  /** Returns the next chunk, exactly {@link CHUNK_SIZE} bytes. */
  next(): Buffer
}

export type GeneratorFactory = () => ChunkStream
