import { createHash } from 'node:crypto'
import { CHUNK_SIZE, type ChunkStream, type GeneratorFactory } from './types.js'

const DOMAIN_TAG = Buffer.from('goldenseed/chunk-stream/v1')

/**
 * Built-in generator: chunk `i` is the first 16 bytes of
 * SHA-256(domain tag || uint64be(i)). Positions are addressable, so
 * advancing costs nothing regardless of distance.
 */
export class CounterChunkStream implements ChunkStream {
  private position = 0n

  advance(count: number): void {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new RangeError(`advance count must be a non-negative safe integer, got ${count}`)
    }
    this.position += BigInt(count)
  }

  next(): Buffer {
    const counter = Buffer.alloc(8)
    counter.writeBigUInt64BE(this.position)
    this.position += 1n

    return createHash('sha256').update(DOMAIN_TAG).update(counter).digest().subarray(0, CHUNK_SIZE)
  }
}

export const counterStreamFactory: GeneratorFactory = () => new CounterChunkStream()
