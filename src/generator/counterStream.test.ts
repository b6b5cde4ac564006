import { createHash } from 'node:crypto'
import { describe, it, expect } from 'vitest'
import { CounterChunkStream, counterStreamFactory } from './counterStream.js'
import { CHUNK_SIZE } from './types.js'

const chunkAt = (index: number): Buffer => {
  const counter = Buffer.alloc(8)
  counter.writeBigUInt64BE(BigInt(index))
  return createHash('sha256')
    .update('goldenseed/chunk-stream/v1')
    .update(counter)
    .digest()
    .subarray(0, 16)
}

describe('CounterChunkStream', () => {
  it('yields 16-byte chunks', () => {
    const stream = new CounterChunkStream()
    expect(stream.next()).toHaveLength(CHUNK_SIZE)
  })

  it('derives chunk i from the position counter', () => {
    const stream = new CounterChunkStream()
    expect(stream.next().equals(chunkAt(0))).toBe(true)
    expect(stream.next().equals(chunkAt(1))).toBe(true)
  })

  it('advancing matches drawing and discarding', () => {
    const drawn = new CounterChunkStream()
    for (let i = 0; i < 5; i++) drawn.next()

    const advanced = new CounterChunkStream()
    advanced.advance(2)
    advanced.advance(3)

    expect(advanced.next().equals(drawn.next())).toBe(true)
  })

  it('jumps far ahead without iterating', () => {
    const stream = new CounterChunkStream()
    stream.advance(Number.MAX_SAFE_INTEGER)
    expect(stream.next().equals(chunkAt(Number.MAX_SAFE_INTEGER))).toBe(true)
  })

  it('rejects negative or fractional advances', () => {
    const stream = new CounterChunkStream()
    expect(() => stream.advance(-1)).toThrow(RangeError)
    expect(() => stream.advance(1.5)).toThrow(RangeError)
  })

  it('factory streams are independent and reproducible', () => {
    const first = counterStreamFactory()
    const second = counterStreamFactory()
    first.next()
    expect(second.next().equals(chunkAt(0))).toBe(true)
  })
})
