import { createHash } from 'node:crypto';
import type { GeneratorFactory } from '../generator/types.js';

export type OutputFormat = 'hex' | 'json' | 'binary';

export type EncodedChunks = string[] | number[][];

export interface GenerationRequest {
    seed: number;
    chunks: number;
    skip: number;
}

export interface CoinFlipStats {
    heads: number;
    tails: number;
    total: number;
    heads_ratio: number;
    perfect_balance: boolean;
    message: string;
}

/** Largest deviation from 0.5 still reported as a perfect balance. */
export const PERFECT_BALANCE_TOLERANCE = 0.001;

/**
 * Draws chunks from a fresh stream: advance by `skip`, then by `seed`,
 * then collect `chunks` units.
 */
export function generateChunks(factory: GeneratorFactory, request: GenerationRequest): Buffer[] {
    const stream = factory();
    stream.advance(request.skip);
    stream.advance(request.seed);

    const out: Buffer[] = [];
    for (let i = 0; i < request.chunks; i++) {
        out.push(stream.next());
    }
    return out;
}

export function encodeChunks(chunks: Buffer[], format: OutputFormat): EncodedChunks {
    switch (format) {
        case 'hex':
            return chunks.map((chunk) => chunk.toString('hex'));
        case 'json':
            return chunks.map((chunk) => Array.from(chunk));
        case 'binary':
            return chunks.map((chunk) => chunk.toString('base64'));
    }
}

/** SHA-256 over the concatenation of all raw chunks, lowercase hex. */
export function digestChunks(chunks: Buffer[]): string {
    const hash = createHash('sha256');
    for (const chunk of chunks) {
        hash.update(chunk);
    }
    return hash.digest('hex');
}

export function verificationUrl(publicBaseUrl: string, hash: string): string {
    return `${publicBaseUrl}/verify/${hash.slice(0, 16)}`;
}

/**
 * `numerator / denominator` rounded to `decimals` places, computed on integers.
 * Exact ties go to the even neighbour.
 */
export function roundedRatio(numerator: number, denominator: number, decimals: number): number {
    const factor = 10 ** decimals;
    const scaled = numerator * factor;

    let quotient = Math.floor(scaled / denominator);
    let remainder = scaled - quotient * denominator;
    if (remainder < 0) {
        quotient -= 1;
        remainder += denominator;
    } else if (remainder >= denominator) {
        quotient += 1;
        remainder -= denominator;
    }

    const twice = remainder * 2;
    if (twice > denominator || (twice === denominator && quotient % 2 === 1)) {
        quotient += 1;
    }
    return quotient / factor;
}

/**
 * Fair-coin sample over `flips` chunks after advancing by `seed`:
 * the least significant bit of each chunk's first byte is heads.
 */
export function coinFlipStats(factory: GeneratorFactory, seed: number, flips: number): CoinFlipStats {
    const stream = factory();
    stream.advance(seed);

    let heads = 0;
    for (let i = 0; i < flips; i++) {
        if (stream.next()[0] & 1) {
            heads++;
        }
    }

    const ratio = heads / flips;
    const perfect = Math.abs(ratio - 0.5) < PERFECT_BALANCE_TOLERANCE;

    return {
        heads,
        tails: flips - heads,
        total: flips,
        heads_ratio: roundedRatio(heads, flips, 6),
        perfect_balance: perfect,
        message: perfect
            ? `Generated ${flips.toLocaleString('en-US')} flips with perfect distribution`
            : 'Distribution within expected variance',
    };
}
