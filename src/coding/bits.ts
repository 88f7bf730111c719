/**
 * @module coding/bits
 * @description Bit sequence parsing, formatting and index helpers
 *
 * Hamming positions are 1-indexed while storage is 0-indexed. All translation
 * between the two goes through `toStorageIndex`.
 */

import { InvalidInputError } from '../core/errors'
import type { Bit, BitSource } from './types'

export interface ParseBitsOptions {
    /** Exact length the caller expects */
    length?: number
    /** Argument name used in error messages */
    name?: string
}

/**
 * Validate a bit source and convert it to a Bit array
 *
 * @throws InvalidInputError on any element other than 0/1, or on a length mismatch
 *
 * @example
 * ```typescript
 * parseBits('1011')        // [1, 0, 1, 1]
 * parseBits([1, 0], { length: 2 })
 * ```
 */
export function parseBits(source: BitSource, options: ParseBitsOptions = {}): Bit[] {
    const name = options.name ?? 'bits'
    const bits: Bit[] = []

    for (let i = 0; i < source.length; i++) {
        const value = source[i]
        if (value === '0' || value === 0) {
            bits.push(0)
        } else if (value === '1' || value === 1) {
            bits.push(1)
        } else {
            throw new InvalidInputError(
                `${name} must contain only 0 and 1; found ${JSON.stringify(value)} at index ${i}`,
                { index: i, value }
            )
        }
    }

    if (options.length !== undefined && bits.length !== options.length) {
        throw new InvalidInputError(
            `${name} must be ${options.length} bits long; got ${bits.length}`,
            { expected: options.length, actual: bits.length }
        )
    }

    return bits
}

/**
 * Render bits as a '0'/'1' string
 */
export function formatBits(bits: readonly Bit[]): string {
    return bits.join('')
}

export function isPowerOfTwo(n: number): boolean {
    return Number.isInteger(n) && n > 0 && (n & (n - 1)) === 0
}

/**
 * Translate a 1-indexed position into a 0-indexed storage index
 *
 * @throws InvalidInputError when the position is outside [1, length]
 */
export function toStorageIndex(position: number, length: number): number {
    if (!Number.isInteger(position) || position < 1 || position > length) {
        throw new InvalidInputError(
            `position ${position} is outside 1..${length}`,
            { position, length }
        )
    }
    return position - 1
}

/**
 * Return a copy with the bit at a 1-indexed position inverted
 */
export function flipBit(bits: readonly Bit[], position: number): Bit[] {
    const index = toStorageIndex(position, bits.length)
    const flipped = [...bits]
    flipped[index] = flipped[index] === 1 ? 0 : 1
    return flipped
}

export function complementBits(bits: readonly Bit[]): Bit[] {
    return bits.map(bit => (bit === 1 ? 0 : 1))
}

export function zeroBits(length: number): Bit[] {
    return new Array<Bit>(length).fill(0)
}

/**
 * Split bits into blocks of `width`, zero-padding the last block on the right
 */
export function toBlocks(bits: readonly Bit[], width: number): Bit[][] {
    if (!Number.isInteger(width) || width <= 0) {
        throw new InvalidInputError(`block width must be a positive integer; got ${width}`, { width })
    }

    const blocks: Bit[][] = []
    for (let i = 0; i < bits.length; i += width) {
        const block = bits.slice(i, i + width)
        while (block.length < width) block.push(0)
        blocks.push(block)
    }
    return blocks
}

// ==================== Byte Adapters ====================

/**
 * Expand bytes into bits, MSB first
 */
export function bytesToBits(bytes: Uint8Array): Bit[] {
    const bits: Bit[] = []
    for (const byte of bytes) {
        for (let i = 7; i >= 0; i--) {
            bits.push((byte >> i) & 1 ? 1 : 0)
        }
    }
    return bits
}

/**
 * Pack bits (MSB first) into bytes
 *
 * @throws InvalidInputError when the bit count is not a multiple of 8
 */
export function bitsToBytes(source: BitSource): Uint8Array {
    const bits = parseBits(source)
    if (bits.length % 8 !== 0) {
        throw new InvalidInputError(
            `bit count must be a multiple of 8 to pack into bytes; got ${bits.length}`,
            { length: bits.length }
        )
    }

    const bytes = new Uint8Array(bits.length / 8)
    for (let i = 0; i < bits.length; i++) {
        bytes[i >> 3] |= bits[i] << (7 - (i & 7))
    }
    return bytes
}
