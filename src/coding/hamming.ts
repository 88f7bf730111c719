/**
 * @module coding/hamming
 * @description Hamming single-error-correcting code for arbitrary data lengths
 *
 * Parity bits sit at the 1-indexed power-of-two positions (1, 2, 4, 8, ...).
 * Parity 2^i makes the XOR over every position with bit i set equal to 0, so
 * the recomputed checks spell out the position of a single flipped bit.
 */

import { InvalidInputError } from '../core/errors'
import { flipBit, formatBits, isPowerOfTwo, parseBits, toStorageIndex } from './bits'
import type { Bit, BitSource, HammingDecodeResult } from './types'

/**
 * Smallest r with 2^r ≥ m + r + 1
 */
export function hammingParityBitCount(dataLength: number): number {
    if (!Number.isInteger(dataLength) || dataLength <= 0) {
        throw new InvalidInputError(`data length must be a positive integer; got ${dataLength}`, { dataLength })
    }
    let r = 0
    while (2 ** r < dataLength + r + 1) r++
    return r
}

/**
 * Parity over every 1-indexed position with bit `i` set
 */
function parityCheck(bits: readonly Bit[], i: number): Bit {
    const mask = 1 << i
    let parity: Bit = 0
    for (let position = 1; position <= bits.length; position++) {
        if ((position & mask) !== 0 && bits[toStorageIndex(position, bits.length)] === 1) {
            parity = parity === 1 ? 0 : 1
        }
    }
    return parity
}

function syndromeOf(bits: readonly Bit[]): number {
    let syndrome = 0
    for (let i = 0; 2 ** i <= bits.length; i++) {
        if (parityCheck(bits, i) === 1) syndrome |= 1 << i
    }
    return syndrome
}

function extractData(bits: readonly Bit[]): Bit[] {
    return bits.filter((_, index) => !isPowerOfTwo(index + 1))
}

/**
 * Interleave parity bits into `data`
 *
 * @throws InvalidInputError on empty data or non-bit elements
 *
 * @example
 * ```typescript
 * hammingEncode('1011') // '0110011'
 * ```
 */
export function hammingEncode(data: BitSource): string {
    const bits = parseBits(data, { name: 'data' })
    if (bits.length === 0) {
        throw new InvalidInputError('data must not be empty')
    }

    const r = hammingParityBitCount(bits.length)
    const n = bits.length + r
    const codeword = new Array<Bit>(n).fill(0)

    // Data fills non-power-of-two positions in order
    let next = 0
    for (let position = 1; position <= n; position++) {
        if (!isPowerOfTwo(position)) {
            codeword[toStorageIndex(position, n)] = bits[next++]
        }
    }

    // Parity slots are still 0, so the check over each group is the parity value itself
    for (let i = 0; i < r; i++) {
        codeword[toStorageIndex(2 ** i, n)] = parityCheck(codeword, i)
    }

    return formatBits(codeword)
}

function parseCodeword(received: BitSource): Bit[] {
    const bits = parseBits(received, { name: 'received' })
    if (bits.length === 0) {
        throw new InvalidInputError('received must not be empty')
    }
    return bits
}

/**
 * Recomputed parity-check value of a received codeword; check i is bit i
 */
export function hammingSyndrome(received: BitSource): number {
    return syndromeOf(parseCodeword(received))
}

/**
 * Check, correct a single-bit error, and extract the data bits
 *
 * Any non-empty length is decoded; the checks run for every 2^i ≤ length.
 * Two or more flipped bits, or an inserted or dropped bit, may produce a
 * syndrome that points at a wrong position (reported as corrected) or beyond
 * the codeword (uncorrectable).
 */
export function hammingDecode(received: BitSource): HammingDecodeResult {
    const bits = parseCodeword(received)
    const syndrome = syndromeOf(bits)

    if (syndrome === 0) {
        return { status: 'no-error', codeword: formatBits(bits), data: formatBits(extractData(bits)), syndrome }
    }

    if (syndrome > bits.length) {
        return { status: 'uncorrectable', codeword: formatBits(bits), data: formatBits(extractData(bits)), syndrome }
    }

    const corrected = flipBit(bits, syndrome)
    return {
        status: 'corrected',
        codeword: formatBits(corrected),
        data: formatBits(extractData(corrected)),
        syndrome,
        errorPosition: syndrome,
    }
}
