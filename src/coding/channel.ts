/**
 * @module coding/channel
 * @description Bit-error injection for exercising the codecs
 */

import { InvalidInputError } from '../core/errors'
import type { SeededRandom } from '../core/repro'
import { flipBit, formatBits, parseBits } from './bits'
import type { BitSource } from './types'

export interface ChannelOutput {
    /** Bits after transmission */
    received: string
    /** 1-indexed positions that were flipped, ascending */
    flipped: number[]
}

/**
 * Invert the bits at the given 1-indexed positions
 *
 * A position listed twice is flipped twice (and so restored).
 *
 * @throws InvalidInputError on a position outside 1..length
 *
 * @example
 * ```typescript
 * flipBits('0110011', [3]) // '0100011'
 * ```
 */
export function flipBits(bits: BitSource, positions: readonly number[]): string {
    let current = parseBits(bits)
    for (const position of positions) {
        current = flipBit(current, position)
    }
    return formatBits(current)
}

/**
 * Binary symmetric channel: each bit flips independently with probability p
 *
 * @param bits - Transmitted bits
 * @param errorProbability - Crossover probability in [0, 1]
 * @param rng - Seeded generator, so a run can be replayed
 */
export function binarySymmetricChannel(
    bits: BitSource,
    errorProbability: number,
    rng: SeededRandom
): ChannelOutput {
    if (!(errorProbability >= 0 && errorProbability <= 1)) {
        throw new InvalidInputError(
            `errorProbability must be within [0, 1]; got ${errorProbability}`,
            { errorProbability }
        )
    }

    const sent = parseBits(bits)
    const flipped: number[] = []
    for (let position = 1; position <= sent.length; position++) {
        if (rng.random() < errorProbability) flipped.push(position)
    }

    return { received: flipBits(sent, flipped), flipped }
}

/**
 * Flip exactly `count` distinct, randomly chosen positions
 *
 * @throws InvalidInputError unless 0 ≤ count ≤ bits.length
 */
export function flipRandomBits(bits: BitSource, count: number, rng: SeededRandom): ChannelOutput {
    const sent = parseBits(bits)
    if (!Number.isInteger(count) || count < 0 || count > sent.length) {
        throw new InvalidInputError(
            `count must be an integer within 0..${sent.length}; got ${count}`,
            { count, length: sent.length }
        )
    }

    const flipped = rng.choosePositions(sent.length, count)
    return { received: flipBits(sent, flipped), flipped }
}
