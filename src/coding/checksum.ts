/**
 * @module coding/checksum
 * @description Fixed-width 1's-complement checksum
 *
 * Data is split into k-bit blocks (last block zero-padded on the right), the
 * blocks are summed with end-around carry, and the complemented sum is the
 * checksum. The receiver adds the checksum to the same block sum; an all-ones
 * result means no error was detected.
 *
 * Blind spots: an all-zero block turned all-ones (or back) leaves the sum
 * unchanged, as do two flips in the same bit column of different blocks that
 * go in opposite directions.
 */

import { InvalidInputError } from '../core/errors'
import { complementBits, formatBits, parseBits, toBlocks, zeroBits } from './bits'
import type {
    Bit,
    BitSource,
    ChecksumVerifyResult,
    SegmentedVerifyResult,
    SegmentOptions,
    SegmentVerifyResult,
} from './types'

// ==================== 1's-Complement Arithmetic ====================

function addWithCarry(a: readonly Bit[], b: readonly Bit[], carryIn: Bit): { sum: Bit[], carry: Bit } {
    const sum = zeroBits(a.length)
    let carry = carryIn
    for (let i = a.length - 1; i >= 0; i--) {
        const total = a[i] + b[i] + carry
        sum[i] = total & 1 ? 1 : 0
        carry = total > 1 ? 1 : 0
    }
    return { sum, carry }
}

/**
 * k-bit 1's-complement addition: carry-out is added back into the low bits
 * until no overflow remains
 */
export function onesComplementAdd(a: readonly Bit[], b: readonly Bit[]): Bit[] {
    if (a.length !== b.length) {
        throw new InvalidInputError(
            `operands must have equal width; got ${a.length} and ${b.length}`,
            { left: a.length, right: b.length }
        )
    }

    let { sum, carry } = addWithCarry(a, b, 0)
    while (carry === 1) {
        ({ sum, carry } = addWithCarry(sum, zeroBits(sum.length), 1))
    }
    return sum
}

/**
 * 1's-complement sum of equal-width blocks
 */
export function onesComplementSum(blocks: readonly (readonly Bit[])[], width: number): Bit[] {
    assertBlockWidth(width)
    return blocks.reduce<Bit[]>((acc, block) => onesComplementAdd(acc, block), zeroBits(width))
}

// ==================== Validation ====================

function assertBlockWidth(width: number): void {
    if (!Number.isInteger(width) || width <= 0) {
        throw new InvalidInputError(`blockWidth must be a positive integer; got ${width}`, { blockWidth: width })
    }
}

function parseData(data: BitSource): Bit[] {
    const bits = parseBits(data, { name: 'data' })
    if (bits.length === 0) {
        throw new InvalidInputError('data must not be empty')
    }
    return bits
}

// ==================== Encode / Verify ====================

function computeChecksum(data: readonly Bit[], blockWidth: number): Bit[] {
    return complementBits(onesComplementSum(toBlocks(data, blockWidth), blockWidth))
}

function verifyParts(data: readonly Bit[], checksum: readonly Bit[], blockWidth: number): ChecksumVerifyResult {
    const sum = onesComplementSum([...toBlocks(data, blockWidth), checksum], blockWidth)
    return {
        status: sum.every(bit => bit === 1) ? 'valid' : 'corrupted',
        data: formatBits(data),
        checksum: formatBits(checksum),
        sum: formatBits(sum),
    }
}

/**
 * Compute the k-bit checksum of `data`
 *
 * @throws InvalidInputError if data is empty or not a bit sequence, or k ≤ 0
 *
 * @example
 * ```typescript
 * checksumEncode('10011001111000100010010010000100', 8) // '11011010'
 * ```
 */
export function checksumEncode(data: BitSource, blockWidth: number): string {
    assertBlockWidth(blockWidth)
    return formatBits(computeChecksum(parseData(data), blockWidth))
}

/**
 * Data followed by its checksum, ready to transmit
 */
export function checksumCodeword(data: BitSource, blockWidth: number): string {
    assertBlockWidth(blockWidth)
    const bits = parseData(data)
    return formatBits([...bits, ...computeChecksum(bits, blockWidth)])
}

/**
 * Verify data followed by a k-bit checksum
 *
 * The trailing k bits are the checksum; the bits before it are blocked exactly
 * as the sender blocked them, so zero-padded encodings verify.
 *
 * @throws InvalidInputError if k ≤ 0 or `received` has no data bits before the checksum
 */
export function checksumVerify(received: BitSource, blockWidth: number): ChecksumVerifyResult {
    assertBlockWidth(blockWidth)
    const bits = parseBits(received, { name: 'received' })
    if (bits.length <= blockWidth) {
        throw new InvalidInputError(
            `received must hold at least one data bit plus a ${blockWidth}-bit checksum; got ${bits.length} bits`,
            { length: bits.length, blockWidth }
        )
    }

    const split = bits.length - blockWidth
    return verifyParts(bits.slice(0, split), bits.slice(split), blockWidth)
}

// ==================== Segmented Checksum ====================

function assertSegmentWidth(segmentWidth: number): void {
    if (!Number.isInteger(segmentWidth) || segmentWidth <= 0) {
        throw new InvalidInputError(
            `segmentWidth must be a positive integer; got ${segmentWidth}`,
            { segmentWidth }
        )
    }
}

/**
 * Per-segment checksums, concatenated in segment order
 *
 * @throws InvalidInputError unless data length is a positive multiple of segmentWidth
 */
export function checksumEncodeSegmented(data: BitSource, options: SegmentOptions): string {
    const { segmentWidth, blockWidth } = options
    assertSegmentWidth(segmentWidth)
    assertBlockWidth(blockWidth)
    const bits = parseData(data)
    if (bits.length % segmentWidth !== 0) {
        throw new InvalidInputError(
            `data length ${bits.length} is not a multiple of segmentWidth ${segmentWidth}`,
            { length: bits.length, segmentWidth }
        )
    }

    const checksums: Bit[] = []
    for (let start = 0; start < bits.length; start += segmentWidth) {
        checksums.push(...computeChecksum(bits.slice(start, start + segmentWidth), blockWidth))
    }
    return formatBits(checksums)
}

/**
 * Verify all data segments followed by all segment checksums
 *
 * @throws InvalidInputError unless received length is a positive multiple of
 * segmentWidth + blockWidth
 */
export function checksumVerifySegmented(received: BitSource, options: SegmentOptions): SegmentedVerifyResult {
    const { segmentWidth, blockWidth } = options
    assertSegmentWidth(segmentWidth)
    assertBlockWidth(blockWidth)
    const bits = parseBits(received, { name: 'received' })
    const frame = segmentWidth + blockWidth
    if (bits.length === 0 || bits.length % frame !== 0) {
        throw new InvalidInputError(
            `received length ${bits.length} is not a positive multiple of ${frame} (segment + checksum)`,
            { length: bits.length, segmentWidth, blockWidth }
        )
    }

    const count = bits.length / frame
    const checksumStart = count * segmentWidth
    const segments: SegmentVerifyResult[] = []
    for (let index = 0; index < count; index++) {
        const data = bits.slice(index * segmentWidth, (index + 1) * segmentWidth)
        const offset = checksumStart + index * blockWidth
        const checksum = bits.slice(offset, offset + blockWidth)
        segments.push({ index, ...verifyParts(data, checksum, blockWidth) })
    }

    return {
        status: segments.every(segment => segment.status === 'valid') ? 'valid' : 'corrupted',
        segments,
    }
}
