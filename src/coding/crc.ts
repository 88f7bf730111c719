/**
 * @module coding/crc
 * @description Cyclic redundancy check by mod-2 polynomial long division
 *
 * The generator is a bit string of GF(2) coefficients, MSB first, so '1011'
 * is x^3 + x + 1 and yields a 3-bit CRC.
 */

import { InvalidInputError } from '../core/errors'
import { formatBits, parseBits, zeroBits } from './bits'
import type {
    Bit,
    BitSource,
    CrcDivisionStep,
    CrcDivisionTrace,
    CrcVerifyResult,
    Mod2DivisionResult,
} from './types'

function xor(a: Bit, b: Bit): Bit {
    return a === b ? 0 : 1
}

/**
 * Parse and validate a generator polynomial
 *
 * @throws InvalidInputError if empty, not a bit string, or its leading bit is 0
 */
export function parseGenerator(generator: BitSource): Bit[] {
    const bits = parseBits(generator, { name: 'generator' })
    if (bits.length === 0) {
        throw new InvalidInputError('generator must not be empty')
    }
    if (bits[0] !== 1) {
        throw new InvalidInputError('generator must start with 1', { generator: formatBits(bits) })
    }
    return bits
}

function parseData(data: BitSource): Bit[] {
    const bits = parseBits(data, { name: 'data' })
    if (bits.length === 0) {
        throw new InvalidInputError('data must not be empty')
    }
    return bits
}

// ==================== Division ====================

function divide(dividend: readonly Bit[], generator: readonly Bit[], onStep?: (step: CrcDivisionStep) => void): Mod2DivisionResult {
    const r = generator.length - 1

    if (dividend.length < generator.length) {
        // Degree below the generator's: the dividend is its own remainder
        return { quotient: [], remainder: [...zeroBits(r - dividend.length), ...dividend] }
    }

    const work = [...dividend]
    const quotient: Bit[] = []

    for (let i = 0; i + r < work.length; i++) {
        if (work[i] === 0) {
            quotient.push(0)
            continue
        }

        const before = onStep ? formatBits(work) : ''
        for (let j = 0; j < generator.length; j++) {
            work[i + j] = xor(work[i + j], generator[j])
        }
        quotient.push(1)
        onStep?.({ position: i, before, after: formatBits(work) })
    }

    return { quotient, remainder: work.slice(work.length - r) }
}

/**
 * GF(2) long division: XOR the aligned generator in wherever the leading bit
 * of the window is 1, left to right
 *
 * @returns quotient bits and an r-bit remainder (r = generator length − 1)
 */
export function mod2Divide(dividend: BitSource, generator: BitSource): Mod2DivisionResult {
    return divide(parseBits(dividend, { name: 'dividend' }), parseGenerator(generator))
}

// ==================== Encode / Verify ====================

/**
 * CRC value of `data`: remainder of data·x^r divided by the generator
 *
 * @throws InvalidInputError on empty data or an invalid generator
 */
export function crcRemainder(data: BitSource, generator: BitSource): string {
    const g = parseGenerator(generator)
    const bits = parseData(data)
    return formatBits(divide([...bits, ...zeroBits(g.length - 1)], g).remainder)
}

/**
 * Codeword = data followed by its CRC
 *
 * @example
 * ```typescript
 * crcEncode('1101011011', '1011') // '1101011011100'
 * ```
 */
export function crcEncode(data: BitSource, generator: BitSource): string {
    const g = parseGenerator(generator)
    const bits = parseData(data)
    const { remainder } = divide([...bits, ...zeroBits(g.length - 1)], g)
    return formatBits([...bits, ...remainder])
}

/**
 * Divide the received codeword by the generator; a zero remainder is valid
 *
 * Input shorter than the generator cannot be validated and is reported as
 * corrupted.
 */
export function crcVerify(received: BitSource, generator: BitSource): CrcVerifyResult {
    const g = parseGenerator(generator)
    const bits = parseBits(received, { name: 'received' })
    const r = g.length - 1
    const { remainder } = divide(bits, g)
    const data = formatBits(bits.slice(0, Math.max(0, bits.length - r)))

    if (bits.length < g.length) {
        return { status: 'corrupted', remainder: formatBits(remainder), data }
    }

    return {
        status: remainder.every(bit => bit === 0) ? 'valid' : 'corrupted',
        remainder: formatBits(remainder),
        data,
    }
}

/**
 * Step-by-step trace of the sender's division, one entry per XOR
 */
export function crcDivisionSteps(data: BitSource, generator: BitSource): CrcDivisionTrace {
    const g = parseGenerator(generator)
    const augmented = [...parseData(data), ...zeroBits(g.length - 1)]
    const steps: CrcDivisionStep[] = []
    const { remainder } = divide(augmented, g, step => steps.push(step))

    return {
        augmented: formatBits(augmented),
        generator: formatBits(g),
        steps,
        remainder: formatBits(remainder),
    }
}
