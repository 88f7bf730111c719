/**
 * @module coding/types
 * @description Shared types for the error-control codecs
 */

/** A single binary digit */
export type Bit = 0 | 1

/**
 * Anything a codec accepts as a bit sequence: a '0'/'1' string or a numeric
 * array of 0/1. Every element is validated before use.
 */
export type BitSource = string | readonly number[]

/** Outcome of a detection-only verifier */
export type VerifyStatus = 'valid' | 'corrupted'

/** Outcome of the Hamming decoder */
export type HammingStatus = 'no-error' | 'corrected' | 'uncorrectable'

// ==================== Checksum ====================

export interface ChecksumVerifyResult {
    status: VerifyStatus
    /** Data portion (received minus the trailing checksum block) */
    data: string
    /** Received checksum block */
    checksum: string
    /** 1's-complement sum of data blocks and checksum; all ones when valid */
    sum: string
}

export interface SegmentOptions {
    /** Bits per segment */
    segmentWidth: number
    /** Checksum block width k */
    blockWidth: number
}

export interface SegmentVerifyResult extends ChecksumVerifyResult {
    /** 0-based segment index */
    index: number
}

export interface SegmentedVerifyResult {
    status: VerifyStatus
    segments: SegmentVerifyResult[]
}

// ==================== CRC ====================

export interface CrcVerifyResult {
    status: VerifyStatus
    /** Division remainder; all zeros when valid */
    remainder: string
    /** Received bits minus the trailing r CRC bits */
    data: string
}

export interface Mod2DivisionResult {
    quotient: Bit[]
    remainder: Bit[]
}

/**
 * One XOR step of the mod-2 long division
 */
export interface CrcDivisionStep {
    /** 0-based position of the leading bit the generator was aligned to */
    position: number
    /** Working bits before the XOR */
    before: string
    /** Working bits after the XOR */
    after: string
}

export interface CrcDivisionTrace {
    augmented: string
    generator: string
    steps: CrcDivisionStep[]
    remainder: string
}

// ==================== Hamming ====================

export interface HammingDecodeResult {
    status: HammingStatus
    /** Corrected codeword, or the received bits when no correction was applied */
    codeword: string
    /** Bits at non-power-of-two positions of `codeword` */
    data: string
    /** Parity-check value; check i is bit i */
    syndrome: number
    /** 1-indexed position that was flipped (only when status is 'corrected') */
    errorPosition?: number
}
