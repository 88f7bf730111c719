/**
 * @module coding
 * @description Bit-level error-control codecs
 *
 * ## Included Schemes
 * - Checksum: k-bit 1's-complement sum (detection only), optionally per segment
 * - CRC: mod-2 polynomial division remainder (detection only)
 * - Hamming: interleaved parity, single-bit correction
 *
 * Each scheme is a pair of pure functions; `createCodec` wraps one scheme
 * behind a common encode/verify surface with optional logging.
 */

// ==================== Types ====================

export type {
    Bit,
    BitSource,
    VerifyStatus,
    HammingStatus,
    ChecksumVerifyResult,
    SegmentOptions,
    SegmentVerifyResult,
    SegmentedVerifyResult,
    CrcVerifyResult,
    Mod2DivisionResult,
    CrcDivisionStep,
    CrcDivisionTrace,
    HammingDecodeResult,
} from './types'

// ==================== Bits ====================

export type { ParseBitsOptions } from './bits'

export {
    parseBits,
    formatBits,
    isPowerOfTwo,
    toStorageIndex,
    flipBit,
    complementBits,
    zeroBits,
    toBlocks,
    bytesToBits,
    bitsToBytes,
} from './bits'

// ==================== Checksum ====================

export {
    onesComplementAdd,
    onesComplementSum,
    checksumEncode,
    checksumCodeword,
    checksumVerify,
    checksumEncodeSegmented,
    checksumVerifySegmented,
} from './checksum'

// ==================== CRC ====================

export {
    parseGenerator,
    mod2Divide,
    crcRemainder,
    crcEncode,
    crcVerify,
    crcDivisionSteps,
} from './crc'

// ==================== Hamming ====================

export {
    hammingParityBitCount,
    hammingEncode,
    hammingSyndrome,
    hammingDecode,
} from './hamming'

// ==================== Channel ====================

export type { ChannelOutput } from './channel'

export { flipBits, binarySymmetricChannel, flipRandomBits } from './channel'

// ==================== Codec Objects ====================

export type { CodecOptions, CodecReport, Codec, ChecksumDetail } from './codec'

export {
    ChecksumCodec,
    CrcCodec,
    HammingCodec,
    createCodec,
    createChecksumCodec,
    createCrcCodec,
    createHammingCodec,
} from './codec'
