/**
 * @module coding/codec
 * @description Configured codec objects with a common encode/verify surface
 *
 * A caller picks one scheme per transmission. `createCodec` validates the
 * configuration, reports configuration warnings to the logger, and returns an
 * object whose `encode` yields the full codeword and whose `verify` yields a
 * scheme-independent report plus the scheme's own detail.
 */

import {
    createCodecConfig,
    validateCodecConfig,
    type ChecksumConfig,
    type CodecConfig,
    type CodecConfigInput,
    type CodecScheme,
    type CrcConfig,
    type HammingConfig,
} from '../core/config';
import { InvalidConfigError } from '../core/errors';
import type { Logger } from '../core/logging';
import { isPowerOfTwo, parseBits } from './bits';
import {
    checksumCodeword,
    checksumEncode,
    checksumEncodeSegmented,
    checksumVerify,
    checksumVerifySegmented,
} from './checksum';
import { crcRemainder, crcVerify } from './crc';
import { hammingDecode, hammingEncode } from './hamming';
import type {
    BitSource,
    ChecksumVerifyResult,
    CrcVerifyResult,
    HammingDecodeResult,
    HammingStatus,
    SegmentedVerifyResult,
    VerifyStatus,
} from './types';

// ==================== Types ====================

export interface CodecOptions {
    /** Receives encode/verify entries and configuration warnings */
    logger?: Logger;
}

/**
 * Scheme-independent verification report
 */
export interface CodecReport<D = unknown> {
    scheme: CodecScheme;
    status: VerifyStatus | HammingStatus;
    /** True when `data` can be used: valid, no-error or corrected */
    ok: boolean;
    /** Data bits with redundancy removed (after correction, where applicable) */
    data: string;
    /** Syndrome rendered as bits: checksum sum, CRC remainder or Hamming check value */
    syndrome: string;
    /** 1-indexed corrected position (Hamming only) */
    errorPosition?: number;
    /** Scheme-specific result */
    detail: D;
}

export interface Codec<C extends CodecConfig = CodecConfig, D = unknown> {
    readonly scheme: C['scheme'];
    readonly config: Readonly<C>;
    /** Encode data into a transmittable codeword */
    encode(data: BitSource): string;
    /** Check (and for Hamming, correct) a received codeword */
    verify(received: BitSource): CodecReport<D>;
}

// ==================== Base ====================

abstract class BaseCodec<C extends CodecConfig, D> implements Codec<C, D> {
    readonly config: Readonly<C>;
    protected readonly logger?: Logger;

    constructor(config: C, options: CodecOptions = {}) {
        const result = validateCodecConfig(config);
        if (!result.valid) {
            throw new InvalidConfigError(`Invalid ${config.scheme} config: ${result.errors.join('; ')}`, result.errors);
        }

        this.config = config;
        this.logger = options.logger;

        for (const message of result.warnings) {
            this.logger?.logWarning({ codec: config.scheme, message, details: { config } });
        }
    }

    get scheme(): C['scheme'] {
        return this.config.scheme;
    }

    protected abstract encodeWithRedundancy(data: BitSource): { codeword: string; redundancy: string };
    protected abstract check(received: BitSource): CodecReport<D>;

    encode(data: BitSource): string {
        const { codeword, redundancy } = this.encodeWithRedundancy(data);
        this.logger?.logEncode({
            codec: this.config.scheme,
            dataLength: codeword.length - redundancy.length,
            codewordLength: codeword.length,
            redundancy,
        });
        return codeword;
    }

    verify(received: BitSource): CodecReport<D> {
        const report = this.check(received);
        this.logger?.logVerify({
            codec: this.config.scheme,
            receivedLength: received.length,
            status: report.status,
            syndrome: report.syndrome,
            errorPosition: report.errorPosition,
        });
        return report;
    }
}

// ==================== Checksum ====================

export type ChecksumDetail = ChecksumVerifyResult | SegmentedVerifyResult;

export class ChecksumCodec extends BaseCodec<ChecksumConfig, ChecksumDetail> {
    protected encodeWithRedundancy(data: BitSource): { codeword: string; redundancy: string } {
        const { blockWidth, segmentWidth } = this.config;
        if (segmentWidth === undefined) {
            const codeword = checksumCodeword(data, blockWidth);
            return { codeword, redundancy: codeword.slice(codeword.length - blockWidth) };
        }

        const redundancy = checksumEncodeSegmented(data, { segmentWidth, blockWidth });
        return { codeword: parseBits(data).join('') + redundancy, redundancy };
    }

    protected check(received: BitSource): CodecReport<ChecksumDetail> {
        const { blockWidth, segmentWidth } = this.config;
        if (segmentWidth === undefined) {
            const detail = checksumVerify(received, blockWidth);
            return {
                scheme: 'checksum',
                status: detail.status,
                ok: detail.status === 'valid',
                data: detail.data,
                syndrome: detail.sum,
                detail,
            };
        }

        const detail = checksumVerifySegmented(received, { segmentWidth, blockWidth });
        return {
            scheme: 'checksum',
            status: detail.status,
            ok: detail.status === 'valid',
            data: detail.segments.map(segment => segment.data).join(''),
            syndrome: detail.segments.map(segment => segment.sum).join(''),
            detail,
        };
    }

    /**
     * Checksum alone, without the data in front of it
     */
    checksum(data: BitSource): string {
        const { blockWidth, segmentWidth } = this.config;
        return segmentWidth === undefined
            ? checksumEncode(data, blockWidth)
            : checksumEncodeSegmented(data, { segmentWidth, blockWidth });
    }
}

// ==================== CRC ====================

export class CrcCodec extends BaseCodec<CrcConfig, CrcVerifyResult> {
    protected encodeWithRedundancy(data: BitSource): { codeword: string; redundancy: string } {
        const redundancy = crcRemainder(data, this.config.generator);
        return { codeword: parseBits(data).join('') + redundancy, redundancy };
    }

    protected check(received: BitSource): CodecReport<CrcVerifyResult> {
        const detail = crcVerify(received, this.config.generator);
        return {
            scheme: 'crc',
            status: detail.status,
            ok: detail.status === 'valid',
            data: detail.data,
            syndrome: detail.remainder,
            detail,
        };
    }
}

// ==================== Hamming ====================

export class HammingCodec extends BaseCodec<HammingConfig, HammingDecodeResult> {
    protected encodeWithRedundancy(data: BitSource): { codeword: string; redundancy: string } {
        const codeword = hammingEncode(data);
        const redundancy = [...codeword].filter((_, index) => isPowerOfTwo(index + 1)).join('');
        return { codeword, redundancy };
    }

    protected check(received: BitSource): CodecReport<HammingDecodeResult> {
        const detail = hammingDecode(received);
        return {
            scheme: 'hamming',
            status: detail.status,
            ok: detail.status !== 'uncorrectable',
            data: detail.data,
            syndrome: detail.syndrome.toString(2),
            errorPosition: detail.errorPosition,
            detail,
        };
    }
}

// ==================== Factory ====================

type InputFor<S extends CodecScheme> = Extract<CodecConfigInput, { scheme: S }>;

/**
 * Validate a configuration and build the matching codec
 *
 * @throws InvalidConfigError when the configuration does not validate
 *
 * @example
 * ```typescript
 * const codec = createCodec({ scheme: 'crc', generator: '1011' }, { logger: new MemoryLogger() });
 * const codeword = codec.encode('1101011011');
 * codec.verify(codeword).status; // 'valid'
 * ```
 */
export function createCodec(input: InputFor<'checksum'>, options?: CodecOptions): ChecksumCodec;
export function createCodec(input: InputFor<'crc'>, options?: CodecOptions): CrcCodec;
export function createCodec(input: InputFor<'hamming'>, options?: CodecOptions): HammingCodec;
export function createCodec(input: CodecConfigInput, options?: CodecOptions): ChecksumCodec | CrcCodec | HammingCodec;
export function createCodec(input: CodecConfigInput, options: CodecOptions = {}): ChecksumCodec | CrcCodec | HammingCodec {
    const config = createCodecConfig(input);
    switch (config.scheme) {
        case 'checksum':
            return new ChecksumCodec(config, options);
        case 'crc':
            return new CrcCodec(config, options);
        case 'hamming':
            return new HammingCodec(config, options);
    }
}

export function createChecksumCodec(
    config: Omit<InputFor<'checksum'>, 'scheme'> = {},
    options?: CodecOptions
): ChecksumCodec {
    return createCodec({ scheme: 'checksum', ...config }, options);
}

export function createCrcCodec(
    config: Omit<InputFor<'crc'>, 'scheme'> = {},
    options?: CodecOptions
): CrcCodec {
    return createCodec({ scheme: 'crc', ...config }, options);
}

export function createHammingCodec(options?: CodecOptions): HammingCodec {
    return createCodec({ scheme: 'hamming' }, options);
}
