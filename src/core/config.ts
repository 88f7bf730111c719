/**
 * @module core/config
 * @description Codec configuration: defaults, validation, canonical serialization
 *
 * A sender and receiver must agree on scheme and parameters. The config hash
 * gives both sides a short value to compare before exchanging codewords.
 */

import { InvalidConfigError } from './errors';

// ==================== Types ====================

/**
 * Supported error-control schemes
 */
export type CodecScheme = 'checksum' | 'crc' | 'hamming';

export const CODEC_SCHEMES: readonly CodecScheme[] = ['checksum', 'crc', 'hamming'];

/**
 * 1's-complement checksum configuration
 */
export interface ChecksumConfig {
    scheme: 'checksum';
    /** Block width k in bits */
    blockWidth: number;
    /**
     * When set, the message is split into segments of this many bits and each
     * segment carries its own k-bit checksum.
     */
    segmentWidth?: number;
}

/**
 * CRC configuration
 */
export interface CrcConfig {
    scheme: 'crc';
    /** Generator polynomial, MSB first (e.g. '1011' = x^3 + x + 1) */
    generator: string;
}

/**
 * Hamming configuration (parameters derive from the data length)
 */
export interface HammingConfig {
    scheme: 'hamming';
}

export type CodecConfig = ChecksumConfig | CrcConfig | HammingConfig;

/**
 * Minimal input for createCodecConfig; omitted parameters take defaults
 */
export type CodecConfigInput =
    | { scheme: 'checksum'; blockWidth?: number; segmentWidth?: number }
    | { scheme: 'crc'; generator?: string }
    | HammingConfig;

/**
 * Validation result for a codec configuration
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

// ==================== Defaults ====================

export const DEFAULT_CHECKSUM_CONFIG: ChecksumConfig = {
    scheme: 'checksum',
    blockWidth: 8,
};

/**
 * CRC-8 (x^8 + x^2 + x + 1)
 */
export const DEFAULT_CRC_CONFIG: CrcConfig = {
    scheme: 'crc',
    generator: '100000111',
};

export const DEFAULT_HAMMING_CONFIG: HammingConfig = {
    scheme: 'hamming',
};

// ==================== Hash ====================

/**
 * djb2, unsigned 32-bit hex
 */
function simpleHash(str: string): string {
    let hash = 5381;
    for (let i = 0; i < str.length; i++) {
        hash = ((hash << 5) + hash) ^ str.charCodeAt(i);
    }
    return (hash >>> 0).toString(16).padStart(8, '0');
}

function createHash(data: string): string {
    const h1 = simpleHash(data);
    const h2 = simpleHash(data + h1);
    return h1 + h2;
}

// ==================== Factory ====================

/**
 * Create a complete CodecConfig, filling defaults
 *
 * @throws InvalidConfigError when the resulting config does not validate
 */
export function createCodecConfig(input: CodecConfigInput): CodecConfig {
    const config = withDefaults(input);
    const result = validateCodecConfig(config);
    if (!result.valid) {
        throw new InvalidConfigError(`Invalid ${input.scheme} config: ${result.errors.join('; ')}`, result.errors);
    }
    return config;
}

function withDefaults(input: CodecConfigInput): CodecConfig {
    switch (input.scheme) {
        case 'checksum': {
            const blockWidth = input.blockWidth ?? DEFAULT_CHECKSUM_CONFIG.blockWidth;
            return input.segmentWidth !== undefined
                ? { scheme: 'checksum', blockWidth, segmentWidth: input.segmentWidth }
                : { scheme: 'checksum', blockWidth };
        }
        case 'crc':
            return { scheme: 'crc', generator: input.generator ?? DEFAULT_CRC_CONFIG.generator };
        case 'hamming':
            return { scheme: 'hamming' };
    }
}

// ==================== Validation ====================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

const KNOWN_KEYS: Record<CodecScheme, string[]> = {
    checksum: ['scheme', 'blockWidth', 'segmentWidth'],
    crc: ['scheme', 'generator'],
    hamming: ['scheme'],
};

function isCodecScheme(value: unknown): value is CodecScheme {
    return typeof value === 'string' && CODEC_SCHEMES.some(scheme => scheme === value);
}

/**
 * Validate an arbitrary value as a codec configuration
 */
export function validateCodecConfig(value: unknown): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!isRecord(value)) {
        return { valid: false, errors: ['config must be an object'], warnings };
    }

    const scheme = value.scheme;
    if (!isCodecScheme(scheme)) {
        return {
            valid: false,
            errors: [`scheme must be one of ${CODEC_SCHEMES.join(', ')}`],
            warnings,
        };
    }

    for (const key of Object.keys(value)) {
        if (!KNOWN_KEYS[scheme].includes(key)) {
            warnings.push(`unknown key '${key}' is ignored by the ${scheme} codec`);
        }
    }

    switch (scheme) {
        case 'checksum': {
            const { blockWidth, segmentWidth } = value;
            if (!isPositiveInteger(blockWidth)) {
                errors.push('blockWidth must be a positive integer');
            }
            if (segmentWidth !== undefined) {
                if (!isPositiveInteger(segmentWidth)) {
                    errors.push('segmentWidth must be a positive integer');
                } else if (isPositiveInteger(blockWidth) && segmentWidth % blockWidth !== 0) {
                    warnings.push(
                        `segmentWidth ${segmentWidth} is not a multiple of blockWidth ${blockWidth}; ` +
                        'the last block of every segment is zero-padded'
                    );
                }
            }
            break;
        }
        case 'crc': {
            const generator = value.generator;
            if (typeof generator !== 'string' || generator.length === 0) {
                errors.push('generator must be a non-empty bit string');
            } else if (!/^[01]+$/.test(generator)) {
                errors.push('generator must contain only 0 and 1');
            } else if (generator[0] !== '1') {
                errors.push('generator must start with 1');
            } else {
                if (generator.length === 1) {
                    warnings.push('generator of degree 0 adds no redundancy; every codeword verifies');
                } else if (generator[generator.length - 1] !== '1') {
                    warnings.push('generator does not end with 1; some single-bit errors will go undetected');
                }
            }
            break;
        }
        case 'hamming':
            break;
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}

// ==================== Serialization ====================

/**
 * Sort object keys recursively for deterministic serialization
 */
function sortObjectKeys(obj: unknown): unknown {
    if (Array.isArray(obj)) {
        return obj.map(sortObjectKeys);
    }
    if (!isRecord(obj)) {
        return obj;
    }

    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(obj).sort()) {
        sorted[key] = sortObjectKeys(obj[key]);
    }
    return sorted;
}

/**
 * Serialize a CodecConfig to a canonical JSON string
 */
export function serializeCodecConfig(config: CodecConfig): string {
    return JSON.stringify(sortObjectKeys(config));
}

/**
 * Parse and validate a serialized CodecConfig
 *
 * @throws InvalidConfigError on malformed JSON or a config that does not validate
 */
export function deserializeCodecConfig(json: string): CodecConfig {
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new InvalidConfigError(`Config is not valid JSON: ${reason}`, [reason]);
    }
    return normalizeCodecConfig(parsed);
}

/**
 * Validate an unknown value and narrow it to a CodecConfig
 *
 * @throws InvalidConfigError
 */
export function normalizeCodecConfig(value: unknown): CodecConfig {
    const result = validateCodecConfig(value);
    if (!result.valid || !isRecord(value)) {
        throw new InvalidConfigError(`Invalid codec config: ${result.errors.join('; ')}`, result.errors);
    }

    const { scheme, blockWidth, segmentWidth, generator } = value;
    if (scheme === 'checksum' && isPositiveInteger(blockWidth)) {
        return isPositiveInteger(segmentWidth)
            ? { scheme, blockWidth, segmentWidth }
            : { scheme, blockWidth };
    }
    if (scheme === 'crc' && typeof generator === 'string') {
        return { scheme, generator };
    }
    if (scheme === 'hamming') {
        return { scheme };
    }
    throw new InvalidConfigError('Invalid codec config', result.errors);
}

/**
 * Compute a short hash of the config for sender/receiver agreement checks
 */
export function computeConfigHash(config: CodecConfig): string {
    return createHash(serializeCodecConfig(config));
}

/**
 * Check if two configs describe the same codec
 */
export function areConfigsCompatible(a: CodecConfig, b: CodecConfig): boolean {
    return computeConfigHash(a) === computeConfigHash(b);
}
