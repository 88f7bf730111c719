/**
 * @module core
 * @description Ambient services shared by the codecs
 *
 * ## Modules
 * - `errors`: Unified error types and codes
 * - `logging`: Structured encode/verify logging
 * - `config`: Codec configuration, validation and canonical serialization
 * - `repro`: Seeded randomness
 */

// ==================== Errors ====================

export {
    ErrorCodes,
    CodecError,
    InvalidInputError,
    InvalidConfigError,
    isCodecError,
    hasErrorCode,
    wrapError,
} from './errors';

export type { ErrorCode } from './errors';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    EncodeLogEntry,
    VerifyLogEntry,
    WarningLogEntry,
    LogEntry,
    Logger,
    ConsoleLoggerConfig,
    MemoryLoggerConfig,
} from './logging';

export {
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
} from './logging';

// ==================== Config ====================

export type {
    CodecScheme,
    ChecksumConfig,
    CrcConfig,
    HammingConfig,
    CodecConfig,
    CodecConfigInput,
    ValidationResult,
} from './config';

export {
    CODEC_SCHEMES,
    DEFAULT_CHECKSUM_CONFIG,
    DEFAULT_CRC_CONFIG,
    DEFAULT_HAMMING_CONFIG,
    createCodecConfig,
    validateCodecConfig,
    normalizeCodecConfig,
    serializeCodecConfig,
    deserializeCodecConfig,
    computeConfigHash,
    areConfigsCompatible,
} from './config';

// ==================== Repro ====================

export { SeededRandom, createRng } from './repro';
