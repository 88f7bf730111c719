/**
 * @module core/errors
 * @description Unified error types and error codes for all codecs
 *
 * Only caller mistakes are errors. A corrupted or uncorrectable transmission
 * is a normal result value and never surfaces through these classes.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes for the bitguard library
 */
export const ErrorCodes = {
    /** Malformed or ill-sized argument (non-bit element, empty data, bad width) */
    INVALID_INPUT: 'INVALID_INPUT',
    /** Codec configuration failed validation */
    INVALID_CONFIG: 'INVALID_CONFIG',
    /** Unexpected failure inside the library */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for bitguard
 */
export class CodecError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'CodecError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, CodecError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Invalid input (bad bit element, empty data, out-of-range width or index)
 */
export class InvalidInputError extends CodecError {
    constructor(message: string, details?: unknown) {
        super(ErrorCodes.INVALID_INPUT, message, details);
        this.name = 'InvalidInputError';
    }
}

/**
 * Invalid codec configuration
 */
export class InvalidConfigError extends CodecError {
    readonly errors: string[];

    constructor(message: string, errors: string[] = []) {
        super(ErrorCodes.INVALID_CONFIG, message, { errors });
        this.name = 'InvalidConfigError';
        this.errors = errors;
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a CodecError
 */
export function isCodecError(error: unknown): error is CodecError {
    return error instanceof CodecError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isCodecError(error) && error.code === code;
}

/**
 * Wrap any error into a CodecError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): CodecError {
    if (isCodecError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new CodecError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new CodecError(defaultCode, String(error));
}
