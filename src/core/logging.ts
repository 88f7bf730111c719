/**
 * @module core/logging
 * @description Structured logging for codec activity
 *
 * Codec objects created through `createCodec` report each encode and verify
 * call, plus configuration warnings, to a caller-supplied Logger. The pure
 * coding functions never log.
 */

import type { CodecScheme } from './config';

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Codec that produced the entry */
    codec: CodecScheme;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Sender-side entry
 */
export interface EncodeLogEntry extends BaseLogEntry {
    logType: 'encode';
    dataLength: number;
    codewordLength: number;
    /** Redundancy bits (checksum, CRC remainder or Hamming parity) */
    redundancy: string;
}

/**
 * Receiver-side entry
 */
export interface VerifyLogEntry extends BaseLogEntry {
    logType: 'verify';
    receivedLength: number;
    status: string;
    /** Syndrome rendered as a bit string */
    syndrome: string;
    errorPosition?: number;
}

/**
 * Configuration or usage warning
 */
export interface WarningLogEntry extends BaseLogEntry {
    logType: 'warning';
    message: string;
    details?: unknown;
}

/**
 * Union of all log entry types
 */
export type LogEntry = EncodeLogEntry | VerifyLogEntry | WarningLogEntry;

type EntryInput<T extends LogEntry> = Omit<T, 'logType' | 'schemaVersion' | 'timestamp'>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log an encode call */
    logEncode(entry: EntryInput<EncodeLogEntry>): void;
    /** Log a verify/decode call */
    logVerify(entry: EntryInput<VerifyLogEntry>): void;
    /** Log a warning */
    logWarning(entry: EntryInput<WarningLogEntry>): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

export interface ConsoleLoggerConfig {
    /** Minimum level printed */
    level?: LogLevel;
}

export interface MemoryLoggerConfig {
    /** Minimum level recorded; encode/verify are `info`, warnings `warn` */
    level?: LogLevel;
    /** Schema version stamped on every entry */
    schemaVersion?: string;
}

// ==================== Constants ====================

const DEFAULT_SCHEMA_VERSION = '1.0.0';

const LEVEL_ORDER: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isEnabled(level: LogLevel, threshold: LogLevel): boolean {
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(threshold);
}

// ==================== Console Logger ====================

/**
 * Console Logger: Print to console
 *
 * encode/verify lines are `info`, per-call syndrome detail is `debug`.
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(levelOrConfig: LogLevel | ConsoleLoggerConfig = 'info') {
        this.level = typeof levelOrConfig === 'string'
            ? levelOrConfig
            : levelOrConfig.level ?? 'info';
    }

    private enabled(level: LogLevel): boolean {
        return isEnabled(level, this.level);
    }

    logEncode(entry: EntryInput<EncodeLogEntry>): void {
        if (this.enabled('info')) {
            console.log(
                `[ENCODE] ${entry.codec}: data=${entry.dataLength} bits, ` +
                `codeword=${entry.codewordLength} bits, redundancy=${entry.redundancy}`
            );
        }
    }

    logVerify(entry: EntryInput<VerifyLogEntry>): void {
        if (this.enabled('info')) {
            console.log(`[VERIFY] ${entry.codec}: received=${entry.receivedLength} bits, status=${entry.status}`);
        }
        if (this.enabled('debug')) {
            const position = entry.errorPosition !== undefined ? `, position=${entry.errorPosition}` : '';
            console.log(`[VERIFY] ${entry.codec}: syndrome=${entry.syndrome}${position}`);
        }
    }

    logWarning(entry: EntryInput<WarningLogEntry>): void {
        if (this.enabled('warn')) {
            console.warn(`[WARN] ${entry.codec}: ${entry.message}`);
        }
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger ====================

/**
 * Memory Logger: Store logs in memory
 * Useful for testing and for callers that ship logs elsewhere.
 */
export class MemoryLogger implements Logger {
    private schemaVersion: string;
    private level: LogLevel;
    public encodes: EncodeLogEntry[] = [];
    public verifies: VerifyLogEntry[] = [];
    public warnings: WarningLogEntry[] = [];

    constructor(config: MemoryLoggerConfig = {}) {
        this.schemaVersion = config.schemaVersion ?? DEFAULT_SCHEMA_VERSION;
        this.level = config.level ?? 'debug';
    }

    private createBaseEntry(): Pick<BaseLogEntry, 'schemaVersion' | 'timestamp'> {
        return {
            schemaVersion: this.schemaVersion,
            timestamp: Date.now(),
        };
    }

    logEncode(entry: EntryInput<EncodeLogEntry>): void {
        if (!isEnabled('info', this.level)) return;
        this.encodes.push({
            ...this.createBaseEntry(),
            logType: 'encode',
            ...entry,
        });
    }

    logVerify(entry: EntryInput<VerifyLogEntry>): void {
        if (!isEnabled('info', this.level)) return;
        this.verifies.push({
            ...this.createBaseEntry(),
            logType: 'verify',
            ...entry,
        });
    }

    logWarning(entry: EntryInput<WarningLogEntry>): void {
        if (!isEnabled('warn', this.level)) return;
        this.warnings.push({
            ...this.createBaseEntry(),
            logType: 'warning',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.encodes, ...this.verifies, ...this.warnings];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            encodes: this.encodes,
            verifies: this.verifies,
            warnings: this.warnings,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.encodes = [];
        this.verifies = [];
        this.warnings = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logEncode(entry: EntryInput<EncodeLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logEncode(entry);
        }
    }

    logVerify(entry: EntryInput<VerifyLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logVerify(entry);
        }
    }

    logWarning(entry: EntryInput<WarningLogEntry>): void {
        for (const logger of this.loggers) {
            logger.logWarning(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format
 */
export function createLogger(format: 'console', config?: ConsoleLoggerConfig): ConsoleLogger;
export function createLogger(format: 'memory', config?: MemoryLoggerConfig): MemoryLogger;
export function createLogger(
    format: 'console' | 'memory',
    config: ConsoleLoggerConfig | MemoryLoggerConfig = {}
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config);
        case 'memory':
            return new MemoryLogger(config);
    }
}
