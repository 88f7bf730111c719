/**
 * Logging Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, MemoryLogger, MultiLogger, createLogger } from '../src/core/logging';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('MemoryLogger', () => {
    it('should stamp entries with type, schema version and time', () => {
        const logger = new MemoryLogger({ schemaVersion: '2.0.0' });
        logger.logEncode({ codec: 'crc', dataLength: 10, codewordLength: 13, redundancy: '100' });

        const [entry] = logger.encodes;
        expect(entry.logType).toBe('encode');
        expect(entry.schemaVersion).toBe('2.0.0');
        expect(typeof entry.timestamp).toBe('number');
    });

    it('should export JSON and JSONL', () => {
        const logger = new MemoryLogger();
        logger.logEncode({ codec: 'hamming', dataLength: 4, codewordLength: 7, redundancy: '010' });
        logger.logVerify({ codec: 'hamming', receivedLength: 7, status: 'no-error', syndrome: '0' });
        logger.logWarning({ codec: 'crc', message: 'careful' });

        expect(logger.getAllLogs().map(entry => entry.logType)).toEqual(['encode', 'verify', 'warning']);

        const parsed: unknown = JSON.parse(logger.toJSON());
        expect(parsed).toMatchObject({
            encodes: [{ codec: 'hamming', redundancy: '010' }],
            verifies: [{ status: 'no-error' }],
            warnings: [{ message: 'careful' }],
        });

        const lines = logger.toJSONL().split('\n');
        expect(lines).toHaveLength(3);
        expect(JSON.parse(lines[2])).toMatchObject({ logType: 'warning', codec: 'crc' });
    });

    it('should drop entries below its level', () => {
        const logger = new MemoryLogger({ level: 'warn' });
        logger.logEncode({ codec: 'crc', dataLength: 10, codewordLength: 13, redundancy: '100' });
        logger.logVerify({ codec: 'crc', receivedLength: 13, status: 'valid', syndrome: '000' });
        logger.logWarning({ codec: 'crc', message: 'kept' });

        expect(logger.encodes).toEqual([]);
        expect(logger.verifies).toEqual([]);
        expect(logger.warnings.map(entry => entry.message)).toEqual(['kept']);

        const quiet = createLogger('memory', { level: 'error' });
        quiet.logWarning({ codec: 'crc', message: 'dropped' });
        expect(quiet.getAllLogs()).toEqual([]);
    });

    it('should clear all entries', () => {
        const logger = new MemoryLogger();
        logger.logWarning({ codec: 'checksum', message: 'x' });
        logger.clear();
        expect(logger.getAllLogs()).toEqual([]);
    });
});

describe('ConsoleLogger', () => {
    it('should print encode and verify lines at info', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const logger = new ConsoleLogger();

        logger.logEncode({ codec: 'crc', dataLength: 10, codewordLength: 13, redundancy: '100' });
        logger.logVerify({ codec: 'crc', receivedLength: 13, status: 'valid', syndrome: '000' });

        expect(log).toHaveBeenCalledTimes(2);
        expect(log).toHaveBeenNthCalledWith(1, '[ENCODE] crc: data=10 bits, codeword=13 bits, redundancy=100');
        expect(log).toHaveBeenNthCalledWith(2, '[VERIFY] crc: received=13 bits, status=valid');
    });

    it('should add syndrome detail at debug', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const logger = new ConsoleLogger({ level: 'debug' });

        logger.logVerify({ codec: 'hamming', receivedLength: 7, status: 'corrected', syndrome: '11', errorPosition: 3 });

        expect(log).toHaveBeenCalledTimes(2);
        expect(log).toHaveBeenLastCalledWith('[VERIFY] hamming: syndrome=11, position=3');
    });

    it('should route warnings to console.warn and respect the level', () => {
        const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
        const logger = new ConsoleLogger('warn');

        logger.logEncode({ codec: 'checksum', dataLength: 8, codewordLength: 12, redundancy: '0101' });
        logger.logWarning({ codec: 'crc', message: 'generator does not end with 1' });

        expect(log).not.toHaveBeenCalled();
        expect(warn).toHaveBeenCalledWith('[WARN] crc: generator does not end with 1');

        new ConsoleLogger('error').logWarning({ codec: 'crc', message: 'hidden' });
        expect(warn).toHaveBeenCalledTimes(1);
    });
});

describe('MultiLogger', () => {
    it('should fan out to every logger', () => {
        const a = new MemoryLogger();
        const b = new MemoryLogger();
        const multi = new MultiLogger([a, b]);

        multi.logVerify({ codec: 'crc', receivedLength: 4, status: 'corrupted', syndrome: '1' });
        multi.flush();
        multi.close();

        expect(a.verifies).toHaveLength(1);
        expect(b.verifies).toHaveLength(1);
    });
});

describe('createLogger', () => {
    it('should build loggers by format', () => {
        expect(createLogger('memory')).toBeInstanceOf(MemoryLogger);
        expect(createLogger('console', { level: 'error' })).toBeInstanceOf(ConsoleLogger);
    });
});
