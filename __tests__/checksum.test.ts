/**
 * Checksum Module Tests
 * 1's-complement arithmetic, encode/verify, padding policy and segmented mode
 */

import { describe, it, expect } from 'vitest';
import {
    onesComplementAdd,
    onesComplementSum,
    checksumEncode,
    checksumCodeword,
    checksumVerify,
    checksumEncodeSegmented,
    checksumVerifySegmented,
} from '../src/coding/checksum';
import { flipBits } from '../src/coding/channel';
import { InvalidInputError } from '../src/core/errors';
import { createRng } from '../src/core/repro';
import { positions, randomBitString } from './test-utils';

// 0x99 0xE2 0x24 0x84
const DATA = '10011001111000100010010010000100';

// ==================== Arithmetic ====================

describe('1\'s-complement arithmetic', () => {
    it('should wrap the carry-out back into the low bits', () => {
        // 9 + 8 = 17 = 1_0001 -> 0001 + 1
        expect(onesComplementAdd([1, 0, 0, 1], [1, 0, 0, 0])).toEqual([0, 0, 1, 0]);
        // 15 + 15 = 30 = 1_1110 -> 1110 + 1
        expect(onesComplementAdd([1, 1, 1, 1], [1, 1, 1, 1])).toEqual([1, 1, 1, 1]);
    });

    it('should add without wrap when nothing overflows', () => {
        expect(onesComplementAdd([0, 1, 0, 1], [0, 0, 1, 0])).toEqual([0, 1, 1, 1]);
    });

    it('should reject operands of different widths', () => {
        expect(() => onesComplementAdd([1, 0], [1, 0, 1])).toThrow(InvalidInputError);
    });

    it('should sum a list of blocks', () => {
        expect(onesComplementSum([[1, 0, 0, 1], [1, 0, 0, 0], [0, 0, 0, 1]], 4)).toEqual([0, 0, 1, 1]);
        expect(onesComplementSum([], 3)).toEqual([0, 0, 0]);
    });
});

// ==================== Encode / Verify ====================

describe('checksumEncode', () => {
    it('should compute the complemented 8-bit sum', () => {
        // 0x99 + 0xE2 + 0x24 + 0x84 = 0x25 with end-around carry; ~0x25 = 0xDA
        expect(checksumEncode(DATA, 8)).toBe('11011010');
    });

    it('should zero-pad a short final block', () => {
        // blocks 101, 100 -> 5 + 4 = 9 -> 010 -> checksum 101
        expect(checksumEncode('1011', 3)).toBe('101');
    });

    it('should accept numeric arrays', () => {
        expect(checksumEncode([1], 1)).toBe('0');
    });

    it('should reject invalid input', () => {
        expect(() => checksumEncode('', 8)).toThrow('data must not be empty');
        expect(() => checksumEncode('1010', 0)).toThrow(InvalidInputError);
        expect(() => checksumEncode('1010', -4)).toThrow(InvalidInputError);
        expect(() => checksumEncode('1010', 1.5)).toThrow(InvalidInputError);
        expect(() => checksumEncode('10x0', 2)).toThrow(InvalidInputError);
    });
});

describe('checksumVerify', () => {
    it('should accept an untouched codeword', () => {
        const codeword = checksumCodeword(DATA, 8);
        expect(codeword).toBe(DATA + '11011010');
        expect(checksumVerify(codeword, 8)).toEqual({
            status: 'valid',
            data: DATA,
            checksum: '11011010',
            sum: '11111111',
        });
    });

    it('should verify zero-padded encodings', () => {
        expect(checksumVerify('1011' + '101', 3).status).toBe('valid');
    });

    it('should round-trip random data for several widths', () => {
        const rng = createRng(7);
        for (const width of [1, 3, 4, 8, 16]) {
            for (let trial = 0; trial < 10; trial++) {
                const data = randomBitString(rng, rng.randint(1, 40));
                expect(checksumVerify(checksumCodeword(data, width), width).status).toBe('valid');
            }
        }
    });

    it('should detect every single-bit flip', () => {
        const codeword = checksumCodeword(DATA, 8);
        for (const position of positions(codeword.length)) {
            const result = checksumVerify(flipBits(codeword, [position]), 8);
            expect(result.status).toBe('corrupted');
        }
    });

    it('should miss an all-zero block flipped to all ones', () => {
        // blocks 0000 1010, checksum 0101
        const codeword = checksumCodeword('00001010', 4);
        expect(codeword).toBe('000010100101');
        const received = flipBits(codeword, [1, 2, 3, 4]);
        expect(received).toBe('111110100101');
        expect(checksumVerify(received, 4).status).toBe('valid');
    });

    it('should catch a whole-block inversion of a mixed block', () => {
        const received = flipBits('000010100101', [5, 6, 7, 8]);
        expect(checksumVerify(received, 4)).toEqual({
            status: 'corrupted',
            data: '00000101',
            checksum: '0101',
            sum: '1010',
        });
    });

    it('should miss opposite flips in the same column of two blocks', () => {
        // blocks 0010 1000 -> sum 1010 -> checksum 0101; column 3 goes 1->0 and 0->1
        const codeword = checksumCodeword('00101000', 4);
        expect(codeword).toBe('001010000101');
        expect(checksumVerify(flipBits(codeword, [3, 7]), 4).status).toBe('valid');
    });

    it('should require data bits in front of the checksum', () => {
        expect(() => checksumVerify('1010', 4)).toThrow(InvalidInputError);
        expect(() => checksumVerify('10', 4)).toThrow(InvalidInputError);
        expect(() => checksumVerify('10101', 0)).toThrow(InvalidInputError);
    });
});

// ==================== Segmented ====================

describe('segmented checksum', () => {
    const options = { segmentWidth: 4, blockWidth: 2 };

    it('should emit one checksum per segment', () => {
        // 1011: 10 + 11 = 101 -> 10 -> 01; 0100: 01 + 00 -> 01 -> 10
        expect(checksumEncodeSegmented('10110100', options)).toBe('0110');
    });

    it('should verify each segment', () => {
        const result = checksumVerifySegmented('10110100' + '0110', options);
        expect(result.status).toBe('valid');
        expect(result.segments).toEqual([
            { index: 0, status: 'valid', data: '1011', checksum: '01', sum: '11' },
            { index: 1, status: 'valid', data: '0100', checksum: '10', sum: '11' },
        ]);
    });

    it('should locate the corrupted segment', () => {
        const received = flipBits('10110100' + '0110', [6]);
        const result = checksumVerifySegmented(received, options);
        expect(result.status).toBe('corrupted');
        expect(result.segments.map(segment => segment.status)).toEqual(['valid', 'corrupted']);
        expect(result.segments[1].data).toBe('0000');
        expect(result.segments[1].sum).toBe('10');
    });

    it('should handle the 100-bit message in 20-bit segments with 4-bit blocks', () => {
        const rng = createRng(2024);
        const data = randomBitString(rng, 100);
        const checksums = checksumEncodeSegmented(data, { segmentWidth: 20, blockWidth: 4 });
        expect(checksums).toHaveLength(20);
        const result = checksumVerifySegmented(data + checksums, { segmentWidth: 20, blockWidth: 4 });
        expect(result.status).toBe('valid');
        expect(result.segments).toHaveLength(5);
    });

    it('should reject lengths that do not fit the segment layout', () => {
        expect(() => checksumEncodeSegmented('101101', options)).toThrow(InvalidInputError);
        expect(() => checksumEncodeSegmented('1011', { segmentWidth: 0, blockWidth: 2 })).toThrow(InvalidInputError);
        expect(() => checksumVerifySegmented('1011010', options)).toThrow(InvalidInputError);
        expect(() => checksumVerifySegmented('', options)).toThrow(InvalidInputError);
    });
});
