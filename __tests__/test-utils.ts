/**
 * Test Utilities for bitguard
 * Helpers for exhaustive and seeded bit-flip testing
 */

import type { SeededRandom } from '../src/core/repro';

/**
 * Random '0'/'1' string of the given length
 */
export function randomBitString(rng: SeededRandom, length: number): string {
    return rng.bits(length).join('');
}

/**
 * 1-indexed positions 1..length
 */
export function positions(length: number): number[] {
    return Array.from({ length }, (_, i) => i + 1);
}

/**
 * All unordered pairs of distinct 1-indexed positions
 */
export function positionPairs(length: number): Array<[number, number]> {
    const pairs: Array<[number, number]> = [];
    for (let i = 1; i <= length; i++) {
        for (let j = i + 1; j <= length; j++) {
            pairs.push([i, j]);
        }
    }
    return pairs;
}
