/**
 * @module src
 * @description bitguard source entry point
 *
 * - core/: errors, logging, configuration, seeded randomness
 * - coding/: checksum, CRC and Hamming codecs, bit helpers, channel simulation
 */

export * from './core';
export * from './coding';
