/**
 * @packageDocumentation
 * @module bitguard
 *
 * bitguard: bit-level error-control codecs
 *
 * ## Codecs
 * - `checksumEncode` / `checksumVerify` - k-bit 1's-complement checksum
 * - `crcEncode` / `crcVerify` - CRC by mod-2 polynomial division
 * - `hammingEncode` / `hammingDecode` - Hamming single-error correction
 *
 * ## Usage Example
 * ```typescript
 * import { hammingEncode, hammingDecode, flipBits, createCodec } from 'bitguard';
 *
 * const codeword = hammingEncode('1011');            // '0110011'
 * const result = hammingDecode(flipBits(codeword, [3]));
 * // result.status === 'corrected', result.data === '1011'
 *
 * const crc = createCodec({ scheme: 'crc', generator: '1011' });
 * crc.verify(crc.encode('1101011011')).ok;           // true
 * ```
 *
 * @license MIT
 */

export * from './src';

// ==================== Version ====================
export const VERSION = '1.0.0';
