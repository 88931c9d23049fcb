/**
 * Codec Module
 *
 * Encoding and decoding between coordinates and Plus Codes:
 * - Alphabet / digit table
 * - Encoder (coordinates to code)
 * - Decoder (code to area)
 * - Cell precision by code length
 */

export { getDigitTable, getDigitValue } from './digits'
export { encode, encodeOrThrow } from './encode'
export { decode, decodeOrThrow, getCodeAreaBounds } from './decode'
export { getCodePrecision } from './gridMath'
