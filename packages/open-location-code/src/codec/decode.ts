/**
 * Plus Code Decoder
 *
 * Converts a full code back to the rectangle it names.
 *
 * Decoding walks the digits once, narrowing the resolution at each step
 * and moving the south-west corner by whole cells.
 */

import {
  PlusCodeError,
  fail,
  ok,
  plusCodeErrorKeywords,
  plusCodeKeywords,
  unwrap,
} from '../vocabulary'
import type { CodeArea, CodeBounds, PlusCodeResult } from '../vocabulary'
import { isFull } from '../validation/validator'
import { getDigitValue, toSignificantDigits } from './digits'

const {
  maxCodeLength,
  pairCodeLength,
  encodingBase,
  gridRows,
  gridColumns,
  latitudeMax,
  longitudeMax,
  initialResolution,
} = plusCodeKeywords

// ============================================================================
// Public API
// ============================================================================

/**
 * Decode a full code into its bounding area
 *
 * @example
 * decode('8FVC2222+22')
 * // { success: true, data: { southLatitude: 47, westLongitude: 8, ... } }
 */
export function decode(code: string): PlusCodeResult<CodeArea> {
  if (!isFull(code)) {
    return fail(
      new PlusCodeError(
        plusCodeErrorKeywords.notFullCode,
        `Open Location Code is not a valid full code: ${code}`,
        code,
      ),
    )
  }

  return ok(decodeDigits(toSignificantDigits(code)))
}

/**
 * Same as decode, but throws a PlusCodeError on invalid input
 */
export function decodeOrThrow(code: string): CodeArea {
  return unwrap(decode(code))
}

/**
 * North-east corner of an area, alongside its south-west corner
 */
export function getCodeAreaBounds(area: CodeArea): CodeBounds {
  return {
    south: area.southLatitude,
    west: area.westLongitude,
    north: area.southLatitude + area.latitudeHeight,
    east: area.westLongitude + area.longitudeWidth,
  }
}

// ============================================================================
// Digit Walk
// ============================================================================

function decodeDigits(digits: string): CodeArea {
  const values = Array.from(digits, (symbol) => getDigitValue(symbol) ?? -1)
  const codeLength = Math.min(values.length, maxCodeLength)

  let southLatitude = -latitudeMax
  let westLongitude = -longitudeMax
  let latResolution: number = initialResolution
  let lngResolution: number = initialResolution
  let index = 0

  // Pair stage: latitude and longitude digits alternate
  while (index < Math.min(codeLength, pairCodeLength)) {
    latResolution /= encodingBase
    lngResolution /= encodingBase
    southLatitude += latResolution * values[index]
    westLongitude += lngResolution * values[index + 1]
    index += 2
  }

  // Grid stage: one digit per 5x4 sub-cell
  while (index < codeLength) {
    latResolution /= gridRows
    lngResolution /= gridColumns
    const value = values[index]
    southLatitude += latResolution * Math.floor(value / gridColumns)
    westLongitude += lngResolution * (value % gridColumns)
    index += 1
  }

  return Object.freeze({
    southLatitude,
    westLongitude,
    latitudeHeight: latResolution,
    longitudeWidth: lngResolution,
    latitudeCenter: southLatitude + latResolution / 2,
    longitudeCenter: westLongitude + lngResolution / 2,
    codeLength: index,
  })
}
