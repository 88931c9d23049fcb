/**
 * Plus Code Encoder
 *
 * Converts a latitude/longitude pair to a code of the requested length.
 *
 * The coordinates are first scaled onto an integer grid fine enough for
 * 15 digits. Digits are then peeled off that integer from the least
 * significant end and prepended, so no floating point error can creep in
 * between digits.
 */

import {
  PlusCodeError,
  codeLengthSchema,
  fail,
  latLngSchema,
  ok,
  plusCodeErrorKeywords,
  plusCodeKeywords,
  unwrap,
} from '../vocabulary'
import type { PlusCodeResult } from '../vocabulary'
import { getSymbol } from './digits'
import {
  clipLatitude,
  floorDiv,
  floorMod,
  getCodePrecision,
  normalizeLongitude,
} from './gridMath'

const {
  padding,
  separator,
  separatorPosition,
  maxCodeLength,
  pairCodeLength,
  pairCodePrecision,
  encodingBase,
  gridRows,
  gridColumns,
  latitudeGridPrecision,
  longitudeGridPrecision,
  latitudeMax,
  longitudeMax,
} = plusCodeKeywords

// ============================================================================
// Public API
// ============================================================================

/**
 * Encode a location as a Plus Code
 *
 * @param codeLength - Significant digits: 2, 4, 6, 8, or 10 and up (clamped to 15)
 *
 * @example
 * encode(47.0000625, 8.0000625) // { success: true, data: '8FVC2222+22' }
 */
export function encode(
  latitude: number,
  longitude: number,
  codeLength: number = plusCodeKeywords.defaultCodeLength,
): PlusCodeResult<string> {
  if (!latLngSchema.safeParse({ latitude, longitude }).success) {
    return fail(
      new PlusCodeError(
        plusCodeErrorKeywords.invalidCoordinate,
        `Coordinates must be finite numbers: (${latitude}, ${longitude})`,
        { latitude, longitude },
      ),
    )
  }

  if (!codeLengthSchema.safeParse(codeLength).success) {
    return fail(
      new PlusCodeError(
        plusCodeErrorKeywords.invalidLength,
        `Invalid Open Location Code length: ${codeLength}`,
        codeLength,
      ),
    )
  }

  return ok(encodeCoordinates(latitude, longitude, codeLength))
}

/**
 * Same as encode, but throws a PlusCodeError on invalid input
 */
export function encodeOrThrow(
  latitude: number,
  longitude: number,
  codeLength: number = plusCodeKeywords.defaultCodeLength,
): string {
  return unwrap(encode(latitude, longitude, codeLength))
}

// ============================================================================
// Digit Generation
// ============================================================================

/**
 * Encode without validating inputs. Callers must pass finite coordinates
 * and a length accepted by codeLengthSchema.
 */
export function encodeCoordinates(
  latitude: number,
  longitude: number,
  codeLength: number,
): string {
  const length = Math.min(codeLength, maxCodeLength)

  let clippedLatitude = clipLatitude(latitude)
  const normalizedLongitude = normalizeLongitude(longitude)

  // The north pole has no cell above it, so move it into the last one
  if (clippedLatitude === latitudeMax) {
    clippedLatitude -= getCodePrecision(length)
  }

  let latValue = Math.floor(
    latitudeMax * pairCodePrecision * latitudeGridPrecision +
      clippedLatitude * pairCodePrecision * latitudeGridPrecision,
  )
  let lngValue = Math.floor(
    longitudeMax * pairCodePrecision * longitudeGridPrecision +
      normalizedLongitude * pairCodePrecision * longitudeGridPrecision,
  )

  let code = ''

  if (length > pairCodeLength) {
    for (let i = 0; i < maxCodeLength - pairCodeLength; i++) {
      const row = floorMod(latValue, gridRows)
      const column = floorMod(lngValue, gridColumns)
      code = getSymbol(row * gridColumns + column) + code
      latValue = floorDiv(latValue, gridRows)
      lngValue = floorDiv(lngValue, gridColumns)
    }
  } else {
    latValue = floorDiv(latValue, latitudeGridPrecision)
    lngValue = floorDiv(lngValue, longitudeGridPrecision)
  }

  for (let i = 0; i < pairCodeLength / 2; i++) {
    code = getSymbol(floorMod(lngValue, encodingBase)) + code
    code = getSymbol(floorMod(latValue, encodingBase)) + code
    latValue = floorDiv(latValue, encodingBase)
    lngValue = floorDiv(lngValue, encodingBase)

    // The last pair sits right after the separator
    if (i === 0) {
      code = separator + code
    }
  }

  return formatCode(code, length)
}

/**
 * Cut a 15 digit code down to length, padding short ones
 */
function formatCode(code: string, codeLength: number): string {
  if (codeLength >= separatorPosition) {
    return code.slice(0, codeLength + 1)
  }
  return (
    code.slice(0, codeLength) +
    padding.repeat(separatorPosition - codeLength) +
    separator
  )
}
