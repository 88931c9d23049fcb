/**
 * Plus Code Shortener
 *
 * Removes leading digits from a full code when a reference location makes
 * them redundant, and puts them back from a reference location.
 *
 * A short code only stays unambiguous if the reference is well inside the
 * area its missing digits describe, hence the safety factor on shorten and
 * the neighbour-cell correction on recover.
 */

import {
  PlusCodeError,
  fail,
  latLngSchema,
  ok,
  plusCodeErrorKeywords,
  plusCodeKeywords,
  unwrap,
} from '../vocabulary'
import type { PlusCodeResult } from '../vocabulary'
import { decode } from '../codec/decode'
import { encodeCoordinates } from '../codec/encode'
import {
  clipLatitude,
  getCodePrecision,
  normalizeLongitude,
} from '../codec/gridMath'
import { isFull, isShort } from '../validation/validator'

const {
  padding,
  separator,
  separatorPosition,
  latitudeMax,
  defaultCodeLength,
  shortenRemovals,
  shortenSafetyFactor,
} = plusCodeKeywords

// ============================================================================
// Shorten
// ============================================================================

/**
 * Remove 8, 6 or 4 leading digits from a full code, given a nearby reference
 *
 * The largest removal whose cell comfortably contains the reference wins.
 * If the reference is too far away the code is returned whole.
 *
 * @example
 * shorten('8FVC2222+22', 47.0001, 8.0001) // { success: true, data: '+22' }
 */
export function shorten(
  code: string,
  latitude: number,
  longitude: number,
): PlusCodeResult<string> {
  if (!isFull(code)) {
    return fail(
      new PlusCodeError(
        plusCodeErrorKeywords.notFullCode,
        `Open Location Code is not a valid full code: ${code}`,
        code,
      ),
    )
  }

  if (code.includes(padding)) {
    return fail(
      new PlusCodeError(
        plusCodeErrorKeywords.paddedCode,
        `Cannot shorten padded codes: ${code}`,
        code,
      ),
    )
  }

  const reference = checkReference(latitude, longitude)
  if (reference) return fail(reference)

  const area = decode(code)
  if (!area.success) return fail(area.error)

  const maxDiff = Math.max(
    Math.abs(latitude - area.data.latitudeCenter),
    Math.abs(longitude - area.data.longitudeCenter),
  )

  const removal = shortenRemovals.find(
    (length) => maxDiff < getCodePrecision(length) * shortenSafetyFactor,
  )

  return ok(code.slice(removal ?? 0).toUpperCase())
}

/**
 * Same as shorten, but throws a PlusCodeError on invalid input
 */
export function shortenOrThrow(
  code: string,
  latitude: number,
  longitude: number,
): string {
  return unwrap(shorten(code, latitude, longitude))
}

// ============================================================================
// Recover
// ============================================================================

/**
 * Recover the full code nearest to a reference location
 *
 * Full codes are returned uppercased. For short codes the missing digits
 * come from the reference, then the result is moved one cell over if a
 * neighbouring cell is closer to the reference.
 *
 * @example
 * recoverNearest('+22', 47.0001, 8.0001) // { success: true, data: '8FVC2222+22' }
 */
export function recoverNearest(
  shortCode: string,
  latitude: number,
  longitude: number,
): PlusCodeResult<string> {
  if (isFull(shortCode)) {
    return ok(shortCode.toUpperCase())
  }

  if (!isShort(shortCode)) {
    return fail(
      new PlusCodeError(
        plusCodeErrorKeywords.notValidShortCode,
        `Open Location Code is not a valid short code: ${shortCode}`,
        shortCode,
      ),
    )
  }

  const reference = checkReference(latitude, longitude)
  if (reference) return fail(reference)

  const referenceLatitude = clipLatitude(latitude)
  const referenceLongitude = normalizeLongitude(longitude)

  const prefixLength = separatorPosition - shortCode.indexOf(separator)
  const resolution = getCodePrecision(prefixLength)
  const halfResolution = resolution / 2

  const code =
    prefixByReference(referenceLatitude, referenceLongitude, prefixLength) +
    shortCode

  const candidate = decode(code)
  if (!candidate.success) return fail(candidate.error)

  let recoveredLatitude = candidate.data.latitudeCenter
  if (
    referenceLatitude + halfResolution < recoveredLatitude &&
    recoveredLatitude - resolution >= -latitudeMax
  ) {
    recoveredLatitude -= resolution
  } else if (
    referenceLatitude - halfResolution > recoveredLatitude &&
    recoveredLatitude + resolution <= latitudeMax
  ) {
    recoveredLatitude += resolution
  }

  // Longitude wraps, so there is no edge to stop at
  let recoveredLongitude = candidate.data.longitudeCenter
  if (referenceLongitude + halfResolution < recoveredLongitude) {
    recoveredLongitude -= resolution
  } else if (referenceLongitude - halfResolution > recoveredLongitude) {
    recoveredLongitude += resolution
  }

  return ok(
    encodeCoordinates(
      recoveredLatitude,
      recoveredLongitude,
      code.length - separator.length,
    ),
  )
}

/**
 * Same as recoverNearest, but throws a PlusCodeError on invalid input
 */
export function recoverNearestOrThrow(
  shortCode: string,
  latitude: number,
  longitude: number,
): string {
  return unwrap(recoverNearest(shortCode, latitude, longitude))
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Leading digits of the cell containing the reference
 */
function prefixByReference(
  latitude: number,
  longitude: number,
  prefixLength: number,
): string {
  const precision = getCodePrecision(prefixLength)
  const roundedLatitude = Math.floor(latitude / precision) * precision
  const roundedLongitude = Math.floor(longitude / precision) * precision

  return encodeCoordinates(
    roundedLatitude,
    roundedLongitude,
    defaultCodeLength,
  ).slice(0, prefixLength)
}

function checkReference(
  latitude: number,
  longitude: number,
): PlusCodeError | undefined {
  if (latLngSchema.safeParse({ latitude, longitude }).success) return undefined

  return new PlusCodeError(
    plusCodeErrorKeywords.invalidCoordinate,
    `Reference location must be finite numbers: (${latitude}, ${longitude})`,
    { latitude, longitude },
  )
}
