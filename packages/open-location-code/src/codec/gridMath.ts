/**
 * Grid arithmetic shared by the codec and the shortener.
 *
 * Integer division here always floors, including for negative operands.
 */

import { plusCodeKeywords } from '../vocabulary'

const {
  encodingBase,
  latitudeMax,
  longitudeMax,
  pairCodeLength,
  pairCodePrecision,
  gridRows,
} = plusCodeKeywords

export function floorDiv(dividend: number, divisor: number): number {
  return Math.floor(dividend / divisor)
}

export function floorMod(dividend: number, divisor: number): number {
  return dividend - divisor * floorDiv(dividend, divisor)
}

/**
 * Clip latitude into [-90, 90]
 */
export function clipLatitude(latitude: number): number {
  return Math.min(latitudeMax, Math.max(-latitudeMax, latitude))
}

/**
 * Wrap longitude into [-180, 180)
 *
 * `%` is exact for doubles, so in-range values come back unchanged and
 * the cost does not grow with the magnitude of the input.
 */
export function normalizeLongitude(longitude: number): number {
  const turn = 2 * longitudeMax
  const normalized = longitude % turn
  if (normalized >= longitudeMax) return normalized - turn
  if (normalized < -longitudeMax) return normalized + turn
  return normalized
}

/**
 * Size in degrees of a cell for a given code length
 *
 * Pair lengths give 20, 1, 0.05, 0.0025 and 0.000125 degrees for
 * 2, 4, 6, 8 and 10 digits. Every grid digit after that divides
 * the latitude size by 5.
 */
export function getCodePrecision(codeLength: number): number {
  if (codeLength <= pairCodeLength) {
    return Math.pow(encodingBase, floorDiv(codeLength, -2) + 2)
  }
  return 1 / (pairCodePrecision * Math.pow(gridRows, codeLength - pairCodeLength))
}
