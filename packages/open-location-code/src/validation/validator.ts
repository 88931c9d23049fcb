/**
 * Plus Code Validator
 *
 * Classifies strings as valid, short or full codes using format rules only.
 * Nothing here decodes a coordinate.
 *
 * Rules:
 * - Exactly one separator, at an even index no later than position 8
 * - Never exactly one digit after the separator
 * - Padding only in full codes, as one even run ending right before the separator
 * - Every other character from the 20 symbol alphabet (either case)
 */

import { plusCodeKeywords } from '../vocabulary'
import { getDigitValue, getPaddingRuns, toSignificantDigits } from '../codec/digits'

const { padding, separator, separatorPosition } = plusCodeKeywords

// ============================================================================
// Classification
// ============================================================================

/**
 * Check if a value is a well-formed code, short or full
 */
export function isValid(code: unknown): boolean {
  return typeof code === 'string' && isValidString(code)
}

/**
 * Check if a value is a valid code missing its leading digits
 */
export function isShort(code: unknown): boolean {
  return (
    typeof code === 'string' &&
    isValidString(code) &&
    code.indexOf(separator) < separatorPosition
  )
}

/**
 * Check if a value is a valid code that can be decoded on its own
 */
export function isFull(code: unknown): boolean {
  return isValid(code) && !isShort(code)
}

/**
 * Check if a value is a valid code shortened with padding (e.g. '8FVC0000+')
 */
export function isPadded(code: unknown): boolean {
  return typeof code === 'string' && isValidString(code) && code.includes(padding)
}

// ============================================================================
// Rules
// ============================================================================

function isValidString(code: string): boolean {
  return (
    hasValidLength(code) &&
    hasValidSeparator(code) &&
    hasValidPadding(code) &&
    hasValidCharacters(code)
  )
}

function hasValidLength(code: string): boolean {
  if (code.length < 2 + separator.length) return false

  const segments = code.split(separator)
  return segments[segments.length - 1].length !== 1
}

function hasValidSeparator(code: string): boolean {
  const index = code.indexOf(separator)

  return (
    code.split(separator).length === 2 &&
    index <= separatorPosition &&
    index % 2 === 0
  )
}

function hasValidPadding(code: string): boolean {
  if (!code.includes(padding)) return true

  if (code.indexOf(separator) < separatorPosition) return false
  if (code.startsWith(padding)) return false
  if (!code.endsWith(padding + separator)) return false

  const runs = getPaddingRuns(code)
  if (runs.length !== 1) return false

  const runLength = runs[0].length
  return runLength % 2 === 0 && runLength <= separatorPosition - 2
}

function hasValidCharacters(code: string): boolean {
  return Array.from(toSignificantDigits(code)).every(
    (symbol) => (getDigitValue(symbol) ?? -1) >= 0,
  )
}
