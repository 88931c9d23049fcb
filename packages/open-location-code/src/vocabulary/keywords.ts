/**
 * Plus Code Keywords
 *
 * Single source of truth for the Open Location Code format constants.
 * These are part of the format contract: changing any of them breaks
 * compatibility with codes produced elsewhere.
 *
 * Philosophy:
 * - No magic numbers anywhere in the codebase
 * - Derived constants are computed from the base ones, never hard-coded twice
 */

const MAX_CODE_LENGTH = 15
const PAIR_CODE_LENGTH = 10
const GRID_ROWS = 5
const GRID_COLUMNS = 4

export const plusCodeKeywords = {
  // ============================================================================
  // Symbols
  // ============================================================================

  /** The 20 digit symbols, in digit-value order */
  alphabet: '23456789CFGHJMPQRVWX',
  padding: '0',
  separator: '+',

  // ============================================================================
  // Layout
  // ============================================================================

  /** Number of characters placed before the separator in a full code */
  separatorPosition: 8,

  /** Digits beyond this are ignored when decoding and clamped when encoding */
  maxCodeLength: MAX_CODE_LENGTH,

  /**
   * Digits encoded as latitude/longitude pairs.
   * A 10 digit code is roughly 14x14 meters at the equator.
   */
  pairCodeLength: PAIR_CODE_LENGTH,

  defaultCodeLength: PAIR_CODE_LENGTH,

  // ============================================================================
  // Numeric base
  // ============================================================================

  encodingBase: 20,

  /** Inverse of the precision of the last pair digit (1 / 0.000125) */
  pairCodePrecision: 8000,

  /** Each grid digit splits a cell into GRID_ROWS x GRID_COLUMNS sub-cells */
  gridRows: GRID_ROWS,
  gridColumns: GRID_COLUMNS,

  /** 5^(15 - 10) */
  latitudeGridPrecision: GRID_ROWS ** (MAX_CODE_LENGTH - PAIR_CODE_LENGTH),

  /** 4^(15 - 10) */
  longitudeGridPrecision: GRID_COLUMNS ** (MAX_CODE_LENGTH - PAIR_CODE_LENGTH),

  // ============================================================================
  // Bounds
  // ============================================================================

  latitudeMax: 90,
  longitudeMax: 180,

  /** Initial decode resolution, halved into the globe by the first pair step */
  initialResolution: 400,

  /** Leading-digit removals attempted by shorten, largest first */
  shortenRemovals: [8, 6, 4],

  /** Fraction of a cell's size the reference must be within for a removal */
  shortenSafetyFactor: 0.3,

  /** Prefix used for every log line emitted by this package */
  logPrefix: '[PlusCodes]',
} as const

/**
 * Error kinds produced by the fallible operations.
 */
export const plusCodeErrorKeywords = {
  invalidLength: 'InvalidLength',
  notFullCode: 'NotFullCode',
  notValidShortCode: 'NotValidShortCode',
  paddedCode: 'PaddedCode',
  invalidCoordinate: 'InvalidCoordinate',
} as const

// ============================================================================
// Type Exports
// ============================================================================

export type PlusCodeErrorKind =
  (typeof plusCodeErrorKeywords)[keyof typeof plusCodeErrorKeywords]
