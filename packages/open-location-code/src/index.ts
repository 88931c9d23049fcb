/**
 * @plus-codes/open-location-code
 *
 * Open Location Code (Plus Code) encoding, decoding, validation and
 * shortening. Pure functions over a fixed grid of latitude/longitude degrees.
 */

// ============================================================================
// Vocabulary - Format constants, schemas and error types
// ============================================================================

export * from './vocabulary'

// ============================================================================
// Codec - Coordinates to codes and back
// ============================================================================

export * from './codec'

// ============================================================================
// Validation - Valid, short and full codes
// ============================================================================

export * from './validation'

// ============================================================================
// Shortening - Relative to a reference location
// ============================================================================

export * from './shortening'

// ============================================================================
// Core - Configured codec
// ============================================================================

export * from './core'

// ============================================================================
// Package Metadata
// ============================================================================

export const PACKAGE_NAME = '@plus-codes/open-location-code'
export const VERSION = '0.1.0'
