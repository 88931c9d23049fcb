/**
 * Plus Code Schemas
 *
 * Zod schemas for everything that crosses the package boundary.
 * Types are inferred from the schemas so the two never drift apart.
 */

import { z } from 'zod'
import { plusCodeKeywords } from './keywords'

// ============================================================================
// Coordinates
// ============================================================================

/**
 * Finite latitude/longitude pair in degrees.
 * Out-of-range values are allowed: encode clips latitude and wraps longitude.
 */
export const latLngSchema = z.object({
  latitude: z.number().finite(),
  longitude: z.number().finite(),
})

export type LatLng = z.infer<typeof latLngSchema>

// ============================================================================
// Code Lengths
// ============================================================================

/**
 * A length encode accepts. Lengths above the max are clamped, not rejected.
 */
export const codeLengthSchema = z
  .number()
  .int()
  .min(2)
  .refine(
    (length) => length >= plusCodeKeywords.pairCodeLength || length % 2 === 0,
    { message: 'Lengths below the pair code length must be even' },
  )

// ============================================================================
// Decoded Areas
// ============================================================================

/**
 * Bounding rectangle of a decoded code
 *
 * Longitudes are not re-normalized, so the east edge of a cell
 * at the antimeridian can be 180.
 */
export const codeAreaSchema = z.object({
  southLatitude: z.number(),
  westLongitude: z.number(),
  latitudeHeight: z.number().positive(),
  longitudeWidth: z.number().positive(),
  latitudeCenter: z.number(),
  longitudeCenter: z.number(),
  codeLength: z.number().int().min(0).max(plusCodeKeywords.maxCodeLength),
})

export type CodeArea = Readonly<z.infer<typeof codeAreaSchema>>

export const codeBoundsSchema = z.object({
  south: z.number(),
  west: z.number(),
  north: z.number(),
  east: z.number(),
})

export type CodeBounds = z.infer<typeof codeBoundsSchema>

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate a latitude/longitude pair
 */
export function safeParseLatLng(value: unknown) {
  return latLngSchema.safeParse(value)
}

/**
 * Validate a decoded code area
 */
export function safeParseCodeArea(value: unknown) {
  return codeAreaSchema.safeParse(value)
}
