/**
 * Validation Module
 *
 * Format checks for Plus Codes (valid / short / full / padded).
 */

export * from './validator'
