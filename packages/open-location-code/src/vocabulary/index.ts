/**
 * Plus Code Vocabulary
 *
 * Public exports for keywords, schemas and error types.
 * This is the single source of truth for all format constants and types.
 */

// Keywords
export * from './keywords'

// Schemas
export * from './schemas'

// Errors and results
export * from './errors'
