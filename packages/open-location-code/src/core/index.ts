/**
 * Core Module
 *
 * Configured codec built on the pure codec, validation and shortening functions.
 */

export * from './plusCodeCodec'
