/**
 * Shortening Module
 *
 * Shorten full codes against a reference location and recover them again.
 */

export * from './shortener'
