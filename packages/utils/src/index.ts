/**
 * Utilities for manipulating bytes, Uint8Arrays, hex strings and bigints
 */
export * from './bytes'
export * from './constants'
/**
 * Errors
 */
export * from './errors'
export * from './helpers'
/**
 * Result tuples
 */
export * from './safe'
