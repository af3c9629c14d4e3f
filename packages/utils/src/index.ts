/**
 * Utilities for manipulating bytes, Uint8Arrays, etc.
 */
export * from './bytes'
export * from './helpers'
/**
 * IP literal encoding and classification
 */
export * from './ip'
export * from './multi-addr'
export * from './safe'
