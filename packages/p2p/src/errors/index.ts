/**
 * Error Handling System
 */

export * from './base'
export * from './types'
