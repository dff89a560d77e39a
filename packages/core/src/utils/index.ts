/**
 * Utility Functions
 */

export * from './bytes'
