/**
 * Centralized Type Definitions for the virtual memory packages
 *
 * Single source of truth for the word, changeset and store types together
 * with the error and result conventions shared by every package.
 */

// Error codes and error classes
export * from './errors'
// Safe result tuples
export * from './safe'
// Store, word and changeset types
export * from './vmem'
