/**
 * Sparse Virtual Memory Package Exports
 *
 * Word-addressed memory that only allocates the words written to it
 */

// Logger
export { logger } from '@sparse-vmem/core'
// Re-export types from centralized types package
export * from '@sparse-vmem/types'
// Diff/patch engine
export {
  applyChangeset,
  checkChangeset,
  diffWords,
  sortedAddresses,
} from './changeset'
// Configuration constants and schemas
export {
  chunkSizeSchema,
  parseChunkSize,
  parseVirtualMemoryOptions,
  VMEM_CONFIG,
  virtualMemoryOptionsSchema,
} from './config'
// Iteration suite
export { ChunksAdjacentContent, IntoIter, Iter, IterMut } from './iterators'
export { VirtualMemory } from './virtual-memory'
