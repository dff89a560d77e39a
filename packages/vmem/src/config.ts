/**
 * Virtual Memory Configuration
 *
 * Construction limits and the zod schemas that guard them
 */

import { z } from '@sparse-vmem/core'
import {
  VirtualMemoryError,
  type VirtualMemoryOptions,
  VMEM_ERRORS,
} from '@sparse-vmem/types'

export const VMEM_CONFIG = {
  // addresses are plain numbers, so the space stops at 2^53 - 1 words
  MAX_LENGTH: Number.MAX_SAFE_INTEGER,
  MIN_WIDTH: 1,
} as const

export const virtualMemoryOptionsSchema = z.object({
  length: z.number().int().min(0).max(VMEM_CONFIG.MAX_LENGTH),
  width: z.number().int().min(VMEM_CONFIG.MIN_WIDTH),
})

export const chunkSizeSchema = z.number().int().min(1)

/**
 * Validate construction options, throwing `invalid_options` on failure
 */
export function parseVirtualMemoryOptions(
  options: VirtualMemoryOptions,
): VirtualMemoryOptions {
  const parsed = virtualMemoryOptionsSchema.safeParse(options)
  if (!parsed.success) {
    throw new VirtualMemoryError(
      `Invalid virtual memory options: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join(', ')}`,
      VMEM_ERRORS.INVALID_OPTIONS,
      { length: options.length, width: options.width },
    )
  }
  return parsed.data
}

/**
 * Validate the maximum adjacency chunk size, throwing `invalid_chunk_size` on failure
 */
export function parseChunkSize(chunkSize: number): number {
  const parsed = chunkSizeSchema.safeParse(chunkSize)
  if (!parsed.success) {
    throw new VirtualMemoryError(
      `Chunk size must be a positive integer, got ${chunkSize}`,
      VMEM_ERRORS.INVALID_CHUNK_SIZE,
      { chunkSize },
    )
  }
  return parsed.data
}
