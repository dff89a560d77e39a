/**
 * Virtual Memory Error Constants
 *
 * Centralized definitions of all error codes raised by the virtual memory
 * packages.
 *
 * Only `ADDRESS_OUT_OF_BOUNDS` is part of the operation contract and is
 * returned through `Safe` tuples. The remaining codes describe caller defects
 * (malformed options or words) and are thrown.
 */
export const VMEM_ERRORS = {
  ADDRESS_OUT_OF_BOUNDS: 'address_out_of_bounds',
  WORD_WIDTH_MISMATCH: 'word_width_mismatch',
  INVALID_OPTIONS: 'invalid_options',
  INVALID_CHUNK_SIZE: 'invalid_chunk_size',
} as const

export type VirtualMemoryErrorCode =
  (typeof VMEM_ERRORS)[keyof typeof VMEM_ERRORS]

export class VirtualMemoryError extends Error {
  constructor(
    message: string,
    public code: VirtualMemoryErrorCode,
    public context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'VirtualMemoryError'
  }
}

export class AddressOutOfBoundsError extends VirtualMemoryError {
  constructor(
    public address: number,
    public length: number,
  ) {
    super(
      `Address ${address} is out of bounds for length ${length}`,
      VMEM_ERRORS.ADDRESS_OUT_OF_BOUNDS,
      { address, length },
    )
    this.name = 'AddressOutOfBoundsError'
  }
}
