/**
 * Byte utilities for word-addressed memory
 *
 * Helpers for creating, comparing and formatting fixed-width words
 */

import { bytesToHex, type Hex } from 'viem'

/**
 * Create a word filled with zeros
 */
export function zeroWord(width: number): Uint8Array {
  return new Uint8Array(width)
}

/**
 * Check if every byte of the buffer is zero
 */
export function isZeroWord(word: Readonly<Uint8Array>): boolean {
  for (let i = 0; i < word.length; i++) {
    if (word[i] !== 0) return false
  }
  return true
}

/**
 * Check if two buffers hold the same bytes
 */
export function bytesEqual(
  a: Readonly<Uint8Array>,
  b: Readonly<Uint8Array>,
): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

/**
 * Format a word as a hex string for log output
 */
export function wordToHex(word: Readonly<Uint8Array>): Hex {
  return bytesToHex(word)
}
