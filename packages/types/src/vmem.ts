import type { Safe } from './safe'

/** One word of storage: exactly `width` bytes */
export type Word = Uint8Array

/** Word handed out for inspection only; mutating it is a caller defect */
export type ReadonlyWord = Readonly<Word>

/** Word index into the logical address space, valid iff `< length` */
export type Address = number

/** Ascending address → word mapping of the words that differ between two stores */
export type Changeset = Map<Address, Word>

/** Materialized entry as yielded by the sparse iterators */
export type WordEntry = [Address, ReadonlyWord]

/** Run of contiguous materialized addresses, capped at the requested size */
export type AdjacentChunk = WordEntry[]

export interface VirtualMemoryOptions {
  /** Number of addressable words */
  length: number
  /** Byte size of one word */
  width: number
}

/**
 * Sparse word-addressed memory.
 *
 * Storage is allocated only for words that have been written; every other
 * in-range address reads as the all-zero word.
 */
export interface VirtualMemoryStore {
  /** Number of addressable words */
  len(): number

  /** Byte size of one word */
  width(): number

  /** Number of materialized entries */
  entryCount(): number

  /** Read the word at `address`, `undefined` when out of range */
  readWord(address: Address): Word | undefined

  /** Write a word, failing with `address_out_of_bounds` when out of range */
  writeWord(word: Word, address: Address): Safe<void>

  /** Fill `buf` with consecutive words starting at `address` */
  readAt(buf: Uint8Array, address: Address): number

  /** Store `buf` as consecutive words starting at `address` */
  writeAt(buf: Uint8Array, address: Address): void

  /** Apply a changeset in ascending address order, stopping at the first error */
  patch(changeset: Changeset): Safe<void>
}
