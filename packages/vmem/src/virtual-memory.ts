import { isZeroWord, logger, zeroWord } from '@sparse-vmem/core'
import {
  type Address,
  AddressOutOfBoundsError,
  type Changeset,
  type ReadonlyWord,
  type Safe,
  safeError,
  safeResult,
  VirtualMemoryError,
  type VirtualMemoryStore,
  VMEM_ERRORS,
  type Word,
  type WordEntry,
} from '@sparse-vmem/types'
import {
  applyChangeset,
  checkChangeset,
  diffWords,
} from './changeset'
import { parseChunkSize, parseVirtualMemoryOptions } from './config'
import { ChunksAdjacentContent, IntoIter, Iter, IterMut } from './iterators'
import { WordMap } from './word-map'

/**
 * Virtual memory where physical storage is only allocated as it is written to.
 *
 * The address space spans `length` words of `width` bytes each. Unwritten
 * words read as all zeros without occupying storage.
 *
 * @example
 * ```ts
 * // addresses 0x00 to 0xff, 4-byte words
 * const vmem = new VirtualMemory(0x100, 4)
 *
 * const [error] = vmem.writeWord(new Uint8Array([0x01, 0x02, 0x04, 0x08]), 0x03)
 * const word = vmem.readWord(0x03)
 * ```
 */
export class VirtualMemory implements VirtualMemoryStore, Iterable<ReadonlyWord> {
  private memory = new WordMap()
  private readonly length: number
  private readonly wordWidth: number

  constructor(length: number, width: number) {
    const options = parseVirtualMemoryOptions({ length, width })
    this.length = options.length
    this.wordWidth = options.width
  }

  /**
   * Build a memory holding `bytes`, one word per `width`-sized chunk.
   *
   * The length is rounded up to whole words and the trailing short chunk is
   * zero-padded. All-zero chunks are left unwritten.
   */
  static fromBytes(bytes: Uint8Array, width: number): VirtualMemory {
    const { width: wordWidth } = parseVirtualMemoryOptions({ length: 0, width })
    const vmem = new VirtualMemory(Math.ceil(bytes.length / wordWidth), wordWidth)

    for (let address = 0; address < vmem.length; address++) {
      const offset = address * wordWidth
      const word = zeroWord(wordWidth)
      word.set(bytes.subarray(offset, offset + wordWidth))
      if (!isZeroWord(word)) vmem.memory.set(address, word)
    }

    logger.debug('Built virtual memory from bytes', {
      bytes: bytes.length,
      length: vmem.length,
      width: wordWidth,
      entries: vmem.memory.size,
    })
    return vmem
  }

  /**
   * Diff two memories, returning the new word of every address that differs.
   *
   * Absent words compare as zero words. Only the addresses both memories
   * cover are compared.
   */
  static diff(old: VirtualMemory, next: VirtualMemory): Changeset {
    return diffWords(old.iter(), next.iter())
  }

  /** The number of words */
  len(): number {
    return this.length
  }

  /** The byte size of one word */
  width(): number {
    return this.wordWidth
  }

  /** The number of words that occupy storage */
  entryCount(): number {
    return this.memory.size
  }

  /** Read the word at the specified address. */
  readWord(address: Address): Word | undefined {
    if (!this.isInBounds(address)) return undefined
    return this.memory.get(address)?.slice() ?? zeroWord(this.wordWidth)
  }

  /** Write a word to the specified address. */
  writeWord(word: Word, address: Address): Safe<void> {
    this.assertWordWidth(word)
    if (!this.isInBounds(address)) {
      return safeError(new AddressOutOfBoundsError(address, this.length))
    }
    this.memory.set(address, word.slice())
    return safeResult(undefined)
  }

  /**
   * Fill `buf` with the contents of the memory starting from `address`.
   *
   * Out-of-range words leave their part of `buf` untouched. The return value
   * is the final word cursor times the width plus the length of any trailing
   * partial chunk; treat it as advisory.
   *
   * @example
   * ```ts
   * const vmem = new VirtualMemory(0x0f, 4)
   * vmem.writeWord(new Uint8Array([0x01, 0x02, 0x04, 0x08]), 0x0d)
   *
   * const buf = new Uint8Array(8)
   * vmem.readAt(buf, 0x0d)
   * // buf = 01 02 04 08 00 00 00 00
   * ```
   */
  readAt(buf: Uint8Array, address: Address): number {
    const width = this.wordWidth
    const fullChunks = Math.floor(buf.length / width)
    let cursor = address

    for (let chunk = 0; chunk < fullChunks; chunk++) {
      if (this.isInBounds(cursor)) {
        buf.set(this.wordAt(cursor), chunk * width)
      }
      cursor += 1
    }

    const remainder = buf.length - fullChunks * width
    if (remainder > 0 && this.isInBounds(cursor)) {
      buf.set(this.wordAt(cursor).subarray(0, remainder), fullChunks * width)
    }

    return cursor * width + remainder
  }

  /**
   * Write the content of `buf` to the memory starting from `address`.
   *
   * Whole chunks replace their word. A trailing partial chunk only overwrites
   * the leading bytes of its word and keeps the rest.
   */
  writeAt(buf: Uint8Array, address: Address): void {
    const width = this.wordWidth
    const fullChunks = Math.floor(buf.length / width)
    let cursor = address

    for (let chunk = 0; chunk < fullChunks; chunk++) {
      if (this.isInBounds(cursor)) {
        const offset = chunk * width
        this.memory.set(cursor, buf.slice(offset, offset + width))
      }
      cursor += 1
    }

    const tail = buf.subarray(fullChunks * width)
    if (tail.length > 0 && this.isInBounds(cursor)) {
      this.memory
        .getOrInsert(cursor, () => zeroWord(width))
        .set(tail)
    }
  }

  /**
   * Apply a changeset to the memory.
   *
   * Entries are written in ascending address order. The first out-of-range
   * address aborts the patch and leaves the earlier entries written.
   */
  patch(changeset: Changeset): Safe<void> {
    return applyChangeset(this, changeset)
  }

  /** Report the first changeset address out of range without writing anything */
  checkPatch(changeset: Changeset): Safe<void> {
    return checkChangeset(this, changeset)
  }

  /** Iterate over owned copies of every word */
  intoIter(): IntoIter {
    return new IntoIter(this.memory.clone(), this.length, this.wordWidth)
  }

  /** Iterate over every word without allocating */
  iter(): Iter {
    return new Iter(this.memory, this.length, this.wordWidth)
  }

  /**
   * Iterate over mutable words.
   *
   * **Warning**: this will allocate words that hadn't been written to.
   */
  iterMut(): IterMut {
    return new IterMut(this.memory, this.length, this.wordWidth)
  }

  /** Iterate over the written entries only, in ascending address order */
  iterContent(): IterableIterator<WordEntry> {
    return this.memory.entries()
  }

  /** Iterate over runs of adjacent written entries of at most `chunkSize` words */
  chunksAdjacentContent(chunkSize: number): ChunksAdjacentContent {
    return new ChunksAdjacentContent(this.memory, parseChunkSize(chunkSize))
  }

  [Symbol.iterator](): Iter {
    return this.iter()
  }

  /** Deep copy with its own storage */
  clone(): VirtualMemory {
    const copy = new VirtualMemory(this.length, this.wordWidth)
    copy.memory = this.memory.clone()
    return copy
  }

  /**
   * Logical equality: same shape and the same word at every address, with
   * unwritten words equal to written zero words
   */
  equals(other: VirtualMemory): boolean {
    if (this.length !== other.length || this.wordWidth !== other.wordWidth) {
      return false
    }
    return VirtualMemory.diff(this, other).size === 0
  }

  private isInBounds(address: Address): boolean {
    return Number.isInteger(address) && address >= 0 && address < this.length
  }

  private wordAt(address: Address): ReadonlyWord {
    return this.memory.get(address) ?? zeroWord(this.wordWidth)
  }

  private assertWordWidth(word: Word): void {
    if (word.length !== this.wordWidth) {
      throw new VirtualMemoryError(
        `Word has ${word.length} bytes, expected ${this.wordWidth}`,
        VMEM_ERRORS.WORD_WIDTH_MISMATCH,
        { width: this.wordWidth, received: word.length },
      )
    }
  }
}
