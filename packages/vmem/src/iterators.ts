import { logger, zeroWord } from '@sparse-vmem/core'
import type {
  AdjacentChunk,
  ReadonlyWord,
  Word,
  WordEntry,
} from '@sparse-vmem/types'
import type { WordMap } from './word-map'

/**
 * Iterator that owns a snapshot of the memory.
 *
 * Every address `0..length-1` yields a word the caller owns outright: a copy
 * of the stored word or a fresh zero word. Later writes to the memory are not
 * observed.
 */
export class IntoIter implements IterableIterator<Word> {
  private index = 0

  constructor(
    private readonly memory: WordMap,
    private readonly length: number,
    private readonly width: number,
  ) {}

  next(): IteratorResult<Word> {
    if (this.index >= this.length) return { done: true, value: undefined }

    const word = this.memory.get(this.index)
    this.index += 1
    return { done: false, value: word ? word.slice() : zeroWord(this.width) }
  }

  [Symbol.iterator](): IntoIter {
    return this
  }
}

/**
 * Iterator over a shared borrow of the memory.
 *
 * Absent addresses yield a zero word that belongs to the iterator; nothing is
 * inserted into the memory.
 */
export class Iter implements IterableIterator<ReadonlyWord> {
  private index = 0
  private readonly zero: ReadonlyWord

  constructor(
    private readonly memory: WordMap,
    private readonly length: number,
    width: number,
  ) {
    this.zero = zeroWord(width)
  }

  next(): IteratorResult<ReadonlyWord> {
    if (this.index >= this.length) return { done: true, value: undefined }

    const word = this.memory.get(this.index) ?? this.zero
    this.index += 1
    return { done: false, value: word }
  }

  [Symbol.iterator](): Iter {
    return this
  }
}

/**
 * Iterator over an exclusive borrow of the memory.
 *
 * **Warning**: every absent address it visits is materialized as a stored zero
 * word, so a full traversal leaves the memory dense. Use `Iter` for read-only
 * traversal.
 *
 * A yielded word may be mutated in place until the next call to `next()`.
 */
export class IterMut implements IterableIterator<Word> {
  private index = 0
  private materialized = 0

  constructor(
    private readonly memory: WordMap,
    private readonly length: number,
    private readonly width: number,
  ) {}

  next(): IteratorResult<Word> {
    if (this.index >= this.length) {
      if (this.materialized > 0) {
        logger.debug('Mutable iteration materialized zero words', {
          materialized: this.materialized,
          entries: this.memory.size,
        })
        this.materialized = 0
      }
      return { done: true, value: undefined }
    }

    const word = this.memory.getOrInsert(this.index, () => {
      this.materialized += 1
      return zeroWord(this.width)
    })
    this.index += 1
    return { done: false, value: word }
  }

  [Symbol.iterator](): IterMut {
    return this
  }
}

/**
 * Iterator over runs of contiguous materialized addresses.
 *
 * Each chunk is anchored at the next unconsumed entry and grows while it holds
 * fewer than `chunkSize` entries and the next entry directly follows the
 * previous one. Unwritten addresses are never visited.
 */
export class ChunksAdjacentContent implements IterableIterator<AdjacentChunk> {
  private readonly entries: Iterator<WordEntry>
  private peeked: IteratorResult<WordEntry> | undefined

  constructor(
    memory: WordMap,
    private readonly chunkSize: number,
  ) {
    this.entries = memory.entries()
  }

  next(): IteratorResult<AdjacentChunk> {
    const anchor = this.take()
    if (anchor.done) return { done: true, value: undefined }

    const chunk: AdjacentChunk = [anchor.value]
    let previous = anchor.value[0]
    while (chunk.length < this.chunkSize) {
      const candidate = this.peek()
      if (candidate.done || candidate.value[0] !== previous + 1) break

      this.take()
      chunk.push(candidate.value)
      previous = candidate.value[0]
    }
    return { done: false, value: chunk }
  }

  [Symbol.iterator](): ChunksAdjacentContent {
    return this
  }

  private peek(): IteratorResult<WordEntry> {
    if (!this.peeked) this.peeked = this.entries.next()
    return this.peeked
  }

  private take(): IteratorResult<WordEntry> {
    const result = this.peek()
    this.peeked = undefined
    return result
  }
}
