/**
 * Diff/Patch Engine
 *
 * A changeset is an ascending address → word map holding the new word of
 * every address whose logical word differs between two stores. It is the unit
 * two mirrored memories exchange to stay in sync: a consumer only needs the
 * (address, word) pairs and the shared word width.
 */

import { bytesEqual, logger, wordToHex } from '@sparse-vmem/core'
import {
  type Address,
  AddressOutOfBoundsError,
  type Changeset,
  type ReadonlyWord,
  type Safe,
  safeError,
  safeResult,
  type VirtualMemoryStore,
} from '@sparse-vmem/types'

/**
 * Compare two dense word sequences position by position.
 *
 * Comparison stops at the end of the shorter sequence. Absent words must
 * already be presented as zero words, which the borrowing iterator does.
 */
export function diffWords(
  old: Iterable<ReadonlyWord>,
  next: Iterable<ReadonlyWord>,
): Changeset {
  const changeset: Changeset = new Map()
  const oldWords = old[Symbol.iterator]()
  const nextWords = next[Symbol.iterator]()

  for (let address = 0; ; address++) {
    const oldWord = oldWords.next()
    if (oldWord.done) break
    const nextWord = nextWords.next()
    if (nextWord.done) break

    if (!bytesEqual(oldWord.value, nextWord.value)) {
      changeset.set(address, nextWord.value.slice())
    }
  }

  return changeset
}

/** Changeset addresses in ascending order, whatever order the map was built in */
export function sortedAddresses(changeset: Changeset): Address[] {
  return [...changeset.keys()].sort((a, b) => a - b)
}

/**
 * Find the first changeset address `target` cannot hold, without writing
 */
export function checkChangeset(
  target: VirtualMemoryStore,
  changeset: Changeset,
): Safe<void> {
  const length = target.len()
  for (const address of sortedAddresses(changeset)) {
    if (!Number.isInteger(address) || address < 0 || address >= length) {
      return safeError(new AddressOutOfBoundsError(address, length))
    }
  }
  return safeResult(undefined)
}

/**
 * Write every changeset entry into `target` in ascending address order.
 *
 * Not atomic: the first failing write aborts the patch and is returned, and
 * the entries written before it stay in `target`.
 */
export function applyChangeset(
  target: VirtualMemoryStore,
  changeset: Changeset,
): Safe<void> {
  let applied = 0
  for (const address of sortedAddresses(changeset)) {
    const word = changeset.get(address)
    if (!word) continue

    const [error] = target.writeWord(word, address)
    if (error) {
      logger.debug('Patch aborted on unwritable address', {
        address,
        word: wordToHex(word),
        applied,
        remaining: changeset.size - applied,
      })
      return safeError(error)
    }
    applied += 1
  }
  return safeResult(undefined)
}
