import type { Address, Word, WordEntry } from '@sparse-vmem/types'

/**
 * Ordered address → word map
 *
 * Words live in a hash map for direct lookups. New addresses are appended to a
 * key list that is only re-sorted before an ordered traversal after an
 * out-of-order insert, so single-word operations stay constant time.
 * Entries are never removed.
 */
export class WordMap {
  private readonly words = new Map<Address, Word>()
  private addresses: Address[] = []
  private sorted = true

  get size(): number {
    return this.words.size
  }

  get(address: Address): Word | undefined {
    return this.words.get(address)
  }

  /**
   * Insert or overwrite the word at `address`
   * @returns true when the address was not present before
   */
  set(address: Address, word: Word): boolean {
    const isNew = !this.words.has(address)
    this.words.set(address, word)
    if (isNew) this.appendAddress(address)
    return isNew
  }

  /**
   * Return the stored word, inserting the one built by `create` when absent
   */
  getOrInsert(address: Address, create: () => Word): Word {
    const existing = this.words.get(address)
    if (existing) return existing

    const word = create()
    this.set(address, word)
    return word
  }

  /** Materialized entries in ascending address order */
  *entries(): IterableIterator<WordEntry> {
    for (const address of this.sortedAddresses()) {
      const word = this.words.get(address)
      if (word) yield [address, word]
    }
  }

  /** Deep copy; words are copied so the two maps never share bytes */
  clone(): WordMap {
    const copy = new WordMap()
    for (const address of this.sortedAddresses()) {
      const word = this.words.get(address)
      if (word) {
        copy.words.set(address, word.slice())
        copy.addresses.push(address)
      }
    }
    return copy
  }

  private appendAddress(address: Address): void {
    const last = this.addresses[this.addresses.length - 1]
    if (last !== undefined && last > address) this.sorted = false
    this.addresses.push(address)
  }

  // A fresh array, so a traversal already under way keeps its own order
  private sortedAddresses(): Address[] {
    if (!this.sorted) {
      this.addresses = this.addresses.slice().sort((a, b) => a - b)
      this.sorted = true
    }
    return this.addresses
  }
}
