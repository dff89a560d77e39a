/**
 * Sparse word store tests
 *
 * Word-granular reads and writes, bounds behaviour, construction and the
 * clone/equality helpers
 */

import { describe, expect, it } from 'vitest'
import * as vmemPackage from '../index'
import {
  AddressOutOfBoundsError,
  VirtualMemory,
  VirtualMemoryError,
  VMEM_ERRORS,
} from '../index'

const word = (...bytes: number[]) => new Uint8Array(bytes)

describe('VirtualMemory', () => {
  describe('construction', () => {
    it('should expose length and width without allocating words', () => {
      const vmem = new VirtualMemory(0x100, 4)
      expect(vmem.len()).toBe(0x100)
      expect(vmem.width()).toBe(4)
      expect(vmem.entryCount()).toBe(0)
    })

    it('should accept an empty address space', () => {
      const vmem = new VirtualMemory(0, 2)
      expect(vmem.len()).toBe(0)
      expect(vmem.readWord(0)).toBeUndefined()
    })

    it.each([
      [-1, 4],
      [1.5, 4],
      [10, 0],
      [10, 2.5],
    ])('should reject length %d with width %d', (length, width) => {
      expect(() => new VirtualMemory(length, width)).toThrow(VirtualMemoryError)
      try {
        new VirtualMemory(length, width)
      } catch (error) {
        expect(error).toBeInstanceOf(VirtualMemoryError)
        if (error instanceof VirtualMemoryError) {
          expect(error.code).toBe(VMEM_ERRORS.INVALID_OPTIONS)
        }
      }
    })
  })

  describe('readWord / writeWord', () => {
    it('should read back a written word', () => {
      const vmem = new VirtualMemory(0x0f, 4)
      const [error] = vmem.writeWord(word(0x0a, 0x0b, 0x0c, 0x0d), 0x03)

      expect(error).toBeUndefined()
      expect(vmem.readWord(0x03)).toEqual(word(0x0a, 0x0b, 0x0c, 0x0d))
      expect(vmem.entryCount()).toBe(1)
    })

    it('should read untouched in-range addresses as zero words', () => {
      const vmem = new VirtualMemory(0x0f, 4)
      expect(vmem.readWord(0x00)).toEqual(word(0, 0, 0, 0))
      expect(vmem.readWord(0x0e)).toEqual(word(0, 0, 0, 0))
      expect(vmem.entryCount()).toBe(0)
    })

    it('should return undefined when reading out of bounds', () => {
      const vmem = new VirtualMemory(0x0f, 4)
      expect(vmem.readWord(0x0f)).toBeUndefined()
      expect(vmem.readWord(0x1000)).toBeUndefined()
      expect(vmem.readWord(-1)).toBeUndefined()
    })

    it('should accept the last address and reject the length', () => {
      const vmem = new VirtualMemory(0x0f, 4)
      const data = word(0x0a, 0x0b, 0x0c, 0x0d)

      expect(vmem.writeWord(data, 0x03)).toEqual([undefined, undefined])
      expect(vmem.writeWord(data, 0x0e)).toEqual([undefined, undefined])

      const [error] = vmem.writeWord(data, 0x0f)
      expect(error).toBeInstanceOf(AddressOutOfBoundsError)
      expect(error?.message).toBe('Address 15 is out of bounds for length 15')
      if (error instanceof AddressOutOfBoundsError) {
        expect(error.code).toBe(VMEM_ERRORS.ADDRESS_OUT_OF_BOUNDS)
        expect(error.address).toBe(0x0f)
        expect(error.length).toBe(0x0f)
      }
      expect(vmem.entryCount()).toBe(2)
    })

    it('should reject negative addresses on write', () => {
      const vmem = new VirtualMemory(4, 2)
      const [error] = vmem.writeWord(word(1, 2), -1)
      expect(error).toBeInstanceOf(AddressOutOfBoundsError)
      expect(vmem.entryCount()).toBe(0)
    })

    it('should overwrite an existing word without adding an entry', () => {
      const vmem = new VirtualMemory(8, 2)
      vmem.writeWord(word(1, 1), 5)
      vmem.writeWord(word(2, 2), 5)
      expect(vmem.readWord(5)).toEqual(word(2, 2))
      expect(vmem.entryCount()).toBe(1)
    })

    it('should throw when the word width does not match', () => {
      const vmem = new VirtualMemory(8, 4)
      expect(() => vmem.writeWord(word(1, 2, 3), 0)).toThrow(
        'Word has 3 bytes, expected 4',
      )
    })

    it('should not share bytes with the caller', () => {
      const vmem = new VirtualMemory(8, 2)
      const source = word(1, 2)
      vmem.writeWord(source, 1)
      source[0] = 0xff

      const read = vmem.readWord(1)
      expect(read).toEqual(word(1, 2))
      if (read) read[1] = 0xee
      expect(vmem.readWord(1)).toEqual(word(1, 2))
    })
  })

  describe('fromBytes', () => {
    it('should skip all-zero chunks', () => {
      const bytes = word(0, 0, 0, 0, 1, 2, 3, 4, 0, 0, 0, 0, 5, 6, 7, 8)
      const vmem = VirtualMemory.fromBytes(bytes, 4)

      expect(vmem.len()).toBe(4)
      expect(vmem.entryCount()).toBe(2)
      expect([...vmem.iterContent()].map(([address]) => address)).toEqual([
        1, 3,
      ])
      expect(vmem.readWord(0)).toEqual(word(0, 0, 0, 0))
      expect(vmem.readWord(3)).toEqual(word(5, 6, 7, 8))
    })

    it('should zero-pad the trailing short chunk', () => {
      const vmem = VirtualMemory.fromBytes(word(1, 2, 3, 4, 5), 4)
      expect(vmem.len()).toBe(2)
      expect(vmem.readWord(1)).toEqual(word(5, 0, 0, 0))
    })

    it('should leave an all-zero trailing chunk unwritten', () => {
      const vmem = VirtualMemory.fromBytes(word(1, 2, 3, 4, 0, 0), 4)
      expect(vmem.len()).toBe(2)
      expect(vmem.entryCount()).toBe(1)
      expect(vmem.readWord(1)).toEqual(word(0, 0, 0, 0))
    })

    it('should build an empty memory from an empty buffer', () => {
      const vmem = VirtualMemory.fromBytes(new Uint8Array(0), 8)
      expect(vmem.len()).toBe(0)
      expect(vmem.width()).toBe(8)
    })

    it('should reject a zero width', () => {
      expect(() => VirtualMemory.fromBytes(word(1), 0)).toThrow(
        VirtualMemoryError,
      )
    })
  })

  describe('clone / equals', () => {
    it('should clone into independent storage', () => {
      const original = new VirtualMemory(4, 2)
      original.writeWord(word(1, 2), 1)

      const copy = original.clone()
      copy.writeWord(word(3, 4), 1)

      expect(original.readWord(1)).toEqual(word(1, 2))
      expect(copy.readWord(1)).toEqual(word(3, 4))
      expect(copy.len()).toBe(4)
      expect(copy.width()).toBe(2)
    })

    it('should clone only the words written within its own shape', () => {
      const original = new VirtualMemory(2, 4)
      original.writeWord(word(1, 2, 3, 4), 1)
      original.writeAt(word(5, 6, 7), 0)

      const copy = original.clone()

      expect([...copy.iterContent()]).toEqual([
        [0, word(5, 6, 7, 0)],
        [1, word(1, 2, 3, 4)],
      ])
      expect(copy.equals(original)).toBe(true)
    })

    it('should keep the backing word map out of the package exports', () => {
      expect(Object.keys(vmemPackage)).not.toContain('WordMap')
    })

    it('should treat written zero words as equal to unwritten ones', () => {
      const sparse = new VirtualMemory(4, 2)
      const dense = new VirtualMemory(4, 2)
      Array.from(dense.iterMut())

      expect(dense.entryCount()).toBe(4)
      expect(sparse.equals(dense)).toBe(true)
    })

    it('should compare shape and content', () => {
      const a = new VirtualMemory(4, 2)
      const b = new VirtualMemory(4, 2)
      a.writeWord(word(0, 1), 3)

      expect(a.equals(b)).toBe(false)
      expect(a.equals(new VirtualMemory(5, 2))).toBe(false)
      expect(b.equals(new VirtualMemory(4, 4))).toBe(false)

      b.writeWord(word(0, 1), 3)
      expect(a.equals(b)).toBe(true)
    })
  })
})
