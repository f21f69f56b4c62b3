import { readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { describe, it, expect, afterEach } from 'vitest'

import { CharacterSlot } from './character-slot'
import { resolveProfile } from './profile'
import {
  BoundsError,
  FormatError,
  IndexError,
  SaveContainer,
  WriteError
} from './save-container'
import {
  buildSaveFile,
  cleanup,
  createTestDir,
  differingOffsets,
  eventFlagsStart,
  slotOffset,
  testProfile
} from './integration/helpers'

describe('SaveContainer', () => {
  const dirs: string[] = []

  afterEach(async () => {
    await cleanup(dirs)
    dirs.length = 0
  })

  describe('load', () => {
    it('should read the slot table', () => {
      const container = SaveContainer.load(buildSaveFile(), testProfile)

      expect(container.getEntryCount()).toBe(12)
      expect(container.slotCount).toBe(10)
      expect(container.getSlotOffsets()).toEqual(
        Array.from({ length: 10 }, (_, index) => slotOffset(index))
      )
      expect(container.protectedRegions()).toHaveLength(11)
    })

    it('should copy its input', () => {
      const data = buildSaveFile()
      const container = SaveContainer.load(data, testProfile)

      data[slotOffset(0) + 100] ^= 0xff

      expect(container.bytes[slotOffset(0) + 100]).toBe(
        data[slotOffset(0) + 100] ^ 0xff
      )
    })

    it('should reject a file shorter than the slot table', () => {
      expect(() => SaveContainer.load(new Uint8Array(100))).toThrow(
        'File is too short: 100 bytes, need at least 704'
      )
    })

    it('should reject a file without the BND4 marker', () => {
      const data = buildSaveFile()
      data[0] = 0x41

      expect(() => SaveContainer.load(data, testProfile)).toThrow(FormatError)
      expect(() => SaveContainer.load(data, testProfile)).toThrow(
        'Missing BND4 marker'
      )
    })

    it('should reject a header with fewer than ten entries', () => {
      const data = buildSaveFile()
      new DataView(data.buffer).setUint32(0x0c, 9, true)

      expect(() => SaveContainer.load(data, testProfile)).toThrow(
        'Expected at least 10 entries, found 9'
      )
    })

    it('should reject an entry that runs past the end of the file', () => {
      const data = buildSaveFile()
      const sizeField = 0x40 + 2 * 0x20 + 8
      new DataView(data.buffer).setBigUint64(sizeField, 0x100000n, true)

      expect(() => SaveContainer.load(data, testProfile)).toThrow(FormatError)
    })

    it('should reject slots too small for the flag blob', () => {
      const profile = resolveProfile({
        eventFlags: { offset: 0x20, length: 0x2800 }
      })

      expect(() => SaveContainer.load(buildSaveFile(), profile)).toThrow(
        'too small for the event flag blob'
      )
    })
  })

  describe('slots', () => {
    it('should expose the ten slots', () => {
      const container = SaveContainer.load(
        buildSaveFile({ occupied: [0, 4] }),
        testProfile
      )

      const slots = container.slots()

      expect(slots).toHaveLength(10)
      expect(slots[0]).toBeInstanceOf(CharacterSlot)
      expect(slots.map((slot) => slot.isEmpty())).toEqual([
        false,
        true,
        true,
        true,
        false,
        true,
        true,
        true,
        true,
        true
      ])
      expect(slots[4].version).toBe(0x104)
      expect(slots[4].offset).toBe(slotOffset(4))
    })

    it('should reject slot indexes outside [0, 10)', () => {
      const container = SaveContainer.load(buildSaveFile(), testProfile)

      expect(() => container.slot(10)).toThrow(IndexError)
      expect(() => container.slot(10)).toThrow(
        'Slot index 10 is outside [0, 10)'
      )
      expect(() => container.slot(-1)).toThrow(IndexError)
    })

    it('should view the flag blob inside the container buffer', () => {
      const container = SaveContainer.load(buildSaveFile(), testProfile)
      const slot = container.slot(0)

      const flags = slot.eventFlags()

      expect(flags.length).toBe(0x2400)
      expect(flags.buffer).toBe(container.bytes.buffer)
      expect(flags.byteOffset).toBe(eventFlagsStart(0))
    })
  })

  describe('slot regions', () => {
    it('should read relative to the slot start', () => {
      const data = buildSaveFile()
      const container = SaveContainer.load(data, testProfile)

      expect(container.readSlotRegion(1, 16, 4)).toEqual(
        data.subarray(slotOffset(1) + 16, slotOffset(1) + 20)
      )
    })

    it('should replace exactly the given bytes', () => {
      const data = buildSaveFile()
      const container = SaveContainer.load(data, testProfile)

      container.writeSlotRegion(2, 0x40, new Uint8Array([1, 2, 3]))

      const changed = differingOffsets(data, container.serialize())
      const start = slotOffset(2) + 0x40
      expect(changed.every((o) => o >= start && o < start + 3)).toBe(true)
      expect([...container.bytes.subarray(start, start + 3)]).toEqual([1, 2, 3])
    })

    it('should reject ranges that leave the slot', () => {
      const data = buildSaveFile()
      const container = SaveContainer.load(data, testProfile)

      expect(() =>
        container.writeSlotRegion(0, 10254, new Uint8Array(4))
      ).toThrow('Range 10254+4 is outside slot 0 (10256 bytes)')
      expect(() => container.readSlotRegion(0, -1, 2)).toThrow(BoundsError)
      expect(container.serialize()).toEqual(data)
    })
  })

  describe('flags', () => {
    it('should edit the slot bytes in place', () => {
      const data = buildSaveFile()
      const container = SaveContainer.load(data, testProfile)
      const before = container.getFlag(0, 71190)

      container.setFlag(0, 71190, !before)

      expect(container.getFlag(0, 71190)).toBe(!before)
      expect(differingOffsets(data, container.serialize())).toEqual([
        eventFlagsStart(0) + 8898
      ])
    })

    it('should keep slots independent', () => {
      const container = SaveContainer.load(buildSaveFile(), testProfile)
      const other = container.getFlag(1, 500)

      container.setFlag(0, 500, !container.getFlag(0, 500))

      expect(container.getFlag(1, 500)).toBe(other)
    })
  })

  describe('clone', () => {
    it('should not share the buffer', () => {
      const container = SaveContainer.load(buildSaveFile(), testProfile)
      const copy = container.clone()

      copy.setFlag(0, 8, !copy.getFlag(0, 8))

      expect(copy.getFlag(0, 8)).not.toBe(container.getFlag(0, 8))
      expect(copy.getSlotOffsets()).toEqual(container.getSlotOffsets())
    })
  })

  describe('saveTo and fromFile', () => {
    it('should write the image byte for byte', async () => {
      const dir = await createTestDir('container')
      dirs.push(dir)
      const filePath = join(dir, 'save.sl2')
      const data = buildSaveFile({ occupied: [0, 1] })

      await SaveContainer.load(data, testProfile).saveTo(filePath)
      const reloaded = await SaveContainer.fromFile(filePath, testProfile)

      expect(new Uint8Array(await readFile(filePath))).toEqual(data)
      expect(reloaded.slot(1).isEmpty()).toBe(false)
    })

    it('should raise WriteError when the target cannot be written', async () => {
      const dir = await createTestDir('container-fail')
      dirs.push(dir)
      const blocker = join(dir, 'blocker')
      await writeFile(blocker, 'not a directory')
      const container = SaveContainer.load(buildSaveFile(), testProfile)

      await expect(
        container.saveTo(join(blocker, 'save.sl2'))
      ).rejects.toBeInstanceOf(WriteError)
    })
  })
})
