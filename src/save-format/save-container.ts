/**
 * Save Container - owns the file image and the slot table.
 *
 * The buffer is the single source of truth. Nothing is re-serialized field by
 * field, so regions the tool does not model survive byte for byte.
 */

import { readFile } from 'node:fs/promises'
import { writeFileAtomic } from './atomic-write'
import { CharacterSlot } from './character-slot'
import { recalculateChecksums, validateChecksums } from './checksum'
import {
  containerHeaderOffsets,
  containerHeaderSize,
  containerMagic,
  digestSize,
  entryHeaderLayout,
  entryHeaderSize,
  slotCount,
  slotHeaderSize
} from './constants'
import { defaultProfile } from './profile'
import type {
  ContainerEntry,
  FlagBatchResult,
  FlagChange,
  SaveProfile,
  ValidationResult
} from './types'

export class SaveContainer {
  readonly bytes: Uint8Array
  readonly profile: SaveProfile
  private readonly entries: readonly ContainerEntry[]
  private readonly entryCount: number

  private constructor(
    bytes: Uint8Array,
    profile: SaveProfile,
    entries: readonly ContainerEntry[],
    entryCount: number
  ) {
    this.bytes = bytes
    this.profile = profile
    this.entries = entries
    this.entryCount = entryCount
  }

  /**
   * Parse a file image. The bytes are copied; the container owns its buffer.
   * @throws FormatError if the image is too short, lacks the BND4 marker or
   * its slot table does not fit the buffer
   */
  static load(
    data: Uint8Array,
    profile: SaveProfile = defaultProfile
  ): SaveContainer {
    const minimumSize = containerHeaderSize + slotCount * entryHeaderSize
    if (data.length < minimumSize) {
      throw new FormatError(
        `File is too short: ${data.length} bytes, need at least ${minimumSize}`
      )
    }

    for (let i = 0; i < containerMagic.length; i++) {
      if (data[containerHeaderOffsets.magic + i] !== containerMagic[i]) {
        throw new FormatError('Missing BND4 marker')
      }
    }

    const bytes = new Uint8Array(data)
    const view = new DataView(bytes.buffer)

    const entryCount = view.getUint32(containerHeaderOffsets.entryCount, true)
    if (entryCount < slotCount) {
      throw new FormatError(
        `Expected at least ${slotCount} entries, found ${entryCount}`
      )
    }

    const tableEnd = containerHeaderSize + entryCount * entryHeaderSize
    if (bytes.length < tableEnd) {
      throw new FormatError(
        `Entry table ends at ${tableEnd}, past the end of the file (${bytes.length})`
      )
    }

    // Entries past the protected ones are kept as opaque bytes
    const entries: ContainerEntry[] = []
    const parsedCount = Math.min(entryCount, profile.protectedEntryCount)
    for (let index = 0; index < parsedCount; index++) {
      const headerOffset = containerHeaderSize + index * entryHeaderSize
      const size = Number(
        view.getBigUint64(headerOffset + entryHeaderLayout.size, true)
      )
      const offset = view.getUint32(
        headerOffset + entryHeaderLayout.dataOffset,
        true
      )

      if (size < digestSize || offset + size > bytes.length) {
        throw new FormatError(
          `Entry ${index} (offset ${offset}, size ${size}) does not fit in the file`
        )
      }

      entries.push({ index, offset, size })
    }

    const flagsEnd =
      slotHeaderSize + profile.eventFlags.offset + profile.eventFlags.length
    for (const entry of entries.slice(0, slotCount)) {
      if (flagsEnd > entry.size) {
        throw new FormatError(
          `Slot ${entry.index} is ${entry.size} bytes, too small for the event flag blob ending at ${flagsEnd}`
        )
      }
    }

    return new SaveContainer(bytes, profile, entries, entryCount)
  }

  /**
   * Read and parse a save file.
   */
  static async fromFile(
    filePath: string,
    profile: SaveProfile = defaultProfile
  ): Promise<SaveContainer> {
    const data = await readFile(filePath)
    return SaveContainer.load(data, profile)
  }

  get slotCount(): number {
    return slotCount
  }

  /**
   * Number of entries declared by the container header.
   */
  getEntryCount(): number {
    return this.entryCount
  }

  /**
   * Absolute offsets of the ten slots, fixed at load time.
   */
  getSlotOffsets(): number[] {
    return this.entries.slice(0, slotCount).map((entry) => entry.offset)
  }

  /**
   * Entries whose digest the checksum engine maintains.
   */
  protectedRegions(): ContainerEntry[] {
    return [...this.entries]
  }

  /**
   * @throws IndexError if index is outside [0, 10)
   */
  slot(index: number): CharacterSlot {
    if (!Number.isInteger(index) || index < 0 || index >= slotCount) {
      throw new IndexError(index, slotCount)
    }
    const entry = this.entries[index]
    return new CharacterSlot(this, index, entry.offset, entry.size)
  }

  slots(): CharacterSlot[] {
    return this.entries
      .slice(0, slotCount)
      .map(
        (entry) =>
          new CharacterSlot(this, entry.index, entry.offset, entry.size)
      )
  }

  /**
   * View of a byte range inside a slot, relative to the slot's start.
   */
  readSlotRegion(
    index: number,
    relativeOffset: number,
    length: number
  ): Uint8Array {
    const start = this.checkSlotRange(index, relativeOffset, length)
    return this.bytes.subarray(start, start + length)
  }

  /**
   * Replace exactly data.length bytes at slotOffsets[index] + relativeOffset.
   * @throws BoundsError if the range leaves the slot or the file
   */
  writeSlotRegion(
    index: number,
    relativeOffset: number,
    data: Uint8Array
  ): void {
    const start = this.checkSlotRange(index, relativeOffset, data.length)
    this.bytes.set(data, start)
  }

  getFlag(slotIndex: number, flagId: number): boolean {
    return this.slot(slotIndex).getFlag(flagId)
  }

  setFlag(slotIndex: number, flagId: number, value: boolean): void {
    this.slot(slotIndex).setFlag(flagId, value)
  }

  applyFlagChanges(
    slotIndex: number,
    changes: Iterable<FlagChange>
  ): FlagBatchResult {
    return this.slot(slotIndex).applyFlagChanges(changes)
  }

  /**
   * Rewrite every protected digest. Call after editing, before serialize().
   * @returns The number of regions written
   */
  recalculateChecksums(): number {
    return recalculateChecksums(this)
  }

  validate(): ValidationResult {
    return validateChecksums(this)
  }

  /**
   * The file image as it stands. Digests are not refreshed here.
   */
  serialize(): Uint8Array {
    return this.bytes
  }

  /**
   * An independent container over a copy of the buffer.
   */
  clone(): SaveContainer {
    return new SaveContainer(
      new Uint8Array(this.bytes),
      this.profile,
      this.entries,
      this.entryCount
    )
  }

  /**
   * Write the image to disk with an atomic replace.
   * @throws WriteError if the file could not be written
   */
  async saveTo(filePath: string): Promise<void> {
    try {
      await writeFileAtomic(filePath, this.serialize())
    } catch (error) {
      throw new WriteError(filePath, error)
    }
  }

  private checkSlotRange(
    index: number,
    relativeOffset: number,
    length: number
  ): number {
    const slot = this.slot(index)
    if (
      !Number.isInteger(relativeOffset) ||
      !Number.isInteger(length) ||
      relativeOffset < 0 ||
      length < 0 ||
      relativeOffset + length > slot.size
    ) {
      throw new BoundsError(index, relativeOffset, length, slot.size)
    }

    const start = slot.offset + relativeOffset
    if (start + length > this.bytes.length) {
      throw new BoundsError(index, relativeOffset, length, slot.size)
    }
    return start
  }
}

/**
 * Error thrown when bytes are not a loadable save container.
 */
export class FormatError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FormatError'
  }
}

/**
 * Error thrown when a slot index is outside the slot table.
 */
export class IndexError extends Error {
  constructor(
    public readonly index: number,
    public readonly count: number
  ) {
    super(`Slot index ${index} is outside [0, ${count})`)
    this.name = 'IndexError'
  }
}

/**
 * Error thrown when a byte range does not fit inside its slot.
 */
export class BoundsError extends Error {
  constructor(
    public readonly slotIndex: number,
    public readonly relativeOffset: number,
    public readonly length: number,
    public readonly slotSize: number
  ) {
    super(
      `Range ${relativeOffset}+${length} is outside slot ${slotIndex} (${slotSize} bytes)`
    )
    this.name = 'BoundsError'
  }
}

/**
 * Error thrown when a save file could not be written.
 */
export class WriteError extends Error {
  constructor(
    public readonly filePath: string,
    cause: unknown
  ) {
    super(
      `Failed to write ${filePath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    )
    this.name = 'WriteError'
  }
}
