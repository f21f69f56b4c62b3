import { slotDataOffsets, slotHeaderSize } from './constants'
import {
  applyFlagChanges,
  diffFlagChanges,
  getFlag,
  readFlags,
  setFlag
} from './flag-codec'
import type { SaveContainer } from './save-container'
import type { FlagBatchResult, FlagChange, FlagReading } from './types'

/**
 * View of one character slot inside a container.
 *
 * Holds offsets only. Every read and write goes to the container's buffer,
 * so an edit made through a slot is already part of the next serialize().
 */
export class CharacterSlot {
  constructor(
    private readonly container: SaveContainer,
    readonly index: number,
    /** Absolute offset of the slot entry (its digest) */
    readonly offset: number,
    /** Entry size, digest included */
    readonly size: number
  ) {}

  /** Absolute offset of the first byte after the digest */
  get dataOffset(): number {
    return this.offset + slotHeaderSize
  }

  get version(): number {
    const bytes = this.container.bytes
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    return view.getUint32(this.dataOffset + slotDataOffsets.version, true)
  }

  /**
   * A slot with no character has a zero version field.
   */
  isEmpty(): boolean {
    return this.version === 0
  }

  /** Offset of the flag blob relative to the slot data */
  get eventFlagsOffset(): number {
    return this.container.profile.eventFlags.offset
  }

  /**
   * The slot's flag blob, as a view into the container buffer.
   */
  eventFlags(): Uint8Array {
    const start = this.dataOffset + this.eventFlagsOffset
    return this.container.bytes.subarray(
      start,
      start + this.container.profile.eventFlags.length
    )
  }

  getFlag(flagId: number): boolean {
    return getFlag(this.eventFlags(), flagId, this.container.profile.bitOrder)
  }

  setFlag(flagId: number, value: boolean): void {
    setFlag(this.eventFlags(), flagId, value, this.container.profile.bitOrder)
  }

  readFlags(flagIds: Iterable<number>): FlagReading[] {
    return readFlags(this.eventFlags(), flagIds, this.container.profile.bitOrder)
  }

  applyFlagChanges(changes: Iterable<FlagChange>): FlagBatchResult {
    return applyFlagChanges(
      this.eventFlags(),
      changes,
      this.container.profile.bitOrder
    )
  }

  diffFlagChanges(desired: Iterable<FlagChange>): FlagChange[] {
    return diffFlagChanges(
      this.eventFlags(),
      desired,
      this.container.profile.bitOrder
    )
  }
}
