import { createHash } from 'node:crypto'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { vi } from 'vitest'
import type { Mock } from 'vitest'
import { resolveProfile } from '../profile'
import type { Logger } from '../../types'

/**
 * Small layout used by the tests: ten slots of 0x2810 bytes (digest
 * included), a profile summary entry and one unprotected trailing entry.
 */
export const slotDataSize = 0x2800
export const slotEntrySize = slotDataSize + 16
export const profileDataSize = 0x100
export const trailingEntrySize = 0x40
export const firstEntryOffset = 0x300
export const testEntryCount = 12

export const testProfile = resolveProfile({
  name: 'test',
  eventFlags: { offset: 0x20, length: 0x2400 }
})

export function slotOffset(index: number): number {
  return firstEntryOffset + index * slotEntrySize
}

export const profileEntryOffset = slotOffset(10)
export const trailingEntryOffset = profileEntryOffset + 16 + profileDataSize
export const testFileSize = trailingEntryOffset + trailingEntrySize

/**
 * Absolute offset of a slot's flag blob.
 */
export function eventFlagsStart(index: number): number {
  return slotOffset(index) + 16 + testProfile.eventFlags.offset
}

export interface BuildSaveOptions {
  /** Slots holding a character (default: [0]) */
  occupied?: number[]
  /** Seed for the filler bytes (default: 1) */
  seed?: number
  /** Entry count written to the header (default: 12) */
  entryCount?: number
}

/**
 * Build a valid save image: correct header, pseudo-random contents and
 * matching digests.
 */
export function buildSaveFile(options: BuildSaveOptions = {}): Uint8Array {
  const occupied = options.occupied ?? [0]
  const entryCount = options.entryCount ?? testEntryCount
  const bytes = new Uint8Array(testFileSize)
  const view = new DataView(bytes.buffer)

  // Deterministic filler so that regions the editor ignores are not zero
  let state = options.seed ?? 1
  for (let i = firstEntryOffset; i < bytes.length; i++) {
    state = (state * 1103515245 + 12345) >>> 0
    bytes[i] = state >>> 24
  }

  bytes.set([0x42, 0x4e, 0x44, 0x34], 0)
  view.setUint32(0x0c, entryCount, true)
  view.setBigUint64(0x10, 0x40n, true)
  bytes.set(new TextEncoder().encode('00000001'), 0x18)
  view.setBigUint64(0x20, 0x20n, true)
  view.setBigUint64(0x28, BigInt(0x40 + entryCount * 0x20), true)

  const sizes = [
    ...Array.from({ length: 10 }, () => slotEntrySize),
    16 + profileDataSize,
    trailingEntrySize
  ]
  let offset = firstEntryOffset
  for (let index = 0; index < Math.min(entryCount, sizes.length); index++) {
    const header = 0x40 + index * 0x20
    view.setUint8(header, 0x50)
    view.setInt32(header + 4, -1, true)
    view.setBigUint64(header + 8, BigInt(sizes[index]), true)
    view.setBigUint64(header + 16, BigInt(sizes[index]), true)
    view.setUint32(header + 24, offset, true)
    view.setUint32(header + 28, 0, true)
    offset += sizes[index]
  }

  for (let index = 0; index < 10; index++) {
    const version = occupied.includes(index) ? 0x100 + index : 0
    view.setUint32(slotOffset(index) + 16, version, true)
  }

  writeDigest(bytes, profileEntryOffset, 16 + profileDataSize)
  for (let index = 0; index < 10; index++) {
    writeDigest(bytes, slotOffset(index), slotEntrySize)
  }

  return bytes
}

function writeDigest(bytes: Uint8Array, offset: number, size: number): void {
  const digest = createHash('md5')
    .update(bytes.subarray(offset + 16, offset + size))
    .digest()
  bytes.set(digest, offset)
}

/**
 * Clear one flag bit (lowest-bit-first numbering) and refresh the digest of
 * the slot that holds it.
 */
export function clearFlagBit(
  bytes: Uint8Array,
  slotIndex: number,
  flagId: number
): void {
  const byte = eventFlagsStart(slotIndex) + Math.floor(flagId / 8)
  bytes[byte] &= ~(1 << flagId % 8) & 0xff
  writeDigest(bytes, slotOffset(slotIndex), slotEntrySize)
}

/**
 * Create a unique scratch directory.
 */
export async function createTestDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `slotsmith-${prefix}-`))
}

/**
 * Clean up scratch directories.
 */
export async function cleanup(dirs: string[]): Promise<void> {
  for (const dir of dirs) {
    await rm(dir, { recursive: true, force: true })
  }
}

/**
 * Flip a single byte in a byte array at the specified index.
 */
export function flipByte(data: Uint8Array, index: number): void {
  if (index >= 0 && index < data.length) {
    data[index] = data[index] ^ 0xff
  }
}

export interface TestLogger extends Logger {
  log: Mock
  warn: Mock
}

/**
 * Logger that records calls instead of printing.
 */
export function createTestLogger(): TestLogger {
  return { log: vi.fn(), warn: vi.fn() }
}

/**
 * Byte indexes where two buffers of equal length differ.
 */
export function differingOffsets(a: Uint8Array, b: Uint8Array): number[] {
  const offsets: number[] = []
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      offsets.push(i)
    }
  }
  return offsets
}
