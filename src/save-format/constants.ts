/**
 * Constants for the BND4 save container.
 *
 * These define the fixed binary layout: a 64-byte file header followed by
 * an entry table, where each entry points at a digest-prefixed region.
 */

// File header magic (ASCII "BND4")
export const containerMagic = new Uint8Array([0x42, 0x4e, 0x44, 0x34])

// Fixed sizes
export const containerHeaderSize = 0x40
export const entryHeaderSize = 0x20
export const slotCount = 10
export const digestSize = 16

// Every region starts with its digest, data follows
export const slotHeaderSize = digestSize

// Header field offsets
export const containerHeaderOffsets = {
  magic: 0, // 4 bytes
  entryCount: 0x0c, // 4 bytes
  headerSize: 0x10, // 8 bytes
  version: 0x18, // 8 bytes (ASCII)
  entryHeaderSize: 0x20, // 8 bytes
  entryHeadersEnd: 0x28 // 8 bytes
} as const

// Entry header layout (32 bytes)
export const entryHeaderLayout = {
  flags: 0, // 1 byte + 3 padding
  marker: 4, // 4 bytes, always -1
  size: 8, // 8 bytes, digest included
  uncompressedSize: 16, // 8 bytes
  dataOffset: 24, // 4 bytes, absolute
  nameOffset: 28 // 4 bytes
} as const

// Slot data field offsets, relative to the first byte after the digest
export const slotDataOffsets = {
  version: 0 // 4 bytes, 0 when no character exists
} as const

export const regionKind = {
  slot: 'slot',
  profile: 'profile'
} as const
