/**
 * Checksum engine.
 *
 * Each protected entry is laid out as [digest:16][data:size-16]. The digest
 * covers the data only and must match for the game to accept the file.
 */

import { createHash } from 'node:crypto'
import { digestSize, regionKind, slotCount } from './constants'
import type {
  ChecksumMismatch,
  ContainerEntry,
  RegionCheck,
  SaveProfile,
  ValidationResult
} from './types'

/**
 * What the engine needs from a container: its buffer and the regions to
 * cover.
 */
export interface ChecksumSource {
  readonly bytes: Uint8Array
  readonly profile: SaveProfile
  protectedRegions(): ContainerEntry[]
}

export function computeDigest(data: Uint8Array, algorithm: string): Buffer {
  return createHash(algorithm).update(data).digest()
}

function regionData(bytes: Uint8Array, region: ContainerEntry): Uint8Array {
  return bytes.subarray(region.offset + digestSize, region.offset + region.size)
}

function toHex(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString(
    'hex'
  )
}

/**
 * Recompute every protected digest and write it into its header.
 * Running it twice without edits in between yields identical bytes.
 * @returns The number of regions written
 */
export function recalculateChecksums(source: ChecksumSource): number {
  const regions = source.protectedRegions()
  for (const region of regions) {
    const digest = computeDigest(
      regionData(source.bytes, region),
      source.profile.digestAlgorithm
    )
    source.bytes.set(digest, region.offset)
  }
  return regions.length
}

/**
 * Compare every stored digest against the current contents without writing.
 */
export function validateChecksums(source: ChecksumSource): ValidationResult {
  const regions: RegionCheck[] = []
  const mismatches: ChecksumMismatch[] = []

  for (const region of source.protectedRegions()) {
    const data = regionData(source.bytes, region)
    const stored = toHex(
      source.bytes.subarray(region.offset, region.offset + digestSize)
    )
    const computed = computeDigest(data, source.profile.digestAlgorithm)
      .toString('hex')

    const base = {
      index: region.index,
      kind: region.index < slotCount ? regionKind.slot : regionKind.profile,
      offset: region.offset,
      length: data.length,
      stored,
      computed
    }

    if (stored === computed) {
      regions.push({ ...base, matches: true })
    } else {
      const mismatch: ChecksumMismatch = { ...base, matches: false }
      regions.push(mismatch)
      mismatches.push(mismatch)
    }
  }

  return { valid: mismatches.length === 0, regions, mismatches }
}
