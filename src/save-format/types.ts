/**
 * Types for the save container, flag codec and checksum engine.
 */

import type { regionKind } from './constants'

/**
 * Bit numbering inside a flag byte.
 * 'lsb': the lowest flag ID of a byte lives in bit 0.
 * 'msb': the lowest flag ID of a byte lives in bit 7.
 */
export type BitOrder = 'lsb' | 'msb'

export type RegionKind = (typeof regionKind)[keyof typeof regionKind]

/**
 * Format constants that vary between releases of the save format.
 */
export interface SaveProfile {
  /** Profile name, shown by the CLI */
  name: string
  /** node:crypto hash algorithm used for region digests */
  digestAlgorithm: string
  /** Number of leading entries whose digest is maintained (slots + profile summary) */
  protectedEntryCount: number
  /** Position of the event flag blob, relative to the slot data */
  eventFlags: {
    offset: number
    length: number
  }
  /** Bit numbering used by the flag codec */
  bitOrder: BitOrder
}

/**
 * Position of a flag inside its blob.
 */
export interface FlagAddress {
  byteOffset: number
  bitIndex: number
  mask: number
}

export interface FlagChange {
  flagId: number
  value: boolean
}

export interface FlagFailure {
  flagId: number
  error: Error
}

/**
 * Aggregate result of applying many flag changes in one pass.
 */
export interface FlagBatchResult {
  /** Number of changes written */
  applied: number
  /** Changes rejected, in input order */
  failed: FlagFailure[]
}

export type FlagReading =
  | { flagId: number; value: boolean }
  | { flagId: number; error: Error }

/**
 * An entry from the container's entry table.
 */
export interface ContainerEntry {
  index: number
  /** Absolute offset of the entry (its digest) */
  offset: number
  /** Entry size, digest included */
  size: number
}

/**
 * Digest check for one protected region.
 */
export interface RegionCheck {
  index: number
  kind: RegionKind
  /** Absolute offset of the stored digest */
  offset: number
  /** Length of the digested data */
  length: number
  stored: string
  computed: string
  matches: boolean
}

/**
 * A protected region whose stored digest does not match its contents.
 */
export type ChecksumMismatch = RegionCheck & { matches: false }

export interface ValidationResult {
  valid: boolean
  regions: RegionCheck[]
  mismatches: ChecksumMismatch[]
}
