/**
 * Event flag codec.
 *
 * A flag blob is a packed bitset: flag N lives in byte floor(N / 8), bit
 * N mod 8. All functions work in place on the caller's buffer.
 */

import type {
  BitOrder,
  FlagAddress,
  FlagBatchResult,
  FlagChange,
  FlagFailure,
  FlagReading
} from './types'

/**
 * Map a flag ID to its byte and bit.
 */
export function address(
  flagId: number,
  bitOrder: BitOrder = 'lsb'
): FlagAddress {
  const byteOffset = Math.floor(flagId / 8)
  const bitIndex = flagId % 8
  const mask = bitOrder === 'lsb' ? 1 << bitIndex : 0x80 >> bitIndex
  return { byteOffset, bitIndex, mask }
}

function checkedAddress(
  blob: Uint8Array,
  flagId: number,
  bitOrder: BitOrder
): FlagAddress {
  if (!Number.isSafeInteger(flagId) || flagId < 0) {
    throw new OutOfRangeError(flagId, blob.length)
  }

  const location = address(flagId, bitOrder)
  if (location.byteOffset >= blob.length) {
    throw new OutOfRangeError(flagId, blob.length)
  }
  return location
}

export function getFlag(
  blob: Uint8Array,
  flagId: number,
  bitOrder: BitOrder = 'lsb'
): boolean {
  const { byteOffset, mask } = checkedAddress(blob, flagId, bitOrder)
  return (blob[byteOffset] & mask) !== 0
}

/**
 * Set or clear a single flag. The other bits of the byte are preserved.
 */
export function setFlag(
  blob: Uint8Array,
  flagId: number,
  value: boolean,
  bitOrder: BitOrder = 'lsb'
): void {
  const { byteOffset, mask } = checkedAddress(blob, flagId, bitOrder)
  if (value) {
    blob[byteOffset] |= mask
  } else {
    blob[byteOffset] &= ~mask & 0xff
  }
}

/**
 * Apply many changes in a single pass over the list.
 * An out-of-range flag is recorded and skipped; the rest still apply.
 */
export function applyFlagChanges(
  blob: Uint8Array,
  changes: Iterable<FlagChange>,
  bitOrder: BitOrder = 'lsb'
): FlagBatchResult {
  let applied = 0
  const failed: FlagFailure[] = []

  for (const { flagId, value } of changes) {
    try {
      setFlag(blob, flagId, value, bitOrder)
      applied++
    } catch (error) {
      if (!(error instanceof OutOfRangeError)) {
        throw error
      }
      failed.push({ flagId, error })
    }
  }

  return { applied, failed }
}

/**
 * Read several flags, reporting per-flag errors instead of throwing.
 */
export function readFlags(
  blob: Uint8Array,
  flagIds: Iterable<number>,
  bitOrder: BitOrder = 'lsb'
): FlagReading[] {
  const readings: FlagReading[] = []
  for (const flagId of flagIds) {
    try {
      readings.push({ flagId, value: getFlag(blob, flagId, bitOrder) })
    } catch (error) {
      if (!(error instanceof OutOfRangeError)) {
        throw error
      }
      readings.push({ flagId, error })
    }
  }
  return readings
}

/**
 * Reduce a desired state to the changes that actually flip a bit.
 * Out-of-range IDs are left out.
 */
export function diffFlagChanges(
  blob: Uint8Array,
  desired: Iterable<FlagChange>,
  bitOrder: BitOrder = 'lsb'
): FlagChange[] {
  const changes: FlagChange[] = []
  for (const { flagId, value } of desired) {
    try {
      if (getFlag(blob, flagId, bitOrder) !== value) {
        changes.push({ flagId, value })
      }
    } catch (error) {
      if (!(error instanceof OutOfRangeError)) {
        throw error
      }
    }
  }
  return changes
}

/**
 * Error thrown when a flag ID falls outside its blob.
 */
export class OutOfRangeError extends Error {
  constructor(
    public readonly flagId: number,
    public readonly blobLength: number
  ) {
    super(
      `Flag ${flagId} is outside the event flag blob (${blobLength} bytes, max flag ${blobLength * 8 - 1})`
    )
    this.name = 'OutOfRangeError'
  }
}
