/**
 * Save format module - BND4 container, slot views, flag codec and digests.
 */

// Main classes
export {
  SaveContainer,
  FormatError,
  IndexError,
  BoundsError,
  WriteError
} from './save-container'
export { CharacterSlot } from './character-slot'

// Types
export type {
  BitOrder,
  RegionKind,
  SaveProfile,
  FlagAddress,
  FlagChange,
  FlagFailure,
  FlagBatchResult,
  FlagReading,
  ContainerEntry,
  RegionCheck,
  ChecksumMismatch,
  ValidationResult
} from './types'
export type { ChecksumSource } from './checksum'

// Constants
export {
  containerMagic,
  containerHeaderSize,
  containerHeaderOffsets,
  entryHeaderSize,
  entryHeaderLayout,
  slotCount,
  digestSize,
  slotHeaderSize,
  slotDataOffsets,
  regionKind
} from './constants'

// Flag codec
export {
  address,
  getFlag,
  setFlag,
  applyFlagChanges,
  readFlags,
  diffFlagChanges,
  OutOfRangeError
} from './flag-codec'

// Checksums
export {
  computeDigest,
  recalculateChecksums,
  validateChecksums
} from './checksum'

// Profiles
export { defaultProfile, resolveProfile, loadProfile } from './profile'

export { writeFileAtomic } from './atomic-write'
