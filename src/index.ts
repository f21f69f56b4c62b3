export { SaveEditor, EmptySlotError } from './editor'
export type { MutationResult, RestoreResult } from './editor'
export { FlagCatalog } from './flag-catalog'
export type { FlagCatalogEntry, FlagSearchResult } from './flag-catalog'
export { parseFlagIds } from './flag-ids'
export {
  SaveContainer,
  CharacterSlot,
  FormatError,
  IndexError,
  BoundsError,
  WriteError,
  OutOfRangeError,
  address,
  getFlag,
  setFlag,
  applyFlagChanges,
  readFlags,
  diffFlagChanges,
  recalculateChecksums,
  validateChecksums,
  defaultProfile,
  resolveProfile,
  loadProfile
} from './save-format'
export type {
  BitOrder,
  SaveProfile,
  FlagChange,
  FlagBatchResult,
  FlagReading,
  RegionCheck,
  ChecksumMismatch,
  ValidationResult
} from './save-format'
export {
  BackupManager,
  BackupError,
  BackupCorruptedError,
  keepAll,
  keepLatest,
  keepWithin
} from './backup'
export type {
  Backup,
  BackupManagerOptions,
  RetentionPolicy
} from './backup'
export type {
  Logger,
  SaveEditorOptions,
  MutationInfo,
  FlagEditResult
} from './types'
