/**
 * Backup module - durable snapshots taken before every mutation.
 */

export {
  BackupManager,
  BackupError,
  BackupCorruptedError
} from './backup-manager'
export { keepAll, keepLatest, keepWithin } from './retention'
export type { RetentionPolicy } from './retention'
export type { Backup, BackupMetadata, BackupManagerOptions } from './types'
export {
  crc32,
  formatBackupId,
  backupSequence,
  serializeMetadata,
  deserializeMetadata,
  fileExtensions,
  metadataVersion
} from './backup-format'
