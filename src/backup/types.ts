/**
 * Types for the backup store.
 */

import type { Logger } from '../types'
import type { RetentionPolicy } from './retention'

/**
 * Metadata stored next to each snapshot. Written last: a snapshot without
 * metadata was never committed.
 */
export interface BackupMetadata {
  /** Metadata layout version */
  formatVersion: number
  /** Unique id, derived from the UTC creation time */
  id: string
  /** Absolute path of the file that was copied */
  sourcePath: string
  /** ISO 8601 creation time */
  timestamp: string
  /** Creation time in Unix milliseconds */
  createdAt: number
  /** Free text shown to the user */
  description: string
  /** Short machine tag naming the feature that triggered the backup */
  operation: string
  /** Size of the stored copy in bytes */
  size: number
  /** CRC32 of the stored copy */
  crc32: number
  /** File name of the stored copy inside the backup directory */
  dataFile: string
}

/**
 * A committed backup.
 */
export interface Backup extends BackupMetadata {
  /** Absolute path of the stored copy */
  dataPath: string
}

export interface BackupManagerOptions {
  /**
   * Directory for snapshots. A string puts every source in one directory;
   * a function picks one per source. Default: "<save>.backups" beside the save.
   */
  backupDir?: string | ((sourcePath: string) => string)
  /** Which backups to delete after each new one (default: keep all) */
  retention?: RetentionPolicy
  /** Clock used for ids and timestamps (default: current time) */
  now?: () => Date
  /** Destination for warnings (default: console) */
  logger?: Logger
}
