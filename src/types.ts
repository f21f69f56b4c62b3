import type { RetentionPolicy } from './backup'
import type { SaveProfile } from './save-format'

/**
 * Where library classes send their messages.
 */
export type Logger = Pick<Console, 'log' | 'warn'>

export interface SaveEditorOptions {
  /** Path of the save file to edit */
  savePath: string
  /** Format constants (default: defaultProfile) */
  profile?: SaveProfile
  /** Backup directory (default: "<save>.backups" beside the save file) */
  backupDir?: string
  /** Retention policy applied after each backup (default: keep all) */
  retention?: RetentionPolicy
  /** Destination for warnings and progress (default: console) */
  logger?: Logger
}

/**
 * Describes the mutation a backup is taken for.
 */
export interface MutationInfo {
  description: string
  operation: string
}

export interface FlagEditResult {
  /** Number of distinct flags requested */
  requested: number
  /** Number of flags written */
  applied: number
  /** Flags rejected by the codec */
  failed: Array<{ flagId: number; error: Error }>
  /** Id of the backup taken before the edit, null when nothing changed */
  backupId: string | null
}

export interface PackageJson {
  name: string
  version: string
  description: string
}
