import invariant from 'tiny-invariant'

import { BackupManager } from './backup'
import type { Backup } from './backup'
import type { FlagCatalog } from './flag-catalog'
import { SaveContainer, defaultProfile } from './save-format'
import type { CharacterSlot, FlagChange, SaveProfile } from './save-format'
import type {
  FlagEditResult,
  Logger,
  MutationInfo,
  SaveEditorOptions
} from './types'

export interface MutationResult<T> {
  result: T
  backup: Backup
}

export interface RestoreResult {
  /** The backup whose bytes were written */
  restored: Backup
  /** Snapshot of the file as it was before the restore */
  safetyBackup: Backup
}

/**
 * Edits one save file on disk.
 *
 * Every change goes through mutate(), which orders the steps:
 * backup → edit a working copy → recalculate digests → atomic write.
 * A failed backup stops the sequence before anything is written.
 */
export class SaveEditor {
  private readonly savePath: string
  private readonly profile: SaveProfile
  private readonly backups: BackupManager
  private readonly logger: Logger
  private current: SaveContainer | null = null

  constructor(options: SaveEditorOptions) {
    invariant(options.savePath, 'Save path must be provided.')

    this.savePath = options.savePath
    this.profile = options.profile ?? defaultProfile
    this.logger = options.logger ?? console
    this.backups = new BackupManager({
      backupDir: options.backupDir,
      retention: options.retention,
      logger: this.logger
    })
  }

  /**
   * Loads the save file. Digest mismatches are reported, not fatal.
   */
  async open(): Promise<SaveContainer> {
    const container = await SaveContainer.fromFile(this.savePath, this.profile)

    for (const mismatch of container.validate().mismatches) {
      const region =
        mismatch.kind === 'slot' ? `slot ${mismatch.index + 1}` : 'profile data'
      this.logger.warn(
        `Checksum mismatch in ${region}: stored ${mismatch.stored}, computed ${mismatch.computed}`
      )
    }

    this.current = container
    return container
  }

  get container(): SaveContainer {
    invariant(this.current, 'Save file not opened. Call open() first.')
    return this.current
  }

  /**
   * Run an edit with backup-before-write discipline.
   * The edit runs on a copy; the copy replaces the current container only
   * after it has been written.
   */
  async mutate<T>(
    info: MutationInfo,
    edit: (container: SaveContainer) => T
  ): Promise<MutationResult<T>> {
    const container = this.container

    const backup = await this.backups.createBackup(
      this.savePath,
      info.description,
      info.operation
    )

    const working = container.clone()
    const result = edit(working)
    working.recalculateChecksums()
    await working.saveTo(this.savePath)

    this.current = working
    return { result, backup }
  }

  /**
   * Set every listed flag to one value in a slot.
   * IDs outside the flag blob are reported and skipped. An empty list
   * changes nothing and takes no backup.
   */
  async setFlags(
    slotIndex: number,
    flagIds: Iterable<number>,
    value: boolean
  ): Promise<FlagEditResult> {
    this.requireCharacter(slotIndex)

    const ids = [...new Set(flagIds)].sort((a, b) => a - b)
    if (ids.length === 0) {
      return { requested: 0, applied: 0, failed: [], backupId: null }
    }

    const slotNumber = slotIndex + 1
    const { result, backup } = await this.mutate(
      {
        description: `before_advanced_flags_slot_${slotNumber}`,
        operation: `advanced_flags_slot_${slotNumber}`
      },
      (working) =>
        working.applyFlagChanges(
          slotIndex,
          ids.map((flagId) => ({ flagId, value }))
        )
    )

    for (const failure of result.failed) {
      this.logger.warn(
        `Failed to set flag ${failure.flagId}: ${failure.error.message}`
      )
    }

    return {
      requested: ids.length,
      applied: result.applied,
      failed: result.failed,
      backupId: backup.id
    }
  }

  /**
   * Bring flags to the given states, writing only those that differ.
   * Nothing is backed up or written when every flag already matches.
   */
  async applyFlagStates(
    slotIndex: number,
    desired: Iterable<FlagChange>,
    info?: MutationInfo
  ): Promise<FlagEditResult> {
    const slot = this.requireCharacter(slotIndex)

    // Later entries for the same flag win
    const states = new Map<number, boolean>()
    for (const { flagId, value } of desired) {
      states.set(flagId, value)
    }
    const wanted = [...states].map(([flagId, value]) => ({ flagId, value }))

    const failed: FlagEditResult['failed'] = []
    for (const reading of slot.readFlags(states.keys())) {
      if ('error' in reading) {
        failed.push({ flagId: reading.flagId, error: reading.error })
      }
    }

    const changes = slot.diffFlagChanges(wanted)
    if (changes.length === 0) {
      return { requested: wanted.length, applied: 0, failed, backupId: null }
    }

    const slotNumber = slotIndex + 1
    const { result, backup } = await this.mutate(
      info ?? {
        description: `before_event_flags_slot_${slotNumber}`,
        operation: `event_flags_slot_${slotNumber}`
      },
      (working) => working.applyFlagChanges(slotIndex, changes)
    )

    return {
      requested: wanted.length,
      applied: result.applied,
      failed: [...failed, ...result.failed],
      backupId: backup.id
    }
  }

  /**
   * Turn on every documented flag of a catalog category.
   */
  async unlockCategory(
    slotIndex: number,
    catalog: FlagCatalog,
    category: string,
    subcategory?: string
  ): Promise<FlagEditResult> {
    const flagIds = catalog.flagsIn(category, subcategory)
    invariant(
      flagIds.length > 0,
      `No flags in ${category}${subcategory ? ` > ${subcategory}` : ''}`
    )

    const slotNumber = slotIndex + 1
    return this.applyFlagStates(
      slotIndex,
      flagIds.map((flagId) => ({ flagId, value: true })),
      {
        description: `before_unlock_${category}_slot_${slotNumber}`,
        operation: `unlock_category_slot_${slotNumber}`
      }
    )
  }

  /**
   * Rewrite every digest so the game accepts the file again.
   */
  async fixChecksums(): Promise<Backup> {
    const { backup } = await this.mutate(
      { description: 'before_fix_checksums', operation: 'fix_checksums' },
      () => undefined
    )
    return backup
  }

  async listBackups(): Promise<Backup[]> {
    return this.backups.listBackups(this.savePath)
  }

  /**
   * Put a backup's bytes back in place of the save file.
   * The restored image is checked as a container and written verbatim; the
   * file it replaces is backed up first. Needs no open(), so a save that no
   * longer loads can still be restored.
   */
  async restore(backupId: string): Promise<RestoreResult> {
    const restored = await this.backups.getBackup(this.savePath, backupId)
    if (!restored) {
      throw new Error(`No backup "${backupId}" for ${this.savePath}`)
    }

    const data = await this.backups.restore(restored)
    const container = SaveContainer.load(data, this.profile)

    const safetyBackup = await this.backups.createBackup(
      this.savePath,
      `before_restore_${backupId}`,
      'restore_backup'
    )
    await container.saveTo(this.savePath)

    this.current = container
    return { restored, safetyBackup }
  }

  private requireCharacter(slotIndex: number): CharacterSlot {
    const slot = this.container.slot(slotIndex)
    if (slot.isEmpty()) {
      throw new EmptySlotError(slotIndex)
    }
    return slot
  }
}

/**
 * Error thrown when editing flags of a slot that holds no character.
 */
export class EmptySlotError extends Error {
  constructor(public readonly slotIndex: number) {
    super(`Slot ${slotIndex + 1} is empty`)
    this.name = 'EmptySlotError'
  }
}
