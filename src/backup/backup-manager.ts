/**
 * Backup Manager - snapshots a save file before it is modified.
 *
 * Implements the commit path: reserve id → copy → fsync → metadata → rename.
 * The metadata file is the commit point; a backup is listed only once its
 * metadata exists, so a failed backup leaves nothing behind in the index.
 */

import { mkdir, open, readFile, readdir, rm } from 'node:fs/promises'
import type { FileHandle } from 'node:fs/promises'
import { basename, dirname, join, resolve } from 'node:path'
import { writeFileAtomic } from '../save-format/atomic-write'
import type { Logger } from '../types'
import {
  backupSequence,
  crc32,
  deserializeMetadata,
  fileExtensions,
  formatBackupId,
  metadataVersion,
  serializeMetadata
} from './backup-format'
import { keepAll } from './retention'
import type { RetentionPolicy } from './retention'
import type { Backup, BackupManagerOptions, BackupMetadata } from './types'

// Ids reserved for one millisecond before giving up
const maxIdAttempts = 1000

export class BackupManager {
  private readonly backupDir: (sourcePath: string) => string
  private readonly retention: RetentionPolicy
  private readonly now: () => Date
  private readonly logger: Logger

  constructor(options: BackupManagerOptions = {}) {
    const { backupDir } = options
    if (typeof backupDir === 'string') {
      this.backupDir = () => resolve(backupDir)
    } else if (backupDir) {
      this.backupDir = (sourcePath) => resolve(backupDir(sourcePath))
    } else {
      this.backupDir = defaultBackupDir
    }
    this.retention = options.retention ?? keepAll()
    this.now = options.now ?? (() => new Date())
    this.logger = options.logger ?? console
  }

  /**
   * Directory holding the backups of a save file.
   */
  directoryFor(sourcePath: string): string {
    return this.backupDir(resolve(sourcePath))
  }

  /**
   * Snapshot the bytes currently on disk at sourcePath.
   * Must run before anything writes to sourcePath.
   * @throws BackupError if the source cannot be read or the copy cannot be
   * stored; nothing is listed afterwards
   */
  async createBackup(
    sourcePath: string,
    description: string,
    operation: string
  ): Promise<Backup> {
    const absoluteSource = resolve(sourcePath)

    let data: Uint8Array
    try {
      data = await readFile(absoluteSource)
    } catch (error) {
      throw new BackupError(`Cannot read ${absoluteSource}`, error)
    }

    const directory = this.backupDir(absoluteSource)
    const createdAt = this.now()
    let dataPath: string | null = null
    let metadataPath: string | null = null

    try {
      await mkdir(directory, { recursive: true })

      const reserved = await reserveId(directory, createdAt)
      dataPath = reserved.dataPath
      try {
        await reserved.fileHandle.write(data, 0, data.length, 0)
        await reserved.fileHandle.sync()
      } finally {
        await reserved.fileHandle.close()
      }

      const metadata: BackupMetadata = {
        formatVersion: metadataVersion,
        id: reserved.id,
        sourcePath: absoluteSource,
        timestamp: createdAt.toISOString(),
        createdAt: createdAt.getTime(),
        description,
        operation,
        size: data.length,
        crc32: crc32(data),
        dataFile: basename(reserved.dataPath)
      }

      // Commit point
      metadataPath = join(directory, reserved.id + fileExtensions.metadata)
      await writeFileAtomic(metadataPath, serializeMetadata(metadata))

      const backup: Backup = { ...metadata, dataPath: reserved.dataPath }
      await this.applyRetention(absoluteSource, backup.id)
      return backup
    } catch (error) {
      if (metadataPath) {
        await rm(metadataPath, { force: true })
      }
      if (dataPath) {
        await rm(dataPath, { force: true })
      }
      throw new BackupError(`Cannot store backup of ${absoluteSource}`, error)
    }
  }

  /**
   * Committed backups of a source, most recent first.
   */
  async listBackups(sourcePath: string): Promise<Backup[]> {
    const absoluteSource = resolve(sourcePath)
    const directory = this.backupDir(absoluteSource)

    let names: string[]
    try {
      names = await readdir(directory)
    } catch (error) {
      if (isErrorCode(error, 'ENOENT')) {
        return []
      }
      throw error
    }

    const backups: Backup[] = []
    for (const name of names) {
      if (!name.endsWith(fileExtensions.metadata)) {
        continue
      }

      const content = await readFile(join(directory, name), 'utf-8')
      const metadata = deserializeMetadata(content)
      if (!metadata || metadata.sourcePath !== absoluteSource) {
        continue
      }

      backups.push({
        ...metadata,
        dataPath: join(directory, metadata.dataFile)
      })
    }

    return backups.sort(
      (a, b) =>
        b.createdAt - a.createdAt ||
        backupSequence(b.id) - backupSequence(a.id) ||
        (a.id < b.id ? 1 : a.id > b.id ? -1 : 0)
    )
  }

  async getBackup(sourcePath: string, id: string): Promise<Backup | null> {
    const backups = await this.listBackups(sourcePath)
    return backups.find((backup) => backup.id === id) ?? null
  }

  /**
   * The stored bytes of a backup, unmodified.
   * @throws BackupCorruptedError if the copy no longer matches its metadata
   */
  async restore(backup: Backup): Promise<Uint8Array> {
    let data: Uint8Array
    try {
      data = new Uint8Array(await readFile(backup.dataPath))
    } catch (error) {
      throw new BackupError(`Cannot read backup ${backup.id}`, error)
    }

    if (data.length !== backup.size || crc32(data) !== backup.crc32) {
      throw new BackupCorruptedError(backup.id)
    }
    return data
  }

  /**
   * Delete a backup. Metadata goes first so the backup stops being listed
   * before its data disappears.
   */
  async deleteBackup(backup: Backup): Promise<void> {
    const directory = dirname(backup.dataPath)
    await rm(join(directory, backup.id + fileExtensions.metadata), {
      force: true
    })
    await rm(backup.dataPath, { force: true })
  }

  /**
   * Apply the retention policy to a source's backups.
   * @returns The deleted backups
   */
  async prune(sourcePath: string): Promise<Backup[]> {
    return this.pruneExcept(resolve(sourcePath), null)
  }

  private async pruneExcept(
    absoluteSource: string,
    keepId: string | null
  ): Promise<Backup[]> {
    const backups = await this.listBackups(absoluteSource)
    const selected = this.retention
      .select(backups)
      .filter((backup) => backup.id !== keepId)

    for (const backup of selected) {
      await this.deleteBackup(backup)
    }
    return selected
  }

  /**
   * Runs after a commit. A failed prune leaves extra backups behind, which
   * does not affect the new one.
   */
  private async applyRetention(
    absoluteSource: string,
    newId: string
  ): Promise<void> {
    try {
      await this.pruneExcept(absoluteSource, newId)
    } catch (error) {
      this.logger.warn(
        `Failed to prune backups of ${absoluteSource}: ${
          error instanceof Error ? error.message : String(error)
        }`
      )
    }
  }
}

function defaultBackupDir(sourcePath: string): string {
  return join(
    dirname(sourcePath),
    basename(sourcePath) + fileExtensions.directory
  )
}

interface ReservedId {
  id: string
  dataPath: string
  fileHandle: FileHandle
}

/**
 * Claim an unused id by creating its data file exclusively.
 * Backups created within the same millisecond get a numeric suffix above
 * every suffix already stored for that millisecond.
 */
async function reserveId(directory: string, date: Date): Promise<ReservedId> {
  const first = await nextSequence(directory, formatBackupId(date))
  for (let sequence = first; sequence < first + maxIdAttempts; sequence++) {
    const id = formatBackupId(date, sequence)
    const dataPath = join(directory, id + fileExtensions.data)
    try {
      const fileHandle = await open(dataPath, 'wx')
      return { id, dataPath, fileHandle }
    } catch (error) {
      if (isErrorCode(error, 'EEXIST')) {
        continue
      }
      throw error
    }
  }
  throw new Error(`No free backup id in ${directory}`)
}

async function nextSequence(directory: string, stamp: string): Promise<number> {
  let next = 0
  for (const name of await readdir(directory)) {
    const id = name.slice(0, name.lastIndexOf('.'))
    if (id === stamp || id.startsWith(`${stamp}-`)) {
      next = Math.max(next, backupSequence(id) + 1)
    }
  }
  return next
}

function isErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

/**
 * Error thrown when a backup cannot be created or read.
 * The mutation that asked for the backup must not go ahead.
 */
export class BackupError extends Error {
  constructor(message: string, cause: unknown) {
    super(
      `${message}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    )
    this.name = 'BackupError'
  }
}

/**
 * Error thrown when a stored copy no longer matches its recorded size or
 * CRC32.
 */
export class BackupCorruptedError extends Error {
  constructor(public readonly backupId: string) {
    super(`Backup ${backupId} is corrupted`)
    this.name = 'BackupCorruptedError'
  }
}
