import invariant from 'tiny-invariant'
import type { Backup } from './types'

/**
 * Decides which backups of a source to delete.
 * Receives the source's backups most recent first.
 */
export interface RetentionPolicy {
  /** Human readable summary, shown by the CLI */
  readonly description: string
  select(backups: readonly Backup[]): Backup[]
}

/**
 * Never delete anything.
 */
export function keepAll(): RetentionPolicy {
  return {
    description: 'keep all backups',
    select: () => []
  }
}

/**
 * Keep the newest `count` backups.
 * @param count - Number of backups to keep (must be positive)
 */
export function keepLatest(count: number): RetentionPolicy {
  invariant(Number.isInteger(count), 'count must be an integer')
  invariant(count > 0, 'count must be a positive integer')

  return {
    description: `keep the latest ${count} backup(s)`,
    select: (backups) => backups.slice(count)
  }
}

/**
 * Keep backups younger than maxAgeMs.
 * @param maxAgeMs - Maximum age in milliseconds
 * @param now - Clock in Unix milliseconds (default: Date.now)
 */
export function keepWithin(
  maxAgeMs: number,
  now: () => number = Date.now
): RetentionPolicy {
  invariant(maxAgeMs >= 0, 'maxAgeMs must not be negative')

  return {
    description: `keep backups younger than ${maxAgeMs}ms`,
    select: (backups) => {
      const cutoff = now() - maxAgeMs
      return backups.filter((backup) => backup.createdAt < cutoff)
    }
  }
}
