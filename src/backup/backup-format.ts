/**
 * On-disk format of the backup store.
 *
 * Each backup is two files in the backup directory:
 * <id>.bak   the complete file image, byte for byte
 * <id>.json  BackupMetadata, the commit record
 */

import type { BackupMetadata } from './types'

export const metadataVersion = 1

export const fileExtensions = {
  data: '.bak',
  metadata: '.json',
  directory: '.backups'
} as const

/**
 * Backup id for a creation time: YYYYMMDD-HHmmss-SSS in UTC.
 * Ids of the same source sort chronologically.
 */
export function formatBackupId(date: Date, sequence = 0): string {
  const stamp = date
    .toISOString()
    .replace(/[-:]/g, '')
    .replace('T', '-')
    .replace('.', '-')
    .replace('Z', '')
  return sequence === 0 ? stamp : `${stamp}-${sequence}`
}

/**
 * Collision counter of a backup id: 0 without a suffix, n for "-n".
 */
export function backupSequence(id: string): number {
  const match = /^\d{8}-\d{6}-\d{3}-(\d+)$/.exec(id)
  return match ? Number(match[1]) : 0
}

export function serializeMetadata(metadata: BackupMetadata): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(metadata, null, 2) + '\n')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Parse a metadata file.
 * Returns null if the content is not valid metadata.
 */
export function deserializeMetadata(content: string): BackupMetadata | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch {
    return null
  }

  if (!isRecord(parsed)) {
    return null
  }

  const {
    formatVersion,
    id,
    sourcePath,
    timestamp,
    createdAt,
    description,
    operation,
    size,
    crc32,
    dataFile
  } = parsed

  if (
    typeof formatVersion !== 'number' ||
    formatVersion !== metadataVersion ||
    typeof id !== 'string' ||
    typeof sourcePath !== 'string' ||
    typeof timestamp !== 'string' ||
    typeof createdAt !== 'number' ||
    typeof description !== 'string' ||
    typeof operation !== 'string' ||
    typeof size !== 'number' ||
    typeof crc32 !== 'number' ||
    typeof dataFile !== 'string'
  ) {
    return null
  }

  return {
    formatVersion,
    id,
    sourcePath,
    timestamp,
    createdAt,
    description,
    operation,
    size,
    crc32,
    dataFile
  }
}

/**
 * CRC32 implementation using the standard polynomial.
 */
const crc32Table = makeCrc32Table()

function makeCrc32Table(): Uint32Array {
  const table = new Uint32Array(256)
  for (let i = 0; i < 256; i++) {
    let c = i
    for (let j = 0; j < 8; j++) {
      if (c & 1) {
        c = 0xedb88320 ^ (c >>> 1)
      } else {
        c = c >>> 1
      }
    }
    table[i] = c
  }
  return table
}

export function crc32(data: Uint8Array): number {
  let crc = 0xffffffff
  for (let i = 0; i < data.length; i++) {
    crc = crc32Table[(crc ^ data[i]) & 0xff] ^ (crc >>> 8)
  }
  return (crc ^ 0xffffffff) >>> 0
}
