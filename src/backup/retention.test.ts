import { describe, it, expect } from 'vitest'

import { keepAll, keepLatest, keepWithin } from './retention'
import type { Backup } from './types'

function backupAt(createdAt: number): Backup {
  const id = `backup-${createdAt}`
  return {
    formatVersion: 1,
    id,
    sourcePath: '/saves/save.sl2',
    timestamp: new Date(createdAt).toISOString(),
    createdAt,
    description: 'test',
    operation: 'test',
    size: 0,
    crc32: 0,
    dataFile: `${id}.bak`,
    dataPath: `/saves/save.sl2.backups/${id}.bak`
  }
}

// Most recent first, as the manager passes them
const backups = [5000, 4000, 3000, 2000, 1000].map(backupAt)

describe('retention policies', () => {
  it('keepAll should select nothing', () => {
    expect(keepAll().select(backups)).toEqual([])
  })

  describe('keepLatest', () => {
    it('should select everything past the newest count', () => {
      const selected = keepLatest(2).select(backups)

      expect(selected.map((b) => b.createdAt)).toEqual([3000, 2000, 1000])
    })

    it('should select nothing when under the limit', () => {
      expect(keepLatest(10).select(backups)).toEqual([])
    })

    it('should reject non-positive counts', () => {
      expect(() => keepLatest(0)).toThrow('count must be a positive integer')
      expect(() => keepLatest(1.5)).toThrow('count must be an integer')
    })
  })

  describe('keepWithin', () => {
    it('should select backups older than the window', () => {
      const policy = keepWithin(2500, () => 6000)

      expect(policy.select(backups).map((b) => b.createdAt)).toEqual([
        3000, 2000, 1000
      ])
    })

    it('should keep a backup exactly at the cutoff', () => {
      const policy = keepWithin(3000, () => 6000)

      expect(policy.select(backups).map((b) => b.createdAt)).toEqual([
        2000, 1000
      ])
    })

    it('should reject negative ages', () => {
      expect(() => keepWithin(-1)).toThrow('maxAgeMs must not be negative')
    })
  })
})
