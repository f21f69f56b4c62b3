import { describe, it, expect } from 'vitest'

import {
  backupSequence,
  crc32,
  deserializeMetadata,
  formatBackupId,
  serializeMetadata
} from './backup-format'
import type { BackupMetadata } from './types'

const metadata: BackupMetadata = {
  formatVersion: 1,
  id: '20240102-030405-006',
  sourcePath: '/saves/save.sl2',
  timestamp: '2024-01-02T03:04:05.006Z',
  createdAt: Date.UTC(2024, 0, 2, 3, 4, 5, 6),
  description: 'before_fix_checksums',
  operation: 'fix_checksums',
  size: 3,
  crc32: 0x352441c2,
  dataFile: '20240102-030405-006.bak'
}

describe('backup format', () => {
  describe('formatBackupId', () => {
    it('should format the UTC time', () => {
      const date = new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6))

      expect(formatBackupId(date)).toBe('20240102-030405-006')
      expect(formatBackupId(date, 2)).toBe('20240102-030405-006-2')
    })
  })

  describe('backupSequence', () => {
    it('should read the collision suffix as a number', () => {
      expect(backupSequence('20240102-030405-006')).toBe(0)
      expect(backupSequence('20240102-030405-006-2')).toBe(2)
      expect(backupSequence('20240102-030405-006-10')).toBe(10)
      expect(backupSequence('manual')).toBe(0)
    })
  })

  describe('metadata', () => {
    it('should read back what it writes', () => {
      const text = new TextDecoder().decode(serializeMetadata(metadata))

      expect(text.endsWith('}\n')).toBe(true)
      expect(deserializeMetadata(text)).toEqual(metadata)
    })

    it('should return null for anything else', () => {
      expect(deserializeMetadata('{')).toBeNull()
      expect(deserializeMetadata('[]')).toBeNull()
      expect(
        deserializeMetadata(JSON.stringify({ ...metadata, formatVersion: 2 }))
      ).toBeNull()
      expect(
        deserializeMetadata(JSON.stringify({ ...metadata, size: '3' }))
      ).toBeNull()
    })
  })

  describe('crc32', () => {
    it('should match the standard check values', () => {
      expect(crc32(new TextEncoder().encode('abc'))).toBe(0x352441c2)
      expect(crc32(new TextEncoder().encode('123456789'))).toBe(0xcbf43926)
      expect(crc32(new Uint8Array(0))).toBe(0)
    })
  })
})
