import { writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { describe, it, expect, afterEach } from 'vitest'

import { FlagCatalog } from './flag-catalog'
import { cleanup, createTestDir } from './save-format/integration/helpers'

const entries = [
  {
    id: 1100,
    name: 'Warden defeated',
    category: 'Bosses',
    subcategory: 'Keep'
  },
  { id: 100, name: 'Gatekeeper defeated', category: 'Bosses' },
  { id: 2005, name: 'Lantern acquired', category: 'Items' },
  {
    id: 2010,
    name: 'Rusty key acquired',
    category: 'Items',
    subcategory: 'Keys'
  }
]

describe('FlagCatalog', () => {
  const dirs: string[] = []

  afterEach(async () => {
    await cleanup(dirs)
    dirs.length = 0
  })

  describe('lookups', () => {
    const catalog = FlagCatalog.fromEntries(entries)

    it('should name documented and undocumented flags', () => {
      expect(catalog.size).toBe(4)
      expect(catalog.has(100)).toBe(true)
      expect(catalog.name(100)).toBe('Gatekeeper defeated')
      expect(catalog.name(5)).toBe('Unknown flag')
      expect(catalog.get(5)).toBeUndefined()
    })

    it('should list categories in first-seen order', () => {
      expect(catalog.categories()).toEqual(['Bosses', 'Items'])
      expect(catalog.subcategories('Bosses')).toEqual(['Keep'])
      expect(catalog.subcategories('Spells')).toEqual([])
    })

    it('should list flags of a category in ascending order', () => {
      expect(catalog.flagsIn('Bosses')).toEqual([100, 1100])
      expect(catalog.flagsIn('Items', 'Keys')).toEqual([2010])
      expect(catalog.flagsIn('Spells')).toEqual([])
    })

    it('should reject duplicate ids', () => {
      expect(() =>
        FlagCatalog.fromEntries([
          { id: 1, name: 'a', category: 'x' },
          { id: 1, name: 'b', category: 'x' }
        ])
      ).toThrow('Duplicate flag id 1')
    })
  })

  describe('search', () => {
    const catalog = FlagCatalog.fromEntries(entries)

    it('should match names case-insensitively', () => {
      expect(catalog.search('DEFEATED')).toEqual({
        flagIds: [100, 1100],
        total: 2
      })
    })

    it('should take a number as that exact flag', () => {
      expect(catalog.search(' 71190 ')).toEqual({ flagIds: [71190], total: 1 })
    })

    it('should match parts of names', () => {
      expect(catalog.search('acquired')).toEqual({
        flagIds: [2005, 2010],
        total: 2
      })
      expect(catalog.search('key').flagIds).toEqual([2010])
    })

    it('should cap the results and keep the total', () => {
      expect(catalog.search('e', 2)).toEqual({ flagIds: [100, 1100], total: 4 })
    })

    it('should return nothing for a blank term', () => {
      expect(catalog.search('   ')).toEqual({ flagIds: [], total: 0 })
    })
  })

  describe('fromFile', () => {
    it('should load a JSON array', async () => {
      const dir = await createTestDir('catalog')
      dirs.push(dir)
      const catalogPath = join(dir, 'flags.json')
      await writeFile(catalogPath, JSON.stringify(entries))

      const catalog = await FlagCatalog.fromFile(catalogPath)

      expect(catalog.size).toBe(4)
      expect(catalog.get(2010)).toEqual(entries[3])
    })

    it('should reject malformed entries', async () => {
      const dir = await createTestDir('catalog')
      dirs.push(dir)
      const catalogPath = join(dir, 'flags.json')
      await writeFile(catalogPath, JSON.stringify([{ id: 'one', name: 'x' }]))

      await expect(FlagCatalog.fromFile(catalogPath)).rejects.toThrow(
        'Flag id must be a non-negative integer.'
      )
    })

    it('should reject anything but an array', async () => {
      const dir = await createTestDir('catalog')
      dirs.push(dir)
      const catalogPath = join(dir, 'flags.json')
      await writeFile(catalogPath, '{}')

      await expect(FlagCatalog.fromFile(catalogPath)).rejects.toThrow(
        'Flag catalog must be a JSON array.'
      )
    })
  })
})
