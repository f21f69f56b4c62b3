import { readFile } from 'node:fs/promises'
import invariant from 'tiny-invariant'

export interface FlagCatalogEntry {
  id: number
  name: string
  category: string
  subcategory?: string
}

export interface FlagSearchResult {
  /** Matching flag IDs, ascending, at most `limit` */
  flagIds: number[]
  /** Number of matches before the limit was applied */
  total: number
}

const unknownFlagName = 'Unknown flag'

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Read-only table of documented flags: names and categories.
 * Built once and shared; nothing mutates it after construction.
 */
export class FlagCatalog {
  private readonly entries: ReadonlyMap<number, Readonly<FlagCatalogEntry>>
  private readonly categoryOrder: readonly string[]

  private constructor(entries: FlagCatalogEntry[]) {
    const byId = new Map<number, Readonly<FlagCatalogEntry>>()
    const categories: string[] = []
    for (const entry of entries) {
      invariant(!byId.has(entry.id), `Duplicate flag id ${entry.id}`)
      byId.set(entry.id, Object.freeze({ ...entry }))
      if (!categories.includes(entry.category)) {
        categories.push(entry.category)
      }
    }
    this.entries = byId
    this.categoryOrder = categories
  }

  static fromEntries(entries: Iterable<FlagCatalogEntry>): FlagCatalog {
    return new FlagCatalog([...entries])
  }

  /**
   * Load a catalog from a JSON array of { id, name, category, subcategory? }.
   */
  static async fromFile(filePath: string): Promise<FlagCatalog> {
    const parsed: unknown = JSON.parse(await readFile(filePath, 'utf-8'))
    invariant(Array.isArray(parsed), 'Flag catalog must be a JSON array.')

    const entries: FlagCatalogEntry[] = []
    for (const item of parsed) {
      invariant(isRecord(item), 'Flag catalog entries must be objects.')
      const { id, name, category, subcategory } = item
      invariant(
        typeof id === 'number' && Number.isSafeInteger(id) && id >= 0,
        'Flag id must be a non-negative integer.'
      )
      invariant(typeof name === 'string', `Flag ${id} needs a name.`)
      invariant(typeof category === 'string', `Flag ${id} needs a category.`)
      invariant(
        subcategory === undefined || typeof subcategory === 'string',
        `Flag ${id} has an invalid subcategory.`
      )
      entries.push(
        subcategory === undefined
          ? { id, name, category }
          : { id, name, category, subcategory }
      )
    }
    return new FlagCatalog(entries)
  }

  get size(): number {
    return this.entries.size
  }

  has(flagId: number): boolean {
    return this.entries.has(flagId)
  }

  get(flagId: number): Readonly<FlagCatalogEntry> | undefined {
    return this.entries.get(flagId)
  }

  /**
   * Display name; undocumented IDs are still valid flags.
   */
  name(flagId: number): string {
    return this.entries.get(flagId)?.name ?? unknownFlagName
  }

  /** Categories in first-seen order */
  categories(): string[] {
    return [...this.categoryOrder]
  }

  subcategories(category: string): string[] {
    const result: string[] = []
    for (const entry of this.entries.values()) {
      if (
        entry.category === category &&
        entry.subcategory !== undefined &&
        !result.includes(entry.subcategory)
      ) {
        result.push(entry.subcategory)
      }
    }
    return result
  }

  /**
   * Flag IDs of a category, optionally narrowed to one subcategory.
   */
  flagsIn(category: string, subcategory?: string): number[] {
    const result: number[] = []
    for (const entry of this.entries.values()) {
      if (
        entry.category === category &&
        (subcategory === undefined || entry.subcategory === subcategory)
      ) {
        result.push(entry.id)
      }
    }
    return result.sort((a, b) => a - b)
  }

  /**
   * Find flags by ID or name.
   * A purely numeric term is taken as that exact ID, documented or not.
   * Otherwise matches names (case-insensitive) and ID digits.
   */
  search(term: string, limit = 100): FlagSearchResult {
    invariant(limit > 0, 'Limit must be a positive integer.')

    const needle = term.trim().toLowerCase()
    if (!needle) {
      return { flagIds: [], total: 0 }
    }

    if (/^\d+$/.test(needle)) {
      return { flagIds: [Number(needle)], total: 1 }
    }

    const matches: number[] = []
    for (const entry of this.entries.values()) {
      if (
        entry.name.toLowerCase().includes(needle) ||
        String(entry.id).includes(needle)
      ) {
        matches.push(entry.id)
      }
    }
    matches.sort((a, b) => a - b)

    return { flagIds: matches.slice(0, limit), total: matches.length }
  }
}
