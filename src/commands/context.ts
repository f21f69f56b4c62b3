import invariant from 'tiny-invariant'
import { keepLatest } from '../backup'
import { SaveEditor } from '../editor'
import { FlagCatalog } from '../flag-catalog'
import { defaultProfile, loadProfile, slotCount } from '../save-format'

export interface EditorFlags {
  profile?: string
  backupDir?: string
  keep?: number
}

/**
 * Build an editor from the shared command line flags without reading the
 * save file.
 */
export async function createEditor(
  savePath: string,
  flags: EditorFlags
): Promise<SaveEditor> {
  const profile = flags.profile
    ? await loadProfile(flags.profile)
    : defaultProfile

  return new SaveEditor({
    savePath,
    profile,
    backupDir: flags.backupDir,
    retention: flags.keep === undefined ? undefined : keepLatest(flags.keep)
  })
}

/**
 * Build an editor and load the save.
 */
export async function openEditor(
  savePath: string,
  flags: EditorFlags
): Promise<SaveEditor> {
  const editor = await createEditor(savePath, flags)
  await editor.open()
  return editor
}

export async function loadCatalog(
  catalogPath: string | undefined
): Promise<FlagCatalog> {
  return catalogPath
    ? FlagCatalog.fromFile(catalogPath)
    : FlagCatalog.fromEntries([])
}

/**
 * Convert a 1-based slot number from the command line to an index.
 */
export function toSlotIndex(slot: number): number {
  invariant(
    Number.isInteger(slot) && slot >= 1 && slot <= slotCount,
    `Slot must be between 1 and ${slotCount}.`
  )
  return slot - 1
}

export function reportError(error: unknown): void {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`)
  process.exitCode = 1
}
