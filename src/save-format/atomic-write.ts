import { mkdir, open, rename, rm } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'

/**
 * Replace a file without ever exposing a partially written version.
 *
 * Writes to a temporary file in the target's directory, syncs it, then
 * renames it over the target. On failure the temporary file is removed and
 * the target keeps its previous contents.
 */
export async function writeFileAtomic(
  filePath: string,
  data: Uint8Array
): Promise<void> {
  const directory = dirname(filePath)
  const suffix = `${process.pid}-${Date.now()}-${Math.random().toString(36).slice(2)}`
  const tempPath = join(directory, `.${basename(filePath)}.${suffix}.tmp`)

  await mkdir(directory, { recursive: true })

  try {
    const fileHandle = await open(tempPath, 'wx')
    try {
      await fileHandle.write(data, 0, data.length, 0)
      await fileHandle.sync()
    } finally {
      await fileHandle.close()
    }

    await rename(tempPath, filePath)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}
