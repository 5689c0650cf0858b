import { mkdir, readdir, rename, rm, writeFile } from 'node:fs/promises'
import { existsSync } from 'node:fs'
import { randomUUID } from 'node:crypto'
import { basename, dirname, extname, join } from 'node:path'

/**
 * Check whether a file exists
 */
export function exists(path: string): boolean {
  return existsSync(path)
}

/**
 * Create a directory and its parents
 */
export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true })
}

/**
 * Write a file so readers never observe a partial result: the data goes to
 * a temporary sibling first, which is then renamed over the target.
 * @param path - Target file path
 * @param data - File content
 */
export async function writeFileAtomic(
  path: string,
  data: Uint8Array
): Promise<void> {
  const dir = dirname(path)
  const tempPath = join(dir, `.${basename(path)}.${randomUUID()}.tmp`)

  await mkdir(dir, { recursive: true })

  try {
    await writeFile(tempPath, data)
    await rename(tempPath, path)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}

/**
 * List .epub files directly inside a directory (no recursion)
 * @param dir - Directory to scan
 * @returns File names, sorted
 */
export async function listEpubFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true })

  return entries
    .filter(
      (entry) => entry.isFile() && extname(entry.name).toLowerCase() === '.epub'
    )
    .map((entry) => entry.name)
    .sort()
}
