import { randomUUID } from 'node:crypto'
import { access, rename, rm, writeFile } from 'node:fs/promises'
import path from 'node:path'

export function resolveWithin(baseDir: string, relativePath: string): string {
  const base = path.resolve(baseDir)
  const resolved = path.resolve(base, relativePath)
  if (!resolved.startsWith(base + path.sep) && resolved !== base) {
    throw new Error('Path escapes base directory')
  }
  return resolved
}

/**
 * Replace `filePath` in one step: readers see either the old content or the
 * new one, never a partial write.
 */
export async function writeFileAtomic(filePath: string, content: string, mode = 0o600): Promise<void> {
  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`)
  try {
    await writeFile(tempPath, content, { encoding: 'utf8', mode })
    await rename(tempPath, filePath)
  } catch (error) {
    await rm(tempPath, { force: true })
    throw error
  }
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}
