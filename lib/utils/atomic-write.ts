import path from 'path'
import * as fs from 'fs-extra'

/**
 * Write `contents` to `filePath` through a temp file in the same directory and a rename,
 * so readers only ever see the previous file or the complete new one.
 */
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const directory = path.dirname(filePath)
  await fs.ensureDir(directory)

  const tempPath = path.join(
    directory,
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2, 8)}.tmp`
  )

  try {
    await fs.writeFile(tempPath, contents, 'utf8')
    await fs.rename(tempPath, filePath)
  } catch (error) {
    await fs.remove(tempPath).catch((cleanupError: unknown) => {
      console.warn('[writeFileAtomic] Failed to remove temp file:', tempPath, cleanupError)
    })
    throw error
  }
}
