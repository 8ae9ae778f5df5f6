import { mkdir, rename, rm } from 'node:fs/promises'
import path from 'node:path'

/** Hidden sibling of `finalPath` in the same directory; encoders write here. */
export function tempPathFor(finalPath: string, tag: string): string {
  const dir = path.dirname(finalPath)
  return path.join(dir, `.${path.basename(finalPath)}.${tag}.part`)
}

export async function ensureParentDir(filePath: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true })
}

/** Move a finished temp file into place, replacing any earlier take. */
export async function commitFile(tempPath: string, finalPath: string): Promise<void> {
  await rename(tempPath, finalPath)
}

export async function discardFile(tempPath: string): Promise<void> {
  await rm(tempPath, { force: true })
}
