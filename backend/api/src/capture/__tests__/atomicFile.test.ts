import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises'
import os from 'node:os'
import path from 'node:path'
import { commitFile, discardFile, ensureParentDir, tempPathFor } from '../atomicFile.js'

let dir: string

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), 'organ-sampler-'))
})

afterEach(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe('atomic files', () => {
  it('names the temp file as a hidden sibling', () => {
    expect(tempPathFor('/samples/Org/036-c.mp3', 'take1')).toBe('/samples/Org/.036-c.mp3.take1.part')
  })

  it('replaces an earlier take and leaves only the final file', async () => {
    const target = path.join(dir, 'Dorpskerk', 'Hoofdwerk', '036-c.mp3')
    await ensureParentDir(target)
    for (const [tag, data] of [['t1', 'first'], ['t2', 'second']]) {
      const temp = tempPathFor(target, tag)
      await writeFile(temp, data)
      await commitFile(temp, target)
    }

    expect(await readFile(target, 'utf8')).toBe('second')
    expect(await readdir(path.dirname(target))).toEqual(['036-c.mp3'])
  })

  it('ignores a temp file that is already gone', async () => {
    await expect(discardFile(path.join(dir, '.missing.part'))).resolves.toBeUndefined()
  })
})
